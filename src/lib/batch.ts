import { z } from 'zod';
import { normalizeName } from './normalize';
import { formatStatLine } from './signals';
import type { LastRun, MeetingRecord, RacePick, RaceRecord, RatingTier, RunnerRecord } from './types';
import { formatPrice, formatRaceHeader, formatStrikeRate, formatWinRun, ordinal, truncate } from './utils';

export const DEFAULT_BATCH_SIZE = 20;
const RUNS_MAX = 110;
// 切り詰め復旧で試す '}' の位置の上限
const RECOVERY_ATTEMPTS = 50;

// 元の順を保ったまま size 件ずつ。size は 1 以上に丸める
export function partition<T>(items: readonly T[], size: number): T[][] {
  const n = Number.isFinite(size) ? Math.max(1, Math.floor(size)) : DEFAULT_BATCH_SIZE;
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += n) out.push(items.slice(i, i + n));
  return out;
}

// --- race text ---

export function formatLastRun(lr: LastRun, daysSince?: number): string {
  let head = lr.position !== undefined ? ordinal(lr.position) : '?';
  if (lr.margin !== undefined && lr.margin > 0) head += ` (${lr.margin}L)`;
  const parts = [head, lr.venue || '?'];
  if (lr.distance) parts.push(`${lr.distance}m`);
  if (daysSince !== undefined) parts.push(`(${daysSince}d ago)`);
  return parts.join(' ');
}

export function freshnessLabel(days: number): string {
  if (days < 14) return 'FRESH';
  if (days > 60) return `RETURNING (${days}d)`;
  return `${days}d`;
}

function surfaceLabel(r: RunnerRecord, trackWet: boolean): string | undefined {
  switch (r.surfacePreference) {
    case 'wet-tracker':
      return trackWet ? '*** WET TRACKER - ADVANTAGES TODAY ***' : 'WET TRACKER';
    case 'dry-preferred':
      return trackWet ? '!! DRY PREFERRED - DISADVANTAGED TODAY' : 'DRY PREFERRED';
    default:
      return undefined;
  }
}

function placeSplit(tag: string, p?: readonly [number, number, number]): string | undefined {
  if (!p || (p[0] === 0 && p[1] === 0 && p[2] === 0)) return undefined;
  return `${tag}:${p[0]}-${p[1]}-${p[2]}`;
}

export function formatFormParts(r: RunnerRecord, trackWet: boolean): string[] {
  const parts: Array<string | undefined> = [];
  if (r.career) parts.push(formatWinRun(r.career));
  parts.push(surfaceLabel(r, trackWet));
  parts.push(placeSplit('Dry', r.dryPlaces));
  parts.push(placeSplit('Wet', r.wetPlaces));
  if (r.daysSince !== undefined) parts.push(freshnessLabel(r.daysSince));
  parts.push(r.distanceStep?.label);
  if (r.jockeyRecord) parts.push(`J%:${formatStrikeRate(r.jockeyRecord)}`);
  if (r.trainerRecord) parts.push(`T%:${formatStrikeRate(r.trainerRecord)}`);
  parts.push(r.barrierFlag?.label);
  parts.push(r.trackBarrierNote?.label);

  const gc = r.gradeChange;
  if (gc?.kind === 'drops') parts.push(`*** ${gc.label.toUpperCase()} ***`);
  else if (gc?.kind === 'rises') parts.push(`!! ${gc.label.toUpperCase()}`);
  else parts.push(gc?.label);

  if (r.speedRating !== undefined) parts.push(`SpeedRating:${r.speedRating}`);
  const stats = r.contextStats;
  const tagged: Array<[string, string]> = [
    ['Track', formatStatLine(stats?.track)],
    ['Dist', formatStatLine(stats?.distance)],
    ['JockeyAtVenue', formatStatLine(stats?.jockeyAtVenue)],
    ['AtClass', formatStatLine(stats?.class)],
  ];
  for (const [tag, s] of tagged) if (s) parts.push(`${tag}:${s}`);
  parts.push(r.weightChange?.label);

  return parts.filter((p): p is string => !!p);
}

export function formatRunnerLine(r: RunnerRecord, trackWet: boolean): string {
  const weight = r.weight ? ` ${r.weight}kg` : '';
  let line =
    `  ${r.number}. ${r.name} (B${r.barrier})${weight} J:${r.jockey} T:${r.trainer} ` +
    `Win:${formatPrice(r.winFixed ?? r.winTote)} Pl:${formatPrice(r.placeFixed ?? r.placeTote)}`;
  const form = formatFormParts(r, trackWet);
  if (form.length) line += `\n    [FORM] ${form.join(' | ')}`;
  if (r.lastRun) line += `\n    [RUNS] ${truncate(formatLastRun(r.lastRun, r.daysSince), RUNS_MAX)}`;
  return line;
}

export function formatRaceBlock(race: RaceRecord): string {
  const lines = [formatRaceHeader(race), ...race.runners.map((r) => formatRunnerLine(r, race.trackWet))];
  return lines.join('\n') + '\n';
}

// --- prompt ---

export const RATING_LABELS: Readonly<Record<RatingTier, string>> = {
  best: '★★★ BEST BET',
  strong: '★★ STRONG BET',
  tip: '★ TIP',
};

const FACTORS = `Weight these factors in order of importance:
1. TRACK CONDITION - on *** WET TRACK ***, heavily favour *** WET TRACKER *** horses. Penalise !! DRY PREFERRED horses.
2. GRADE LEVELLING - *** DROPS IN CLASS *** is a strong positive signal even with ordinary recent form. !! RISES IN CLASS is a negative signal.
3. BARRIER - barrier advantage = horse wins often from today's draw; barrier concern = poor record from this draw. good draw at inside-biased tracks is very valuable. wide draw at tight tracks is a serious disadvantage.
4. JOCKEY FORM - J% shows jockey win rate. Prefer jockeys >15% win rate; avoid <10%.
5. TRAINER FORM - T% shows trainer win rate. High-strike trainers (>20%) are strong signals.
6. DISTANCE - step up suits stayers; step down suits sprinters. Large steps (400m+) are risky. Dist:NW/NR(%) shows record at today's distance.
7. FRESHNESS - FRESH (<14d) = peak fitness. RETURNING (>60d) = fitness risk.
8. CAREER RECORD - low W/R ratio = unexposed and potentially better than odds suggest.
9. DRY/WET SPLITS - Dry:W-P-S and Wet:W-P-S show surface-specific record.
10. SPEED RATING - SpeedRating:N (lower = faster). Prefer SpeedRating <= 5.
11. TRACK/CLASS RECORD - Track:, AtClass: and JockeyAtVenue: show record at this track, this class and the jockey at this venue.
12. WEIGHT - lighter Xkg = positive; heavier Xkg = negative.`;

export function buildBatchPrompt(races: readonly RaceRecord[], date: string, isFirst: boolean): string {
  const raceText = `Horse Racing - ${date}\n\n` + races.map(formatRaceBlock).join('');
  const bestBetNote = isFirst
    ? `Mark exactly 5 of these races as ${RATING_LABELS.best} (your strongest picks today).`
    : `Use ${RATING_LABELS.best} only for outstanding value; otherwise ★★ or ★.`;
  return [
    'You are an expert Australian horse racing analyst. Pick a winner for EVERY race below.',
    '',
    raceText,
    bestBetNote,
    `Use ${RATING_LABELS.strong} for confident picks and ${RATING_LABELS.tip} for speculative picks.`,
    '',
    FACTORS,
    '',
    'Return ONLY valid JSON - no markdown fences, no other text:',
    `{"picks": [{"track": "TRACK NAME", "race_number": 1, "pick": "HORSE NAME", "barrier": "N", "odds": "$X.XX", "rating": "${RATING_LABELS.best}", "analysis": "2-3 sentences citing specific form data."}]}`,
    '',
    'Rules: pick a winner for EVERY race listed. No skipping.',
  ].join('\n');
}

// --- response ---

export function ratingTier(rating: string): RatingTier {
  const stars = (rating.match(/★/g) ?? []).length;
  const upper = rating.toUpperCase();
  if (stars >= 3 || upper.includes('BEST')) return 'best';
  if (stars === 2 || upper.includes('STRONG')) return 'strong';
  return 'tip';
}

const looseText = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .optional()
  .catch(undefined);

const PickEntrySchema = z
  .object({
    track: z.string().trim().min(1),
    race_number: z.coerce.number().int().positive(),
    pick: z.string().trim().min(1),
    barrier: looseText,
    odds: looseText,
    rating: z.string().trim().catch(''),
    analysis: z.string().trim().catch(''),
  })
  .transform((p): RacePick => {
    const tier = ratingTier(p.rating);
    return {
      track: p.track,
      raceNumber: p.race_number,
      pick: p.pick,
      barrier: p.barrier || undefined,
      odds: p.odds || undefined,
      rating: p.rating || RATING_LABELS[tier],
      tier,
      analysis: p.analysis,
    };
  });

const PicksEnvelopeSchema = z.object({ picks: z.array(z.unknown()) });

export type AnalyzerParse = {
  status: 'ok' | 'recovered' | 'failed';
  picks: RacePick[];
};

// コードフェンスや前置きの文章を剥がして JSON 本体だけにする
export function stripFences(raw: string): string {
  let s = raw.trim();
  const fence = s.match(/```(?:json)?\s*([\s\S]*?)(?:```|$)/i);
  if (fence) s = fence[1].trim();
  // 前置きに { が混じることがあるので、"picks" で始まる object を優先する
  const envelope = s.search(/\{\s*"picks"/);
  const start = envelope >= 0 ? envelope : s.indexOf('{');
  return start > 0 ? s.slice(start) : s;
}

function tryJson(s: string): unknown {
  try {
    return JSON.parse(s);
  } catch {
    return undefined;
  }
}

// 不正な要素は捨てる（誤った予想を載せるより 0 件のほうがよい）
function extractPicks(json: unknown): RacePick[] | undefined {
  const env = PicksEnvelopeSchema.safeParse(json);
  if (!env.success) return undefined;
  const out: RacePick[] = [];
  for (const entry of env.data.picks) {
    const r = PickEntrySchema.safeParse(entry);
    if (r.success) out.push(r.data);
  }
  return out;
}

/*
  途中で切れた JSON の復旧:
  末尾側の '}' から順に、その位置で切って "]}" を足したものを試す。
  最初にパースでき picks が取れたものを採用する。
*/
function recoverTruncated(s: string): RacePick[] | undefined {
  let pos = s.lastIndexOf('}');
  for (let attempt = 0; pos > 0 && attempt < RECOVERY_ATTEMPTS; attempt++) {
    const picks = extractPicks(tryJson(s.slice(0, pos + 1) + ']}'));
    if (picks && picks.length) return picks;
    pos = s.lastIndexOf('}', pos - 1);
  }
  return undefined;
}

export function parseAnalyzerResponse(raw: string): AnalyzerParse {
  const body = stripFences(raw);
  const whole = extractPicks(tryJson(body));
  if (whole) return { status: 'ok', picks: whole };
  const recovered = recoverTruncated(body);
  if (recovered) return { status: 'recovered', picks: recovered };
  return { status: 'failed', picks: [] };
}

// --- results ---

export function pickKey(track: string, raceNumber: number): string {
  return `${normalizeName(track)}:${raceNumber}`;
}

// バッチ提出順に適用。同じキーは後に処理したものが勝つ
export function mergeResults(batches: ReadonlyArray<readonly RacePick[]>): Map<string, RacePick> {
  const out = new Map<string, RacePick>();
  for (const batch of batches) {
    for (const p of batch) out.set(pickKey(p.track, p.raceNumber), p);
  }
  return out;
}

// 開催・レース順に並べる。どのレースにも当たらない予想は末尾に残す
export function orderPicks(meetings: readonly MeetingRecord[], picks: ReadonlyMap<string, RacePick>): RacePick[] {
  const out: RacePick[] = [];
  const used = new Set<string>();
  for (const m of meetings) {
    for (const r of m.races) {
      const key = pickKey(m.track, r.raceNumber);
      const p = picks.get(key);
      if (p) {
        out.push(p);
        used.add(key);
      }
    }
  }
  for (const [key, p] of picks) if (!used.has(key)) out.push(p);
  return out;
}

export type MeetingBestBet = { track: string; raceNumber: number; pick: RacePick };

// 開催ごとに最初の ★★★
export function bestBetsByMeeting(meetings: readonly MeetingRecord[], picks: ReadonlyMap<string, RacePick>): MeetingBestBet[] {
  const out: MeetingBestBet[] = [];
  for (const m of meetings) {
    for (const r of m.races) {
      const p = picks.get(pickKey(m.track, r.raceNumber));
      if (p?.tier === 'best') {
        out.push({ track: m.track, raceNumber: r.raceNumber, pick: p });
        break;
      }
    }
  }
  return out;
}
