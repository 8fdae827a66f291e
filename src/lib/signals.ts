import type {
  BarrierFlag,
  DistanceStep,
  PlaceCounts,
  StatLine,
  SurfacePreference,
  TrackBarrierNote,
  TrackBias,
  WeightChange,
  WinRun,
} from './types';
import { formatStrikeRate } from './utils';

const WET_KEYWORDS = ['soft', 'heavy'];

// 馬場状態の文字列全体に soft/heavy が含まれていれば重馬場扱い（トークン化しない）
export function isWetTrack(condition?: string | null): boolean {
  const c = (condition ?? '').toLowerCase();
  if (!c) return false;
  return WET_KEYWORDS.some((w) => c.includes(w));
}

// 配列でない/短い/数値でない場合は 0 で埋める
export function toPlaceCounts(v: unknown): PlaceCounts {
  if (!Array.isArray(v)) return [0, 0, 0];
  const at = (i: number): number => {
    const n = Number(v[i]);
    return Number.isFinite(n) ? n : 0;
  };
  return [at(0), at(1), at(2)];
}

/*
  dry/wet の 1-2-3着回数から馬場適性を判定。
  総出走数が取れないため 3着内回数を分母の代わりに使う。
  wet-tracker を先に評価する。
*/
export function surfacePreference(dry?: readonly unknown[] | null, wet?: readonly unknown[] | null): SurfacePreference {
  const d = toPlaceCounts(dry);
  const w = toPlaceCounts(wet);
  const dryTotal = d[0] + d[1] + d[2];
  const wetTotal = w[0] + w[1] + w[2];
  const dryWins = d[0];
  const wetWins = w[0];

  if (wetTotal >= 2 && wetWins >= 1) {
    const wetRate = wetWins / wetTotal;
    const dryRate = dryTotal >= 2 ? dryWins / dryTotal : 0;
    if (wetRate >= 0.25 && wetRate >= dryRate) return 'wet-tracker';
  }

  if (dryTotal >= 3 && dryWins >= 1) {
    const dryRate = dryWins / dryTotal;
    const wetRate = wetTotal >= 1 ? wetWins / wetTotal : 0;
    if (dryRate > wetRate || (wetTotal === 0 && dryWins >= 1)) return 'dry-preferred';
  }

  return 'none';
}

function toNumber(v: unknown): number | undefined {
  if (typeof v === 'number') return Number.isFinite(v) ? v : undefined;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v.replace(/m$/i, '').trim());
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

export function distanceStep(today: unknown, last: unknown): DistanceStep | undefined {
  const t = toNumber(today);
  const l = toNumber(last);
  if (t === undefined || l === undefined || t <= 0 || l <= 0) return undefined;
  const diff = t - l;
  if (diff === 0) return undefined;
  if (Math.abs(diff) >= 200) {
    return diff > 0
      ? { kind: 'step-up', label: `step up ${Math.abs(diff)}m` }
      : { kind: 'step-down', label: `step down ${Math.abs(diff)}m` };
  }
  return { kind: 'similar', label: `similar (${diff > 0 ? '+' : ''}${diff}m)` };
}

// 今日の枠からの過去成績。3走未満はサンプル不足で出さない
export function barrierFlag(barrier: string, record?: WinRun): BarrierFlag | undefined {
  if (!record || record.runs < 3) return undefined;
  const { wins, runs } = record;
  const pct = (wins / runs) * 100;
  if (pct >= 40) {
    return { kind: 'advantage', label: `barrier advantage ${formatStrikeRate(record, true)} from barrier ${barrier}` };
  }
  if (wins === 0) {
    return { kind: 'concern', label: `barrier concern 0W/${runs}R from barrier ${barrier}` };
  }
  return { kind: 'neutral', label: `barrier ${barrier}: ${formatStrikeRate(record, true)}` };
}

export function parseBarrier(barrier?: string | null): number | undefined {
  const s = (barrier ?? '').trim();
  if (!/^\d+$/.test(s)) return undefined;
  return Number(s);
}

// inside バイアスのコースのみ。even は何も出さない
export function trackBarrierNote(barrier: string, bias: TrackBias): TrackBarrierNote | undefined {
  if (bias.type !== 'inside') return undefined;
  const b = parseBarrier(barrier);
  if (b === undefined) return undefined;
  const suffix = bias.description ? `: ${bias.description}` : '';
  return b <= bias.goodBarrierMax
    ? { kind: 'good-draw', label: `good draw (B${b})${suffix}` }
    : { kind: 'wide-draw', label: `wide draw (B${b})${suffix}` };
}

export function parseKg(v?: string | number | null): number | undefined {
  if (typeof v === 'number') return Number.isFinite(v) ? v : undefined;
  const s = (v ?? '').replace(/kg/i, '').trim();
  if (!s) return undefined;
  const n = Number(s);
  return Number.isFinite(n) ? n : undefined;
}

// 0.4kg 未満は有意差なし。差は 0.1kg 単位に丸めてから判定
export function weightChange(current?: string | number | null, previous?: string | number | null): WeightChange | undefined {
  const curr = parseKg(current);
  const prev = parseKg(previous);
  if (curr === undefined || prev === undefined) return undefined;
  const diff = Math.round((curr - prev) * 10) / 10;
  if (Math.abs(diff) < 0.4) return undefined;
  return diff < 0
    ? { kind: 'lighter', label: `lighter ${Math.abs(diff).toFixed(1)}kg` }
    : { kind: 'heavier', label: `heavier ${diff.toFixed(1)}kg` };
}

// "3:1-1-0" -> { runs: 3, wins: 1, seconds: 1, thirds: 0 }
export function parseStatLine(raw?: string | null): StatLine | undefined {
  const s = (raw ?? '').trim();
  const colon = s.indexOf(':');
  if (colon <= 0) return undefined;
  const runs = Number(s.slice(0, colon));
  if (!Number.isInteger(runs)) return undefined;
  const parts = s.slice(colon + 1).split('-').map((p) => Number(p.trim()));
  if (parts.some((n) => !Number.isInteger(n))) return undefined;
  return { runs, wins: parts[0] ?? 0, seconds: parts[1] ?? 0, thirds: parts[2] ?? 0 };
}

// 表示用 "1W/3R(33%)"。0走は空文字
export function formatStatLine(stat?: StatLine): string {
  if (!stat || stat.runs === 0) return '';
  return formatStrikeRate(stat);
}
