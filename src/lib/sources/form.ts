import { z } from 'zod';
import { daysBetween } from '../date';
import { normalizeName } from '../normalize';
import { toPlaceCounts } from '../signals';
import type { FormFragment, FormIndex, LastRun, WinRun } from '../types';
import { lenientArray, optionalNumber, optionalText, text } from './schema';
import { AUS_STATES } from './tab';

/*
  form provider（GraphQL）の 3 フェーズ
    1. stats    : 日付単位。通算・馬場別・枠別・クラス
    2. lastRun  : 開催単位。前走の着順・距離・クラス・日時
    3. people   : 日付単位。騎手・調教師の通算
  どのフェーズも欠けてよい。欠けた分は enrichment されないだけ。
*/

const EntryConditionSchema = z.object({ type: text, description: text });

const WinRunSchema = z.object({ wins: optionalNumber, totalRuns: optionalNumber }).catch({});

const BarrierStatSchema = z.object({
  name: z.union([z.string(), z.number()]).transform((v) => String(v).trim()),
  wins: optionalNumber,
  runs: optionalNumber,
});

const StatsSchema = z
  .object({
    wins: optionalNumber,
    totalRuns: optionalNumber,
    dryPlaces: z.unknown(),
    wetPlaces: z.unknown(),
    class: optionalText,
    barrierStats: lenientArray(BarrierStatSchema),
  })
  .catch({ barrierStats: [] });

const CompetitorSchema = z.object({ name: text }).catch({ name: '' });

const StatsSelectionSchema = z.object({
  id: optionalText,
  competitor: CompetitorSchema,
  stats: StatsSchema,
});

const StatsEventSchema = z.object({
  entryConditions: lenientArray(EntryConditionSchema),
  selections: lenientArray(StatsSelectionSchema),
});

const StatsMeetingSchema = z.object({
  id: optionalText,
  state: text,
  events: lenientArray(StatsEventSchema),
});

const StatsPayloadSchema = z.object({ meetings: lenientArray(StatsMeetingSchema) }).catch({ meetings: [] });

const LastRunSchema = z.object({
  finishPosition: optionalNumber,
  margin: optionalNumber,
  meetingName: optionalText,
  event: z
    .object({
      distance: optionalNumber,
      startTime: optionalText,
      entryConditions: lenientArray(EntryConditionSchema),
    })
    .catch({ entryConditions: [] }),
});

const LastRunSelectionSchema = z.object({
  id: optionalText,
  competitor: CompetitorSchema,
  lastRun: LastRunSchema.nullish().catch(undefined),
});

const LastRunPayloadSchema = z
  .object({
    meeting: z
      .object({ events: lenientArray(z.object({ selections: lenientArray(LastRunSelectionSchema) })) })
      .nullish()
      .catch(undefined),
  })
  .catch({});

const PersonSchema = z.object({ name: text, stats: WinRunSchema }).nullish().catch(undefined);

const PeoplePayloadSchema = z
  .object({
    meetings: lenientArray(
      z.object({
        events: lenientArray(
          z.object({ selections: lenientArray(z.object({ jockey: PersonSchema, trainer: PersonSchema })) })
        ),
      })
    ),
  })
  .catch({ meetings: [] });

function classCondition(conds: ReadonlyArray<{ type: string; description: string }>): string | undefined {
  return conds.find((c) => c.type === 'Class' && c.description)?.description;
}

// stats.class "3:0-1-1" の先頭がクラス。数字でなければそのまま返す
export function parseStatsClass(raw?: string | null): string | undefined {
  const s = (raw ?? '').trim();
  if (!s) return undefined;
  const level = s.split(':')[0]?.trim() ?? '';
  return /^\d+$/.test(level) ? `Class ${level}` : s;
}

export type FormStats = {
  horses: Map<string, FormFragment>; // 正規化した馬名 -> fragment
  ausMeetingIds: string[]; // phase 2 の対象
};

export function parseFormStats(data: unknown): FormStats {
  const payload = StatsPayloadSchema.parse(data);
  const horses = new Map<string, FormFragment>();
  const ausMeetingIds: string[] = [];

  for (const meeting of payload.meetings) {
    if (meeting.id && AUS_STATES.has(meeting.state)) ausMeetingIds.push(meeting.id);
    for (const event of meeting.events) {
      const eventClass = classCondition(event.entryConditions);
      for (const sel of event.selections) {
        const key = normalizeName(sel.competitor.name);
        if (!key) continue;
        const stats = sel.stats;
        const runs = stats.totalRuns ?? 0;
        const barrierStats = new Map<string, WinRun>();
        for (const b of stats.barrierStats) {
          if (!b.name) continue;
          barrierStats.set(b.name, { wins: b.wins ?? 0, runs: b.runs ?? 0 });
        }
        horses.set(key, {
          selectionId: sel.id,
          career: runs > 0 ? { wins: stats.wins ?? 0, runs } : undefined,
          dryPlaces: toPlaceCounts(stats.dryPlaces),
          wetPlaces: toPlaceCounts(stats.wetPlaces),
          currentGrade: eventClass ?? parseStatsClass(stats.class),
          barrierStats,
        });
      }
    }
  }
  return { horses, ausMeetingIds };
}

// 前走情報を重ねる。selection id で引き、無ければ馬名で引く
export function mergeLastRuns(
  horses: ReadonlyMap<string, FormFragment>,
  data: unknown,
  raceDate: string
): { horses: Map<string, FormFragment>; enriched: number } {
  const out = new Map(horses);
  const keyById = new Map<string, string>();
  for (const [key, f] of horses) if (f.selectionId) keyById.set(f.selectionId, key);

  let enriched = 0;
  const meeting = LastRunPayloadSchema.parse(data).meeting;
  for (const event of meeting?.events ?? []) {
    for (const sel of event.selections) {
      const byId = sel.id ? keyById.get(sel.id) : undefined;
      const byName = normalizeName(sel.competitor.name);
      const key = byId ?? (out.has(byName) ? byName : undefined);
      const current = key ? out.get(key) : undefined;
      if (!key || !current || !sel.lastRun) continue;

      const lr = sel.lastRun;
      const lastRun: LastRun = {
        position: lr.finishPosition,
        margin: lr.margin,
        venue: lr.meetingName,
        distance: lr.event.distance,
        grade: classCondition(lr.event.entryConditions),
        startTime: lr.event.startTime,
      };
      out.set(key, { ...current, lastRun, daysSince: daysBetween(raceDate, lr.event.startTime) });
      enriched++;
    }
  }
  return { horses: out, enriched };
}

export function parsePeopleStats(data: unknown): { jockeys: Map<string, WinRun>; trainers: Map<string, WinRun> } {
  const jockeys = new Map<string, WinRun>();
  const trainers = new Map<string, WinRun>();
  const put = (m: Map<string, WinRun>, p: { name: string; stats: { wins?: number; totalRuns?: number } } | null | undefined) => {
    if (!p) return;
    const key = normalizeName(p.name);
    const runs = p.stats.totalRuns ?? 0;
    if (!key || runs <= 0) return;
    m.set(key, { wins: p.stats.wins ?? 0, runs });
  };
  for (const meeting of PeoplePayloadSchema.parse(data).meetings) {
    for (const event of meeting.events) {
      for (const sel of event.selections) {
        put(jockeys, sel.jockey);
        put(trainers, sel.trainer);
      }
    }
  }
  return { jockeys, trainers };
}

export const EMPTY_FORM_INDEX: FormIndex = Object.freeze({
  horses: new Map<string, FormFragment>(),
  jockeys: new Map<string, WinRun>(),
  trainers: new Map<string, WinRun>(),
});
