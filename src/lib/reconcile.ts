import { gradeChange } from './difficulty';
import { normalizeName } from './normalize';
import { barrierFlag, distanceStep, surfacePreference, trackBarrierNote, weightChange } from './signals';
import type {
  Enrichment,
  FormFragment,
  RatingsFragment,
  RunnerRecord,
  TrackBias,
  WinRun,
} from './types';

/*
  base（odds feed）+ form + ratings → 1頭分の RunnerRecord

  マージ規則:
  - base の項目はそのままコピー
  - 各 source は「まだ未設定の項目」だけを埋める（先に埋まった値は上書きしない）
  - speedRating / contextStats / weightChange は ratings 専用
  項目が重ならない patch 同士なら適用順に依存しない。
*/

export type EnrichmentSource = 'track' | 'form' | 'ratings';

export type EnrichmentPatch = { source: EnrichmentSource; fields: Enrichment };

export type ReconcileContext = {
  distance?: number; // 今日の距離
  trackBias: TrackBias;
  jockeys?: ReadonlyMap<string, WinRun>;
  trainers?: ReadonlyMap<string, WinRun>;
};

const ENRICHMENT_KEYS = [
  'career',
  'dryPlaces',
  'wetPlaces',
  'daysSince',
  'lastRun',
  'currentGrade',
  'barrierRecord',
  'jockeyRecord',
  'trainerRecord',
  'surfacePreference',
  'distanceStep',
  'barrierFlag',
  'gradeChange',
  'trackBarrierNote',
  'speedRating',
  'contextStats',
  'weightChange',
] as const satisfies ReadonlyArray<keyof Enrichment>;

const RATINGS_ONLY: ReadonlySet<keyof Enrichment> = new Set<keyof Enrichment>(['speedRating', 'contextStats', 'weightChange']);

function fillKey<K extends keyof Enrichment>(out: Enrichment, patch: Enrichment, key: K): void {
  if (out[key] === undefined && patch[key] !== undefined) out[key] = patch[key];
}

export function mergeEnrichment(base: RunnerRecord, patches: readonly EnrichmentPatch[]): RunnerRecord {
  const out: RunnerRecord = { ...base };
  for (const p of patches) {
    for (const key of ENRICHMENT_KEYS) {
      if (RATINGS_ONLY.has(key) && p.source !== 'ratings') continue;
      fillKey(out, p.fields, key);
    }
  }
  return out;
}

export function trackPatch(base: RunnerRecord, bias: TrackBias): EnrichmentPatch {
  return { source: 'track', fields: { trackBarrierNote: trackBarrierNote(base.barrier, bias) } };
}

export function formPatch(base: RunnerRecord, form: FormFragment, ctx: ReconcileContext): EnrichmentPatch {
  const barrierRecord = form.barrierStats.get(base.barrier.trim());
  // 今日のクラスは form provider の currentGrade（開催の Class 条件 > stats の class）
  const currentGrade = form.currentGrade;
  return {
    source: 'form',
    fields: {
      career: form.career,
      dryPlaces: form.dryPlaces,
      wetPlaces: form.wetPlaces,
      daysSince: form.daysSince,
      lastRun: form.lastRun,
      currentGrade,
      barrierRecord,
      surfacePreference: surfacePreference(form.dryPlaces, form.wetPlaces),
      distanceStep: distanceStep(ctx.distance, form.lastRun?.distance),
      barrierFlag: barrierFlag(base.barrier, barrierRecord),
      gradeChange: gradeChange(currentGrade, form.lastRun?.grade),
    },
  };
}

// 騎手・調教師の通算成績は馬の form 有無とは独立に引く
export function peoplePatch(base: RunnerRecord, ctx: ReconcileContext): EnrichmentPatch {
  const pick = (m: ReadonlyMap<string, WinRun> | undefined, name: string): WinRun | undefined => {
    const r = m?.get(normalizeName(name));
    return r && r.runs > 0 ? r : undefined;
  };
  return {
    source: 'form',
    fields: {
      jockeyRecord: pick(ctx.jockeys, base.jockey),
      trainerRecord: pick(ctx.trainers, base.trainer),
    },
  };
}

export function ratingsPatch(ratings: RatingsFragment): EnrichmentPatch {
  return {
    source: 'ratings',
    fields: {
      speedRating: ratings.speedRating,
      contextStats: ratings.stats,
      weightChange: weightChange(ratings.weightToday, ratings.weightLast),
    },
  };
}

export function reconcile(
  base: RunnerRecord,
  form: FormFragment | undefined,
  ratings: RatingsFragment | undefined,
  ctx: ReconcileContext
): RunnerRecord {
  const patches: EnrichmentPatch[] = [trackPatch(base, ctx.trackBias)];
  if (form) patches.push(formPatch(base, form, ctx));
  patches.push(peoplePatch(base, ctx));
  if (ratings) patches.push(ratingsPatch(ratings));
  return mergeEnrichment(base, patches);
}
