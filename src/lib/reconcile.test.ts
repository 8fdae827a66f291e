import { describe, it, expect } from 'vitest';
import { formPatch, mergeEnrichment, ratingsPatch, reconcile, type ReconcileContext } from './reconcile';
import type { FormFragment, RatingsFragment, RunnerRecord } from './types';

const base: RunnerRecord = {
  number: 1,
  name: 'Fast Horse',
  barrier: '3',
  jockey: 'J Smith',
  trainer: 'T Jones',
  weight: 58,
  winFixed: 4.5,
  placeFixed: 1.8,
  scratched: false,
};

const form: FormFragment = {
  career: { wins: 2, runs: 10 },
  dryPlaces: [3, 1, 0],
  wetPlaces: [0, 0, 0],
  currentGrade: 'BM 64',
  barrierStats: new Map([['3', { wins: 2, runs: 4 }]]),
  lastRun: { position: 2, distance: 1600, grade: 'BM 78', venue: 'Rosehill' },
  daysSince: 21,
};

const ratings: RatingsFragment = {
  speedRating: 2,
  stats: { track: { runs: 3, wins: 1, seconds: 1, thirds: 0 } },
  weightToday: '56.5kg',
  weightLast: '58kg',
};

const ctx: ReconcileContext = {
  distance: 1200,
  trackBias: { type: 'inside', goodBarrierMax: 4, description: 'tight' },
  jockeys: new Map([['J SMITH', { wins: 10, runs: 50 }]]),
  trainers: new Map([['T JONES', { wins: 0, runs: 0 }]]),
};

describe('reconcile', () => {
  it('copies base fields and derives signals from form', () => {
    const r = reconcile(base, form, undefined, ctx);
    expect(r).toMatchObject(base);
    expect(r.career).toEqual({ wins: 2, runs: 10 });
    expect(r.currentGrade).toBe('BM 64');
    expect(r.barrierRecord).toEqual({ wins: 2, runs: 4 });
    expect(r.surfacePreference).toBe('dry-preferred');
    expect(r.distanceStep?.label).toBe('step down 400m');
    expect(r.barrierFlag?.label).toBe('barrier advantage 2W/4R (50%) from barrier 3');
    expect(r.gradeChange?.label).toBe('drops in class (BM 78 -> BM 64)');
    expect(r.trackBarrierNote?.label).toBe('good draw (B3): tight');
    expect(r.daysSince).toBe(21);
  });

  it('fills jockey records by name and skips zero-run records', () => {
    const r = reconcile(base, undefined, undefined, ctx);
    expect(r.jockeyRecord).toEqual({ wins: 10, runs: 50 });
    expect(r.trainerRecord).toBeUndefined();
  });

  it('fills ratings fields only from ratings', () => {
    const r = reconcile(base, undefined, ratings, ctx);
    expect(r.speedRating).toBe(2);
    expect(r.contextStats?.track).toEqual({ runs: 3, wins: 1, seconds: 1, thirds: 0 });
    expect(r.weightChange).toEqual({ kind: 'lighter', label: 'lighter 1.5kg' });
    expect(r.career).toBeUndefined();
  });

  it('keeps a runner with no enrichment', () => {
    const even: ReconcileContext = { trackBias: { type: 'even', goodBarrierMax: 8, description: '' } };
    expect(reconcile(base, undefined, undefined, even)).toEqual(base);
  });

  it('leaves barrier fields unset for a non-numeric barrier', () => {
    for (const barrier of ['constructor', 'toString', '__proto__']) {
      const r = reconcile({ ...base, barrier }, form, undefined, ctx);
      expect(r.barrierRecord).toBeUndefined();
      expect(r.barrierFlag).toBeUndefined();
      expect(r.trackBarrierNote).toBeUndefined();
    }
  });

  it('is idempotent', () => {
    const once = reconcile(base, form, ratings, ctx);
    expect(reconcile(once, form, ratings, ctx)).toEqual(once);
  });

  it('does not depend on the order of disjoint patches', () => {
    const f = formPatch(base, form, ctx);
    const r = ratingsPatch(ratings);
    expect(mergeEnrichment(base, [f, r])).toEqual(mergeEnrichment(base, [r, f]));
  });
});

describe('mergeEnrichment', () => {
  it('never overwrites a field once set', () => {
    const r = mergeEnrichment(base, [
      { source: 'form', fields: { career: { wins: 1, runs: 2 } } },
      { source: 'form', fields: { career: { wins: 5, runs: 9 } } },
    ]);
    expect(r.career).toEqual({ wins: 1, runs: 2 });
  });

  it('ignores ratings-only fields from other sources', () => {
    const r = mergeEnrichment(base, [{ source: 'form', fields: { speedRating: 3, daysSince: 7 } }]);
    expect(r.speedRating).toBeUndefined();
    expect(r.daysSince).toBe(7);
  });

  it('does not mutate the base record', () => {
    mergeEnrichment(base, [{ source: 'form', fields: { daysSince: 7 } }]);
    expect(base.daysSince).toBeUndefined();
  });
});
