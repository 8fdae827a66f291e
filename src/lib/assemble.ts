import { normalizeName } from './normalize';
import { reconcile } from './reconcile';
import { isWetTrack } from './signals';
import { toRunnerBase } from './sources/tab';
import { lookupTrackBias } from './trackBias';
import type { EnrichmentIndex, MeetingRecord, RaceRecord, RawMeeting, RawRace, RunnerRecord, TrackBiasTable } from './types';

// 固定オッズ優先、無ければ tote。どちらも無ければ Infinity（末尾）
export function marketPrice(r: Pick<RunnerRecord, 'winFixed' | 'winTote'>): number {
  if (r.winFixed !== undefined && r.winFixed > 0) return r.winFixed;
  if (r.winTote !== undefined && r.winTote > 0) return r.winTote;
  return Number.POSITIVE_INFINITY;
}

// Array#sort は安定。価格なし同士は元の順を保つ
export function sortByMarketPrice<T extends Pick<RunnerRecord, 'winFixed' | 'winTote'>>(runners: readonly T[]): T[] {
  return [...runners].sort((a, b) => {
    const pa = marketPrice(a);
    const pb = marketPrice(b);
    if (pa === pb) return 0;
    return pa < pb ? -1 : 1;
  });
}

export function assembleRace(meeting: RawMeeting, race: RawRace, index: EnrichmentIndex, table: TrackBiasTable): RaceRecord {
  const track = meeting.meetingName;
  const trackBias = lookupTrackBias(table, track);
  const ctx = {
    distance: race.raceDistance,
    trackBias,
    jockeys: index.form.jockeys,
    trainers: index.form.trainers,
  };

  // 取消馬は並べ替え・enrichment の前に落とす
  const active = race.runners.map(toRunnerBase).filter((r) => !r.scratched);
  const runners = sortByMarketPrice(active).map((base) => {
    const key = normalizeName(base.name);
    return Object.freeze(reconcile(base, index.form.horses.get(key), index.ratings.get(key), ctx));
  });

  return Object.freeze({
    track,
    location: meeting.location,
    trackCondition: meeting.trackCondition,
    trackWet: isWetTrack(meeting.trackCondition),
    raceNumber: race.raceNumber,
    raceName: race.raceName,
    distance: race.raceDistance,
    startTime: race.raceStartTime,
    runners: Object.freeze(runners),
  });
}

// 出走馬が 0 頭のレースは落とす
export function assembleMeeting(meeting: RawMeeting, index: EnrichmentIndex, table: TrackBiasTable): MeetingRecord {
  const races = meeting.races
    .map((race) => assembleRace(meeting, race, index, table))
    .filter((r) => r.runners.length > 0);
  return Object.freeze({
    track: meeting.meetingName,
    location: meeting.location,
    trackCondition: meeting.trackCondition,
    races: Object.freeze(races),
  });
}

export type EnrichmentSummary = {
  races: number;
  wetRaces: number;
  runners: number;
  form: number;
  surface: number;
  jockey: number;
  trainer: number;
  barrier: number;
  grade: number;
  trackBias: number;
  ratings: number;
  weight: number;
};

export function summarizeEnrichment(races: readonly RaceRecord[]): EnrichmentSummary {
  const all = races.flatMap((r) => r.runners);
  const count = (pred: (r: RunnerRecord) => boolean) => all.filter(pred).length;
  return {
    races: races.length,
    wetRaces: races.filter((r) => r.trackWet).length,
    runners: all.length,
    form: count((r) => r.career !== undefined),
    surface: count((r) => r.surfacePreference !== undefined && r.surfacePreference !== 'none'),
    jockey: count((r) => r.jockeyRecord !== undefined),
    trainer: count((r) => r.trainerRecord !== undefined),
    barrier: count((r) => r.barrierRecord !== undefined),
    grade: count((r) => r.gradeChange !== undefined),
    trackBias: count((r) => r.trackBarrierNote !== undefined),
    ratings: count((r) => r.speedRating !== undefined),
    weight: count((r) => r.weightChange !== undefined),
  };
}
