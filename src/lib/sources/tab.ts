import { z } from 'zod';
import type { MarketQuote, RawMeeting, RawRace, RawRunner, RunnerRecord } from '../types';
import { lenientArray, optionalNumber, text } from './schema';

// 解析対象の開催地（豪州各州 + NZ + 日本）
export const ALLOWED_LOCATIONS: ReadonlySet<string> = new Set([
  'NSW', 'VIC', 'QLD', 'SA', 'WA', 'TAS', 'ACT', 'NT',
  'NZL',
  'JPN',
]);

// form / ratings provider は豪州の開催のみ
export const AUS_STATES: ReadonlySet<string> = new Set(['NSW', 'VIC', 'QLD', 'SA', 'WA', 'TAS', 'ACT', 'NT']);

const QuoteSchema = z
  .object({
    returnWin: optionalNumber,
    returnPlace: optionalNumber,
    bettingStatus: text,
  })
  .catch({ bettingStatus: '' });

const RunnerSchema = z
  .object({
    runnerNumber: optionalNumber,
    runnerName: text,
    barrierNumber: text,
    riderDriverName: text,
    trainerName: text,
    // 斤量は handicapWeight / weightTotal / weightKg のいずれか
    handicapWeight: optionalNumber,
    weightTotal: optionalNumber,
    weightKg: optionalNumber,
    fixedOdds: QuoteSchema,
    parimutuel: QuoteSchema,
  })
  .transform((r): RawRunner => ({
    runnerNumber: r.runnerNumber ?? 0,
    runnerName: r.runnerName || 'Unknown',
    barrierNumber: r.barrierNumber,
    riderDriverName: r.riderDriverName,
    trainerName: r.trainerName,
    weight: r.handicapWeight || r.weightTotal || r.weightKg || undefined,
    fixedOdds: r.fixedOdds,
    parimutuel: r.parimutuel,
  }));

const RaceSchema = z
  .object({
    raceNumber: optionalNumber,
    raceName: text,
    raceDistance: optionalNumber,
    raceStartTime: text,
    runners: lenientArray(RunnerSchema),
  })
  .transform((r): RawRace => ({
    raceNumber: r.raceNumber ?? 0,
    raceName: r.raceName || `Race ${r.raceNumber ?? '?'}`,
    raceDistance: r.raceDistance ?? 0,
    raceStartTime: r.raceStartTime,
    runners: r.runners,
  }));

const MeetingSchema = z.object({
  meetingName: text,
  venueMnemonic: text,
  raceType: text,
  location: text,
  trackCondition: text,
  races: lenientArray(RaceSchema),
});

const MeetingsPayloadSchema = z.object({ meetings: lenientArray(MeetingSchema) }).catch({ meetings: [] });
const RaceDetailSchema = z.object({ runners: lenientArray(RunnerSchema) }).catch({ runners: [] });

export function parseMeetings(json: unknown): RawMeeting[] {
  return MeetingsPayloadSchema.parse(json).meetings;
}

export function parseRaceDetail(json: unknown): RawRunner[] {
  return RaceDetailSchema.parse(json).runners;
}

// 競走馬の開催のみ。allTracks=false なら開催地ホワイトリストで絞る
export function filterMeetings(meetings: readonly RawMeeting[], allTracks = false): { kept: RawMeeting[]; dropped: RawMeeting[] } {
  const horse = meetings.filter((m) => m.raceType === 'R');
  if (allTracks) return { kept: horse, dropped: [] };
  return {
    kept: horse.filter((m) => ALLOWED_LOCATIONS.has(m.location)),
    dropped: horse.filter((m) => !ALLOWED_LOCATIONS.has(m.location)),
  };
}

// どちらかの市場で Scratched なら取消
export function isScratched(r: RawRunner): boolean {
  return r.fixedOdds.bettingStatus.includes('Scratched') || r.parimutuel.bettingStatus.includes('Scratched');
}

function price(q: MarketQuote, key: 'returnWin' | 'returnPlace'): number | undefined {
  const v = q[key];
  return typeof v === 'number' && v > 0 ? v : undefined;
}

export function toRunnerBase(r: RawRunner): RunnerRecord {
  return {
    number: r.runnerNumber,
    name: r.runnerName,
    barrier: r.barrierNumber,
    jockey: r.riderDriverName,
    trainer: r.trainerName,
    weight: r.weight,
    winFixed: price(r.fixedOdds, 'returnWin'),
    placeFixed: price(r.fixedOdds, 'returnPlace'),
    winTote: price(r.parimutuel, 'returnWin'),
    placeTote: price(r.parimutuel, 'returnPlace'),
    scratched: isScratched(r),
  };
}
