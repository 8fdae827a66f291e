import { z } from 'zod';
import { normalizeName } from '../normalize';
import { parseStatLine } from '../signals';
import type { RatingsFragment, RatingsIndex } from '../types';
import { lenientArray, optionalNumber, optionalText, text } from './schema';
import { AUS_STATES } from './tab';

// ratings provider: 開催一覧 → 開催ごとのレース/出走馬

const MeetingListSchema = z
  .object({
    GetMeetingByDate: lenientArray(z.object({ id: optionalText, venueName: text, state: text })),
  })
  .catch({ GetMeetingByDate: [] });

const EntrySchema = z.object({
  horseName: text,
  speedValue: optionalNumber,
  atThisBarrierNumberStats: optionalText,
  atThisClassStats: optionalText,
  jockeyStats: optionalText,
  trackStats: optionalText,
  distanceStats: optionalText,
  weightCarried: optionalText,
  weightPrevious: optionalText,
});

const RacesSchema = z
  .object({
    getRacesForMeet: lenientArray(z.object({ raceNumber: optionalNumber, formRaceEntries: lenientArray(EntrySchema) })),
  })
  .catch({ getRacesForMeet: [] });

export type RatingsMeeting = { id: string; venueName: string; state: string };

// 豪州の開催のみ（id の無いものは引けないので除外）
export function parseRatingsMeetings(data: unknown): RatingsMeeting[] {
  const out: RatingsMeeting[] = [];
  for (const m of MeetingListSchema.parse(data).GetMeetingByDate) {
    if (m.id && AUS_STATES.has(m.state)) out.push({ id: m.id, venueName: m.venueName, state: m.state });
  }
  return out;
}

export function parseRatingsEntries(data: unknown): Map<string, RatingsFragment> {
  const out = new Map<string, RatingsFragment>();
  for (const race of RacesSchema.parse(data).getRacesForMeet) {
    for (const e of race.formRaceEntries) {
      const key = normalizeName(e.horseName);
      if (!key) continue;
      out.set(key, {
        speedRating: e.speedValue,
        stats: {
          barrier: parseStatLine(e.atThisBarrierNumberStats),
          class: parseStatLine(e.atThisClassStats),
          jockeyAtVenue: parseStatLine(e.jockeyStats),
          track: parseStatLine(e.trackStats),
          distance: parseStatLine(e.distanceStats),
        },
        weightToday: e.weightCarried,
        weightLast: e.weightPrevious,
      });
    }
  }
  return out;
}

// 開催ごとの結果を 1 つの index にまとめる。同名は後勝ち
export function mergeRatings(parts: ReadonlyArray<ReadonlyMap<string, RatingsFragment>>): RatingsIndex {
  const out = new Map<string, RatingsFragment>();
  for (const p of parts) for (const [k, v] of p) out.set(k, v);
  return out;
}
