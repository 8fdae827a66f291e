import { z } from 'zod';
import { pickKey } from '../../src/lib/batch';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'invalid date');

const RunnerShape = z.object({
  number: z.number(),
  name: z.string().min(1),
  barrier: z.string(),
  scratched: z.literal(false),
});

const RaceShape = z.object({
  track: z.string().min(1),
  raceNumber: z.number().int().positive(),
  trackWet: z.boolean(),
  runners: z.array(RunnerShape).min(1, 'runners empty'),
});

const RaceDayShape = z.object({
  date: isoDate,
  meetings: z
    .array(z.object({ track: z.string().min(1), races: z.array(RaceShape).min(1, 'races empty') }))
    .min(1, 'meetings empty'),
});

const RecoShape = z.object({
  date: isoDate,
  races: z.array(
    z.object({
      track: z.string().min(1),
      raceNumber: z.number().int().positive(),
      pick: z.string().min(1),
      tier: z.enum(['best', 'strong', 'tip']),
    })
  ),
});

export type RaceDayShape = z.infer<typeof RaceDayShape>;
export type RecoShape = z.infer<typeof RecoShape>;

function assertShape<T>(schema: z.ZodType<T>, file: string, obj: unknown): T {
  const r = schema.safeParse(obj);
  if (!r.success) {
    const first = r.error.issues[0];
    throw new Error(`${file}: ${first ? `${first.path.join('.') || '(root)'} ${first.message}` : 'invalid'}`);
  }
  return r.data;
}

export function validateRaceDay(file: string, obj: unknown): RaceDayShape {
  return assertShape(RaceDayShape, file, obj);
}

export function validateReco(file: string, obj: unknown): RecoShape {
  return assertShape(RecoShape, file, obj);
}

// 存在しないレースを指す予想（警告のみ）
export function danglingPicks(day: RaceDayShape, reco: RecoShape): string[] {
  const keys = new Set<string>();
  for (const m of day.meetings) for (const r of m.races) keys.add(pickKey(m.track, r.raceNumber));
  return reco.races.filter((p) => !keys.has(pickKey(p.track, p.raceNumber))).map((p) => `${p.track} R${p.raceNumber}`);
}
