import { z } from 'zod';
import { normalizeName } from './normalize';
import type { TrackBias, TrackBiasTable } from './types';

// 未登録コースは偏りなし扱い
export const DEFAULT_TRACK_BIAS: TrackBias = Object.freeze({ type: 'even', goodBarrierMax: 8, description: '' });

const TrackBiasSchema = z.object({
  type: z.enum(['inside', 'even']),
  goodBarrierMax: z.number().int().positive(),
  description: z.string().default(''),
});

const TrackBiasFileSchema = z.record(z.string(), TrackBiasSchema);

export function createTrackBiasTable(entries: Record<string, TrackBias>): TrackBiasTable {
  const m = new Map<string, TrackBias>();
  for (const [track, bias] of Object.entries(entries)) {
    m.set(normalizeName(track), Object.freeze({ ...bias }));
  }
  return m;
}

// config/track-bias.json の中身（JSON.parse 済み）からテーブルを作る。形が不正なら例外
export function parseTrackBiasTable(json: unknown): TrackBiasTable {
  return createTrackBiasTable(TrackBiasFileSchema.parse(json));
}

export function lookupTrackBias(table: TrackBiasTable, track: string): TrackBias {
  return table.get(normalizeName(track)) ?? DEFAULT_TRACK_BIAS;
}
