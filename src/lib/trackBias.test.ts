import fs from 'node:fs';
import { describe, it, expect } from 'vitest';
import { DEFAULT_TRACK_BIAS, createTrackBiasTable, lookupTrackBias, parseTrackBiasTable } from './trackBias';

describe('track bias table', () => {
  it('looks up tracks by normalized name', () => {
    const table = createTrackBiasTable({ 'Moonee Valley': { type: 'inside', goodBarrierMax: 4, description: 'tight' } });
    expect(lookupTrackBias(table, ' moonee valley')).toEqual({ type: 'inside', goodBarrierMax: 4, description: 'tight' });
  });

  it('defaults unlisted tracks to even with barrier 8', () => {
    const table = createTrackBiasTable({});
    expect(lookupTrackBias(table, 'Nowhere Downs')).toBe(DEFAULT_TRACK_BIAS);
    expect(DEFAULT_TRACK_BIAS).toEqual({ type: 'even', goodBarrierMax: 8, description: '' });
  });

  it('keeps entries immutable', () => {
    const source = { Doomben: { type: 'inside' as const, goodBarrierMax: 4, description: 'tight' } };
    const table = createTrackBiasTable(source);
    source.Doomben.goodBarrierMax = 10;
    expect(lookupTrackBias(table, 'DOOMBEN').goodBarrierMax).toBe(4);
    expect(Object.isFrozen(lookupTrackBias(table, 'DOOMBEN'))).toBe(true);
  });

  it('rejects malformed files', () => {
    expect(() => parseTrackBiasTable({ Ascot: { type: 'sideways', goodBarrierMax: 7 } })).toThrow();
    expect(() => parseTrackBiasTable([])).toThrow();
  });

  it('loads the shipped configuration', () => {
    const json: unknown = JSON.parse(fs.readFileSync(new URL('../../config/track-bias.json', import.meta.url), 'utf8'));
    const table = parseTrackBiasTable(json);
    expect(lookupTrackBias(table, 'Moonee Valley')).toMatchObject({ type: 'inside', goodBarrierMax: 4 });
    expect(lookupTrackBias(table, 'Flemington')).toMatchObject({ type: 'even', goodBarrierMax: 8 });
  });
});
