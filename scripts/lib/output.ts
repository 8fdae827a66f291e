import fs from 'node:fs';
import path from 'node:path';
import type { DayReco, RaceDay } from '../../src/lib/types';

// 出力先: {outDir}/{date}.json と {outDir}/reco-{date}.json

export function dayFile(outDir: string, date: string): string {
  return path.join(outDir, `${date}.json`);
}

export function recoFile(outDir: string, date: string): string {
  return path.join(outDir, `reco-${date}.json`);
}

export function ensureDir(p: string) {
  fs.mkdirSync(p, { recursive: true });
}

export function writeJson(p: string, data: unknown) {
  ensureDir(path.dirname(p));
  fs.writeFileSync(p, JSON.stringify(data, null, 2));
}

// 無い・壊れているファイルは undefined
export function readJson(p: string): unknown {
  if (!fs.existsSync(p)) return undefined;
  try {
    return JSON.parse(fs.readFileSync(p, 'utf8'));
  } catch (e) {
    console.warn(`[output] unreadable ${p}:`, e);
    return undefined;
  }
}

export function writeRaceDay(outDir: string, day: RaceDay): string {
  const f = dayFile(outDir, day.date);
  writeJson(f, day);
  return f;
}

export function writeReco(outDir: string, reco: DayReco): string {
  const f = recoFile(outDir, reco.date);
  writeJson(f, reco);
  return f;
}
