import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig } from './lib/config';
import { readJson } from './lib/output';
import { danglingPicks, validateRaceDay, validateReco, type RaceDayShape } from './lib/validate';

const DAY_RE = /^(\d{4}-\d{2}-\d{2})\.json$/;
const RECO_RE = /^reco-(\d{4}-\d{2}-\d{2})\.json$/;

function main() {
  const outDir = path.resolve(process.cwd(), process.argv[2] ?? loadConfig().outDir);
  if (!fs.existsSync(outDir)) {
    throw new Error(`output dir not found: ${outDir}`);
  }
  const files = fs.readdirSync(outDir).sort();

  const days = new Map<string, RaceDayShape>();
  for (const f of files) {
    const m = f.match(DAY_RE);
    if (!m) continue;
    const obj = readJson(path.join(outDir, f));
    if (obj === undefined) throw new Error(`${f}: unreadable`);
    const day = validateRaceDay(f, obj);
    if (day.date !== m[1]) throw new Error(`${f}: date ${day.date} does not match file name`);
    days.set(day.date, day);
  }
  if (days.size === 0) throw new Error('day files: none found');

  let recos = 0;
  for (const f of files) {
    const m = f.match(RECO_RE);
    if (!m) continue;
    const obj = readJson(path.join(outDir, f));
    if (obj === undefined) throw new Error(`${f}: unreadable`);
    const reco = validateReco(f, obj);
    if (reco.date !== m[1]) throw new Error(`${f}: date ${reco.date} does not match file name`);
    const day = days.get(reco.date);
    if (!day) {
      console.warn(`[validate] ${f}: no day file for ${reco.date}`);
    } else {
      const dangling = danglingPicks(day, reco);
      if (dangling.length) console.warn(`[validate] ${f}: picks for unknown races: ${dangling.join(', ')}`);
    }
    recos++;
  }

  console.log(`[validate] OK: ${days.size} day files, ${recos} reco files`);
}

try {
  main();
} catch (e) {
  console.error(e);
  process.exit(1);
}
