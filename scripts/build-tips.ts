/*
  1 日分のレースを集めて enrichment し、解析器に予想を出させる。
    data/days/{date}.json       … 全開催・全レース（取消馬を除く）
    data/days/reco-{date}.json  … レースごとの予想（--no-ai なら書かない）
*/
import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import { bestBetsByMeeting } from '../src/lib/batch';
import { parseTrackBiasTable } from '../src/lib/trackBias';
import { createAnthropicAnalyzer } from './analyzer/anthropic';
import { createFormProvider } from './form/client';
import { loadConfig, requireAnalyzerKey } from './lib/config';
import { writeRaceDay, writeReco } from './lib/output';
import { createRatingsProvider } from './ratings/client';
import { createTabFeed } from './tab/client';
import { parseArgs } from './tips/args';
import { runTips } from './tips/run';

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const cfg = loadConfig();
  // キー不足は取得を始める前に止める
  const analyzer = args.noAi
    ? undefined
    : createAnthropicAnalyzer({ apiKey: requireAnalyzerKey(cfg), model: cfg.anthropicModel, maxTokens: cfg.analyzerMaxTokens });

  const biasPath = path.resolve(process.cwd(), cfg.trackBiasFile);
  const trackBias = parseTrackBiasTable(JSON.parse(fs.readFileSync(biasPath, 'utf8')));

  const result = await runTips(
    {
      feed: createTabFeed(cfg),
      form: createFormProvider(cfg),
      ratings: createRatingsProvider(cfg),
      analyzer,
    },
    {
      date: args.date,
      jurisdiction: args.jurisdiction,
      allTracks: args.allTracks,
      batchSize: args.batchSize ?? cfg.batchSize,
      trackBias,
    }
  );

  const outDir = path.resolve(process.cwd(), args.outDir ?? cfg.outDir);
  console.log(`[tips] wrote ${writeRaceDay(outDir, result.day)}`);
  if (!result.reco) return;
  console.log(`[tips] wrote ${writeReco(outDir, result.reco)}`);
  for (const b of bestBetsByMeeting(result.day.meetings, result.picks)) {
    console.log(`[tips] best bet ${b.track} R${b.raceNumber}: ${b.pick.pick} ${b.pick.odds ?? ''}`.trimEnd());
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
