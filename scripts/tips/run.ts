import { assembleMeeting, summarizeEnrichment, type EnrichmentSummary } from '../../src/lib/assemble';
import { buildBatchPrompt, mergeResults, orderPicks, parseAnalyzerResponse, partition } from '../../src/lib/batch';
import { EMPTY_FORM_INDEX } from '../../src/lib/sources/form';
import { filterMeetings } from '../../src/lib/sources/tab';
import type {
  Analyzer,
  DayReco,
  EnrichmentIndex,
  FormIndex,
  RacePick,
  RaceDay,
  RaceRecord,
  RatingsIndex,
  RawMeeting,
  RawRace,
  TrackBiasTable,
} from '../../src/lib/types';
import type { Collaborators, OddsFeed } from '../lib/collaborators';

// odds feed が取れない・空のときだけ run を止める
export class TipsFatalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TipsFatalError';
  }
}

export type TipsOptions = {
  date: string;
  jurisdiction: string;
  allTracks: boolean;
  batchSize: number;
  trackBias: TrackBiasTable;
};

export type TipsResult = {
  day: RaceDay;
  races: RaceRecord[];
  summary: EnrichmentSummary;
  picks: Map<string, RacePick>;
  reco?: DayReco; // 解析しなかった場合は undefined
};

export async function fetchMeetings(feed: OddsFeed, opts: TipsOptions): Promise<RawMeeting[]> {
  console.log(`[tab] fetching meetings for ${opts.date} (${opts.jurisdiction})...`);
  let all: RawMeeting[];
  try {
    all = await feed.meetings(opts.date, opts.jurisdiction);
  } catch (e) {
    throw new TipsFatalError(`odds feed unavailable: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  const { kept, dropped } = filterMeetings(all, opts.allTracks);
  if (opts.allTracks) {
    console.log(`[tab] ${kept.length} horse racing meetings (whitelist disabled)`);
  } else {
    const names = dropped.map((m) => m.meetingName || '?').join(', ') || 'none';
    console.log(`[tab] ${kept.length} meetings kept, skipped ${dropped.length} international: ${names}`);
  }
  if (kept.length === 0) throw new TipsFatalError(`no meetings found for ${opts.date}`);
  return kept;
}

// レース詳細の runners に差し替える。取れなければ開催一覧側の runners を使う
export async function withRaceDetail(feed: OddsFeed, opts: TipsOptions, meeting: RawMeeting): Promise<RawMeeting> {
  const races: RawRace[] = [];
  for (const race of meeting.races) {
    let runners = race.runners;
    try {
      const detail = await feed.raceRunners(opts.date, opts.jurisdiction, meeting, race.raceNumber);
      if (detail.length > 0) runners = detail;
    } catch (e) {
      console.warn(`[tab] ${meeting.meetingName} R${race.raceNumber}: detail failed, using meeting runners:`, e);
    }
    races.push({ ...race, runners });
  }
  return { ...meeting, races };
}

async function loadEnrichment(collab: Collaborators, date: string): Promise<EnrichmentIndex> {
  const [form, ratings] = await Promise.all([
    collab.form.load(date).catch((e: unknown): FormIndex => {
      console.warn('[form] failed, continuing without form data:', e);
      return EMPTY_FORM_INDEX;
    }),
    collab.ratings.load(date).catch((e: unknown): RatingsIndex => {
      console.warn('[ratings] failed, continuing without ratings:', e);
      return new Map();
    }),
  ]);
  return { form, ratings };
}

// バッチは順に投げる。1 バッチの失敗はそのバッチの 0 件で済ませる
export async function analyzeRaces(
  races: readonly RaceRecord[],
  date: string,
  batchSize: number,
  analyzer: Analyzer
): Promise<Map<string, RacePick>> {
  const batches = partition(races, batchSize);
  const results: RacePick[][] = [];
  for (const [i, batch] of batches.entries()) {
    const prompt = buildBatchPrompt(batch, date, i === 0);
    console.log(`[analyzer] batch ${i + 1}/${batches.length}: ${batch.length} races`);
    let raw: string;
    try {
      raw = await analyzer(prompt);
    } catch (e) {
      console.warn(`[analyzer] batch ${i + 1} failed, no picks for this batch:`, e);
      results.push([]);
      continue;
    }
    const parsed = parseAnalyzerResponse(raw);
    if (parsed.status === 'failed') console.warn(`[analyzer] batch ${i + 1}: unparseable response, no picks for this batch`);
    if (parsed.status === 'recovered') console.warn(`[analyzer] batch ${i + 1}: truncated response, recovered ${parsed.picks.length} picks`);
    results.push(parsed.picks);
    console.log(`[analyzer] batch ${i + 1}: ${parsed.picks.length} picks`);
  }
  const merged = mergeResults(results);
  console.log(`[analyzer] total picks: ${merged.size}`);
  return merged;
}

export async function runTips(collab: Collaborators, opts: TipsOptions): Promise<TipsResult> {
  const meetings = await fetchMeetings(collab.feed, opts);
  const detailed: RawMeeting[] = [];
  for (const m of meetings) detailed.push(await withRaceDetail(collab.feed, opts, m));

  const index = await loadEnrichment(collab, opts.date);

  const assembled = detailed.map((m) => assembleMeeting(m, index, opts.trackBias)).filter((m) => m.races.length > 0);
  const races = assembled.flatMap((m) => [...m.races]);
  if (races.length === 0) throw new TipsFatalError(`no races with runners for ${opts.date}`);

  const summary = summarizeEnrichment(races);
  console.log(`[tips] ${summary.races} races (${summary.wetRaces} wet), ${summary.runners} runners`);
  console.log(
    `[tips] enrichment: form ${summary.form}, surface ${summary.surface}, jockey ${summary.jockey}, ` +
      `trainer ${summary.trainer}, barrier ${summary.barrier}, grade ${summary.grade}, ` +
      `track bias ${summary.trackBias}, ratings ${summary.ratings}, weight ${summary.weight}`
  );

  const day: RaceDay = { date: opts.date, meetings: assembled };
  if (!collab.analyzer) return { day, races, summary, picks: new Map() };

  const picks = await analyzeRaces(races, opts.date, opts.batchSize, collab.analyzer);
  return { day, races, summary, picks, reco: { date: opts.date, races: orderPicks(assembled, picks) } };
}
