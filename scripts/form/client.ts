import type { TipsConfig } from '../lib/config';
import type { FormProvider } from '../lib/collaborators';
import { loadQuery, postGraphql, type FetchOptions, type GraphqlResult } from '../lib/http';
import { EMPTY_FORM_INDEX, mergeLastRuns, parseFormStats, parsePeopleStats } from '../../src/lib/sources/form';
import type { FormIndex, WinRun } from '../../src/lib/types';

const STATS_QUERY = new URL('./queries/stats.graphql', import.meta.url);
const LAST_RUN_QUERY = new URL('./queries/last-run.graphql', import.meta.url);
const PEOPLE_QUERY = new URL('./queries/people.graphql', import.meta.url);

export function createFormProvider(
  cfg: Pick<TipsConfig, 'formApiBase' | 'fetchIntervalMs' | 'fetchRetry'>,
  fetchImpl?: typeof fetch
): FormProvider {
  const opts: FetchOptions = {
    headers: { authorization: 'Bearer guest' },
    retry: cfg.fetchRetry,
    minIntervalMs: cfg.fetchIntervalMs,
    fetchImpl,
  };
  const gql = (file: URL, vars: Record<string, string>) => postGraphql(cfg.formApiBase, loadQuery(file, vars), opts);

  return {
    async load(date: string): Promise<FormIndex> {
      console.log('[form] fetching form data...');

      // phase 1: 取れなければ form なしで続行
      let stats: GraphqlResult;
      try {
        stats = await gql(STATS_QUERY, { date });
      } catch (e) {
        console.warn('[form] unavailable, continuing without form data:', e);
        return EMPTY_FORM_INDEX;
      }
      if (stats.data === undefined) {
        console.warn(`[form] error: ${stats.error ?? 'no data'}, continuing without form data`);
        return EMPTY_FORM_INDEX;
      }
      const parsed = parseFormStats(stats.data);
      let horses = parsed.horses;
      console.log(`[form] phase 1: career stats for ${horses.size} runners (${parsed.ausMeetingIds.length} Australian meetings)`);

      // phase 2: 開催ごと。失敗した開催は飛ばす
      let enriched = 0;
      for (const meetingId of parsed.ausMeetingIds) {
        try {
          const r = await gql(LAST_RUN_QUERY, { meetingId });
          if (r.data === undefined) continue;
          const merged = mergeLastRuns(horses, r.data, date);
          horses = merged.horses;
          enriched += merged.enriched;
        } catch (e) {
          console.warn(`[form] last run for meeting ${meetingId} failed:`, e);
        }
      }
      console.log(`[form] phase 2: last-run details for ${enriched} runners`);

      // phase 3: 騎手・調教師
      let jockeys: ReadonlyMap<string, WinRun> = EMPTY_FORM_INDEX.jockeys;
      let trainers: ReadonlyMap<string, WinRun> = EMPTY_FORM_INDEX.trainers;
      try {
        const r = await gql(PEOPLE_QUERY, { date });
        if (r.data !== undefined) {
          ({ jockeys, trainers } = parsePeopleStats(r.data));
          console.log(`[form] phase 3: ${jockeys.size} jockeys, ${trainers.size} trainers`);
        } else {
          console.warn(`[form] phase 3: jockey/trainer stats unavailable (${r.error ?? 'no data'})`);
        }
      } catch (e) {
        console.warn('[form] phase 3 skipped:', e);
      }

      return { horses, jockeys, trainers };
    },
  };
}
