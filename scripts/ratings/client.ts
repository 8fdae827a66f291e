import type { TipsConfig } from '../lib/config';
import type { RatingsProvider } from '../lib/collaborators';
import { loadQuery, postGraphql, type FetchOptions, type GraphqlResult } from '../lib/http';
import { mergeRatings, parseRatingsEntries, parseRatingsMeetings } from '../../src/lib/sources/ratings';
import type { RatingsFragment, RatingsIndex } from '../../src/lib/types';

const MEETINGS_QUERY = new URL('./queries/meetings.graphql', import.meta.url);
const RACES_QUERY = new URL('./queries/races.graphql', import.meta.url);

const EMPTY: RatingsIndex = new Map();

export function createRatingsProvider(
  cfg: Pick<TipsConfig, 'ratingsApiBase' | 'ratingsApiKey' | 'fetchIntervalMs' | 'fetchRetry'>,
  fetchImpl?: typeof fetch
): RatingsProvider {
  const opts: FetchOptions = {
    headers: cfg.ratingsApiKey ? { 'x-api-key': cfg.ratingsApiKey } : {},
    retry: cfg.fetchRetry,
    minIntervalMs: cfg.fetchIntervalMs,
    fetchImpl,
  };
  const gql = (file: URL, vars: Record<string, string>) => postGraphql(cfg.ratingsApiBase, loadQuery(file, vars), opts);

  return {
    async load(date: string): Promise<RatingsIndex> {
      if (!cfg.ratingsApiKey) {
        console.warn('[ratings] RATINGS_API_KEY not set, skipping');
        return EMPTY;
      }
      console.log('[ratings] fetching ratings...');
      let list: GraphqlResult;
      try {
        list = await gql(MEETINGS_QUERY, { date });
      } catch (e) {
        console.warn('[ratings] unavailable:', e);
        return EMPTY;
      }
      if (list.data === undefined) {
        console.warn(`[ratings] error: ${list.error ?? 'no data'}`);
        return EMPTY;
      }
      const meetings = parseRatingsMeetings(list.data);
      console.log(`[ratings] ${meetings.length} Australian meetings`);

      const parts: Array<Map<string, RatingsFragment>> = [];
      for (const m of meetings) {
        try {
          const r = await gql(RACES_QUERY, { meetCode: m.id });
          if (r.data !== undefined) parts.push(parseRatingsEntries(r.data));
        } catch (e) {
          console.warn(`[ratings] ${m.venueName} failed:`, e);
        }
      }
      const index = mergeRatings(parts);
      console.log(`[ratings] ${index.size} runners`);
      return index;
    },
  };
}
