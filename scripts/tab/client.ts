import type { TipsConfig } from '../lib/config';
import type { OddsFeed } from '../lib/collaborators';
import { fetchJson, type FetchOptions } from '../lib/http';
import { parseMeetings, parseRaceDetail } from '../../src/lib/sources/tab';

const TAB_HEADERS: Record<string, string> = {
  accept: 'application/json, text/plain, */*',
  'accept-language': 'en-GB,en-US;q=0.9,en;q=0.8',
  origin: 'https://www.tab.com.au',
  referer: 'https://www.tab.com.au/',
};

export function createTabFeed(
  cfg: Pick<TipsConfig, 'tabApiBase' | 'fetchIntervalMs' | 'fetchRetry'>,
  fetchImpl?: typeof fetch
): OddsFeed {
  const opts: FetchOptions = {
    headers: TAB_HEADERS,
    retry: cfg.fetchRetry,
    minIntervalMs: cfg.fetchIntervalMs,
    fetchImpl,
  };
  return {
    async meetings(date, jurisdiction) {
      const url = `${cfg.tabApiBase}/dates/${date}/meetings`;
      const json = await fetchJson(url, {
        ...opts,
        query: { jurisdiction, returnOffers: 'true', returnPromo: 'true' },
      });
      return parseMeetings(json);
    },
    async raceRunners(date, jurisdiction, meeting, raceNumber) {
      const url =
        `${cfg.tabApiBase}/dates/${date}/meetings/${encodeURIComponent(meeting.raceType)}` +
        `/${encodeURIComponent(meeting.venueMnemonic)}/races/${raceNumber}`;
      const json = await fetchJson(url, { ...opts, query: { jurisdiction } });
      return parseRaceDetail(json);
    },
  };
}
