import type { Analyzer, FormIndex, RatingsIndex, RawMeeting, RawRunner } from '../../src/lib/types';

// 外部との境界。テストでは in-process の fake に差し替える

export type OddsFeed = {
  // 失敗は例外（odds feed が取れなければ run は続けられない）
  meetings(date: string, jurisdiction: string): Promise<RawMeeting[]>;
  raceRunners(date: string, jurisdiction: string, meeting: RawMeeting, raceNumber: number): Promise<RawRunner[]>;
};

// 失敗時は空の index を返す
export type FormProvider = { load(date: string): Promise<FormIndex> };
export type RatingsProvider = { load(date: string): Promise<RatingsIndex> };

export type Collaborators = {
  feed: OddsFeed;
  form: FormProvider;
  ratings: RatingsProvider;
  analyzer?: Analyzer; // 無ければ解析しない
};
