// 識別子は英語、コメントは日本語。表示ラベルは英語（解析プロンプトに載るため）。

export type WinRun = { wins: number; runs: number };

// 1着/2着/3着 の回数
export type PlaceCounts = [number, number, number];

// "{runs}:{wins}-{2nds}-{3rds}"
export type StatLine = { runs: number; wins: number; seconds: number; thirds: number };

export type SurfacePreference = 'wet-tracker' | 'dry-preferred' | 'none';

// 派生シグナル。kind は判定用、label はそのまま人が読む文字列
export type Signal<K extends string> = { kind: K; label: string };

export type DistanceStep = Signal<'step-up' | 'step-down' | 'similar'>;
export type WeightChange = Signal<'lighter' | 'heavier'>;
export type GradeChange = Signal<'unchanged' | 'drops' | 'rises' | 'changed'>;
export type BarrierFlag = Signal<'advantage' | 'concern' | 'neutral'>;
export type TrackBarrierNote = Signal<'good-draw' | 'wide-draw'>;

export type LastRun = {
  position?: number;
  margin?: number; // 着差（馬身）
  venue?: string;
  distance?: number; // m
  grade?: string;
  startTime?: string; // ISO
};

// ratings provider の文脈別成績
export type ContextStats = {
  barrier?: StatLine;
  class?: StatLine;
  jockeyAtVenue?: StatLine;
  track?: StatLine;
  distance?: StatLine;
};

// odds feed 由来（マージ時はそのままコピー）
export type RunnerBase = {
  number: number;
  name: string;
  barrier: string; // 文字列キーで barrier 成績を引く
  jockey: string;
  trainer: string;
  weight?: number; // kg
  // 市場が無い場合は undefined（0 とは扱わない）
  winFixed?: number;
  placeFixed?: number;
  winTote?: number;
  placeTote?: number;
  scratched: boolean;
};

// enrichment で埋まる項目（すべて任意）
export type Enrichment = {
  // form provider
  career?: WinRun;
  dryPlaces?: PlaceCounts;
  wetPlaces?: PlaceCounts;
  daysSince?: number;
  lastRun?: LastRun;
  currentGrade?: string;
  barrierRecord?: WinRun;
  jockeyRecord?: WinRun;
  trainerRecord?: WinRun;
  surfacePreference?: SurfacePreference;
  distanceStep?: DistanceStep;
  barrierFlag?: BarrierFlag;
  gradeChange?: GradeChange;
  // track table
  trackBarrierNote?: TrackBarrierNote;
  // ratings provider（この source 専用）
  speedRating?: number;
  contextStats?: ContextStats;
  weightChange?: WeightChange;
};

export type RunnerRecord = RunnerBase & Enrichment;

export type RaceRecord = {
  track: string;
  location: string; // 州/国コード
  trackCondition: string;
  trackWet: boolean;
  raceNumber: number;
  raceName: string;
  distance: number; // m
  startTime: string;
  runners: readonly RunnerRecord[]; // 価格昇順、価格なしは末尾
};

export type MeetingRecord = {
  track: string;
  location: string;
  trackCondition: string;
  races: readonly RaceRecord[];
};

export type RaceDay = {
  date: string; // YYYY-MM-DD
  meetings: MeetingRecord[];
};

// --- enrichment fragments ---

export type FormFragment = {
  selectionId?: string;
  career?: WinRun;
  dryPlaces: PlaceCounts;
  wetPlaces: PlaceCounts;
  currentGrade?: string;
  barrierStats: ReadonlyMap<string, WinRun>; // 枠番（文字列）-> 成績
  lastRun?: LastRun;
  daysSince?: number;
};

export type RatingsFragment = {
  speedRating?: number;
  stats: ContextStats;
  weightToday?: string;
  weightLast?: string;
};

export type FormIndex = {
  horses: ReadonlyMap<string, FormFragment>;
  jockeys: ReadonlyMap<string, WinRun>;
  trainers: ReadonlyMap<string, WinRun>;
};

export type RatingsIndex = ReadonlyMap<string, RatingsFragment>;

export type EnrichmentIndex = {
  form: FormIndex;
  ratings: RatingsIndex;
};

// --- track barrier bias ---

export type BarrierBiasType = 'inside' | 'even';

export type TrackBias = {
  type: BarrierBiasType;
  goodBarrierMax: number;
  description: string;
};

export type TrackBiasTable = ReadonlyMap<string, TrackBias>;

// --- raw odds feed（zod で整形済みの形） ---

export type MarketQuote = {
  returnWin?: number;
  returnPlace?: number;
  bettingStatus: string;
};

export type RawRunner = {
  runnerNumber: number;
  runnerName: string;
  barrierNumber: string;
  riderDriverName: string;
  trainerName: string;
  weight?: number;
  fixedOdds: MarketQuote;
  parimutuel: MarketQuote;
};

export type RawRace = {
  raceNumber: number;
  raceName: string;
  raceDistance: number;
  raceStartTime: string;
  runners: RawRunner[];
};

export type RawMeeting = {
  meetingName: string;
  venueMnemonic: string;
  raceType: string;
  location: string;
  trackCondition: string;
  races: RawRace[];
};

// --- external analyzer ---

export type RatingTier = 'best' | 'strong' | 'tip';

export type RacePick = {
  track: string;
  raceNumber: number;
  pick: string;
  barrier?: string;
  odds?: string;
  rating: string; // 例: "★★★ BEST BET"
  tier: RatingTier;
  analysis: string;
};

export type DayReco = {
  date: string;
  races: RacePick[];
};

// 解析器は text in / text out。トランスポートは呼び出し側の責務
export type Analyzer = (prompt: string) => Promise<string>;
