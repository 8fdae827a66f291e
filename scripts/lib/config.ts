import { z } from 'zod';
import { DEFAULT_BATCH_SIZE } from '../../src/lib/batch';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// 空文字の環境変数は未設定として扱う
const blank = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);
const str = (def: string) => z.preprocess(blank, z.string().trim().default(def));
const int = (def: number, min: number) => z.preprocess(blank, z.coerce.number().int().min(min).default(def));
const secret = z.preprocess(blank, z.string().trim().optional());

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: secret,
  ANTHROPIC_MODEL: str('claude-sonnet-4-5'),
  ANALYZER_MAX_TOKENS: int(8192, 1),
  RATINGS_API_KEY: secret,
  TAB_API_BASE: str('https://api.beta.tab.com.au/v1/tab-info-service/racing'),
  FORM_API_BASE: str('https://puntapi.com/racing'),
  RATINGS_API_BASE: str('https://graphql.rmdprod.racing.com/'),
  BATCH_SIZE: int(DEFAULT_BATCH_SIZE, 1),
  FETCH_INTERVAL_MS: int(300, 0),
  FETCH_RETRY: int(3, 1),
  OUT_DIR: str('data/days'),
  TRACK_BIAS_FILE: str('config/track-bias.json'),
});

export type TipsConfig = Readonly<{
  anthropicApiKey?: string;
  anthropicModel: string;
  analyzerMaxTokens: number;
  ratingsApiKey?: string;
  tabApiBase: string;
  formApiBase: string;
  ratingsApiBase: string;
  batchSize: number;
  fetchIntervalMs: number;
  fetchRetry: number;
  outDir: string;
  trackBiasFile: string;
}>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TipsConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`invalid environment: ${detail}`);
  }
  const e = parsed.data;
  return Object.freeze({
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    anthropicModel: e.ANTHROPIC_MODEL,
    analyzerMaxTokens: e.ANALYZER_MAX_TOKENS,
    ratingsApiKey: e.RATINGS_API_KEY,
    tabApiBase: e.TAB_API_BASE.replace(/\/+$/, ''),
    formApiBase: e.FORM_API_BASE,
    ratingsApiBase: e.RATINGS_API_BASE,
    batchSize: e.BATCH_SIZE,
    fetchIntervalMs: e.FETCH_INTERVAL_MS,
    fetchRetry: e.FETCH_RETRY,
    outDir: e.OUT_DIR,
    trackBiasFile: e.TRACK_BIAS_FILE,
  });
}

// 解析器を使う場合のみ必須
export function requireAnalyzerKey(cfg: TipsConfig): string {
  if (!cfg.anthropicApiKey) throw new ConfigError('ANTHROPIC_API_KEY is not set (use --no-ai to skip analysis)');
  return cfg.anthropicApiKey;
}
