import fs from 'node:fs';
import { setTimeout as sleepTimer } from 'node:timers/promises';
import iconv from 'iconv-lite';
import { z } from 'zod';

export type FetchOptions = {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  query?: Record<string, string>;
  body?: unknown; // JSON として送る
  retry?: number; // default 3
  minIntervalMs?: number; // default 300
  fetchImpl?: typeof fetch; // テスト用
};

export async function sleep(ms: number) {
  if (ms > 0) await sleepTimer(ms);
}

export function userAgent(): string {
  return (
    process.env.SCRAPER_UA ||
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36'
  );
}

export class HttpError extends Error {
  constructor(readonly status: number, readonly url: string) {
    super(`HTTP ${status} for ${url}`);
    this.name = 'HttpError';
  }
}

function sniffCharset(contentType?: string | null): string | undefined {
  const m = (contentType || '').toLowerCase().match(/charset=([^;]+)/);
  return m ? m[1].trim().replace(/^"|"$/g, '') : undefined;
}

// content-type の charset で復号。不明・未対応なら UTF-8
export function decodeBody(buf: Uint8Array, contentType?: string | null): string {
  const charset = sniffCharset(contentType);
  if (!charset || charset === 'utf-8' || charset === 'utf8' || !iconv.encodingExists(charset)) {
    return new TextDecoder('utf-8').decode(buf);
  }
  return iconv.decode(Buffer.from(buf), charset);
}

export function withQuery(url: string, query?: Record<string, string>): string {
  if (!query || Object.keys(query).length === 0) return url;
  const u = new URL(url);
  for (const [k, v] of Object.entries(query)) u.searchParams.set(k, v);
  return u.toString();
}

// 失敗したら retry 回まで再試行し、最後のエラーを投げる
export async function fetchJson(url: string, opts: FetchOptions = {}): Promise<unknown> {
  const retry = opts.retry ?? 3;
  const minInterval = opts.minIntervalMs ?? 300;
  const doFetch = opts.fetchImpl ?? fetch;
  const target = withQuery(url, opts.query);
  let lastError: unknown;
  for (let i = 0; i < retry; i++) {
    try {
      await sleep(minInterval);
      const res = await doFetch(target, {
        method: opts.method ?? (opts.body === undefined ? 'GET' : 'POST'),
        headers: {
          'user-agent': userAgent(),
          accept: 'application/json',
          ...(opts.body === undefined ? {} : { 'content-type': 'application/json' }),
          ...(opts.headers || {}),
        },
        body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
      });
      if (!res.ok) throw new HttpError(res.status, target);
      const buf = new Uint8Array(await res.arrayBuffer());
      return JSON.parse(decodeBody(buf, res.headers.get('content-type')));
    } catch (e) {
      lastError = e;
      if (i === retry - 1) break;
    }
  }
  throw lastError;
}

const GraphqlEnvelopeSchema = z.object({
  data: z.unknown(),
  errors: z.array(z.object({ message: z.string().catch('unknown') }).catch({ message: 'unknown' })).optional(),
  message: z.string().optional(),
});

export type GraphqlResult = { data?: unknown; error?: string };

// errors を含む応答は data 無しとして返す（呼び出し側で空扱い）
export async function postGraphql(url: string, query: string, opts: FetchOptions = {}): Promise<GraphqlResult> {
  const json = await fetchJson(url, { ...opts, method: 'POST', body: { query } });
  const env = GraphqlEnvelopeSchema.safeParse(json);
  if (!env.success) return { error: 'not a GraphQL response' };
  if (env.data.errors?.length) return { error: env.data.errors[0].message };
  if (env.data.data === undefined || env.data.data === null) return { error: env.data.message ?? 'no data' };
  return { data: env.data.data };
}

// .graphql ファイルを読み、{{name}} を値で置き換える（引用符・バックスラッシュは落とす）
export function loadQuery(file: URL, vars: Record<string, string> = {}): string {
  const template = fs.readFileSync(file, 'utf8');
  return template.replace(/\{\{(\w+)\}\}/g, (_, name: string) => (vars[name] ?? '').replace(/["\\]/g, ''));
}
