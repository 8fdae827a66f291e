import iconv from 'iconv-lite';
import { describe, it, expect } from 'vitest';
import { decodeBody, fetchJson, HttpError, loadQuery, postGraphql, withQuery } from './http';

type Call = { url: string; init?: RequestInit };

function fakeFetch(responses: Array<Response | Error>) {
  const calls: Call[] = [];
  const impl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    const next = responses.shift();
    if (!next) throw new Error('no more responses');
    if (next instanceof Error) throw next;
    return next;
  };
  return { impl, calls };
}

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json; charset=utf-8' } });

describe('fetchJson', () => {
  it('retries and returns the first good response', async () => {
    const { impl, calls } = fakeFetch([new Error('socket hang up'), json({ ok: true })]);
    const out = await fetchJson('http://feed.test/a', { fetchImpl: impl, minIntervalMs: 0, query: { jurisdiction: 'NSW' } });
    expect(out).toEqual({ ok: true });
    expect(calls).toHaveLength(2);
    expect(calls[0].url).toBe('http://feed.test/a?jurisdiction=NSW');
  });

  it('throws the last error after the retry budget', async () => {
    const { impl, calls } = fakeFetch([json({}, 500), json({}, 503)]);
    await expect(fetchJson('http://feed.test/b', { fetchImpl: impl, minIntervalMs: 0, retry: 2 })).rejects.toBeInstanceOf(HttpError);
    expect(calls).toHaveLength(2);
  });

  it('posts JSON bodies', async () => {
    const { impl, calls } = fakeFetch([json({ data: { x: 1 } })]);
    await fetchJson('http://feed.test/gql', { fetchImpl: impl, minIntervalMs: 0, body: { query: '{ x }' } });
    expect(calls[0].init?.method).toBe('POST');
    expect(calls[0].init?.body).toBe('{"query":"{ x }"}');
  });
});

describe('postGraphql', () => {
  it('returns data', async () => {
    const { impl } = fakeFetch([json({ data: { meetings: [] } })]);
    expect(await postGraphql('http://gql.test', '{ meetings }', { fetchImpl: impl, minIntervalMs: 0 })).toEqual({
      data: { meetings: [] },
    });
  });

  it('reports errors as missing data', async () => {
    const { impl } = fakeFetch([json({ errors: [{ message: 'Cannot query field "stats"' }] })]);
    expect(await postGraphql('http://gql.test', '{ x }', { fetchImpl: impl, minIntervalMs: 0 })).toEqual({
      error: 'Cannot query field "stats"',
    });
  });
});

describe('helpers', () => {
  it('decodes declared charsets', () => {
    const buf = new Uint8Array(iconv.encode('{"name":"café"}', 'latin1'));
    expect(decodeBody(buf, 'application/json; charset=ISO-8859-1')).toBe('{"name":"café"}');
    expect(decodeBody(new TextEncoder().encode('plain'), null)).toBe('plain');
  });

  it('adds query parameters', () => {
    expect(withQuery('http://x.test/p?a=1', { b: '2' })).toBe('http://x.test/p?a=1&b=2');
    expect(withQuery('http://x.test/p')).toBe('http://x.test/p');
  });

  it('fills query templates', () => {
    const q = loadQuery(new URL('../form/queries/last-run.graphql', import.meta.url), { meetingId: 'abc"123' });
    expect(q).toContain('meeting(id: "abc123")');
  });
});
