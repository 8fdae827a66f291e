import { z } from 'zod';
import type { Analyzer } from '../../src/lib/types';

const MESSAGES_URL = 'https://api.anthropic.com/v1/messages';
const TIMEOUT_MS = 180_000;

export class AnalyzerError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'AnalyzerError';
  }
}

const MessageResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).catch([]),
  stop_reason: z.string().nullish(),
});

export type AnthropicOptions = {
  apiKey: string;
  model: string;
  maxTokens: number;
  fetchImpl?: typeof fetch;
};

// text ブロックを連結して返す。stop_reason が max_tokens なら途中で切れている
export function createAnthropicAnalyzer(opts: AnthropicOptions): Analyzer {
  const doFetch = opts.fetchImpl ?? fetch;
  return async (prompt: string) => {
    const res = await doFetch(MESSAGES_URL, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'x-api-key': opts.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify({
        model: opts.model,
        max_tokens: opts.maxTokens,
        messages: [{ role: 'user', content: prompt }],
      }),
      signal: AbortSignal.timeout(TIMEOUT_MS),
    });
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw new AnalyzerError(`${res.status}: ${body.slice(0, 200)}`, res.status);
    }
    const data = MessageResponseSchema.parse(await res.json());
    if (data.stop_reason === 'max_tokens') console.warn('[analyzer] response hit max_tokens, output may be truncated');
    return data.content
      .filter((b) => b.type === 'text')
      .map((b) => b.text ?? '')
      .join('');
  };
}
