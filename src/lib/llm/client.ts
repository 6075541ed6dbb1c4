import { request, type Dispatcher } from 'undici';
import { z } from 'zod';

import { LlmAuthError, LlmRequestError, errorMessage } from '../errors.js';

export interface CompletionRequest {
  prompt: string;
  temperature?: number;
  maxTokens?: number;
}

export interface CompletionResponse {
  text: string;
}

/** The only thing the pipeline knows about the model provider. */
export interface CompletionClient {
  complete(req: CompletionRequest): Promise<CompletionResponse>;
}

export interface OpenAICompatibleOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  dispatcher?: Dispatcher; // tests pass an undici MockAgent
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

const RETRYABLE_STATUS = new Set([408, 409, 429]);

export function parseRetryAfter(value: string | string[] | undefined, now = Date.now()): number | undefined {
  const v = Array.isArray(value) ? value[0] : value;
  if (!v) return undefined;
  const seconds = Number(v);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1000);
  const at = Date.parse(v);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

function clip(s: string, max = 300): string {
  const t = s.replace(/\s+/g, ' ').trim();
  return t.length <= max ? t : `${t.slice(0, max - 1)}…`;
}

export class OpenAICompatibleClient implements CompletionClient {
  private readonly endpoint: string;

  constructor(private readonly opts: OpenAICompatibleOptions) {
    this.endpoint = opts.baseUrl.replace(/\/+$/, '') + '/chat/completions';
  }

  async complete(req: CompletionRequest): Promise<CompletionResponse> {
    const payload = {
      model: this.opts.model,
      messages: [{ role: 'user', content: req.prompt }],
      temperature: req.temperature ?? 0.3,
      ...(req.maxTokens !== undefined ? { max_tokens: req.maxTokens } : {}),
    };

    let res: Dispatcher.ResponseData;
    try {
      res = await request(this.endpoint, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${this.opts.apiKey}`,
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
        headersTimeout: this.opts.timeoutMs,
        bodyTimeout: this.opts.timeoutMs,
        ...(this.opts.dispatcher ? { dispatcher: this.opts.dispatcher } : {}),
      });
    } catch (err) {
      // Timeout (AbortSignal / undici timeouts) or network error: retryable.
      throw new LlmRequestError(`Completion request failed: ${errorMessage(err)}`, { retryable: true, cause: err });
    }

    const { statusCode, headers, body } = res;

    if (statusCode < 200 || statusCode >= 300) {
      const detail = clip(await body.text().catch(() => ''));
      const message = `Completion API returned ${statusCode}${detail ? `: ${detail}` : ''}`;
      if (statusCode === 401 || statusCode === 403) {
        throw new LlmAuthError(message, statusCode);
      }
      const retryable = RETRYABLE_STATUS.has(statusCode) || statusCode >= 500;
      throw new LlmRequestError(message, {
        retryable,
        status: statusCode,
        retryAfterMs: retryable ? parseRetryAfter(headers['retry-after']) : undefined,
      });
    }

    let json: unknown;
    try {
      json = await body.json();
    } catch (err) {
      throw new LlmRequestError(`Completion API returned invalid JSON: ${errorMessage(err)}`, {
        retryable: true,
        status: statusCode,
        cause: err,
      });
    }

    const parsed = ChatCompletionSchema.safeParse(json);
    const first = parsed.success ? parsed.data.choices[0] : undefined;
    if (!parsed.success || !first) {
      throw new LlmRequestError('Completion API response has no choices[0].message.content', {
        retryable: true,
        status: statusCode,
      });
    }

    return { text: first.message.content ?? '' };
  }
}
