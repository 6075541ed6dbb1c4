import { request, type Dispatcher } from 'undici';

import { WebhookError, errorMessage } from '../errors.js';

export interface WebhookOptions {
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

/** Plain-text bot message, as accepted by Feishu/Lark-style group webhooks. */
export function textMessagePayload(text: string): { msg_type: 'text'; content: { text: string } } {
  return { msg_type: 'text', content: { text } };
}

export async function postWebhookText(url: string, text: string, opts: WebhookOptions = {}): Promise<void> {
  const { timeoutMs = 30_000, dispatcher } = opts;

  let res: Dispatcher.ResponseData;
  try {
    res = await request(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(textMessagePayload(text)),
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      ...(dispatcher ? { dispatcher } : {}),
    });
  } catch (err) {
    throw new WebhookError(`Webhook request failed: ${errorMessage(err)}`);
  }

  const body = await res.body.text();
  if (res.statusCode < 200 || res.statusCode >= 300) {
    throw new WebhookError(`Webhook returned ${res.statusCode}: ${body.slice(0, 300)}`, res.statusCode);
  }
}
