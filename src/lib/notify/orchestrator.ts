import { errorMessage } from '../errors.js';
import { sleep } from '../sleep.js';

export interface SendFn {
  (message: string): Promise<void>;
}

export interface DeliverOptions {
  delayMsBetweenMessages?: number;
}

export interface DeliverResult {
  sentCount: number;
  failed: Array<{ index: number; error: string }>;
}

/**
 * Sends messages in order. A batch that fails is logged and skipped; the
 * remaining batches still go out.
 */
export async function deliverDigest(send: SendFn, messages: readonly string[], opts: DeliverOptions = {}): Promise<DeliverResult> {
  const { delayMsBetweenMessages = 600 } = opts;

  let sentCount = 0;
  const failed: DeliverResult['failed'] = [];

  for (const [index, message] of messages.entries()) {
    if (index > 0) await sleep(delayMsBetweenMessages);
    try {
      await send(message);
      sentCount += 1;
    } catch (e) {
      const error = errorMessage(e);
      console.error(`Failed to deliver message ${index + 1}/${messages.length}: ${error}`);
      failed.push({ index, error });
    }
  }

  return { sentCount, failed };
}
