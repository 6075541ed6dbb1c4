import type { CompletionClient, CompletionRequest, CompletionResponse } from './client.js';

export interface ThrottleOptions {
  maxInFlight: number;
  minIntervalMs: number;
  now?: () => number;
  setTimer?: (fn: () => void, ms: number) => void;
}

/**
 * FIFO gate in front of the LLM endpoint.
 *
 * Waiters are released in arrival order, at most `maxInFlight` at a time, and
 * two consecutive releases are at least `minIntervalMs` apart.
 */
export class RequestThrottle {
  private readonly maxInFlight: number;
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly setTimer: (fn: () => void, ms: number) => void;

  private readonly queue: Array<() => void> = [];
  private inFlight = 0;
  private lastStart = Number.NEGATIVE_INFINITY;
  private timerPending = false;

  constructor(opts: ThrottleOptions) {
    this.maxInFlight = Math.max(1, opts.maxInFlight);
    this.minIntervalMs = Math.max(0, opts.minIntervalMs);
    this.now = opts.now ?? (() => Date.now());
    this.setTimer = opts.setTimer ?? ((fn, ms) => { setTimeout(fn, ms); });
  }

  get active(): number {
    return this.inFlight;
  }

  get pending(): number {
    return this.queue.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await new Promise<void>((resolve) => {
      this.queue.push(resolve);
      this.drain();
    });
    try {
      return await task();
    } finally {
      this.inFlight -= 1;
      this.drain();
    }
  }

  private drain(): void {
    if (this.timerPending) return;

    while (this.queue.length > 0 && this.inFlight < this.maxInFlight) {
      const wait = this.lastStart + this.minIntervalMs - this.now();
      if (wait > 0) {
        this.timerPending = true;
        this.setTimer(() => {
          this.timerPending = false;
          this.drain();
        }, wait);
        return;
      }

      const next = this.queue.shift();
      if (!next) return;
      this.inFlight += 1;
      this.lastStart = this.now();
      next();
    }
  }
}

/** Routes every call of the wrapped client through one shared throttle. */
export class ThrottledCompletionClient implements CompletionClient {
  constructor(
    private readonly inner: CompletionClient,
    readonly throttle: RequestThrottle
  ) {}

  complete(req: CompletionRequest): Promise<CompletionResponse> {
    return this.throttle.run(() => this.inner.complete(req));
  }
}
