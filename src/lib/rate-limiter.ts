import type { Logger } from './logger.js';

const ONE_SECOND = 1_000;

/**
 * Sliding one-second window limiter for outbound API requests.
 *
 * The vPIC API is public and throttles bursts per client address, so the
 * connector spaces its requests out rather than relying on 429 recovery.
 */
export class RateLimiter {
  private requests: number[] = [];
  private slotLock: Promise<void> = Promise.resolve();

  constructor(
    private readonly maxPerSecond: number,
    private readonly logger?: Logger,
  ) {}

  /**
   * Returns wait time in ms before another request may go out (0 = proceed).
   */
  checkRequest(): number {
    const now = Date.now();
    this.requests = this.requests.filter((ts) => ts > now - ONE_SECOND);

    if (this.requests.length >= this.maxPerSecond) {
      const oldestInWindow = Math.min(...this.requests);
      return oldestInWindow + ONE_SECOND - now + 50; // +50ms buffer
    }

    return 0;
  }

  recordRequest(): void {
    this.requests.push(Date.now());
  }

  /**
   * Wait until a request is allowed, then record it.
   * Callers are serialized through a promise chain so two waiters never
   * both see a free slot.
   */
  async waitForSlot(): Promise<void> {
    const previous = this.slotLock;
    let release: () => void = () => {};
    this.slotLock = new Promise<void>((r) => {
      release = r;
    });

    await previous;

    try {
      let waitMs = this.checkRequest();
      while (waitMs > 0) {
        this.logger?.debug({ waitMs }, 'Rate limiter: waiting for request slot');
        await sleep(waitMs);
        waitMs = this.checkRequest();
      }
      this.recordRequest();
    } finally {
      release();
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
