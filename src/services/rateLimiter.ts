import { Clock, Sleep, sleep as defaultSleep, systemClock } from '../utils/clock';
import { logger } from '../utils/logger';

/** At most `maxRequests` request starts in any rolling `timeWindowMs`. */
export class SlidingWindowRateLimiter {
  private requests: number[] = [];

  constructor(
    private readonly maxRequests: number,
    private readonly timeWindowMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  canMakeRequest(): boolean {
    const now = this.clock.now();
    this.requests = this.requests.filter(time => now - time < this.timeWindowMs);
    return this.requests.length < this.maxRequests;
  }

  recordRequest(): void {
    this.requests.push(this.clock.now());
  }

  getNextAvailableTime(): number {
    if (this.canMakeRequest()) return 0;

    const oldestRequest = this.requests[0];
    return oldestRequest !== undefined ? oldestRequest + this.timeWindowMs - this.clock.now() : 0;
  }

  /** Waits until a slot is free, then claims it. */
  async acquire(sleep: Sleep = defaultSleep): Promise<void> {
    while (!this.canMakeRequest()) {
      const waitTime = this.getNextAvailableTime();
      logger.debug(`Rate limit reached, waiting ${waitTime}ms`);
      await sleep(Math.max(waitTime, 1));
    }
    this.recordRequest();
  }
}

/**
 * Enforces a minimum gap between the starts of consecutive requests. The
 * first request goes out immediately.
 */
export class RequestSpacer {
  private lastStart: number | null = null;

  constructor(
    private readonly minSpacingMs: number,
    private readonly clock: Clock = systemClock,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  async wait(): Promise<void> {
    if (this.lastStart !== null) {
      const remaining = this.lastStart + this.minSpacingMs - this.clock.now();
      if (remaining > 0) {
        await this.sleep(remaining);
      }
    }
    this.lastStart = this.clock.now();
  }
}
