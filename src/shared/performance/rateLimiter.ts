import { logger } from '../../lib/logger';
import { timerManager } from './timerManager';

/**
 * Gate every outbound call of one client goes through
 */
export interface RateLimiter {
  wait(): Promise<void>;
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = ms => timerManager.delay(ms);

/**
 * Enforces a minimum interval between requests. Callers queue on a promise
 * chain, so concurrent callers are released one at a time.
 */
export class IntervalRateLimiter implements RateLimiter {
  private lastRequestTime = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly minDelayMs: number,
    private readonly serviceName: string = 'API',
    private readonly sleep: Sleep = defaultSleep,
    private readonly now: () => number = Date.now
  ) {}

  static perSecond(requestsPerSecond: number, serviceName: string, sleep?: Sleep): IntervalRateLimiter {
    return new IntervalRateLimiter(Math.ceil(1000 / requestsPerSecond), serviceName, sleep);
  }

  wait(): Promise<void> {
    const turn = this.tail.then(() => this.takeTurn());
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  getTimeUntilNextRequest(): number {
    return Math.max(0, this.minDelayMs - (this.now() - this.lastRequestTime));
  }

  reset(): void {
    this.lastRequestTime = 0;
  }

  private async takeTurn(): Promise<void> {
    const delay = this.getTimeUntilNextRequest();
    if (delay > 0) {
      logger.debug(`Rate limiting ${this.serviceName} - waiting ${delay}ms before next request`);
      await this.sleep(delay);
    }
    this.lastRequestTime = this.now();
  }
}

/**
 * Limiter that never waits
 */
export class NoopRateLimiter implements RateLimiter {
  async wait(): Promise<void> {}
}
