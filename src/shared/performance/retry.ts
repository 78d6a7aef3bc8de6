import { logger } from '../../lib/logger';
import { Result, err, ok } from '../types/result';
import { Sleep } from './rateLimiter';
import { timerManager } from './timerManager';

/**
 * How a failed attempt is treated
 * - `retry`: wait with exponential backoff, then try again
 * - `rate-limited`: wait the fixed rate-limit delay, then try again
 * - `fatal`: give up immediately
 */
export type RetryDecision = 'retry' | 'rate-limited' | 'fatal';

export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
  rateLimitedDelayMs: number;
  classify: (error: Error) => RetryDecision;
}

export interface RetryOptions {
  serviceName?: string;
  sleep?: Sleep;
}

/**
 * Delay before the attempt following `attempt` (1-based)
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.initialDelayMs * Math.pow(policy.backoffFactor, attempt - 1), policy.maxDelayMs);
}

/**
 * Run `fn` under `policy`. Never throws: the last error comes back as the
 * failed side of the result.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<Result<T, Error>> {
  const serviceName = options.serviceName ?? 'Operation';
  const sleep = options.sleep ?? ((ms: number) => timerManager.delay(ms));
  let lastError: Error = new Error(`${serviceName} was never attempted`);

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return ok(await fn());
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const decision = policy.classify(lastError);

      if (decision === 'fatal') {
        logger.debug(`${serviceName} error not eligible for retry: ${lastError.message}`);
        return err(lastError);
      }

      if (attempt >= policy.maxAttempts) {
        break;
      }

      const delay = decision === 'rate-limited' ? policy.rateLimitedDelayMs : backoffDelay(policy, attempt);
      logger.warn(
        `${serviceName} ${decision === 'rate-limited' ? 'rate limited' : 'failed'} on attempt ${attempt}/${
          policy.maxAttempts
        }: ${lastError.message}; retrying in ${delay}ms`
      );
      await sleep(delay);
    }
  }

  logger.warn(`${serviceName} failed after ${policy.maxAttempts} attempts: ${lastError.message}`);
  return err(lastError);
}
