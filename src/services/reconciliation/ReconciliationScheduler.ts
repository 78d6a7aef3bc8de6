import { ValidatedConfiguration } from '../../config';
import { createLogger } from '../../lib/logger';
import { errorHandler } from '../../shared/errors';
import { TimerManager, timerManager } from '../../shared/performance';
import { ISweeper, SweepResult } from './ReconciliationSweeper';

const logger = createLogger('reconciliation-scheduler');

/**
 * Runs a delayed follow-up sweep of an upload. At most one sweep per upload
 * is waiting at any time.
 */
export class ReconciliationScheduler {
  private readonly timers = new Map<number, ReturnType<typeof setTimeout>>();
  private readonly running = new Set<Promise<void>>();

  constructor(
    private readonly sweeper: ISweeper,
    private readonly delayMs: number = ValidatedConfiguration.reconciliation.retryDelayMs,
    private readonly timerManagerInstance: TimerManager = timerManager,
    private readonly onComplete?: (uploadId: number, result: SweepResult) => void
  ) {}

  /**
   * @returns False when a sweep of this upload is already waiting, or timers are shutting down
   */
  schedule(uploadId: number): boolean {
    if (this.timers.has(uploadId)) {
      return false;
    }

    try {
      const timer = this.timerManagerInstance.setTimeout(() => {
        this.timers.delete(uploadId);
        this.track(this.run(uploadId));
      }, this.delayMs);
      this.timers.set(uploadId, timer);
    } catch (error) {
      errorHandler.handleError(error, { uploadId, operation: 'scheduleSweep' });
      return false;
    }

    logger.info({ uploadId, delayMs: this.delayMs }, 'Scheduled follow-up sweep');
    return true;
  }

  isScheduled(uploadId: number): boolean {
    return this.timers.has(uploadId);
  }

  cancel(uploadId: number): boolean {
    const timer = this.timers.get(uploadId);
    if (!timer) {
      return false;
    }
    this.timerManagerInstance.clearTimeout(timer);
    this.timers.delete(uploadId);
    return true;
  }

  cancelAll(): void {
    for (const uploadId of [...this.timers.keys()]) {
      this.cancel(uploadId);
    }
  }

  /**
   * Wait for sweeps that have already started
   */
  async drain(): Promise<void> {
    await Promise.all([...this.running]);
  }

  get size(): number {
    return this.timers.size;
  }

  private async run(uploadId: number): Promise<void> {
    try {
      const result = await this.sweeper.fixOrphans({ uploadId });
      logger.info({ uploadId, ...result }, 'Follow-up sweep finished');
      this.onComplete?.(uploadId, result);
    } catch (error) {
      errorHandler.handleError(error, { uploadId, operation: 'followUpSweep' });
    }
  }

  // run() handles its own errors, so the tracked promise never rejects
  private track(task: Promise<void>): void {
    this.running.add(task);
    void task.finally(() => this.running.delete(task));
  }
}
