import { logger } from '../../lib/logger';

/**
 * Global timer management for proper cleanup on process termination
 */
export class TimerManager {
  private static instance: TimerManager;
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();
  private isShuttingDown = false;

  private constructor() {
    process.once('SIGTERM', () => this.shutdown('SIGTERM'));
    process.once('SIGINT', () => this.shutdown('SIGINT'));
  }

  static getInstance(): TimerManager {
    if (!TimerManager.instance) {
      TimerManager.instance = new TimerManager();
    }
    return TimerManager.instance;
  }

  /**
   * Create a managed setTimeout that will be cleaned up on shutdown
   */
  setTimeout(callback: () => void, delay: number): ReturnType<typeof setTimeout> {
    if (this.isShuttingDown) {
      throw new Error('Cannot create timer during shutdown');
    }

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      callback();
    }, delay);

    this.timers.add(timer);
    return timer;
  }

  /**
   * Clear a managed timeout
   */
  clearTimeout(timer: ReturnType<typeof setTimeout>): void {
    clearTimeout(timer);
    this.timers.delete(timer);
  }

  /**
   * Create a delay promise with automatic cleanup
   */
  async delay(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) return;

    return new Promise<void>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | null = null;

      const abortHandler = () => {
        cleanup();
        reject(new Error('Delay aborted'));
      };

      const cleanup = () => {
        if (timer) {
          this.clearTimeout(timer);
        }
        signal?.removeEventListener('abort', abortHandler);
      };

      if (signal) {
        signal.addEventListener('abort', abortHandler, { once: true });
      }

      timer = this.setTimeout(() => {
        cleanup();
        resolve();
      }, ms);
    });
  }

  /**
   * Clear every managed timer
   */
  shutdown(reason: string): void {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    logger.info(`TimerManager: Clearing ${this.timers.size} active timers on ${reason}`);
    this.timers.forEach(timer => clearTimeout(timer));
    this.timers.clear();
  }
}

export const timerManager = TimerManager.getInstance();
