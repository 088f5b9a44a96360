import { Clock, systemClock } from '../utils/clock';
import { globalErrorHandler } from '../utils/errorHandler';
import { logger } from '../utils/logger';

/** Repeating timer; the returned function cancels it. */
export interface TimerApi {
  schedule(callback: () => void, intervalMs: number): () => void;
}

export const intervalTimer: TimerApi = {
  schedule(callback, intervalMs) {
    const handle = setInterval(callback, intervalMs);
    return () => clearInterval(handle);
  }
};

export interface PeriodicTaskOptions {
  timer?: TimerApi;
  clock?: Clock;
  runImmediately?: boolean;
  signal?: AbortSignal;
}

export interface PeriodicTaskStats {
  name: string;
  running: boolean;
  busy: boolean;
  runs: number;
  skippedTicks: number;
  failures: number;
  lastRunAt: number | null;
  lastError: string | null;
}

/**
 * Runs an async job on a fixed interval. A tick that arrives while the
 * previous run is still going is skipped, so one task never overlaps itself.
 */
export class PeriodicTask {
  private cancel: (() => void) | null = null;
  private current: Promise<void> | null = null;
  private readonly timer: TimerApi;
  private readonly clock: Clock;
  private readonly onAbort = () => {
    this.stop().catch((error: unknown) => logger.error(`Failed to stop task ${this.name}:`, error));
  };

  private runs = 0;
  private skippedTicks = 0;
  private failures = 0;
  private lastRunAt: number | null = null;
  private lastError: string | null = null;

  constructor(
    readonly name: string,
    private readonly intervalMs: number,
    private readonly job: () => Promise<void>,
    private readonly options: PeriodicTaskOptions = {}
  ) {
    this.timer = options.timer ?? intervalTimer;
    this.clock = options.clock ?? systemClock;
  }

  isRunning(): boolean {
    return this.cancel !== null;
  }

  start(): void {
    if (this.cancel) return;
    if (this.options.signal?.aborted) return;

    this.cancel = this.timer.schedule(() => {
      void this.tick();
    }, this.intervalMs);
    this.options.signal?.addEventListener('abort', this.onAbort, { once: true });

    logger.info(`Task ${this.name} started, every ${this.intervalMs}ms`);

    if (this.options.runImmediately) {
      void this.tick();
    }
  }

  /** Runs the job once unless a run is already in progress. Never rejects. */
  tick(): Promise<void> {
    if (this.current) {
      this.skippedTicks++;
      logger.debug(`Task ${this.name} still running, skipping tick`);
      return this.current;
    }

    this.current = this.execute().finally(() => {
      this.current = null;
    });
    return this.current;
  }

  private async execute(): Promise<void> {
    this.lastRunAt = this.clock.now();
    this.runs++;
    try {
      await this.job();
      this.lastError = null;
    } catch (error) {
      this.failures++;
      const appError = globalErrorHandler.handleError(error, { operation: `task_${this.name}` });
      this.lastError = appError.message;
    }
  }

  /** Cancels future ticks and waits for an in-flight run to finish. */
  async stop(): Promise<void> {
    if (this.cancel) {
      this.cancel();
      this.cancel = null;
      this.options.signal?.removeEventListener('abort', this.onAbort);
      logger.info(`Task ${this.name} stopped`);
    }
    if (this.current) {
      await this.current;
    }
  }

  getStats(): PeriodicTaskStats {
    return {
      name: this.name,
      running: this.isRunning(),
      busy: this.current !== null,
      runs: this.runs,
      skippedTicks: this.skippedTicks,
      failures: this.failures,
      lastRunAt: this.lastRunAt,
      lastError: this.lastError
    };
  }
}
