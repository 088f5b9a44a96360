import cron from 'node-cron';
import { reportDeliveries } from '../events/alertBus';
import { logger } from '../utils/logger';
import { PeriodicTask, PeriodicTaskStats, TimerApi } from './periodicTask';
import { PriceSampler } from './priceSampler';
import { RsiEngine } from './rsiEngine';
import { WalletPnlAggregator } from './walletPnl';

export interface SchedulerConfig {
  checkIntervalSeconds: number;
  rsiCheckIntervalMinutes: number;
  pnlRefreshCron: string | null;
  timezone: string;
}

export interface SchedulerStatus {
  running: boolean;
  tasks: PeriodicTaskStats[];
  pnlCron: string | null;
}

export class SchedulerService {
  private tasks: PeriodicTask[] = [];
  private cronTasks: cron.ScheduledTask[] = [];
  private isRunning = false;

  constructor(
    private readonly sampler: PriceSampler,
    private readonly rsiEngine: RsiEngine,
    private readonly aggregator: WalletPnlAggregator,
    private readonly config: SchedulerConfig,
    private readonly timer?: TimerApi
  ) {}

  start(): void {
    if (this.isRunning) {
      logger.warn('Scheduler is already running');
      return;
    }

    this.tasks.push(new PeriodicTask('price_sampler', this.config.checkIntervalSeconds * 1000, () => this.runPriceSample(), {
      timer: this.timer,
      runImmediately: true
    }));

    if (this.rsiEngine.isEnabled()) {
      this.tasks.push(new PeriodicTask('rsi_refresh', this.config.rsiCheckIntervalMinutes * 60000, () => this.runRsiRefresh(), {
        timer: this.timer,
        runImmediately: true
      }));
    } else {
      logger.info('RSI engine disabled, no analytics API key configured');
    }

    this.setupPnlRefresh();

    for (const task of this.tasks) {
      task.start();
    }
    this.isRunning = true;

    logger.info('Scheduler started', {
      checkIntervalSeconds: this.config.checkIntervalSeconds,
      rsiCheckIntervalMinutes: this.config.rsiCheckIntervalMinutes,
      pnlRefreshCron: this.config.pnlRefreshCron
    });
  }

  private setupPnlRefresh(): void {
    const expression = this.config.pnlRefreshCron;
    if (!expression) return;

    if (!this.aggregator.isEnabled()) {
      logger.info('PNL_REFRESH_CRON ignored, wallet PnL is disabled');
      return;
    }
    if (!cron.validate(expression)) {
      logger.warn(`Ignoring invalid PNL_REFRESH_CRON "${expression}"`);
      return;
    }

    const task = cron.schedule(expression, () => {
      this.aggregator.refresh().catch((error: unknown) => {
        logger.error('Scheduled wallet PnL refresh failed:', error);
      });
    }, {
      scheduled: true,
      timezone: this.config.timezone
    });
    this.cronTasks.push(task);

    logger.info(`Scheduled wallet PnL refresh "${expression}" (${this.config.timezone})`);
  }

  async runPriceSample(): Promise<void> {
    const outcome = await this.sampler.sample();
    if (outcome.status === 'recorded') {
      reportDeliveries('Price', outcome.evaluation.deliveries);
    } else {
      logger.info(`Price sample skipped: ${outcome.reason}`);
    }
  }

  async runRsiRefresh(): Promise<void> {
    const result = await this.rsiEngine.refresh();
    reportDeliveries('RSI', result.deliveries);
  }

  async stop(): Promise<void> {
    for (const task of this.cronTasks) {
      task.stop();
    }
    this.cronTasks = [];

    await Promise.all(this.tasks.map(task => task.stop()));
    this.tasks = [];
    this.isRunning = false;

    logger.info('Scheduler stopped');
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.isRunning,
      tasks: this.tasks.map(task => task.getStats()),
      pnlCron: this.cronTasks.length > 0 ? this.config.pnlRefreshCron : null
    };
  }
}
