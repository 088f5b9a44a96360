import dotenv from 'dotenv';
import { Server } from 'http';
import { AlertEventBus } from './events/alertBus';
import { ControlService } from './services/control';
import { HealthCheckService, createHealthApp } from './services/health';
import { JupiterQuoteService } from './services/jupiterQuote';
import { NtfyService } from './services/ntfy';
import { PriceSampler } from './services/priceSampler';
import { RsiEngine } from './services/rsiEngine';
import { SchedulerService } from './services/scheduler';
import { SolanaTrackerService } from './services/solanaTracker';
import { StateStore } from './services/stateStore';
import { TelegramService } from './services/telegram';
import { ThresholdAlertEngine } from './services/thresholdAlerts';
import { WalletPnlAggregator } from './services/walletPnl';
import { AppConfig, loadConfig } from './utils/config';
import { DatabaseManager } from './utils/database';
import { globalErrorHandler, createErrorContext } from './utils/errorHandler';
import { logger } from './utils/logger';

dotenv.config();
if (process.env.LOG_LEVEL) {
  logger.level = process.env.LOG_LEVEL;
}

class PriceAlertMonitor {
  private config: AppConfig;
  private database: DatabaseManager;
  private store: StateStore;
  private alertBus: AlertEventBus;
  private rsiEngine: RsiEngine;
  private aggregator: WalletPnlAggregator;
  private scheduler: SchedulerService;
  private control: ControlService;
  private health: HealthCheckService;
  private telegram: TelegramService | null = null;
  private server: Server | null = null;
  private isShuttingDown = false;

  constructor() {
    this.config = loadConfig();
    const config = this.config;

    this.database = new DatabaseManager(config.databasePath);
    this.store = new StateStore(this.database.db, {
      usdAmount: config.usdAmount,
      alertResetMinutes: config.alertResetMinutes,
      rsiInterval: config.rsiInterval,
      rsiResetEnabled: config.rsiResetEnabled,
      trackedToken: config.outputMint,
      buyThresholds: config.buyAlerts,
      sellThresholds: config.sellAlerts,
      rsiAlerts: config.rsiAlerts,
      wallets: config.walletAddresses
    });

    this.alertBus = new AlertEventBus(config.timezone);

    const tracker = config.solanaTrackerApiKey
      ? new SolanaTrackerService({ apiKey: config.solanaTrackerApiKey, baseURL: config.solanaTrackerApiUrl })
      : null;
    if (!tracker) {
      logger.warn('SOLANATRACKER_API_KEY not set, RSI and wallet PnL are disabled');
    }

    this.rsiEngine = new RsiEngine(this.store, this.alertBus, tracker, config.outputMint);
    this.aggregator = new WalletPnlAggregator(this.store, tracker, config.outputMint);

    const sampler = new PriceSampler(
      this.store,
      new JupiterQuoteService({ baseURL: config.jupiterApiUrl }),
      new ThresholdAlertEngine(this.store, this.alertBus),
      {
        inputMint: config.inputMint,
        outputMint: config.outputMint,
        inputDecimals: config.inputDecimals,
        outputDecimals: config.outputDecimals
      }
    );

    this.scheduler = new SchedulerService(sampler, this.rsiEngine, this.aggregator, {
      checkIntervalSeconds: config.checkIntervalSeconds,
      rsiCheckIntervalMinutes: config.rsiCheckIntervalMinutes,
      pnlRefreshCron: config.pnlRefreshCron,
      timezone: config.timezone
    });

    this.control = new ControlService(this.store, this.rsiEngine, this.aggregator);
    this.health = new HealthCheckService({
      database: this.database,
      scheduler: this.scheduler,
      alertBus: this.alertBus,
      rsiEngine: this.rsiEngine,
      aggregator: this.aggregator,
      analytics: tracker
    });

    this.setupNotifications();
    this.setupProcessHandlers();
  }

  private setupNotifications(): void {
    const { config } = this;

    if (config.ntfyTopic) {
      this.alertBus.subscribeSender(new NtfyService({ server: config.ntfyServer, topic: config.ntfyTopic }));
    } else {
      logger.warn('NTFY_TOPIC not set, ntfy notifications are disabled');
    }

    if (config.telegramBotToken && config.telegramChatId) {
      this.telegram = new TelegramService(
        config.telegramBotToken,
        config.telegramChatId,
        () => this.control.formatStatusSummary(config.timezone)
      );
      this.alertBus.subscribeSender(this.telegram);
    }
  }

  private setupProcessHandlers(): void {
    process.on('uncaughtException', (error) => {
      globalErrorHandler.handleError(error, createErrorContext('uncaught_exception'));
      logger.error('Uncaught exception:', error);
      void this.gracefulShutdown(1);
    });

    process.on('unhandledRejection', (reason) => {
      const error = reason instanceof Error ? reason : new Error(String(reason));
      globalErrorHandler.handleError(error, createErrorContext('unhandled_rejection'));
    });

    process.on('SIGTERM', () => {
      logger.warn('SIGTERM received');
      void this.gracefulShutdown(0);
    });

    process.on('SIGINT', () => {
      logger.warn('SIGINT received');
      void this.gracefulShutdown(0);
    });
  }

  start(): void {
    const { config } = this;
    logger.info('Starting price alert monitor', {
      inputMint: config.inputMint,
      outputMint: config.outputMint,
      usdAmount: this.store.getUsdAmount(),
      wallets: this.store.getWallets().length
    });

    this.scheduler.start();
    this.telegram?.start();

    if (this.aggregator.isEnabled() && this.store.getWallets().length > 0) {
      this.control.refreshWalletPnl().catch((error: unknown) => {
        logger.error('Initial wallet PnL refresh failed:', error);
      });
    }

    const app = createHealthApp(this.health, this.control);
    this.server = app.listen(config.healthCheckPort, () => {
      logger.info(`Health check server started on port ${config.healthCheckPort}`);
    });
  }

  async gracefulShutdown(exitCode: number): Promise<void> {
    if (this.isShuttingDown) {
      logger.warn('Shutdown already in progress, forcing exit');
      process.exit(exitCode);
    }

    this.isShuttingDown = true;
    logger.info('Initiating graceful shutdown...');

    const shutdownTimeout = setTimeout(() => {
      logger.error('Shutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, 30000);

    try {
      await this.scheduler.stop();
      this.telegram?.stop();
      if (this.server) {
        this.server.close();
        logger.info('Health check server stopped');
      }
    } catch (error) {
      logger.error('Error during service shutdown:', error);
    } finally {
      this.database.close();
      clearTimeout(shutdownTimeout);
      logger.info('Graceful shutdown completed');
      process.exit(exitCode);
    }
  }
}

function main(): void {
  try {
    const monitor = new PriceAlertMonitor();
    monitor.start();
  } catch (error) {
    logger.error('Failed to start monitor:', {
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : 'No stack trace'
    });
    process.exit(1);
  }
}

if (require.main === module) {
  main();
}

export { PriceAlertMonitor };
