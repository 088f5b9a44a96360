import express from 'express';
import { AlertEventBus } from '../events/alertBus';
import { Clock, systemClock } from '../utils/clock';
import { DatabaseManager } from '../utils/database';
import { globalErrorHandler } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { ControlService } from './control';
import { RsiEngine } from './rsiEngine';
import { SchedulerService } from './scheduler';
import { SolanaTrackerService } from './solanaTracker';
import { WalletPnlAggregator } from './walletPnl';

export interface ServiceHealth {
  healthy: boolean;
  latency?: number | undefined;
  error?: string | undefined;
  lastCheck: number;
  metadata?: Record<string, unknown> | undefined;
}

export interface HealthStatus {
  healthy: boolean;
  timestamp: number;
  services: {
    database: ServiceHealth;
    scheduler: ServiceHealth;
    alertBus: ServiceHealth;
    rsi: ServiceHealth;
    walletPnl: ServiceHealth;
  };
  metrics: {
    uptime: number;
    memoryUsage: NodeJS.MemoryUsage;
    errorsLastHour: Record<string, number>;
  };
}

export interface HealthDependencies {
  database: DatabaseManager;
  scheduler: SchedulerService;
  alertBus: AlertEventBus;
  rsiEngine: RsiEngine;
  aggregator: WalletPnlAggregator;
  analytics: SolanaTrackerService | null;
}

/**
 * Point-in-time view of every subsystem. A disabled RSI or PnL subsystem is
 * reported but does not make the process unhealthy.
 */
export class HealthCheckService {
  private readonly startTime: number;

  constructor(
    private readonly deps: HealthDependencies,
    private readonly clock: Clock = systemClock
  ) {
    this.startTime = clock.now();
  }

  performHealthCheck(): HealthStatus {
    const timestamp = this.clock.now();
    const services = {
      database: this.checkDatabase(timestamp),
      scheduler: this.checkScheduler(timestamp),
      alertBus: this.checkAlertBus(timestamp),
      rsi: this.checkRsi(timestamp),
      walletPnl: this.checkWalletPnl(timestamp)
    };

    const healthy = Object.values(services).every(service => service.healthy);
    if (!healthy) {
      logger.warn('Health check failed', { services });
    }

    return {
      healthy,
      timestamp,
      services,
      metrics: {
        uptime: timestamp - this.startTime,
        memoryUsage: process.memoryUsage(),
        errorsLastHour: globalErrorHandler.getErrorStats()
      }
    };
  }

  private checkDatabase(now: number): ServiceHealth {
    const result = this.deps.database.healthCheck();
    return {
      healthy: result.healthy,
      latency: result.latency,
      error: result.error,
      lastCheck: now
    };
  }

  private checkScheduler(now: number): ServiceHealth {
    const status = this.deps.scheduler.getStatus();
    const failing = status.tasks.filter(task => task.lastError !== null);
    return {
      healthy: status.running,
      error: status.running ? undefined : 'Scheduler is not running',
      lastCheck: now,
      metadata: {
        tasks: status.tasks,
        failingTasks: failing.map(task => task.name),
        pnlCron: status.pnlCron
      }
    };
  }

  private checkAlertBus(now: number): ServiceHealth {
    const stats = this.deps.alertBus.getStats();
    return {
      healthy: stats.subscriberCount > 0,
      error: stats.subscriberCount > 0 ? undefined : 'No notification channel configured',
      lastCheck: now,
      metadata: {
        subscriberCount: stats.subscriberCount,
        totalEvents: stats.totalEvents,
        eventsByType: stats.eventsByType
      }
    };
  }

  private checkRsi(now: number): ServiceHealth {
    return {
      healthy: true,
      lastCheck: now,
      metadata: {
        status: this.deps.rsiEngine.getStatus(),
        circuit: this.deps.analytics?.getCircuitState() ?? null
      }
    };
  }

  private checkWalletPnl(now: number): ServiceHealth {
    return {
      healthy: true,
      lastCheck: now,
      metadata: {
        enabled: this.deps.aggregator.isEnabled(),
        refreshing: this.deps.aggregator.isRefreshing()
      }
    };
  }
}

export function createHealthApp(health: HealthCheckService, control: ControlService): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req: express.Request, res: express.Response) => {
    try {
      const status = health.performHealthCheck();
      res.status(status.healthy ? 200 : 503).json(status);
    } catch (error) {
      res.status(500).json({
        healthy: false,
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString()
      });
    }
  });

  app.get('/status', (_req: express.Request, res: express.Response) => {
    try {
      res.json(control.getState());
    } catch (error) {
      res.status(500).json({
        error: error instanceof Error ? error.message : 'Unknown error'
      });
    }
  });

  return app;
}
