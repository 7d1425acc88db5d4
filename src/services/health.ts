import http from 'http';
import express from 'express';
import { errorMessage, globalErrorHandler } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { CooldownGate } from './cooldown';
import { MentionStore } from './mentionStore';
import { RadarMetrics } from './metrics';
import { RadarStats, StatsSnapshot } from './stats';

export interface ServiceHealth {
  healthy: boolean;
  error?: string | undefined;
  lastCheck: number;
  metadata?: Record<string, unknown> | undefined;
}

export interface HealthStatus {
  healthy: boolean;
  timestamp: number;
  services: {
    database: ServiceHealth;
    telegram: ServiceHealth;
    scheduler: ServiceHealth;
  };
  stats: StatsSnapshot;
  cooldowns: number;
  detectors: string[];
  dryRun: boolean;
  // Handled errors by `${code}_${operation}`.
  errors: Record<string, number>;
}

export interface HealthDependencies {
  store: MentionStore;
  stats: RadarStats;
  cooldown: CooldownGate;
  detectors: string[];
  dryRun: boolean;
  isTelegramConnected: () => boolean;
  isSchedulerRunning: () => boolean;
  liquidityCircuitState?: () => string;
  errorStats?: () => Record<string, number>;
  now?: () => number;
}

export class HealthCheckService {
  private readonly now: () => number;
  private readonly errorStats: () => Record<string, number>;

  constructor(private readonly deps: HealthDependencies) {
    this.now = deps.now ?? Date.now;
    this.errorStats = deps.errorStats ?? (() => globalErrorHandler.getErrorStats());
  }

  async performHealthCheck(): Promise<HealthStatus> {
    const timestamp = this.now();

    const [database, telegram, scheduler] = await Promise.allSettled([
      this.checkDatabase(),
      this.checkTelegram(),
      this.checkScheduler()
    ]);

    const services = {
      database: this.extractResult(database),
      telegram: this.extractResult(telegram),
      scheduler: this.extractResult(scheduler)
    };

    const healthy = Object.values(services).every(service => service.healthy);
    if (!healthy) {
      logger.warn('Health check failed', { services });
    }

    return {
      healthy,
      timestamp,
      services,
      stats: this.deps.stats.snapshot(),
      cooldowns: this.deps.cooldown.size(),
      detectors: this.deps.detectors,
      dryRun: this.deps.dryRun,
      errors: this.errorStats()
    };
  }

  private extractResult(result: PromiseSettledResult<ServiceHealth>): ServiceHealth {
    if (result.status === 'fulfilled') {
      return result.value;
    }
    return {
      healthy: false,
      error: errorMessage(result.reason),
      lastCheck: this.now()
    };
  }

  private async checkDatabase(): Promise<ServiceHealth> {
    const connected = this.deps.store.isConnected();
    return {
      healthy: connected,
      error: connected ? undefined : 'Mention store is not connected',
      lastCheck: this.now()
    };
  }

  private async checkTelegram(): Promise<ServiceHealth> {
    const connected = this.deps.isTelegramConnected();
    return {
      healthy: connected,
      error: connected ? undefined : 'Telegram bot is not running',
      lastCheck: this.now()
    };
  }

  private async checkScheduler(): Promise<ServiceHealth> {
    const running = this.deps.isSchedulerRunning();
    return {
      healthy: running,
      error: running ? undefined : 'Scheduler is not running',
      lastCheck: this.now(),
      metadata: this.deps.liquidityCircuitState
        ? { liquidityCircuit: this.deps.liquidityCircuitState() }
        : undefined
    };
  }
}

/** `/metrics` is mounted only when a metrics registry is passed. */
export function createHealthApp(health: HealthCheckService, metrics: RadarMetrics | null = null): express.Express {
  const app = express();

  app.get('/health', async (_req: express.Request, res: express.Response) => {
    try {
      const status = await health.performHealthCheck();
      res.status(status.healthy ? 200 : 503).json({
        status: status.healthy ? 'healthy' : 'unhealthy',
        ...status
      });
    } catch (error) {
      res.status(500).json({
        status: 'unhealthy',
        error: errorMessage(error),
        timestamp: new Date().toISOString()
      });
    }
  });

  app.get('/status', (_req: express.Request, res: express.Response) => {
    res.json({
      status: 'running',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      pid: process.pid
    });
  });

  if (metrics) {
    app.get('/metrics', async (_req: express.Request, res: express.Response) => {
      try {
        res.set('Content-Type', metrics.contentType);
        res.send(await metrics.render());
      } catch (error) {
        res.status(500).send(errorMessage(error));
      }
    });
  }

  return app;
}

export function startHealthServer(app: express.Express, port: number): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`Health check server started on port ${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function stopHealthServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}
