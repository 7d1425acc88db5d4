import http from 'http';
import dotenv from 'dotenv';
import { AlertDispatcher } from './services/alertDispatcher';
import { CooldownGate } from './services/cooldown';
import { createDetectors } from './services/detectors';
import { DexScreenerService } from './services/dexscreener';
import { HealthCheckService, createHealthApp, startHealthServer, stopHealthServer } from './services/health';
import { MentionIngestor } from './services/ingestion';
import { RadarMetrics } from './services/metrics';
import { SqliteMentionStore } from './services/mentionStore';
import { SchedulerService } from './services/scheduler';
import { RadarStats } from './services/stats';
import { TelegramService } from './services/telegram';
import { TrendingEngine } from './services/trending';
import { AppConfig, loadConfig } from './utils/config';
import { createErrorContext, globalErrorHandler, withErrorHandling } from './utils/errorHandler';
import { logger, setLogLevel } from './utils/logger';

dotenv.config();

interface RadarServices {
  store: SqliteMentionStore;
  telegram: TelegramService;
  scheduler: SchedulerService;
  healthServer: http.Server | null;
}

class AlphaRadarBot {
  private config: AppConfig;
  private services: RadarServices | null = null;
  private isShuttingDown = false;

  constructor() {
    this.config = loadConfig();
    setLogLevel(this.config.logLevel);
    this.setupProcessHandlers();
  }

  private setupProcessHandlers(): void {
    process.on('uncaughtException', (error) => {
      globalErrorHandler.handleError(error, createErrorContext('uncaught_exception'));
      logger.error('Uncaught exception:', error);
      void this.gracefulShutdown(1);
    });

    process.on('unhandledRejection', (reason) => {
      globalErrorHandler.handleError(reason, createErrorContext('unhandled_rejection'));
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

  async start(): Promise<void> {
    logger.info('Starting Alpha Radar...', {
      nodeEnv: this.config.nodeEnv,
      dryRun: this.config.dryRun,
      window: `${this.config.trending.windowMinutes}m`,
      minMentions: this.config.trending.minMentions,
      minUniqueSources: this.config.trending.minUniqueSources,
      cooldown: `${this.config.trending.cooldownMinutes}m`,
      liquidityFilter: this.config.dexScreener.enabled,
      tokenNames: this.config.dexScreener.tokenNames,
      metrics: this.config.metricsEnabled
    });

    this.services = await withErrorHandling(
      () => this.initializeServices(),
      createErrorContext('bot_startup')
    );

    logger.info('Alpha Radar started successfully');
  }

  private async initializeServices(): Promise<RadarServices> {
    const { config } = this;

    const store = await SqliteMentionStore.open(config.databasePath, {
      saveIntervalMs: config.databaseSaveIntervalSeconds * 1000
    });

    const metrics = config.metricsEnabled ? new RadarMetrics({ collectDefaults: true }) : null;
    const stats = new RadarStats(Date.now, metrics);
    const cooldown = new CooldownGate(config.trending.cooldownMinutes * 60 * 1000);
    const detectors = createDetectors();

    const dexScreener = config.dexScreener.enabled || config.dexScreener.tokenNames
      ? new DexScreenerService(config.dexScreener)
      : null;
    const liquidity = config.dexScreener.enabled ? dexScreener : null;

    const engine = new TrendingEngine(store, {
      windowMinutes: config.trending.windowMinutes,
      minMentions: config.trending.minMentions,
      minUniqueSources: config.trending.minUniqueSources,
      liquidityEnabled: config.dexScreener.enabled,
      storeTimeoutMs: config.storeQueryTimeoutMs
    }, liquidity);

    const ingestor = new MentionIngestor(store, detectors, config.filters, stats);

    const telegram = new TelegramService(config.telegramBotToken, {
      ingestor,
      engine,
      store,
      stats,
      cooldown,
      timezone: config.timezone,
      dryRun: config.dryRun
    });

    const dispatcher = new AlertDispatcher(telegram, cooldown, store, {
      alertChatId: config.alertChatId,
      windowMinutes: config.trending.windowMinutes,
      dryRun: config.dryRun
    }, Date.now, config.dexScreener.tokenNames ? dexScreener : null);

    const scheduler = new SchedulerService(engine, dispatcher, cooldown, store, stats, {
      checkIntervalSeconds: config.trending.checkIntervalSeconds,
      retentionHours: config.trending.retentionHours,
      timezone: config.timezone
    });

    await telegram.start();
    scheduler.start();

    let healthServer: http.Server | null = null;
    if (config.healthEnabled || config.metricsEnabled) {
      const health = new HealthCheckService({
        store,
        stats,
        cooldown,
        detectors: detectors.map(detector => detector.chain),
        dryRun: config.dryRun,
        isTelegramConnected: () => telegram.isRunning(),
        isSchedulerRunning: () => scheduler.isSchedulerRunning(),
        liquidityCircuitState: dexScreener ? () => dexScreener.getCircuitState() : undefined
      });
      try {
        healthServer = await startHealthServer(createHealthApp(health, metrics), config.healthPort);
      } catch (error) {
        logger.error('Failed to start health check HTTP server:', error);
      }
    }

    return { store, telegram, scheduler, healthServer };
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

    const services = this.services;
    try {
      if (services) {
        await services.scheduler.stop();
        await services.telegram.stop();
        if (services.healthServer) {
          await stopHealthServer(services.healthServer);
        }
      }
    } catch (error) {
      logger.error('Error during service shutdown:', error);
    } finally {
      if (services) {
        await services.store.close();
      }
      clearTimeout(shutdownTimeout);
      logger.info('Graceful shutdown completed');
      process.exit(exitCode);
    }
  }
}

async function main(): Promise<void> {
  const bot = new AlphaRadarBot();
  await bot.start();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Failed to start Alpha Radar:', error);
    process.exit(1);
  });
}

export { AlphaRadarBot };
