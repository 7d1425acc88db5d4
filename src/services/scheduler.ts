import cron, { ScheduledTask } from 'node-cron';
import { Chain } from '../types/mentions';
import { AppError, ErrorSeverity, createErrorContext, errorMessage } from '../utils/errorHandler';
import { Formatters } from '../utils/formatters';
import { logger } from '../utils/logger';
import { validateCronCadence } from '../utils/validation';
import { AlertDispatcher } from './alertDispatcher';
import { CooldownGate } from './cooldown';
import { MentionStore } from './mentionStore';
import { RadarStats } from './stats';
import { TrendingEngine, compareTrending } from './trending';

export interface SchedulerConfig {
  checkIntervalSeconds: number;
  retentionHours: number;
  timezone: string;
}

export type CycleOutcome = 'completed' | 'failed' | 'skipped';

/** Six-field cron expression firing every `seconds` seconds at a fixed cadence. */
export function intervalToCron(seconds: number): string {
  const cadence = validateCronCadence(seconds, 'checkIntervalSeconds');
  if (!cadence.valid) {
    throw new AppError(
      cadence.error ?? `Unsupported check interval: ${seconds}s`,
      'CONFIG_ERROR',
      ErrorSeverity.CRITICAL,
      createErrorContext('schedule_trending_checks'),
      false
    );
  }
  if (seconds < 60) {
    return `*/${seconds} * * * * *`;
  }
  const minutes = seconds / 60;
  if (minutes === 60) {
    return '0 0 * * * *';
  }
  return `0 */${minutes} * * * *`;
}

export class SchedulerService {
  private tasks: ScheduledTask[] = [];
  private isRunning = false;
  private inFlight: Promise<CycleOutcome> | null = null;
  private cleanupRunning = false;

  constructor(
    private readonly engine: TrendingEngine,
    private readonly dispatcher: AlertDispatcher,
    private readonly cooldown: CooldownGate,
    private readonly store: MentionStore,
    private readonly stats: RadarStats,
    private readonly config: SchedulerConfig,
    private readonly now: () => number = Date.now
  ) {}

  start(): void {
    if (this.isRunning) {
      logger.warn('Scheduler is already running');
      return;
    }

    this.setupTrendingChecks(this.config.checkIntervalSeconds);
    this.setupRetentionCleanup();
    this.isRunning = true;

    logger.info('Scheduler started', {
      checkIntervalSeconds: this.config.checkIntervalSeconds,
      retentionHours: this.config.retentionHours,
      timezone: this.config.timezone
    });
  }

  private setupTrendingChecks(intervalSeconds: number): void {
    const task = cron.schedule(intervalToCron(intervalSeconds), async () => {
      await this.runTrendingCycle();
    }, {
      scheduled: true,
      timezone: this.config.timezone
    });

    this.tasks.push(task);
    logger.info(`Scheduled trending checks every ${intervalSeconds}s`);
  }

  private setupRetentionCleanup(): void {
    const task = cron.schedule('0 * * * *', async () => {
      await this.runRetentionCleanup();
    }, {
      scheduled: true,
      timezone: this.config.timezone
    });

    this.tasks.push(task);
    logger.info(`Scheduled hourly cleanup of mentions older than ${this.config.retentionHours}h`);
  }

  /**
   * One detect, dispatch and sweep pass. A call made while a previous pass is
   * still running returns 'skipped' without touching the store.
   */
  runTrendingCycle(): Promise<CycleOutcome> {
    if (this.inFlight) {
      logger.warn('Previous trending cycle still running, skipping tick');
      this.stats.cycleSkipped();
      return Promise.resolve('skipped');
    }

    const cycle = this.executeCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async executeCycle(): Promise<CycleOutcome> {
    const startedAt = this.now();
    try {
      const byChain = await this.engine.detectByChain();

      let sent = 0;
      const counts = new Map<Chain, number>();
      for (const [chain, tokens] of byChain) {
        counts.set(chain, tokens.length);
        sent += await this.dispatcher.dispatch(tokens);
      }

      const swept = this.cooldown.sweepExpired();
      this.stats.cycleCompleted(counts, sent);

      const top = [...byChain.values()].flat().sort(compareTrending).slice(0, 5).map(token => ({
        contract: Formatters.shortenAddress(token.contract),
        chain: token.chain,
        score: Number(token.score.toFixed(2))
      }));
      const trending = [...counts.values()].reduce((sum, count) => sum + count, 0);
      const summary = {
        trending,
        alertsSent: sent,
        cooldownsSwept: swept,
        durationMs: this.now() - startedAt,
        top
      };
      if (trending > 0) {
        logger.info('Trending cycle completed', summary);
      } else {
        logger.debug('Trending cycle completed', summary);
      }
      return 'completed';
    } catch (error) {
      logger.error('Trending cycle failed:', { error: errorMessage(error) });
      this.stats.cycleFailed(errorMessage(error));
      return 'failed';
    }
  }

  async runRetentionCleanup(): Promise<number> {
    if (this.cleanupRunning) {
      logger.debug('Retention cleanup already running');
      return 0;
    }

    this.cleanupRunning = true;
    try {
      const cutoff = this.now() - this.config.retentionHours * 60 * 60 * 1000;
      const deleted = await this.store.deleteOlderThan(cutoff);
      logger.info(`Retention cleanup removed ${deleted} mentions`, {
        cutoff: new Date(cutoff).toISOString()
      });
      return deleted;
    } catch (error) {
      logger.error('Failed to run retention cleanup:', { error: errorMessage(error) });
      return 0;
    } finally {
      this.cleanupRunning = false;
    }
  }

  /** Halts future ticks and waits for a cycle that is already running. */
  async stop(): Promise<void> {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
    this.isRunning = false;

    if (this.inFlight) {
      logger.info('Waiting for in-flight trending cycle to finish');
      await this.inFlight;
    }
    logger.info('Scheduler stopped');
  }

  isSchedulerRunning(): boolean {
    return this.isRunning;
  }

  isCycleInFlight(): boolean {
    return this.inFlight !== null;
  }

  getActiveTasksCount(): number {
    return this.tasks.length;
  }
}
