import { Chain } from '../types/mentions';
import { RadarMetrics } from './metrics';

export interface StatsSnapshot {
  startedAt: number;
  uptimeMs: number;
  messagesProcessed: number;
  mentionsRecorded: number;
  alertsSent: number;
  cyclesRun: number;
  cyclesFailed: number;
  cyclesSkipped: number;
  lastCycleAt: number | null;
  lastCycleError: string | null;
  trendingByChain: Record<string, number>;
}

export class RadarStats {
  private readonly startedAt: number;
  private messagesProcessed = 0;
  private mentionsRecorded = 0;
  private alertsSent = 0;
  private cyclesRun = 0;
  private cyclesFailed = 0;
  private cyclesSkipped = 0;
  private lastCycleAt: number | null = null;
  private lastCycleError: string | null = null;
  private trendingByChain = new Map<Chain, number>();

  constructor(
    private readonly now: () => number = Date.now,
    private readonly metrics: RadarMetrics | null = null
  ) {
    this.startedAt = now();
  }

  messageProcessed(): void {
    this.messagesProcessed++;
    this.metrics?.messageProcessed();
  }

  mentionRecorded(chain: Chain, count: number = 1): void {
    this.mentionsRecorded += count;
    this.metrics?.mentionRecorded(chain, count);
  }

  cycleCompleted(trending: Map<Chain, number>, alertsSent: number): void {
    this.cyclesRun++;
    this.alertsSent += alertsSent;
    this.metrics?.alertsSent(alertsSent);
    this.metrics?.trendingUpdated(trending);
    this.lastCycleAt = this.now();
    this.lastCycleError = null;
    this.trendingByChain = new Map(trending);
  }

  cycleFailed(error: string): void {
    this.cyclesFailed++;
    this.lastCycleAt = this.now();
    this.lastCycleError = error;
  }

  cycleSkipped(): void {
    this.cyclesSkipped++;
  }

  snapshot(): StatsSnapshot {
    const now = this.now();
    return {
      startedAt: this.startedAt,
      uptimeMs: now - this.startedAt,
      messagesProcessed: this.messagesProcessed,
      mentionsRecorded: this.mentionsRecorded,
      alertsSent: this.alertsSent,
      cyclesRun: this.cyclesRun,
      cyclesFailed: this.cyclesFailed,
      cyclesSkipped: this.cyclesSkipped,
      lastCycleAt: this.lastCycleAt,
      lastCycleError: this.lastCycleError,
      trendingByChain: Object.fromEntries(this.trendingByChain)
    };
  }
}
