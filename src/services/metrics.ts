import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';
import { Chain, KNOWN_CHAINS } from '../types/mentions';

export interface MetricsOptions {
  collectDefaults?: boolean;
}

/** Prometheus counters mirroring the radar's in-process stats. */
export class RadarMetrics {
  readonly registry = new Registry();

  private readonly messagesTotal: Counter<'chain'>;
  private readonly mentionsTotal: Counter<'chain'>;
  private readonly alertsTotal: Counter;
  private readonly trendingGauge: Gauge<'chain'>;

  constructor(options: MetricsOptions = {}) {
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.messagesTotal = new Counter({
      name: 'radar_messages_total',
      help: 'Total messages processed',
      labelNames: ['chain'],
      registers: [this.registry]
    });
    this.mentionsTotal = new Counter({
      name: 'radar_mentions_total',
      help: 'Total contract mentions recorded',
      labelNames: ['chain'],
      registers: [this.registry]
    });
    this.alertsTotal = new Counter({
      name: 'radar_alerts_total',
      help: 'Total alerts sent',
      registers: [this.registry]
    });
    this.trendingGauge = new Gauge({
      name: 'radar_trending_count',
      help: 'Current number of trending tokens',
      labelNames: ['chain'],
      registers: [this.registry]
    });
  }

  messageProcessed(): void {
    this.messagesTotal.inc({ chain: 'all' });
  }

  mentionRecorded(chain: Chain, count: number): void {
    this.mentionsTotal.inc({ chain }, count);
  }

  alertsSent(count: number): void {
    this.alertsTotal.inc(count);
  }

  /** Chains absent from `trending` are reset to zero. */
  trendingUpdated(trending: Map<Chain, number>): void {
    for (const chain of KNOWN_CHAINS) {
      this.trendingGauge.set({ chain }, trending.get(chain) ?? 0);
    }
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }
}
