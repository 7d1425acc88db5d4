import { RadarMetrics } from '../services/metrics';
import { RadarStats } from '../services/stats';
import { Chain } from '../types/mentions';

const NOW = 1_700_000_000_000;

describe('RadarMetrics', () => {
  let metrics: RadarMetrics;

  const lines = async (): Promise<string[]> => (await metrics.render()).split('\n');

  beforeEach(() => {
    metrics = new RadarMetrics();
  });

  it('should count mentions per chain', async () => {
    metrics.mentionRecorded(Chain.SOLANA, 2);
    metrics.mentionRecorded(Chain.EVM, 1);
    metrics.mentionRecorded(Chain.SOLANA, 3);

    expect(await lines()).toEqual(expect.arrayContaining([
      'radar_mentions_total{chain="solana"} 5',
      'radar_mentions_total{chain="evm"} 1'
    ]));
  });

  it('should reset chains that dropped out of the ranking', async () => {
    metrics.trendingUpdated(new Map([[Chain.SOLANA, 2], [Chain.EVM, 4]]));
    metrics.trendingUpdated(new Map([[Chain.SOLANA, 1]]));

    expect(await lines()).toEqual(expect.arrayContaining([
      'radar_trending_count{chain="solana"} 1',
      'radar_trending_count{chain="evm"} 0'
    ]));
  });

  it('should keep separate registries per instance', async () => {
    const other = new RadarMetrics();
    other.alertsSent(3);
    metrics.alertsSent(1);

    expect((await other.render()).split('\n')).toContain('radar_alerts_total 3');
    expect(await lines()).toContain('radar_alerts_total 1');
  });
});

describe('RadarStats with metrics', () => {
  it('should forward every counter to the registry', async () => {
    const metrics = new RadarMetrics();
    const stats = new RadarStats(() => NOW, metrics);

    stats.messageProcessed();
    stats.messageProcessed();
    stats.mentionRecorded(Chain.EVM, 4);
    stats.cycleCompleted(new Map([[Chain.EVM, 2]]), 2);
    stats.cycleCompleted(new Map(), 0);

    const rendered = (await metrics.render()).split('\n');

    expect(stats.snapshot().mentionsRecorded).toBe(4);
    expect(stats.snapshot().alertsSent).toBe(2);
    expect(rendered).toEqual(expect.arrayContaining([
      'radar_messages_total{chain="all"} 2',
      'radar_mentions_total{chain="evm"} 4',
      'radar_alerts_total 2',
      'radar_trending_count{chain="solana"} 0',
      'radar_trending_count{chain="evm"} 0'
    ]));
  });

  it('should work without a registry', () => {
    const stats = new RadarStats(() => NOW);

    stats.mentionRecorded(Chain.SOLANA);

    expect(stats.snapshot().mentionsRecorded).toBe(1);
  });
});
