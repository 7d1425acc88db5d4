import { Chain, KNOWN_CHAINS, WindowAggregate } from '../types/mentions';
import { LiquidityChecker, TrendingConfig, TrendingToken } from '../types/trending';
import { AppError, ErrorSeverity, createErrorContext, errorMessage, withTimeout } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { validateNumericRange } from '../utils/validation';
import { MentionStore } from './mentionStore';

export const SCORE_WEIGHTS = {
  mentions: 2,
  uniqueSources: 3,
  velocity: 5
} as const;

/**
 * Relative growth against the previous window. A contract with no prior
 * mentions gets its current count as velocity.
 */
export function computeVelocity(current: number, previous: number): number {
  if (previous === 0) return current;
  return (current - previous) / previous;
}

export function computeScore(mentionCount: number, uniqueSources: number, velocity: number): number {
  return mentionCount * SCORE_WEIGHTS.mentions +
    uniqueSources * SCORE_WEIGHTS.uniqueSources +
    velocity * SCORE_WEIGHTS.velocity;
}

/** Score desc, then mentionCount desc, then contract asc (code-unit order). */
export function compareTrending(a: TrendingToken, b: TrendingToken): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.mentionCount !== b.mentionCount) return b.mentionCount - a.mentionCount;
  if (a.contract < b.contract) return -1;
  if (a.contract > b.contract) return 1;
  return 0;
}

export class TrendingEngine {
  private readonly windowMs: number;

  constructor(
    private readonly store: MentionStore,
    private readonly config: TrendingConfig,
    private readonly liquidity: LiquidityChecker | null = null,
    private readonly now: () => number = Date.now
  ) {
    const problems: string[] = [];
    if (!(config.windowMinutes > 0)) {
      problems.push('windowMinutes must be greater than 0');
    }
    for (const check of [
      validateNumericRange(config.minMentions, 1, Infinity, 'minMentions'),
      validateNumericRange(config.minUniqueSources, 1, Infinity, 'minUniqueSources'),
      validateNumericRange(config.storeTimeoutMs, 1, Infinity, 'storeTimeoutMs')
    ]) {
      if (check.error) problems.push(check.error);
    }

    if (problems.length > 0) {
      throw new AppError(
        `Invalid trending configuration: ${problems.join('; ')}`,
        'CONFIG_ERROR',
        ErrorSeverity.CRITICAL,
        createErrorContext('trending_engine_init'),
        false
      );
    }

    this.windowMs = config.windowMinutes * 60 * 1000;
  }

  get windowMinutes(): number {
    return this.config.windowMinutes;
  }

  async detect(chain?: Chain): Promise<TrendingToken[]> {
    const now = this.now();
    const windowStart = now - this.windowMs;
    const previousStart = windowStart - this.windowMs;

    const aggregates = await this.fromStore('aggregate_window', () => this.store.aggregateWindow({
      since: windowStart,
      chain,
      minMentions: this.config.minMentions,
      minUniqueSources: this.config.minUniqueSources
    }), chain);

    const scored = await Promise.all(aggregates.map(async (aggregate) => {
      const previousCount = await this.fromStore(
        'count_previous_window',
        () => this.store.countInRange(aggregate.contract, previousStart, windowStart),
        chain
      );
      return this.score(aggregate, previousCount);
    }));

    const kept = await this.applyLiquidityFilter(scored);
    kept.sort(compareTrending);

    logger.debug(`Trending detection finished for ${chain ?? 'all chains'}`, {
      candidates: aggregates.length,
      trending: kept.length
    });

    return kept;
  }

  async detectByChain(): Promise<Map<Chain, TrendingToken[]>> {
    const results = new Map<Chain, TrendingToken[]>();

    for (const chain of KNOWN_CHAINS) {
      const tokens = await this.detect(chain);
      if (tokens.length > 0) {
        results.set(chain, tokens);
      }
    }

    return results;
  }

  private score(aggregate: WindowAggregate, previousCount: number): TrendingToken {
    const velocity = computeVelocity(aggregate.mentionCount, previousCount);
    return {
      ...aggregate,
      previousCount,
      velocity,
      score: computeScore(aggregate.mentionCount, aggregate.uniqueSources, velocity)
    };
  }

  private async applyLiquidityFilter(tokens: TrendingToken[]): Promise<TrendingToken[]> {
    const checker = this.liquidity;
    if (!this.config.liquidityEnabled || !checker || tokens.length === 0) {
      return tokens;
    }

    const allowed = await Promise.all(tokens.map(token =>
      checker.checkLiquidity(token.contract, token.chain).catch((error: unknown) => {
        logger.warn(`Liquidity check threw for ${token.contract}, allowing token`, {
          chain: token.chain,
          error: errorMessage(error)
        });
        return true;
      })
    ));

    return tokens.filter((_, index) => allowed[index]);
  }

  private async fromStore<T>(operation: string, query: () => Promise<T>, chain?: Chain): Promise<T> {
    const context = createErrorContext(operation, { chain });
    try {
      return await withTimeout(query(), this.config.storeTimeoutMs, context);
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new AppError(
        `Mention store query failed: ${errorMessage(error)}`,
        'STORE_ERROR',
        ErrorSeverity.HIGH,
        context
      );
    }
  }
}
