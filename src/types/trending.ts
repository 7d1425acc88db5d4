import { Chain, WindowAggregate } from './mentions';

export interface TrendingToken extends WindowAggregate {
  // Mentions in the window immediately before the current one.
  previousCount: number;
  velocity: number;
  score: number;
}

export interface TrendingConfig {
  windowMinutes: number;
  minMentions: number;
  minUniqueSources: number;
  liquidityEnabled: boolean;
  storeTimeoutMs: number;
}

export interface LiquidityChecker {
  checkLiquidity(contract: string, chain: Chain): Promise<boolean>;
}

/** Resolves a display name such as `Name (SYMBOL)`; '' when unknown. */
export interface TokenNameResolver {
  lookupTokenName(contract: string): Promise<string>;
}
