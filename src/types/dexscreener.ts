// Subset of the /latest/dex/tokens/{address} payload the radar reads.
export interface DexScreenerPair {
  chainId?: string;
  pairAddress?: string;
  baseToken?: {
    name?: string;
    symbol?: string;
  };
  liquidity?: {
    usd?: number;
  };
}

export interface DexScreenerResponse {
  schemaVersion?: string;
  pairs: DexScreenerPair[] | null;
}

export interface DexScreenerConfig {
  baseUrl: string;
  minLiquidityUsd: number;
  timeoutMs: number;
}

/**
 * Outcome of one liquidity lookup.
 *
 * `error` covers transport failures, non-200 replies, malformed bodies and an
 * open circuit; callers treat it like `pass`.
 */
export type LiquidityVerdict =
  | { kind: 'pass'; reason: 'above_floor' | 'no_pairs'; liquidityUsd: number | null }
  | { kind: 'error'; reason: string }
  | { kind: 'reject'; liquidityUsd: number };

export interface ApiRateLimiter {
  canMakeRequest(): boolean;
  recordRequest(): void;
  getNextAvailableTime(): number;
}
