import axios, { AxiosInstance } from 'axios';
import {
  ApiRateLimiter,
  DexScreenerConfig,
  DexScreenerPair,
  DexScreenerResponse,
  LiquidityVerdict
} from '../types/dexscreener';
import { Chain } from '../types/mentions';
import { LiquidityChecker, TokenNameResolver } from '../types/trending';
import { AppError, CircuitBreaker, ErrorSeverity, ErrorContext, createErrorContext, errorMessage } from '../utils/errorHandler';
import { logger } from '../utils/logger';

class RateLimiter implements ApiRateLimiter {
  private requests: number[] = [];
  private readonly maxRequests: number;
  private readonly timeWindow: number;

  constructor(maxRequests: number, timeWindowMs: number) {
    this.maxRequests = maxRequests;
    this.timeWindow = timeWindowMs;
  }

  canMakeRequest(): boolean {
    const now = Date.now();
    this.requests = this.requests.filter(time => now - time < this.timeWindow);
    return this.requests.length < this.maxRequests;
  }

  recordRequest(): void {
    this.requests.push(Date.now());
  }

  getNextAvailableTime(): number {
    if (this.canMakeRequest()) return 0;

    const now = Date.now();
    const oldestRequest = this.requests[0];
    return oldestRequest ? oldestRequest + this.timeWindow - now : 0;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns null when the body is not a token-pairs payload. */
export function parsePairsResponse(body: unknown): DexScreenerResponse | null {
  if (!isRecord(body)) return null;

  const rawPairs = body.pairs;
  if (rawPairs === null || rawPairs === undefined) {
    return { pairs: null };
  }
  if (!Array.isArray(rawPairs)) return null;

  const pairs: DexScreenerPair[] = [];
  for (const raw of rawPairs) {
    if (!isRecord(raw)) return null;

    const pair: DexScreenerPair = {};
    if (typeof raw.chainId === 'string') pair.chainId = raw.chainId;
    if (typeof raw.pairAddress === 'string') pair.pairAddress = raw.pairAddress;
    if (isRecord(raw.baseToken)) {
      const { name, symbol } = raw.baseToken;
      pair.baseToken = {
        ...(typeof name === 'string' ? { name } : {}),
        ...(typeof symbol === 'string' ? { symbol } : {})
      };
    }
    if (isRecord(raw.liquidity)) {
      const usd = raw.liquidity.usd;
      pair.liquidity = typeof usd === 'number' && Number.isFinite(usd) ? { usd } : {};
    }
    pairs.push(pair);
  }

  return {
    schemaVersion: typeof body.schemaVersion === 'string' ? body.schemaVersion : undefined,
    pairs
  };
}

/** `Name (SYMBOL)` from the first pair, or whichever of the two is present. */
export function formatTokenName(pair: DexScreenerPair | undefined): string {
  const name = pair?.baseToken?.name?.trim() ?? '';
  const symbol = pair?.baseToken?.symbol?.trim() ?? '';
  if (name && symbol) return `${name} (${symbol})`;
  return symbol || name;
}

export function verdictAllows(verdict: LiquidityVerdict): boolean {
  return verdict.kind !== 'reject';
}

/**
 * Liquidity floor check and token names from DexScreener. Lookups that cannot
 * be answered resolve to an `error` verdict, which lets the token through.
 */
export class DexScreenerService implements LiquidityChecker, TokenNameResolver {
  private readonly client: AxiosInstance;
  private readonly rateLimiter: ApiRateLimiter;
  private readonly breaker: CircuitBreaker;

  constructor(private readonly config: DexScreenerConfig, client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        'Accept': 'application/json',
        'User-Agent': 'alpha-radar/1.0.0'
      }
    });

    this.rateLimiter = new RateLimiter(300, 60000);
    this.breaker = new CircuitBreaker({ failureThreshold: 5, recoveryTimeout: 30000 });

    this.client.interceptors.request.use(async (requestConfig) => {
      while (!this.rateLimiter.canMakeRequest()) {
        const waitTime = this.rateLimiter.getNextAvailableTime();
        logger.debug(`DexScreener rate limit reached, waiting ${waitTime}ms`);
        await new Promise(resolve => setTimeout(resolve, Math.max(50, Math.min(waitTime, 1000))));
      }
      this.rateLimiter.recordRequest();
      return requestConfig;
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        logger.debug('DexScreener transport error:', { message: errorMessage(error) });
        return Promise.reject(error);
      }
    );
  }

  /**
   * GET /{contract} behind the breaker. Any reply other than 200 counts as a
   * breaker failure and rejects with `HTTP <status>`.
   */
  private async fetchPairs(contract: string, context: ErrorContext): Promise<DexScreenerResponse | null> {
    const response = await this.breaker.execute(async () => {
      const reply = await this.client.get<unknown>(`/${contract}`, {
        timeout: this.config.timeoutMs,
        validateStatus: () => true
      });
      if (reply.status !== 200) {
        throw new AppError(`HTTP ${reply.status}`, 'HTTP_ERROR', ErrorSeverity.LOW, context);
      }
      return reply;
    }, context);

    return parsePairsResponse(response.data);
  }

  async evaluateLiquidity(contract: string): Promise<LiquidityVerdict> {
    const context = createErrorContext('liquidity_check', { contract });

    let parsed: DexScreenerResponse | null;
    try {
      parsed = await this.fetchPairs(contract, context);
    } catch (error) {
      return { kind: 'error', reason: errorMessage(error) };
    }

    if (!parsed) {
      return { kind: 'error', reason: 'malformed response body' };
    }

    const pairs = parsed.pairs ?? [];
    if (pairs.length === 0) {
      return { kind: 'pass', reason: 'no_pairs', liquidityUsd: null };
    }

    const best = Math.max(...pairs.map(pair => pair.liquidity?.usd ?? 0));
    if (best >= this.config.minLiquidityUsd) {
      return { kind: 'pass', reason: 'above_floor', liquidityUsd: best };
    }
    return { kind: 'reject', liquidityUsd: best };
  }

  async lookupTokenName(contract: string): Promise<string> {
    const context = createErrorContext('token_name_lookup', { contract });
    try {
      const parsed = await this.fetchPairs(contract, context);
      return formatTokenName(parsed?.pairs?.[0]);
    } catch (error) {
      logger.debug(`Token name lookup failed for ${contract}`, { error: errorMessage(error) });
      return '';
    }
  }

  async checkLiquidity(contract: string, chain: Chain): Promise<boolean> {
    const verdict = await this.evaluateLiquidity(contract);

    switch (verdict.kind) {
      case 'error':
        logger.warn(`Liquidity check failed for ${contract}, allowing token`, {
          chain,
          reason: verdict.reason
        });
        break;
      case 'reject':
        logger.info(`Liquidity below floor for ${contract}`, {
          chain,
          liquidityUsd: verdict.liquidityUsd,
          floorUsd: this.config.minLiquidityUsd
        });
        break;
      case 'pass':
        logger.debug(`Liquidity check passed for ${contract}`, {
          chain,
          reason: verdict.reason,
          liquidityUsd: verdict.liquidityUsd
        });
        break;
    }

    return verdictAllows(verdict);
  }

  getCircuitState(): string {
    return this.breaker.getState();
  }
}
