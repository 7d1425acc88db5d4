import axios, { AxiosAdapter, AxiosError, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { DexScreenerService, formatTokenName, parsePairsResponse, verdictAllows } from '../services/dexscreener';
import { Chain } from '../types/mentions';

const config = {
  baseUrl: 'https://dex.test/latest/dex/tokens',
  minLiquidityUsd: 1000,
  timeoutMs: 5000
};

type Reply = { status: number; data: unknown };

function clientWith(handler: (request: InternalAxiosRequestConfig) => Reply | Promise<Reply>): {
  client: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (request) => {
    requests.push(request);
    const reply = await handler(request);
    return { data: reply.data, status: reply.status, statusText: String(reply.status), headers: {}, config: request };
  };
  return { client: axios.create({ adapter }), requests };
}

function serviceReturning(reply: Reply): DexScreenerService {
  return new DexScreenerService(config, clientWith(() => reply).client);
}

describe('DexScreenerService', () => {
  it('should request the token path for the contract', async () => {
    const { client, requests } = clientWith(() => ({ status: 200, data: { pairs: [] } }));
    const service = new DexScreenerService(config, client);

    await service.evaluateLiquidity('MintXYZ');

    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe('/MintXYZ');
    expect(requests[0]?.timeout).toBe(5000);
  });

  it('should pass when any pair meets the floor', async () => {
    const service = serviceReturning({
      status: 200,
      data: { schemaVersion: '1.0.0', pairs: [{ liquidity: { usd: 500 } }, { liquidity: { usd: 2500 } }] }
    });

    expect(await service.evaluateLiquidity('MintXYZ')).toEqual({ kind: 'pass', reason: 'above_floor', liquidityUsd: 2500 });
    expect(await service.checkLiquidity('MintXYZ', Chain.SOLANA)).toBe(true);
  });

  it('should pass when liquidity equals the floor', async () => {
    const service = serviceReturning({ status: 200, data: { pairs: [{ liquidity: { usd: 1000 } }] } });
    expect(await service.checkLiquidity('MintXYZ', Chain.SOLANA)).toBe(true);
  });

  it('should reject when every pair is below the floor', async () => {
    const service = serviceReturning({ status: 200, data: { pairs: [{ liquidity: { usd: 400 } }, { chainId: 'solana' }] } });

    expect(await service.evaluateLiquidity('MintXYZ')).toEqual({ kind: 'reject', liquidityUsd: 400 });
    expect(await service.checkLiquidity('MintXYZ', Chain.SOLANA)).toBe(false);
  });

  it('should pass tokens with no known pairs', async () => {
    expect(await serviceReturning({ status: 200, data: { pairs: null } }).evaluateLiquidity('MintXYZ'))
      .toEqual({ kind: 'pass', reason: 'no_pairs', liquidityUsd: null });
    expect(await serviceReturning({ status: 200, data: { pairs: [] } }).checkLiquidity('MintXYZ', Chain.EVM)).toBe(true);
  });

  it('should fail open on a non-200 status', async () => {
    const service = serviceReturning({ status: 503, data: { pairs: [{ liquidity: { usd: 1 } }] } });

    expect(await service.evaluateLiquidity('MintXYZ')).toEqual({ kind: 'error', reason: 'HTTP 503' });
    expect(await service.checkLiquidity('MintXYZ', Chain.SOLANA)).toBe(true);
  });

  it('should fail open on a body that is not a pairs payload', async () => {
    expect(await serviceReturning({ status: 200, data: '<html>oops</html>' }).evaluateLiquidity('MintXYZ'))
      .toEqual({ kind: 'error', reason: 'malformed response body' });
    expect(await serviceReturning({ status: 200, data: { pairs: 'none' } }).checkLiquidity('MintXYZ', Chain.SOLANA))
      .toBe(true);
  });

  it('should fail open on a transport timeout', async () => {
    const { client } = clientWith((request) => {
      throw new AxiosError('timeout of 5000ms exceeded', AxiosError.ECONNABORTED, request);
    });
    const service = new DexScreenerService(config, client);

    expect(await service.evaluateLiquidity('MintXYZ')).toEqual({ kind: 'error', reason: 'timeout of 5000ms exceeded' });
    expect(await service.checkLiquidity('MintXYZ', Chain.SOLANA)).toBe(true);
  });

  it('should stop calling the API once the circuit opens', async () => {
    const { client, requests } = clientWith(() => {
      throw new Error('connect ECONNREFUSED');
    });
    const service = new DexScreenerService(config, client);

    for (let i = 0; i < 5; i++) {
      await service.evaluateLiquidity('MintXYZ');
    }
    const verdict = await service.evaluateLiquidity('MintXYZ');

    expect(requests).toHaveLength(5);
    expect(verdict).toEqual({ kind: 'error', reason: 'Circuit breaker is OPEN' });
    expect(service.getCircuitState()).toBe('OPEN');
  });

  it('should count throttled and failing replies against the circuit', async () => {
    const { client, requests } = clientWith(() => ({ status: 429, data: { error: 'rate limited' } }));
    const service = new DexScreenerService(config, client);

    for (let i = 0; i < 5; i++) {
      expect(await service.evaluateLiquidity('MintXYZ')).toEqual({ kind: 'error', reason: 'HTTP 429' });
    }

    expect(service.getCircuitState()).toBe('OPEN');
    expect(await service.checkLiquidity('MintXYZ', Chain.SOLANA)).toBe(true);
    expect(requests).toHaveLength(5);
  });

  it('should close the circuit again after a successful reply', async () => {
    let status = 503;
    const { client } = clientWith(() => ({ status, data: { pairs: [] } }));
    const service = new DexScreenerService(config, client);

    for (let i = 0; i < 4; i++) {
      await service.evaluateLiquidity('MintXYZ');
    }
    status = 200;
    await service.evaluateLiquidity('MintXYZ');
    status = 503;
    await service.evaluateLiquidity('MintXYZ');

    expect(service.getCircuitState()).toBe('CLOSED');
  });

  describe('lookupTokenName', () => {
    it('should combine name and symbol of the first pair', async () => {
      const service = serviceReturning({
        status: 200,
        data: { pairs: [{ baseToken: { name: 'Moon Dog', symbol: 'MDOG' } }, { baseToken: { name: 'Other', symbol: 'OTH' } }] }
      });

      expect(await service.lookupTokenName('MintXYZ')).toBe('Moon Dog (MDOG)');
    });

    it('should fall back to whichever field is present', async () => {
      expect(await serviceReturning({ status: 200, data: { pairs: [{ baseToken: { symbol: 'MDOG' } }] } })
        .lookupTokenName('MintXYZ')).toBe('MDOG');
      expect(await serviceReturning({ status: 200, data: { pairs: [{ baseToken: { name: 'Moon Dog' } }] } })
        .lookupTokenName('MintXYZ')).toBe('Moon Dog');
    });

    it('should return an empty name when nothing is known', async () => {
      expect(await serviceReturning({ status: 200, data: { pairs: null } }).lookupTokenName('MintXYZ')).toBe('');
      expect(await serviceReturning({ status: 500, data: {} }).lookupTokenName('MintXYZ')).toBe('');
      expect(await serviceReturning({ status: 200, data: 'oops' }).lookupTokenName('MintXYZ')).toBe('');
    });

    it('should return an empty name on a transport failure', async () => {
      const { client } = clientWith(() => {
        throw new Error('socket hang up');
      });

      expect(await new DexScreenerService(config, client).lookupTokenName('MintXYZ')).toBe('');
    });
  });
});

describe('formatTokenName', () => {
  it('should trim and join the parts', () => {
    expect(formatTokenName({ baseToken: { name: ' Moon Dog ', symbol: 'MDOG ' } })).toBe('Moon Dog (MDOG)');
    expect(formatTokenName({ baseToken: {} })).toBe('');
    expect(formatTokenName(undefined)).toBe('');
  });
});

describe('parsePairsResponse', () => {
  it('should keep only numeric liquidity values', () => {
    expect(parsePairsResponse({ pairs: [{ pairAddress: 'pool1', liquidity: { usd: '1000' } }] }))
      .toEqual({ schemaVersion: undefined, pairs: [{ pairAddress: 'pool1', liquidity: {} }] });
  });

  it('should read base token names and drop non-string parts', () => {
    expect(parsePairsResponse({ pairs: [{ baseToken: { name: 'Moon Dog', symbol: 7 } }] }))
      .toEqual({ schemaVersion: undefined, pairs: [{ baseToken: { name: 'Moon Dog' } }] });
  });

  it('should treat a missing pairs field as no pairs', () => {
    expect(parsePairsResponse({ schemaVersion: '1.0.0' })).toEqual({ pairs: null });
  });

  it('should refuse non-object bodies and non-object pairs', () => {
    expect(parsePairsResponse(null)).toBeNull();
    expect(parsePairsResponse([])).toBeNull();
    expect(parsePairsResponse({ pairs: [42] })).toBeNull();
  });
});

describe('verdictAllows', () => {
  it('should only block rejections', () => {
    expect(verdictAllows({ kind: 'pass', reason: 'no_pairs', liquidityUsd: null })).toBe(true);
    expect(verdictAllows({ kind: 'error', reason: 'HTTP 500' })).toBe(true);
    expect(verdictAllows({ kind: 'reject', liquidityUsd: 10 })).toBe(false);
  });
});
