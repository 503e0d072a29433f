import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CachedExchangeRateProvider } from '../../src/adapters/exchangeRateAdapter';

const mockFetch = vi.fn();

function provider(now: () => number = () => 1_000_000) {
  return new CachedExchangeRateProvider({
    apiUrl: 'https://rates.test/latest/USD',
    currency: 'ngn',
    fallbackRate: 1500,
    ttlSec: 3600,
    timeoutMs: 500,
    now,
  });
}

describe('CachedExchangeRateProvider', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('returns the live rate and caches it for the TTL', async () => {
    let clock = 1_000_000;
    const rates = provider(() => clock);
    mockFetch.mockImplementation(async () => new Response(JSON.stringify({ rates: { NGN: 1612.5, USD: 1 } }), { status: 200 }));

    expect(await rates.getUsdToLocalRate()).toBe(1612.5);
    clock += 3_599_000;
    expect(await rates.getUsdToLocalRate()).toBe(1612.5);
    expect(mockFetch).toHaveBeenCalledTimes(1);

    clock += 1_000;
    await rates.getUsdToLocalRate();
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('falls back without caching on an HTTP error', async () => {
    const rates = provider();
    mockFetch.mockResolvedValueOnce(new Response('{}', { status: 500 }));
    mockFetch.mockResolvedValueOnce(new Response(JSON.stringify({ rates: { NGN: 1600 } }), { status: 200 }));

    expect(await rates.getUsdToLocalRate()).toBe(1500);
    expect(await rates.getUsdToLocalRate()).toBe(1600);
  });

  it('falls back when the currency is missing or the request throws', async () => {
    const rates = provider();
    mockFetch.mockResolvedValueOnce(new Response(JSON.stringify({ rates: { GHS: 15 } }), { status: 200 }));
    expect(await rates.getUsdToLocalRate()).toBe(1500);

    mockFetch.mockRejectedValueOnce(new Error('timeout'));
    expect(await rates.getUsdToLocalRate()).toBe(1500);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });
});
