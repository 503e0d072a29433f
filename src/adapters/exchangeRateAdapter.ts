/**
 * USD -> local currency rate from a public rates endpoint, cached in memory for the
 * lifetime of the Lambda container. Any failure falls back to the configured rate.
 */

import { z } from 'zod';
import { errorMessage } from '../lib/errors';
import type { ExchangeRateSource } from '../ports/exchangeRate';

const ratesResponseSchema = z.object({ rates: z.record(z.number()) }).passthrough();

export interface ExchangeRateProviderOptions {
  apiUrl: string;
  currency: string;
  fallbackRate: number;
  ttlSec: number;
  timeoutMs: number;
  now?: () => number;
}

export class CachedExchangeRateProvider implements ExchangeRateSource {
  private cached: { rate: number; expiresAt: number } | null = null;
  private readonly now: () => number;

  constructor(private readonly options: ExchangeRateProviderOptions) {
    this.now = options.now ?? Date.now;
  }

  async getUsdToLocalRate(): Promise<number> {
    if (this.cached && this.cached.expiresAt > this.now()) return this.cached.rate;
    const rate = await this.fetchRate();
    if (rate === null) return this.options.fallbackRate;
    // Concurrent refreshes may both write; the last one wins.
    this.cached = { rate, expiresAt: this.now() + this.options.ttlSec * 1000 };
    return rate;
  }

  private async fetchRate(): Promise<number | null> {
    const { apiUrl, currency, timeoutMs } = this.options;
    if (!apiUrl) return null;
    try {
      const res = await fetch(apiUrl, { signal: AbortSignal.timeout(timeoutMs) });
      if (!res.ok) {
        console.warn('Exchange rate API returned', res.status, '- using fallback rate');
        return null;
      }
      const parsed = ratesResponseSchema.safeParse(await res.json());
      const rate = parsed.success ? parsed.data.rates[currency.toUpperCase()] : undefined;
      if (rate === undefined || !(rate > 0)) {
        console.warn(`Exchange rate API has no usable ${currency} rate - using fallback rate`);
        return null;
      }
      return rate;
    } catch (err) {
      console.warn('Exchange rate fetch failed - using fallback rate:', errorMessage(err));
      return null;
    }
  }
}
