/**
 * Currency helpers. Ledger amounts are USD cents; gateways report subunits
 * (cents, kobo) in the charge currency.
 */

export const LEDGER_CURRENCY = 'USD';

/** Round half away from zero to whole cents. */
export function roundCents(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

/**
 * Convert a gateway subunit amount to USD cents.
 * `usdToLocalRate` is units of the charge currency per 1 USD.
 */
export function subunitToUsdCents(subunitAmount: number, currency: string, usdToLocalRate: number): number {
  if (currency.toUpperCase() === LEDGER_CURRENCY) return roundCents(subunitAmount);
  if (!(usdToLocalRate > 0)) throw new Error(`Invalid exchange rate: ${usdToLocalRate}`);
  return roundCents(subunitAmount / usdToLocalRate);
}

/** USD cents to charge-currency subunits, e.g. 5000 cents at 1500 NGN/USD -> 7_500_000 kobo. */
export function usdCentsToSubunit(usdCents: number, currency: string, usdToLocalRate: number): number {
  if (currency.toUpperCase() === LEDGER_CURRENCY) return usdCents;
  return roundCents(usdCents * usdToLocalRate);
}

/** Rate carried in the charge metadata, or null when absent or unusable. */
export function parseMetadataRate(raw: unknown): number | null {
  if (typeof raw === 'number') return raw > 0 && Number.isFinite(raw) ? raw : null;
  if (typeof raw === 'string' && raw.trim() !== '') {
    const n = Number(raw);
    return n > 0 && Number.isFinite(n) ? n : null;
  }
  return null;
}

export function formatUsd(cents: number): string {
  return `$${(cents / 100).toFixed(2)}`;
}
