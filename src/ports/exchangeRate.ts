/**
 * Exchange rate port.
 */

export interface ExchangeRateSource {
  /** Units of the local charge currency per 1 USD. Never throws; falls back to a configured rate. */
  getUsdToLocalRate(): Promise<number>;
}
