/**
 * Environment config with validation.
 */

function getEnv(key: string, defaultValue?: string): string {
  return process.env[key] ?? defaultValue ?? '';
}

function requireEnv(key: string): string {
  const v = process.env[key];
  if (!v) throw new Error(`Missing required env: ${key}`);
  return v;
}

function parseIntEnv(key: string, defaultValue: number): number {
  const v = process.env[key];
  if (v === undefined || v === '') return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? defaultValue : n;
}

function parseFloatEnv(key: string, defaultValue: number): number {
  const v = process.env[key];
  if (v === undefined || v === '') return defaultValue;
  const n = parseFloat(v);
  return Number.isFinite(n) ? n : defaultValue;
}

export interface Config {
  stage: string;
  registrationsTableName: string;
  transactionsTableName: string;
  paymentActivityTableName: string;
  cohortsTableName: string;
  eventBusName: string;
  fromEmail: string;
  siteUrl: string;
  supportEmail: string;
  staffApiKey: string;
  squadBaseUrl: string;
  squadSecretKey: string;
  paystackBaseUrl: string;
  paystackSecretKey: string;
  localCurrency: string;
  // Configurable business/operational constants (env with defaults)
  usdToLocalFallbackRate: number;
  exchangeRateApiUrl: string;
  exchangeRateTtlSec: number;
  exchangeRateTimeoutMs: number;
  gatewayTimeoutMs: number;
  reconcileMaxRetries: number;
  participantIdMaxRetries: number;
  settingsCacheTtlSec: number;
}

export function getConfig(): Config {
  return {
    stage: getEnv('STAGE', 'dev'),
    registrationsTableName: requireEnv('REGISTRATIONS_TABLE'),
    transactionsTableName: requireEnv('TRANSACTIONS_TABLE'),
    paymentActivityTableName: requireEnv('PAYMENT_ACTIVITY_TABLE'),
    cohortsTableName: requireEnv('COHORTS_TABLE'),
    eventBusName: getEnv('EVENT_BUS_NAME'),
    fromEmail: getEnv('FROM_EMAIL', 'noreply@example.com'),
    siteUrl: getEnv('SITE_URL', 'http://localhost:3000').replace(/\/+$/, ''),
    supportEmail: getEnv('SUPPORT_EMAIL', getEnv('FROM_EMAIL', 'noreply@example.com')),
    staffApiKey: getEnv('STAFF_API_KEY'),
    squadBaseUrl: getEnv('SQUAD_BASE_URL', 'https://sandbox-api-d.squadco.com').replace(/\/+$/, ''),
    squadSecretKey: getEnv('SQUAD_SECRET_KEY').trim(),
    paystackBaseUrl: getEnv('PAYSTACK_BASE_URL', 'https://api.paystack.co').replace(/\/+$/, ''),
    paystackSecretKey: getEnv('PAYSTACK_SECRET_KEY').trim(),
    localCurrency: getEnv('LOCAL_CURRENCY', 'NGN').toUpperCase(),
    usdToLocalFallbackRate: parseFloatEnv('USD_TO_NGN_RATE', 1500),
    exchangeRateApiUrl: getEnv('EXCHANGE_RATE_API_URL', 'https://api.exchangerate-api.com/v4/latest/USD'),
    exchangeRateTtlSec: parseIntEnv('EXCHANGE_RATE_TTL_SEC', 3600),
    exchangeRateTimeoutMs: parseIntEnv('EXCHANGE_RATE_TIMEOUT_MS', 5000),
    gatewayTimeoutMs: parseIntEnv('GATEWAY_TIMEOUT_MS', 15000),
    reconcileMaxRetries: parseIntEnv('RECONCILE_MAX_RETRIES', 5),
    participantIdMaxRetries: parseIntEnv('PARTICIPANT_ID_MAX_RETRIES', 50),
    settingsCacheTtlSec: parseIntEnv('SETTINGS_CACHE_TTL_SEC', 60),
  };
}
