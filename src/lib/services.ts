/**
 * Builds adapters and domain dependencies from config. Instances are reused across
 * warm invocations so the exchange-rate and settings caches survive between events.
 */

import { createSesAdapter } from '../adapters/sesAdapter';
import { DynamoCatalogStore } from '../adapters/dynamoCatalogStore';
import { DynamoRegistrationStore } from '../adapters/dynamoRegistrationStore';
import { CachedExchangeRateProvider } from '../adapters/exchangeRateAdapter';
import { PaystackAdapter } from '../adapters/paystackAdapter';
import { SquadAdapter } from '../adapters/squadAdapter';
import { PaymentNotifier } from '../domain/notifications/notifier';
import type { AllocatorDeps } from '../domain/participants/allocator';
import type { InitiationDeps } from '../domain/payments/initiation';
import type { ManualReconcileDeps } from '../domain/payments/reconciler';
import { ProgramSettingsLoader, type ProgramSettings } from '../domain/settings/settings';
import type { CatalogStore } from '../ports/catalogStore';
import type { ExchangeRateSource } from '../ports/exchangeRate';
import type { PaymentGatewayPort } from '../ports/paymentGateway';
import type { RegistrationStore } from '../ports/registrationStore';
import type { DomainEvent } from '../types/events';
import type { GatewayName } from '../types/tables';
import type { Config } from './config';
import { publishEvent } from './eventbridge';

let exchangeRate: CachedExchangeRateProvider | null = null;
let settingsLoader: ProgramSettingsLoader | null = null;

export function getRegistrationStore(config: Config): RegistrationStore {
  return new DynamoRegistrationStore({
    registrationsTableName: config.registrationsTableName,
    transactionsTableName: config.transactionsTableName,
    paymentActivityTableName: config.paymentActivityTableName,
  });
}

export function getCatalogStore(config: Config): CatalogStore {
  return new DynamoCatalogStore(config.cohortsTableName);
}

export function getExchangeRateSource(config: Config): ExchangeRateSource {
  exchangeRate ??= new CachedExchangeRateProvider({
    apiUrl: config.exchangeRateApiUrl,
    currency: config.localCurrency,
    fallbackRate: config.usdToLocalFallbackRate,
    ttlSec: config.exchangeRateTtlSec,
    timeoutMs: config.exchangeRateTimeoutMs,
  });
  return exchangeRate;
}

export function getPaystackAdapter(config: Config): PaystackAdapter {
  return new PaystackAdapter(config.paystackBaseUrl, config.paystackSecretKey, config.gatewayTimeoutMs);
}

export function getGateways(config: Config): Record<GatewayName, PaymentGatewayPort> {
  return {
    squad: new SquadAdapter(config.squadBaseUrl, config.squadSecretKey, config.gatewayTimeoutMs),
    paystack: getPaystackAdapter(config),
  };
}

export async function loadProgramSettings(config: Config): Promise<ProgramSettings> {
  settingsLoader ??= new ProgramSettingsLoader(
    getCatalogStore(config),
    { siteUrl: config.siteUrl, supportEmail: config.supportEmail },
    config.settingsCacheTtlSec * 1000
  );
  return settingsLoader.load();
}

export function getPublisher(config: Config): ((event: DomainEvent) => Promise<void>) | undefined {
  const bus = config.eventBusName;
  if (!bus) return undefined;
  return (event) => publishEvent(event, bus);
}

export function getNotifier(config: Config, settings: ProgramSettings): PaymentNotifier {
  return new PaymentNotifier(createSesAdapter(config.fromEmail), settings);
}

export async function buildReconcilerDeps(config: Config): Promise<ManualReconcileDeps> {
  const settings = await loadProgramSettings(config);
  return {
    store: getRegistrationStore(config),
    exchangeRate: getExchangeRateSource(config),
    notifier: getNotifier(config, settings),
    publish: getPublisher(config),
    maxRetries: config.reconcileMaxRetries,
    gateways: getGateways(config),
  };
}

export async function buildInitiationDeps(config: Config): Promise<InitiationDeps> {
  return {
    store: getRegistrationStore(config),
    catalog: getCatalogStore(config),
    gateways: getGateways(config),
    exchangeRate: getExchangeRateSource(config),
    settings: await loadProgramSettings(config),
    localCurrency: config.localCurrency,
  };
}

export function buildAllocatorDeps(config: Config): AllocatorDeps {
  return { store: getRegistrationStore(config), maxRetries: config.participantIdMaxRetries };
}
