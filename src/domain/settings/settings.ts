/**
 * Program settings: an explicitly loaded struct handed to the reconciler and
 * handlers. The loader caches the last read for maxAgeMs; reload() forces a read.
 */

import type { CatalogStore } from '../../ports/catalogStore';
import type { ProgramSettingsRecord } from '../../types/tables';

export interface ProgramSettings {
  siteName: string;
  siteUrl: string;
  supportEmail: string;
  staffNotificationEmails: string[];
  maintenanceMode: boolean;
  maintenanceMessage: string;
}

export const DEFAULT_SITE_NAME = 'ASPIR Mentorship Program';

export function resolveProgramSettings(
  record: ProgramSettingsRecord | null,
  defaults: { siteUrl: string; supportEmail: string }
): ProgramSettings {
  return {
    siteName: record?.siteName || DEFAULT_SITE_NAME,
    siteUrl: (record?.siteUrl || defaults.siteUrl).replace(/\/+$/, ''),
    supportEmail: record?.supportEmail || defaults.supportEmail,
    staffNotificationEmails: (record?.staffNotificationEmails ?? []).map((e) => e.trim()).filter((e) => e.length > 0),
    maintenanceMode: record?.maintenanceMode ?? false,
    maintenanceMessage: record?.maintenanceMessage || 'Registration is temporarily unavailable. Please try again later.',
  };
}

export class ProgramSettingsLoader {
  private cached: { settings: ProgramSettings; loadedAt: number } | null = null;

  constructor(
    private readonly catalog: CatalogStore,
    private readonly defaults: { siteUrl: string; supportEmail: string },
    private readonly maxAgeMs = 60_000,
    private readonly now: () => number = Date.now
  ) {}

  async load(): Promise<ProgramSettings> {
    if (this.cached && this.now() - this.cached.loadedAt < this.maxAgeMs) return this.cached.settings;
    return this.reload();
  }

  async reload(): Promise<ProgramSettings> {
    const record = await this.catalog.getProgramSettings();
    const settings = resolveProgramSettings(record, this.defaults);
    this.cached = { settings, loadedAt: this.now() };
    return settings;
  }
}
