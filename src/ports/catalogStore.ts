/**
 * Admin-managed reference data: cohorts, pricing and program settings.
 */

import type { CohortRecord, EnrollmentType, PricingRecord, ProgramSettingsRecord } from '../types/tables';

export interface CatalogStore {
  getCohort(code: string): Promise<CohortRecord | null>;
  listCohorts(): Promise<CohortRecord[]>;
  getPricing(enrollmentType: EnrollmentType): Promise<PricingRecord | null>;
  getProgramSettings(): Promise<ProgramSettingsRecord | null>;
}
