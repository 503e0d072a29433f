/**
 * DynamoDB implementation of the CatalogStore port. Cohorts, pricing and program
 * settings share one table keyed by COHORT#, PRICING# and SETTINGS# partitions.
 */

import { getItem, scanAll } from '../lib/dynamodb';
import type { CatalogStore } from '../ports/catalogStore';
import type { CohortRecord, EnrollmentType, PricingRecord, ProgramSettingsRecord } from '../types/tables';
import { METADATA_SK, PROGRAM_SETTINGS_PK, cohortPk, pricingPk } from '../types/tables';

export class DynamoCatalogStore implements CatalogStore {
  constructor(private readonly tableName: string) {}

  async getCohort(code: string): Promise<CohortRecord | null> {
    return getItem<CohortRecord>(this.tableName, { PK: cohortPk(code), SK: METADATA_SK });
  }

  async listCohorts(): Promise<CohortRecord[]> {
    return scanAll<CohortRecord>(this.tableName, {
      expression: 'begins_with(PK, :prefix) AND SK = :sk',
      attrValues: { ':prefix': 'COHORT#', ':sk': METADATA_SK },
    });
  }

  async getPricing(enrollmentType: EnrollmentType): Promise<PricingRecord | null> {
    return getItem<PricingRecord>(this.tableName, { PK: pricingPk(enrollmentType), SK: METADATA_SK });
  }

  async getProgramSettings(): Promise<ProgramSettingsRecord | null> {
    return getItem<ProgramSettingsRecord>(this.tableName, { PK: PROGRAM_SETTINGS_PK, SK: METADATA_SK });
  }
}
