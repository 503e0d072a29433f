/**
 * Fee schedule per enrollment type, in USD cents.
 */

import type { CatalogStore } from '../../ports/catalogStore';
import type { CohortRecord, EnrollmentType } from '../../types/tables';

export interface Pricing {
  enrollmentType: EnrollmentType;
  registrationFee: number;
  courseFee: number;
  total: number;
}

export const FALLBACK_PRICING: Record<EnrollmentType, { registrationFee: number; courseFee: number }> = {
  NEW: { registrationFee: 5000, courseFee: 10000 },
  RETURNING: { registrationFee: 2000, courseFee: 10000 },
};

export function enrollmentTypeForCohort(cohort: Pick<CohortRecord, 'isNewIntake'>): EnrollmentType {
  return cohort.isNewIntake ? 'NEW' : 'RETURNING';
}

/** Active pricing record, else the built-in schedule. */
export async function resolvePricing(catalog: CatalogStore, enrollmentType: EnrollmentType): Promise<Pricing> {
  const record = await catalog.getPricing(enrollmentType);
  const fees = record && record.isActive ? record : FALLBACK_PRICING[enrollmentType];
  return {
    enrollmentType,
    registrationFee: fees.registrationFee,
    courseFee: fees.courseFee,
    total: fees.registrationFee + fees.courseFee,
  };
}
