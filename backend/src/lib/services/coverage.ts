import {
  ScopeCategory,
  TargetStatus,
  type AggregationMethod,
  type WorkingCompany,
} from '@tempscore/shared';
import { compareIds } from './fields.js';
import { companyWeight } from './weights.js';

export interface CoverageBreakdown {
  coveredWeight: number;
  totalWeight: number;
}

const hasValidatedTarget = (company: WorkingCompany) =>
  company.targets.some((target) => target.status === TargetStatus.VALIDATED);

/**
 * Portfolio weight backed by validated targets. Weights are taken at the
 * combined scope category in identifier order, so `totalWeight` matches the
 * overall s1s2s3 aggregate of the same companies.
 */
export function coverageBreakdown(
  companies: readonly WorkingCompany[],
  method: AggregationMethod
): CoverageBreakdown {
  let coveredWeight = 0;
  let totalWeight = 0;

  const ordered = [...companies].sort((a, b) => compareIds(a.companyId, b.companyId));
  for (const company of ordered) {
    const weight = companyWeight(company.fields, method, ScopeCategory.S1S2S3);
    if (weight === null) continue;
    totalWeight += weight;
    if (hasValidatedTarget(company)) coveredWeight += weight;
  }

  return { coveredWeight, totalWeight };
}

export function computeCoverage(
  companies: readonly WorkingCompany[],
  method: AggregationMethod
): number {
  const { coveredWeight, totalWeight } = coverageBreakdown(companies, method);
  if (totalWeight <= 0) return 0;
  return Math.min(1, Math.max(0, coveredWeight / totalWeight));
}
