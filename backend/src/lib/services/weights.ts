import {
  AggregationMethod,
  ScopeCategory,
  type FieldValue,
} from '@tempscore/shared';
import { ConfigurationError } from '../errors.js';
import { FieldName, readNumber } from './fields.js';

const AGGREGATION_METHODS: readonly AggregationMethod[] = Object.values(AggregationMethod);

// Financial denominator of each owned-emissions method
const OWNERSHIP_DENOMINATORS: Partial<Record<AggregationMethod, FieldName>> = {
  [AggregationMethod.MOTS]: FieldName.MARKET_CAP,
  [AggregationMethod.EOTS]: FieldName.ENTERPRISE_VALUE,
  [AggregationMethod.ECOTS]: FieldName.EV_PLUS_CASH,
  [AggregationMethod.AOTS]: FieldName.TOTAL_ASSETS,
  [AggregationMethod.ROTS]: FieldName.REVENUE,
};

/**
 * Parse an aggregation method identifier (case-insensitive). Unknown
 * identifiers are rejected rather than replaced by a default.
 */
export function parseAggregationMethod(
  value: string | undefined,
  fallback: AggregationMethod
): AggregationMethod {
  if (value === undefined || value.trim() === '') return fallback;

  const normalized = value.trim().toUpperCase();
  const method = AGGREGATION_METHODS.find((candidate) => candidate === normalized);
  if (!method) {
    throw new ConfigurationError(`Unknown aggregation method: ${value}`, {
      allowed: [...AGGREGATION_METHODS],
    });
  }
  return method;
}

/**
 * Emissions attributed to a scope category. The combined category sums both
 * parts; a missing part counts as zero unless both are missing.
 */
export function scopeEmissions(
  fields: Record<string, FieldValue>,
  scope: ScopeCategory
): number | undefined {
  const s1s2 = readNumber(fields, FieldName.GHG_S1S2);
  const s3 = readNumber(fields, FieldName.GHG_S3);

  switch (scope) {
    case ScopeCategory.S1S2:
      return s1s2;
    case ScopeCategory.S3:
      return s3;
    case ScopeCategory.S1S2S3:
      return s1s2 === undefined && s3 === undefined ? undefined : (s1s2 ?? 0) + (s3 ?? 0);
  }
}

/**
 * Weight of one company in a bucket of the given scope.
 *
 * - EQUAL: 1.
 * - WATS: investment value; missing means 0 and the company still counts.
 * - TETS: scope emissions; missing means 0 and the company still counts.
 * - MOTS, EOTS, ECOTS, AOTS, ROTS: investment / denominator * emissions.
 *   A missing or non-positive denominator excludes the company (null);
 *   missing investment or emissions give weight 0.
 *
 * Coverage and aggregation both go through this function.
 */
export function companyWeight(
  fields: Record<string, FieldValue>,
  method: AggregationMethod,
  scope: ScopeCategory
): number | null {
  switch (method) {
    case AggregationMethod.EQUAL:
      return 1;
    case AggregationMethod.WATS:
      return nonNegative(readNumber(fields, FieldName.INVESTMENT_VALUE));
    case AggregationMethod.TETS:
      return nonNegative(scopeEmissions(fields, scope));
    default: {
      const denominatorField = OWNERSHIP_DENOMINATORS[method];
      const denominator =
        denominatorField === undefined ? undefined : readNumber(fields, denominatorField);
      if (denominator === undefined || denominator <= 0) return null;

      const investment = nonNegative(readNumber(fields, FieldName.INVESTMENT_VALUE));
      const emissions = nonNegative(scopeEmissions(fields, scope));
      return (investment / denominator) * emissions;
    }
  }
}

function nonNegative(value: number | undefined): number {
  return value === undefined || value < 0 ? 0 : value;
}
