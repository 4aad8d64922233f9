import { z } from 'zod';
import {
  ScopeCategory,
  TargetStatus,
  TimeFrame,
  type CompanyRecord,
  type FieldValue,
  type TargetRecord,
} from '@tempscore/shared';
import type { Logger } from '../logger.js';

// ============================================================
// Cell coercion
// ============================================================

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const blankToNull = (value: unknown) =>
  value === undefined || (typeof value === 'string' && value.trim() === '') ? null : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());
// A figure that is not a number is dropped; the rest of the row still counts
const optionalNumber = z
  .preprocess(blankToUndefined, z.coerce.number().optional())
  .catch(undefined);
const nullableNumber = z.preprocess(blankToNull, z.coerce.number().nullable());

// "S1+S2", "s1 s2" and "s1s2" all name the same scope
const scopeCell = z
  .preprocess(
    (value) =>
      typeof value === 'string' ? value.toLowerCase().replace(/[\s+]/g, '') || null : null,
    z.nativeEnum(ScopeCategory).nullable()
  )
  .catch(null);

const timeFrameCell = z
  .preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() || null : null),
    z.nativeEnum(TimeFrame).nullable()
  )
  .catch(null);

const statusCell = z
  .preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.nativeEnum(TargetStatus)
  )
  .catch(TargetStatus.UNVALIDATED);

// ============================================================
// Row schemas (snake_case CSV headers)
// ============================================================

const COMPANY_COLUMNS = [
  'company_id',
  'company_name',
  'sector',
  'region',
  'benchmark',
  'ghg_s1s2',
  'ghg_s3',
  'company_market_cap',
  'company_enterprise_value',
  'company_ev_plus_cash',
  'company_total_assets',
  'company_revenue',
] as const;

const knownCompanyColumns: ReadonlySet<string> = new Set(COMPANY_COLUMNS);

const NUMERIC_COMPANY_COLUMNS: ReadonlySet<string> = new Set([
  'ghg_s1s2',
  'ghg_s3',
  'company_market_cap',
  'company_enterprise_value',
  'company_ev_plus_cash',
  'company_total_assets',
  'company_revenue',
]);

export const companyCsvRowSchema = z
  .object({
    company_id: z.string().trim().min(1),
    company_name: optionalText,
    sector: optionalText,
    region: optionalText,
    benchmark: optionalText,
    ghg_s1s2: optionalNumber,
    ghg_s3: optionalNumber,
    company_market_cap: optionalNumber,
    company_enterprise_value: optionalNumber,
    company_ev_plus_cash: optionalNumber,
    company_total_assets: optionalNumber,
    company_revenue: optionalNumber,
  })
  .passthrough()
  .transform((row): CompanyRecord => {
    const attributes: Record<string, FieldValue> = {};
    for (const [column, value] of Object.entries(row)) {
      if (knownCompanyColumns.has(column)) continue;
      attributes[column] = typeof value === 'string' && value.trim() !== '' ? value : null;
    }

    return {
      companyId: row.company_id,
      companyName: row.company_name ?? row.company_id,
      sector: row.sector,
      region: row.region,
      benchmark: row.benchmark,
      ghgS1S2: row.ghg_s1s2,
      ghgS3: row.ghg_s3,
      marketCap: row.company_market_cap,
      enterpriseValue: row.company_enterprise_value,
      evPlusCash: row.company_ev_plus_cash,
      totalAssets: row.company_total_assets,
      revenue: row.company_revenue,
      ...(Object.keys(attributes).length > 0 ? { attributes } : {}),
    };
  });

export const targetCsvRowSchema = z
  .object({
    company_id: z.string().trim().min(1),
    scope: scopeCell,
    time_frame: timeFrameCell,
    status: statusCell,
    reduction_ambition: z.preprocess(blankToUndefined, z.coerce.number()),
    base_year: nullableNumber,
    end_year: nullableNumber,
  })
  .transform(
    (row): TargetRecord => ({
      companyId: row.company_id,
      scope: row.scope,
      timeFrame: row.time_frame,
      status: row.status,
      reductionAmbition: row.reduction_ambition,
      baseYear: row.base_year,
      endYear: row.end_year,
    })
  );

// ============================================================
// Parsing helpers
// ============================================================

type ParseContext = { provider: string; file: string; logger: Logger };

/**
 * Parse raw rows with a schema, skipping (and logging) rows that do not fit.
 */
export function parseRows<T>(
  rows: readonly unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  context: ParseContext
): T[] {
  const parsed: T[] = [];
  rows.forEach((row, index) => {
    const result = schema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
    } else {
      context.logger.warn(
        { provider: context.provider, file: context.file, row: index + 1, issues: result.error.issues },
        'Skipping malformed provider row'
      );
    }
  });
  return parsed;
}

const isNonNumericCell = (value: unknown) =>
  typeof value === 'string' && value.trim() !== '' && Number.isNaN(Number(value));

/**
 * Parse company rows. Non-numeric figures are logged and left out of the record
 * instead of dropping the company.
 */
export function parseCompanyRows(rows: readonly unknown[], context: ParseContext): CompanyRecord[] {
  rows.forEach((row, index) => {
    if (typeof row !== 'object' || row === null) return;
    const cells: [string, unknown][] = Object.entries(row);
    for (const [column, value] of cells) {
      if (NUMERIC_COMPANY_COLUMNS.has(column) && isNonNumericCell(value)) {
        context.logger.warn(
          { provider: context.provider, file: context.file, row: index + 1, column, value },
          'Ignoring non-numeric provider cell'
        );
      }
    }
  });
  return parseRows(rows, companyCsvRowSchema, context);
}

// Keep only records for the requested companies, preserving record order
export function selectCompanies<T extends { companyId: string }>(
  records: readonly T[],
  companyIds: readonly string[]
): T[] {
  const wanted = new Set(companyIds);
  return records.filter((record) => wanted.has(record.companyId));
}
