import type { FieldValue, ScoreRow } from '@tempscore/shared';

// Merged company columns the pipeline reads by name
export const FieldName = {
  COMPANY_ID: 'companyId',
  COMPANY_NAME: 'companyName',
  INVESTMENT_VALUE: 'investmentValue',
  SECTOR: 'sector',
  REGION: 'region',
  BENCHMARK: 'benchmark',
  GHG_S1S2: 'ghgS1S2',
  GHG_S3: 'ghgS3',
  MARKET_CAP: 'marketCap',
  ENTERPRISE_VALUE: 'enterpriseValue',
  EV_PLUS_CASH: 'evPlusCash',
  TOTAL_ASSETS: 'totalAssets',
  REVENUE: 'revenue',
} as const;
export type FieldName = (typeof FieldName)[keyof typeof FieldName];

// Columns every score row carries outside of `fields`
export const SCORE_ROW_COLUMNS = [
  'companyId',
  'companyName',
  'scope',
  'timeFrame',
  'temperatureScore',
  'covered',
  'validatedTarget',
] as const;

/**
 * Numeric value of a field. Numeric strings (as read from CSV attributes or
 * spreadsheets) are accepted; anything else is undefined.
 */
export function readNumber(fields: Record<string, FieldValue>, key: string): number | undefined {
  if (!Object.hasOwn(fields, key)) return undefined;
  const value = fields[key];
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function readText(fields: Record<string, FieldValue>, key: string): string | undefined {
  if (!Object.hasOwn(fields, key)) return undefined;
  const value = fields[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

export function readRowColumn(row: ScoreRow, column: string): FieldValue | undefined {
  switch (column) {
    case 'companyId':
      return row.companyId;
    case 'companyName':
      return row.companyName;
    case 'scope':
      return row.scope;
    case 'timeFrame':
      return row.timeFrame;
    case 'temperatureScore':
      return row.temperatureScore;
    case 'covered':
      return row.covered;
    case 'validatedTarget':
      return row.validatedTarget;
    default:
      return Object.hasOwn(row.fields, column) ? row.fields[column] : undefined;
  }
}

/**
 * Every column of the score-row projection: the fixed row columns followed by
 * pass-through fields in order of first appearance.
 */
export function availableColumns(rows: readonly ScoreRow[]): string[] {
  const columns = new Set<string>(SCORE_ROW_COLUMNS);
  for (const row of rows) {
    for (const key of Object.keys(row.fields)) {
      columns.add(key);
    }
  }
  return [...columns];
}

// Code-unit order, independent of the host locale
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
