import type {
  FieldValue,
  OutputRow,
  ScopeCategory,
  ScoreRow,
  TimeFrame,
} from '@tempscore/shared';
import { availableColumns, FieldName, readRowColumn } from './fields.js';

export interface PostprocessOptions {
  scopeFilter?: readonly ScopeCategory[];
  timeFrameFilter?: readonly TimeFrame[];
  includeColumns?: readonly string[];
  anonymize?: boolean;
}

export interface PostprocessedScores {
  scores: ScoreRow[];
  companies: OutputRow[];
}

// Identifier columns removed from anonymized output
const IDENTIFYING_FIELDS = ['isin', 'lei', 'ticker'] as const;

// Always part of the projected company rows
const MANDATORY_COLUMNS = ['companyName', 'scope', 'timeFrame', 'temperatureScore'] as const;

export function filterScores(
  rows: readonly ScoreRow[],
  scopes: readonly ScopeCategory[] = [],
  timeFrames: readonly TimeFrame[] = []
): ScoreRow[] {
  return rows.filter(
    (row) =>
      (scopes.length === 0 || scopes.includes(row.scope)) &&
      (timeFrames.length === 0 || timeFrames.includes(row.timeFrame))
  );
}

/**
 * Replace company names and identifiers with `company_<n>` tokens, numbered
 * by first appearance, and drop identifying fields.
 */
export function anonymizeScores(rows: readonly ScoreRow[]): ScoreRow[] {
  const tokens = new Map<string, string>();
  const tokenFor = (companyId: string) => {
    let token = tokens.get(companyId);
    if (token === undefined) {
      token = `company_${tokens.size + 1}`;
      tokens.set(companyId, token);
    }
    return token;
  };

  return rows.map((row) => {
    const token = tokenFor(row.companyId);
    const fields: Record<string, FieldValue> = { ...row.fields };
    for (const key of IDENTIFYING_FIELDS) {
      delete fields[key];
    }
    if (Object.hasOwn(fields, FieldName.COMPANY_ID)) fields[FieldName.COMPANY_ID] = token;
    if (Object.hasOwn(fields, FieldName.COMPANY_NAME)) fields[FieldName.COMPANY_NAME] = token;

    return { ...row, companyId: token, companyName: token, fields };
  });
}

/**
 * Flatten rows onto the mandatory columns plus the requested ones. Requested
 * columns that no row carries are ignored.
 */
export function projectScores(
  rows: readonly ScoreRow[],
  includeColumns: readonly string[] = []
): OutputRow[] {
  const available = new Set(availableColumns(rows));
  const columns = [
    ...new Set<string>([
      ...MANDATORY_COLUMNS,
      ...includeColumns.filter((column) => available.has(column)),
    ]),
  ];

  return rows.map((row) =>
    Object.fromEntries(columns.map((column) => [column, readRowColumn(row, column) ?? null]))
  );
}

export function postprocessScores(
  rows: readonly ScoreRow[],
  options: PostprocessOptions = {}
): PostprocessedScores {
  const filtered = filterScores(rows, options.scopeFilter, options.timeFrameFilter);
  const scores = options.anonymize ? anonymizeScores(filtered) : filtered;
  return {
    scores,
    companies: projectScores(scores, options.includeColumns),
  };
}
