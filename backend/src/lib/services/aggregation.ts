import {
  OVERALL_GROUP,
  SCOPE_ORDER,
  TIME_FRAME_ORDER,
  type AggregatedScore,
  type AggregationMethod,
  type FieldValue,
  type GroupKey,
  type GroupingDistribution,
  type ScopeCategory,
  type ScoreRow,
  type TimeFrame,
  type WorkingCompany,
} from '@tempscore/shared';
import { InvalidGroupingError } from '../errors.js';
import { availableColumns, readRowColumn } from './fields.js';
import { companyWeight } from './weights.js';

interface Group<T> {
  key: GroupKey;
  members: T[];
}

// Groups ordered by their serialized value tuple
function groupBy<T>(
  items: readonly T[],
  columns: readonly string[],
  read: (item: T, column: string) => FieldValue | undefined
): Group<T>[] {
  const groups = new Map<string, Group<T>>();
  for (const item of items) {
    const values = columns.map((column) => read(item, column) ?? null);
    const serialized = JSON.stringify(values);
    let group = groups.get(serialized);
    if (!group) {
      group = {
        key: Object.fromEntries(columns.map((column, index) => [column, values[index] ?? null])),
        members: [],
      };
      groups.set(serialized, group);
    }
    group.members.push(item);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, group]) => group);
}

function assertGroupingColumns(rows: readonly ScoreRow[], columns: readonly string[]): void {
  const available = availableColumns(rows);
  const missing = columns.filter((column) => !available.includes(column));
  if (missing.length > 0) {
    throw new InvalidGroupingError(missing, available);
  }
}

function aggregateBucket(
  rows: readonly ScoreRow[],
  method: AggregationMethod,
  timeFrame: TimeFrame,
  scope: ScopeCategory,
  group: AggregatedScore['group']
): AggregatedScore {
  const weighted: { weight: number; score: number }[] = [];
  for (const row of rows) {
    const weight = companyWeight(row.fields, method, scope);
    if (weight !== null) {
      weighted.push({ weight, score: row.temperatureScore });
    }
  }

  const totalWeight = weighted.reduce((sum, entry) => sum + entry.weight, 0);
  let score: number | undefined;
  if (totalWeight > 0) {
    score = weighted.reduce((sum, entry) => sum + (entry.weight / totalWeight) * entry.score, 0);
  }

  return {
    method,
    timeFrame,
    scope,
    group,
    ...(score === undefined ? {} : { score }),
    companyCount: weighted.length,
    totalWeight,
  };
}

/**
 * Weighted portfolio scores per time frame and scope category: the overall
 * aggregate first, then one aggregate per combination of grouping values.
 * Buckets without rows are left out.
 */
export function aggregateScores(
  rows: readonly ScoreRow[],
  method: AggregationMethod,
  groupingColumns: readonly string[] = []
): AggregatedScore[] {
  if (groupingColumns.length > 0) {
    assertGroupingColumns(rows, groupingColumns);
  }

  const results: AggregatedScore[] = [];
  for (const timeFrame of TIME_FRAME_ORDER) {
    for (const scope of SCOPE_ORDER) {
      const bucket = rows.filter((row) => row.timeFrame === timeFrame && row.scope === scope);
      if (bucket.length === 0) continue;

      results.push(aggregateBucket(bucket, method, timeFrame, scope, OVERALL_GROUP));
      if (groupingColumns.length === 0) continue;

      for (const group of groupBy(bucket, groupingColumns, readRowColumn)) {
        results.push(aggregateBucket(group.members, method, timeFrame, scope, group.key));
      }
    }
  }
  return results;
}

function readCompanyColumn(company: WorkingCompany, column: string): FieldValue | undefined {
  if (column === 'companyId') return company.companyId;
  if (column === 'companyName') return company.companyName;
  return Object.hasOwn(company.fields, column) ? company.fields[column] : undefined;
}

/**
 * Share of portfolio companies per combination of grouping values.
 */
export function computeGroupingDistribution(
  companies: readonly WorkingCompany[],
  columns: readonly string[]
): GroupingDistribution {
  const total = companies.length;
  return {
    columns: [...columns],
    groups: groupBy(companies, columns, readCompanyColumn).map((group) => ({
      group: group.key,
      companyCount: group.members.length,
      percentage: total > 0 ? (group.members.length / total) * 100 : 0,
    })),
  };
}
