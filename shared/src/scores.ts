import type { AggregationMethod, ScopeCategory, TimeFrame } from './enums.js';
import type { FieldValue } from './portfolio.js';

// Temperature score for one company, scope category and time frame
export interface ScoreRow {
  companyId: string;
  companyName: string;
  scope: ScopeCategory;
  timeFrame: TimeFrame;
  temperatureScore: number;
  // A usable target produced the score (false means the default score was used)
  covered: boolean;
  // The target behind the score is externally validated
  validatedTarget: boolean;
  fields: Record<string, FieldValue>;
}

// Flat projection of a score row returned to API callers
export type OutputRow = Record<string, FieldValue>;

export const OVERALL_GROUP = 'overall' as const;

export type GroupKey = Record<string, FieldValue>;

export interface AggregatedScore {
  method: AggregationMethod;
  timeFrame: TimeFrame;
  scope: ScopeCategory;
  group: typeof OVERALL_GROUP | GroupKey;
  // Absent when the bucket carries no weight
  score?: number;
  companyCount: number;
  totalWeight: number;
}

export interface GroupingDistributionEntry {
  group: GroupKey;
  companyCount: number;
  percentage: number;
}

export interface GroupingDistribution {
  columns: string[];
  groups: GroupingDistributionEntry[];
}

export interface PipelineResult {
  scores: ScoreRow[];
  companies: OutputRow[];
  aggregatedScores: AggregatedScore[];
  coverage: number;
  groupingDistribution?: GroupingDistribution;
  unmatchedCompanyIds: string[];
}
