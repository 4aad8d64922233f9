// Common API types
import type { DataProviderSummary } from './portfolio.js';
import type { AggregatedScore, GroupingDistribution, OutputRow, ScoreRow } from './scores.js';

// Standard error response
export interface ApiError {
  error: {
    code: string;
    message: string;
    requestId: string;
    details?: Record<string, unknown>;
  };
}

// Error codes
export const ErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  EMPTY_RESULT: 'EMPTY_RESULT',
  INVALID_GROUPING: 'INVALID_GROUPING',
  PROVIDER_FAILURE: 'PROVIDER_FAILURE',
} as const;
export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// POST /temperature-score response
export interface TemperatureScoreResponse {
  aggregatedScores: AggregatedScore[];
  scores: ScoreRow[];
  coverage: number;
  companies: OutputRow[];
  featureDistribution: GroupingDistribution | null;
  unmatchedCompanyIds: string[];
}

// GET /data-providers response
export interface DataProvidersResponse {
  items: DataProviderSummary[];
}

// Health check response
export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
}
