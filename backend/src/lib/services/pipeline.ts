import type {
  AggregationMethod,
  PipelineResult,
  PortfolioCompany,
  Scenario,
  ScopeCategory,
  TimeFrame,
} from '@tempscore/shared';
import { ValidationError } from '../errors.js';
import { logger as baseLogger, type Logger } from '../logger.js';
import type { DataProvider } from '../providers/types.js';
import { aggregateScores, computeGroupingDistribution } from './aggregation.js';
import { assemblePortfolio } from './assembler.js';
import { computeCoverage } from './coverage.js';
import { postprocessScores } from './postprocess.js';
import { applyScenario } from './scenario.js';
import { createRegressionModel, scoreCompanies, type TemperatureModel } from './scoring.js';
import { validateTargets } from './targets.js';

export interface PipelineInput {
  providers: readonly DataProvider[];
  portfolio: readonly PortfolioCompany[];
  fallbackScore: number;
  aggregationMethod: AggregationMethod;
  grouping?: readonly string[];
  scenario?: Scenario | null;
  scopeFilter?: readonly ScopeCategory[];
  timeFrameFilter?: readonly TimeFrame[];
  includeColumns?: readonly string[];
  anonymize?: boolean;
  evaluationDate?: Date;
  providerTimeoutMs?: number;
  model?: TemperatureModel;
  logger?: Logger;
}

/**
 * Score a portfolio end to end:
 * assemble -> validate targets -> scenario -> score -> aggregate and coverage
 * -> post-process.
 *
 * Aggregates and coverage always see every score row; the scope and time
 * frame filters only shape the returned rows.
 */
export async function runPipeline(input: PipelineInput): Promise<PipelineResult> {
  const log = input.logger ?? baseLogger;
  if (!Number.isFinite(input.fallbackScore) || input.fallbackScore < 0) {
    throw new ValidationError('Default score must be a finite, non-negative number', {
      fallbackScore: input.fallbackScore,
    });
  }

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const { companyId } of input.portfolio) {
    if (seen.has(companyId)) duplicates.add(companyId);
    seen.add(companyId);
  }
  if (duplicates.size > 0) {
    throw new ValidationError('Portfolio company identifiers must be unique', {
      duplicateCompanyIds: [...duplicates],
    });
  }

  const { companies: assembled, unmatchedCompanyIds } = await assemblePortfolio(
    input.providers,
    input.portfolio,
    { timeoutMs: input.providerTimeoutMs, logger: log }
  );

  const validated = validateTargets(assembled, {
    evaluationDate: input.evaluationDate ?? new Date(),
  });
  const companies = applyScenario(input.scenario, validated);

  const rows = scoreCompanies(companies, {
    fallbackScore: input.fallbackScore,
    model: input.model ?? createRegressionModel(),
  });
  log.debug({ companies: companies.length, rows: rows.length }, 'Scores computed');

  const grouping = input.grouping ?? [];
  const aggregatedScores = aggregateScores(rows, input.aggregationMethod, grouping);
  const coverage = computeCoverage(companies, input.aggregationMethod);

  const { scores, companies: projected } = postprocessScores(rows, {
    scopeFilter: input.scopeFilter,
    timeFrameFilter: input.timeFrameFilter,
    includeColumns: input.includeColumns,
    anonymize: input.anonymize,
  });

  log.debug(
    { aggregates: aggregatedScores.length, coverage, returnedRows: scores.length },
    'Pipeline finished'
  );

  return {
    scores,
    companies: projected,
    aggregatedScores,
    coverage,
    ...(grouping.length > 0
      ? { groupingDistribution: computeGroupingDistribution(companies, grouping) }
      : {}),
    unmatchedCompanyIds,
  };
}
