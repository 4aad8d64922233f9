import { z } from 'zod';
import {
  SCOPE_ORDER,
  TIME_FRAME_ORDER,
  TargetStatus,
  type ScopeCategory,
  type ScoreRow,
  type TargetRecord,
  type TimeFrame,
  type WorkingCompany,
} from '@tempscore/shared';
import benchmarksConfig from '../../config/benchmarks.json' with { type: 'json' };
import { compareIds, FieldName, readText } from './fields.js';

// ============================================================
// Temperature model
// ============================================================

// Linear relation between annual reduction rate (%) and temperature (°C)
export interface Benchmark {
  intercept: number;
  slope: number;
}

export interface TemperatureModel {
  benchmarkFor(company: WorkingCompany, scope: ScopeCategory, timeFrame: TimeFrame): Benchmark;
  score(target: TargetRecord, benchmark: Benchmark): number;
}

const benchmarkSchema = z.object({
  intercept: z.number(),
  slope: z.number(),
});

const timeFrameTableSchema = z.object({
  short: benchmarkSchema,
  mid: benchmarkSchema,
  long: benchmarkSchema,
});

const scopeTableSchema = z.object({
  s1s2: timeFrameTableSchema,
  s3: timeFrameTableSchema,
  s1s2s3: timeFrameTableSchema,
});

// Sector tables only need the entries that differ from the default
const partialScopeTableSchema = z.object({
  s1s2: timeFrameTableSchema.partial().optional(),
  s3: timeFrameTableSchema.partial().optional(),
  s1s2s3: timeFrameTableSchema.partial().optional(),
});

export const benchmarkTableSchema = z.object({
  default: scopeTableSchema,
  sectors: z.record(partialScopeTableSchema).default({}),
});

export type BenchmarkTable = z.infer<typeof benchmarkTableSchema>;

export const DEFAULT_BENCHMARKS: BenchmarkTable = benchmarkTableSchema.parse(benchmarksConfig);

/**
 * Regression model: the target's annual reduction rate, in percent, is mapped
 * to a temperature through the benchmark for the company's sector.
 */
export function createRegressionModel(table: BenchmarkTable = DEFAULT_BENCHMARKS): TemperatureModel {
  return {
    benchmarkFor(company, scope, timeFrame) {
      const key = (
        readText(company.fields, FieldName.BENCHMARK) ?? readText(company.fields, FieldName.SECTOR)
      )?.toLowerCase();
      const sector =
        key !== undefined && Object.hasOwn(table.sectors, key) ? table.sectors[key] : undefined;
      return sector?.[scope]?.[timeFrame] ?? table.default[scope][timeFrame];
    },

    score(target, benchmark) {
      if (target.baseYear === null || target.endYear === null) {
        throw new Error(`Target of ${target.companyId} has no base or end year`);
      }
      const years = Math.max(1, target.endYear - target.baseYear);
      const annualReduction = (target.reductionAmbition / years) * 100;
      return benchmark.intercept + benchmark.slope * annualReduction;
    },
  };
}

// ============================================================
// Scoring
// ============================================================

export interface ScoreOptions {
  fallbackScore: number;
  model: TemperatureModel;
  scopes?: readonly ScopeCategory[];
  timeFrames?: readonly TimeFrame[];
}

const roundScore = (value: number) => Math.round(Math.max(0, value) * 100) / 100;

/**
 * Produce one score row per company, scope and time frame. Combinations
 * without a target get the fallback score and are marked as not covered.
 */
export function scoreCompanies(
  companies: readonly WorkingCompany[],
  options: ScoreOptions
): ScoreRow[] {
  const { fallbackScore, model } = options;
  const scopes = SCOPE_ORDER.filter((scope) => !options.scopes || options.scopes.includes(scope));
  const timeFrames = TIME_FRAME_ORDER.filter(
    (timeFrame) => !options.timeFrames || options.timeFrames.includes(timeFrame)
  );

  const ordered = [...companies].sort((a, b) => compareIds(a.companyId, b.companyId));
  const rows: ScoreRow[] = [];

  for (const company of ordered) {
    for (const scope of scopes) {
      for (const timeFrame of timeFrames) {
        const target = company.targets.find(
          (candidate) => candidate.scope === scope && candidate.timeFrame === timeFrame
        );

        let temperatureScore = fallbackScore;
        if (target) {
          const raw = model.score(target, model.benchmarkFor(company, scope, timeFrame));
          if (!Number.isFinite(raw)) {
            throw new Error(
              `Temperature model returned ${raw} for ${company.companyId} (${scope}, ${timeFrame})`
            );
          }
          temperatureScore = roundScore(raw);
        }

        rows.push({
          companyId: company.companyId,
          companyName: company.companyName,
          scope,
          timeFrame,
          temperatureScore,
          covered: target !== undefined,
          validatedTarget: target?.status === TargetStatus.VALIDATED,
          fields: { ...company.fields },
        });
      }
    }
  }

  return rows;
}
