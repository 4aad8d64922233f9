import { z } from 'zod';
import {
  AggregationMethod,
  ScenarioType,
  ScopeCategory,
  TargetStatus,
  TimeFrame,
  type PortfolioCompany,
} from '@tempscore/shared';

// Common validators
export const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const yearSchema = z.number().int().min(1900).max(2200);

// Portfolio schemas
// Keys beyond the known ones are caller-defined columns and end up in `fields`
export const portfolioCompanySchema = z
  .object({
    companyId: z.string().trim().min(1).max(200),
    companyName: z.string().max(500).optional(),
    investmentValue: z.number().nonnegative().optional(),
  })
  .catchall(fieldValueSchema)
  .transform(({ companyId, companyName, investmentValue, ...fields }): PortfolioCompany => ({
    companyId,
    ...(companyName === undefined ? {} : { companyName }),
    ...(investmentValue === undefined ? {} : { investmentValue }),
    fields,
  }));

export const portfolioSchema = z
  .array(portfolioCompanySchema)
  .min(1)
  .max(10_000)
  .superRefine((companies, ctx) => {
    const seen = new Set<string>();
    companies.forEach((company, index) => {
      if (seen.has(company.companyId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate companyId: ${company.companyId}`,
          path: [index, 'companyId'],
        });
      }
      seen.add(company.companyId);
    });
  });

// Scenario schemas
export const scenarioSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal(ScenarioType.SHIFT_TARGET_YEAR),
    name: z.string().max(200).optional(),
    targetYear: yearSchema,
  }),
  z.object({
    type: z.literal(ScenarioType.SCALE_AMBITION),
    name: z.string().max(200).optional(),
    factor: z.number().min(0).max(10),
  }),
  z.object({
    type: z.literal(ScenarioType.MINIMUM_AMBITION),
    name: z.string().max(200).optional(),
    floor: z.number().min(0).max(1),
  }),
]);

// Temperature score request
export const temperatureScoreRequestSchema = z.object({
  dataProviders: z.array(z.string().min(1).max(100)).max(50).optional().default([]),
  strictProviders: z.boolean().optional().default(false),
  companies: portfolioSchema,
  defaultScore: z.number().nonnegative().max(10).optional(),
  // Parsed separately so unknown methods raise a ConfigurationError
  aggregationMethod: z.string().max(20).optional(),
  groupingColumns: z.array(z.string().min(1).max(100)).max(10).optional(),
  includeColumns: z.array(z.string().min(1).max(100)).max(100).optional().default([]),
  scenario: scenarioSchema.nullable().optional(),
  anonymizeDataDump: z.boolean().optional().default(false),
  filterScopeCategory: z.array(z.nativeEnum(ScopeCategory)).optional().default([]),
  filterTimeFrame: z.array(z.nativeEnum(TimeFrame)).optional().default([]),
});

// Provider record schemas (camelCase JSON, as embedded in settings)
export const companyRecordSchema = z.object({
  companyId: z.string().trim().min(1),
  companyName: z.string(),
  sector: z.string().optional(),
  region: z.string().optional(),
  benchmark: z.string().optional(),
  ghgS1S2: z.number().nonnegative().optional(),
  ghgS3: z.number().nonnegative().optional(),
  marketCap: z.number().optional(),
  enterpriseValue: z.number().optional(),
  evPlusCash: z.number().optional(),
  totalAssets: z.number().optional(),
  revenue: z.number().optional(),
  attributes: z.record(fieldValueSchema).optional(),
});

// Lenient on purpose: unusable targets are dropped by target validation
export const targetRecordSchema = z.object({
  companyId: z.string().trim().min(1),
  scope: z.nativeEnum(ScopeCategory).nullable().default(null),
  timeFrame: z.nativeEnum(TimeFrame).nullable().default(null),
  status: z.nativeEnum(TargetStatus).default(TargetStatus.UNVALIDATED),
  reductionAmbition: z.number(),
  baseYear: z.number().nullable().default(null),
  endYear: z.number().nullable().default(null),
});

// Provider parameter schemas
export const inlineProviderParametersSchema = z.object({
  companies: z.array(companyRecordSchema).default([]),
  targets: z.array(targetRecordSchema).default([]),
});

export const csvProviderParametersSchema = z.object({
  companiesPath: z.string().min(1),
  targetsPath: z.string().min(1),
});

export const s3ProviderParametersSchema = z.object({
  bucket: z.string().min(3).max(63),
  companiesKey: z.string().min(1),
  targetsKey: z.string().min(1),
});

// Settings schemas
export const providerConfigSchema = z.object({
  name: z.string().min(1).max(100),
  // Checked against the registry's factories so unknown types fail as configuration errors
  type: z.string().min(1),
  parameters: z.record(z.unknown()).optional().default({}),
});

export const settingsSchema = z.object({
  defaultScore: z.number().nonnegative().max(10).default(3.2),
  defaultAggregationMethod: z.nativeEnum(AggregationMethod).default(AggregationMethod.WATS),
  providerTimeoutMs: z.number().int().positive().optional(),
  dataProviders: z.array(providerConfigSchema).default([]),
});

// Export types
export type TemperatureScoreRequest = z.infer<typeof temperatureScoreRequestSchema>;
export type ScenarioInput = z.infer<typeof scenarioSchema>;
export type InlineProviderParameters = z.infer<typeof inlineProviderParametersSchema>;
export type CsvProviderParameters = z.infer<typeof csvProviderParametersSchema>;
export type S3ProviderParameters = z.infer<typeof s3ProviderParametersSchema>;
export type ProviderConfig = z.infer<typeof providerConfigSchema>;
export type Settings = z.infer<typeof settingsSchema>;
