import type { ScopeCategory, TimeFrame, TargetStatus } from './enums.js';

// Scalar cell value carried through the pipeline as a pass-through column
export type FieldValue = string | number | boolean | null;

// Company submitted by the caller as part of a portfolio
export interface PortfolioCompany {
  companyId: string;
  companyName?: string;
  investmentValue?: number;
  // Caller-defined columns (grouping keys, identifiers, notes)
  fields?: Record<string, FieldValue>;
}

// Company attributes returned by a data provider
export interface CompanyRecord {
  companyId: string;
  companyName: string;
  sector?: string;
  region?: string;
  benchmark?: string;
  ghgS1S2?: number;
  ghgS3?: number;
  marketCap?: number;
  enterpriseValue?: number;
  evPlusCash?: number;
  totalAssets?: number;
  revenue?: number;
  attributes?: Record<string, FieldValue>;
}

// A single emissions-reduction target as reported by a data provider
export interface TargetRecord {
  companyId: string;
  scope: ScopeCategory | null;
  timeFrame: TimeFrame | null;
  status: TargetStatus;
  // Fraction of base-year emissions to be reduced by endYear
  reductionAmbition: number;
  baseYear: number | null;
  endYear: number | null;
}

// Portfolio company merged with its provider data
export interface WorkingCompany {
  companyId: string;
  companyName: string;
  fields: Record<string, FieldValue>;
  targets: readonly TargetRecord[];
}

// Public description of a configured provider
export interface DataProviderSummary {
  name: string;
  type: string;
}
