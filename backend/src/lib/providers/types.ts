import type { CompanyRecord, ProviderType, TargetRecord } from '@tempscore/shared';

export interface ProviderQueryOptions {
  // Aborted by the assembler when the query exceeds its timeout
  signal?: AbortSignal;
}

/**
 * Source of company and target records.
 *
 * Implementations are pure reads: they never mutate state and return nothing
 * (rather than failing) for identifiers they do not know.
 */
export interface DataProvider {
  readonly name: string;
  readonly type: ProviderType;

  getCompanyData(
    companyIds: readonly string[],
    options?: ProviderQueryOptions
  ): Promise<CompanyRecord[]>;

  getTargetData(
    companyIds: readonly string[],
    options?: ProviderQueryOptions
  ): Promise<TargetRecord[]>;
}

// Builds a provider from its configured name and raw parameters
export type ProviderFactory = (name: string, parameters: Record<string, unknown>) => DataProvider;
