import { ProviderType, type CompanyRecord, type TargetRecord } from '@tempscore/shared';
import {
  inlineProviderParametersSchema,
  type InlineProviderParameters,
} from '../validation.js';
import { selectCompanies } from './records.js';
import type { DataProvider, ProviderFactory } from './types.js';

/**
 * Serves records embedded directly in the settings file.
 * Handy for small reference portfolios and for local runs.
 */
export class InlineProvider implements DataProvider {
  readonly type = ProviderType.INLINE;

  constructor(
    readonly name: string,
    private readonly records: InlineProviderParameters
  ) {}

  async getCompanyData(companyIds: readonly string[]): Promise<CompanyRecord[]> {
    return selectCompanies(this.records.companies, companyIds);
  }

  async getTargetData(companyIds: readonly string[]): Promise<TargetRecord[]> {
    return selectCompanies(this.records.targets, companyIds);
  }
}

export const createInlineProvider: ProviderFactory = (name, parameters) =>
  new InlineProvider(name, inlineProviderParametersSchema.parse(parameters));
