import { createReadStream } from 'fs';
import type { Readable } from 'stream';
import csv from 'csv-parser';
import { ProviderType, type CompanyRecord, type TargetRecord } from '@tempscore/shared';
import { logger as baseLogger, type Logger } from '../logger.js';
import { csvProviderParametersSchema, type CsvProviderParameters } from '../validation.js';
import { parseCompanyRows, parseRows, selectCompanies, targetCsvRowSchema } from './records.js';
import type { DataProvider, ProviderFactory, ProviderQueryOptions } from './types.js';

/**
 * Collect every row of a CSV stream. Headers are trimmed and lower-cased.
 */
export function readCsvRows(source: Readable): Promise<unknown[]> {
  return new Promise((resolve, reject) => {
    const rows: unknown[] = [];
    source
      .on('error', reject)
      .pipe(csv({ mapHeaders: ({ header }) => header.trim().toLowerCase() }))
      .on('data', (row: unknown) => rows.push(row))
      .on('end', () => resolve(rows))
      .on('error', reject);
  });
}

// Reads companies and targets from two CSV files on local disk
export class CsvProvider implements DataProvider {
  readonly type = ProviderType.CSV;

  constructor(
    readonly name: string,
    private readonly parameters: CsvProviderParameters,
    private readonly logger: Logger = baseLogger
  ) {}

  async getCompanyData(
    companyIds: readonly string[],
    options: ProviderQueryOptions = {}
  ): Promise<CompanyRecord[]> {
    const file = this.parameters.companiesPath;
    const rows = await readCsvRows(createReadStream(file, { signal: options.signal }));
    const records = parseCompanyRows(rows, {
      provider: this.name,
      file,
      logger: this.logger,
    });
    return selectCompanies(records, companyIds);
  }

  async getTargetData(
    companyIds: readonly string[],
    options: ProviderQueryOptions = {}
  ): Promise<TargetRecord[]> {
    const file = this.parameters.targetsPath;
    const rows = await readCsvRows(createReadStream(file, { signal: options.signal }));
    const records = parseRows(rows, targetCsvRowSchema, {
      provider: this.name,
      file,
      logger: this.logger,
    });
    return selectCompanies(records, companyIds);
  }
}

export const createCsvProvider: ProviderFactory = (name, parameters) =>
  new CsvProvider(name, csvProviderParametersSchema.parse(parameters));
