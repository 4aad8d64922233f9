import { Readable } from 'stream';
import { ProviderType, type CompanyRecord, type TargetRecord } from '@tempscore/shared';
import { ProviderFailure } from '../errors.js';
import { logger as baseLogger, type Logger } from '../logger.js';
import { getObjectText } from '../s3.js';
import { s3ProviderParametersSchema, type S3ProviderParameters } from '../validation.js';
import { readCsvRows } from './csv.js';
import { parseCompanyRows, parseRows, selectCompanies, targetCsvRowSchema } from './records.js';
import type { DataProvider, ProviderFactory, ProviderQueryOptions } from './types.js';

// Same CSV layout as the csv provider, read from an S3 bucket
export class S3CsvProvider implements DataProvider {
  readonly type = ProviderType.S3;

  constructor(
    readonly name: string,
    private readonly parameters: S3ProviderParameters,
    private readonly logger: Logger = baseLogger
  ) {}

  async getCompanyData(
    companyIds: readonly string[],
    options: ProviderQueryOptions = {}
  ): Promise<CompanyRecord[]> {
    const key = this.parameters.companiesKey;
    const rows = await this.readRows(key, options.signal);
    const records = parseCompanyRows(rows, {
      provider: this.name,
      file: key,
      logger: this.logger,
    });
    return selectCompanies(records, companyIds);
  }

  async getTargetData(
    companyIds: readonly string[],
    options: ProviderQueryOptions = {}
  ): Promise<TargetRecord[]> {
    const key = this.parameters.targetsKey;
    const rows = await this.readRows(key, options.signal);
    const records = parseRows(rows, targetCsvRowSchema, {
      provider: this.name,
      file: key,
      logger: this.logger,
    });
    return selectCompanies(records, companyIds);
  }

  private async readRows(key: string, signal?: AbortSignal): Promise<unknown[]> {
    const text = await getObjectText(this.parameters.bucket, key, signal);
    if (text === null) {
      throw new ProviderFailure(this.name, `object not found: s3://${this.parameters.bucket}/${key}`);
    }
    return readCsvRows(Readable.from([text]));
  }
}

export const createS3CsvProvider: ProviderFactory = (name, parameters) =>
  new S3CsvProvider(name, s3ProviderParametersSchema.parse(parameters));
