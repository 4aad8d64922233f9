import pino from 'pino';
import { describe, it, expect, vi } from 'vitest';
import { ScopeCategory, TargetStatus, TimeFrame } from '@tempscore/shared';
import {
  companyCsvRowSchema,
  parseCompanyRows,
  parseRows,
  selectCompanies,
  targetCsvRowSchema,
} from './records.js';

describe('companyCsvRowSchema', () => {
  it('maps snake_case columns and keeps unknown ones as attributes', () => {
    const record = companyCsvRowSchema.parse({
      company_id: ' C1 ',
      company_name: 'Alpha Power',
      sector: 'Power',
      ghg_s1s2: '120.5',
      company_market_cap: '1000',
      isin: 'XX0000000001',
      lei: '',
    });

    expect(record).toEqual({
      companyId: 'C1',
      companyName: 'Alpha Power',
      sector: 'Power',
      ghgS1S2: 120.5,
      marketCap: 1000,
      attributes: { isin: 'XX0000000001', lei: null },
    });
  });

  it('falls back to the identifier when the name is blank', () => {
    const record = companyCsvRowSchema.parse({ company_id: 'C9', company_name: '  ' });
    expect(record.companyName).toBe('C9');
    expect(record.attributes).toBeUndefined();
  });

  it('rejects rows without an identifier', () => {
    expect(companyCsvRowSchema.safeParse({ company_id: '', company_name: 'x' }).success).toBe(false);
  });

  it('drops non-numeric figures and keeps the company', () => {
    const record = companyCsvRowSchema.parse({ company_id: 'C1', ghg_s1s2: 'n/a', ghg_s3: '12' });
    expect(record.companyId).toBe('C1');
    expect(record.ghgS1S2).toBeUndefined();
    expect(record.ghgS3).toBe(12);
  });
});

describe('targetCsvRowSchema', () => {
  const row = {
    company_id: 'C1',
    scope: 's1s2',
    time_frame: 'short',
    status: 'validated',
    reduction_ambition: '0.25',
    base_year: '2020',
    end_year: '2030',
  };

  it('parses a complete row', () => {
    expect(targetCsvRowSchema.parse(row)).toEqual({
      companyId: 'C1',
      scope: ScopeCategory.S1S2,
      timeFrame: TimeFrame.SHORT,
      status: TargetStatus.VALIDATED,
      reductionAmbition: 0.25,
      baseYear: 2020,
      endYear: 2030,
    });
  });

  it('normalizes scope spellings', () => {
    expect(targetCsvRowSchema.parse({ ...row, scope: 'S1+S2' }).scope).toBe(ScopeCategory.S1S2);
    expect(targetCsvRowSchema.parse({ ...row, scope: 'S1 S2 S3' }).scope).toBe(ScopeCategory.S1S2S3);
  });

  it('keeps unknown scopes and time frames as null', () => {
    const target = targetCsvRowSchema.parse({ ...row, scope: 'scope 4', time_frame: 'forever' });
    expect(target.scope).toBeNull();
    expect(target.timeFrame).toBeNull();
  });

  it('treats unknown statuses as unvalidated', () => {
    expect(targetCsvRowSchema.parse({ ...row, status: 'pending' }).status).toBe(
      TargetStatus.UNVALIDATED
    );
  });

  it('keeps blank years as null', () => {
    const target = targetCsvRowSchema.parse({ ...row, base_year: '', end_year: '' });
    expect(target.baseYear).toBeNull();
    expect(target.endYear).toBeNull();
  });

  it('rejects rows without an ambition', () => {
    expect(targetCsvRowSchema.safeParse({ ...row, reduction_ambition: '' }).success).toBe(false);
  });
});

describe('parseRows', () => {
  it('skips and logs rows that do not fit the schema', () => {
    const logger = pino({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');

    const records = parseRows(
      [{ company_id: 'C1' }, { company_id: '' }, { company_id: 'C2' }],
      companyCsvRowSchema,
      { provider: 'local', file: 'companies.csv', logger }
    );

    expect(records.map((record) => record.companyId)).toEqual(['C1', 'C2']);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ provider: 'local', file: 'companies.csv', row: 2 }),
      'Skipping malformed provider row'
    );
  });
});

describe('parseCompanyRows', () => {
  it('keeps companies with a non-numeric figure and logs the cell', () => {
    const logger = pino({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');

    const records = parseCompanyRows(
      [
        { company_id: 'A', company_name: 'Acme', company_revenue: 'n/a' },
        { company_id: 'B', company_name: 'Bolt', company_revenue: '250' },
      ],
      { provider: 'local', file: 'companies.csv', logger }
    );

    expect(records).toEqual([
      { companyId: 'A', companyName: 'Acme' },
      { companyId: 'B', companyName: 'Bolt', revenue: 250 },
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      { provider: 'local', file: 'companies.csv', row: 1, column: 'company_revenue', value: 'n/a' },
      'Ignoring non-numeric provider cell'
    );
  });
});

describe('selectCompanies', () => {
  it('keeps requested companies in record order', () => {
    const records = [{ companyId: 'B' }, { companyId: 'A' }, { companyId: 'C' }];
    expect(selectCompanies(records, ['C', 'B'])).toEqual([{ companyId: 'B' }, { companyId: 'C' }]);
  });
});
