import { describe, it, expect } from 'vitest';
import { AggregationMethod, ScopeCategory } from '@tempscore/shared';
import { ConfigurationError } from '../errors.js';
import { companyWeight, parseAggregationMethod, scopeEmissions } from './weights.js';

describe('parseAggregationMethod', () => {
  it('accepts identifiers case-insensitively', () => {
    expect(parseAggregationMethod('mots', AggregationMethod.WATS)).toBe(AggregationMethod.MOTS);
    expect(parseAggregationMethod(' Equal ', AggregationMethod.WATS)).toBe(AggregationMethod.EQUAL);
  });

  it('uses the fallback when no method is given', () => {
    expect(parseAggregationMethod(undefined, AggregationMethod.TETS)).toBe(AggregationMethod.TETS);
    expect(parseAggregationMethod('', AggregationMethod.TETS)).toBe(AggregationMethod.TETS);
  });

  it('rejects unknown identifiers', () => {
    expect(() => parseAggregationMethod('MEDIAN', AggregationMethod.WATS)).toThrow(ConfigurationError);
    expect(() => parseAggregationMethod('MEDIAN', AggregationMethod.WATS)).toThrow(
      'Unknown aggregation method: MEDIAN'
    );
  });
});

describe('scopeEmissions', () => {
  it('reads the matching emissions column', () => {
    const fields = { ghgS1S2: 100, ghgS3: 40 };
    expect(scopeEmissions(fields, ScopeCategory.S1S2)).toBe(100);
    expect(scopeEmissions(fields, ScopeCategory.S3)).toBe(40);
    expect(scopeEmissions(fields, ScopeCategory.S1S2S3)).toBe(140);
  });

  it('treats a missing part of the combined scope as zero', () => {
    expect(scopeEmissions({ ghgS3: 40 }, ScopeCategory.S1S2S3)).toBe(40);
    expect(scopeEmissions({}, ScopeCategory.S1S2S3)).toBeUndefined();
  });

  it('accepts numeric strings', () => {
    expect(scopeEmissions({ ghgS1S2: '12.5' }, ScopeCategory.S1S2)).toBe(12.5);
  });
});

describe('companyWeight', () => {
  const fields = {
    investmentValue: 50,
    ghgS1S2: 100,
    ghgS3: 300,
    marketCap: 1000,
    enterpriseValue: 500,
    evPlusCash: 250,
    totalAssets: 2000,
    revenue: 100,
  };

  it('weighs every company the same under EQUAL', () => {
    expect(companyWeight({}, AggregationMethod.EQUAL, ScopeCategory.S1S2)).toBe(1);
  });

  it('weighs by investment under WATS', () => {
    expect(companyWeight(fields, AggregationMethod.WATS, ScopeCategory.S1S2)).toBe(50);
    expect(companyWeight({}, AggregationMethod.WATS, ScopeCategory.S1S2)).toBe(0);
  });

  it('weighs by scope emissions under TETS', () => {
    expect(companyWeight(fields, AggregationMethod.TETS, ScopeCategory.S3)).toBe(300);
    expect(companyWeight(fields, AggregationMethod.TETS, ScopeCategory.S1S2S3)).toBe(400);
    expect(companyWeight({}, AggregationMethod.TETS, ScopeCategory.S1S2)).toBe(0);
  });

  it('weighs by owned emissions under the ownership methods', () => {
    expect(companyWeight(fields, AggregationMethod.MOTS, ScopeCategory.S1S2)).toBe(5);
    expect(companyWeight(fields, AggregationMethod.EOTS, ScopeCategory.S1S2)).toBe(10);
    expect(companyWeight(fields, AggregationMethod.ECOTS, ScopeCategory.S1S2)).toBe(20);
    expect(companyWeight(fields, AggregationMethod.AOTS, ScopeCategory.S1S2)).toBe(2.5);
    expect(companyWeight(fields, AggregationMethod.ROTS, ScopeCategory.S1S2)).toBe(50);
  });

  it('excludes companies without a positive denominator', () => {
    expect(companyWeight({ ...fields, marketCap: 0 }, AggregationMethod.MOTS, ScopeCategory.S1S2)).toBeNull();
    expect(companyWeight({ investmentValue: 50, ghgS1S2: 100 }, AggregationMethod.ROTS, ScopeCategory.S1S2)).toBeNull();
  });

  it('gives zero weight when emissions are missing', () => {
    expect(companyWeight({ investmentValue: 50, marketCap: 1000 }, AggregationMethod.MOTS, ScopeCategory.S1S2)).toBe(0);
  });
});
