import { describe, it, expect } from 'vitest';
import {
  AggregationMethod,
  OVERALL_GROUP,
  ScopeCategory,
  TimeFrame,
  type FieldValue,
  type ScoreRow,
  type WorkingCompany,
} from '@tempscore/shared';
import { InvalidGroupingError } from '../errors.js';
import { aggregateScores, computeGroupingDistribution } from './aggregation.js';

function row(
  companyId: string,
  temperatureScore: number,
  fields: Record<string, FieldValue> = {},
  scope: ScopeCategory = ScopeCategory.S1S2,
  timeFrame: TimeFrame = TimeFrame.SHORT
): ScoreRow {
  return {
    companyId,
    companyName: companyId,
    scope,
    timeFrame,
    temperatureScore,
    covered: true,
    validatedTarget: false,
    fields: { companyId, ...fields },
  };
}

describe('aggregateScores', () => {
  it('returns the row score for a single-company portfolio', () => {
    const rows = [
      row('C1', 1.87, { investmentValue: 40 }),
      row('C1', 2.93, { investmentValue: 40 }, ScopeCategory.S3, TimeFrame.LONG),
    ];

    const results = aggregateScores(rows, AggregationMethod.WATS);

    expect(results.map((result) => result.score)).toEqual([1.87, 2.93]);
  });

  it('weighs scores by investment value', () => {
    const rows = [row('A', 2, { investmentValue: 100 }), row('B', 3, { investmentValue: 300 })];

    expect(aggregateScores(rows, AggregationMethod.WATS)).toEqual([
      {
        method: AggregationMethod.WATS,
        timeFrame: TimeFrame.SHORT,
        scope: ScopeCategory.S1S2,
        group: OVERALL_GROUP,
        score: 2.75,
        companyCount: 2,
        totalWeight: 400,
      },
    ]);
  });

  it('orders buckets by time frame, then scope', () => {
    const rows = [
      row('A', 2, {}, ScopeCategory.S3, TimeFrame.SHORT),
      row('A', 2, {}, ScopeCategory.S1S2, TimeFrame.MID),
      row('A', 2, {}, ScopeCategory.S1S2, TimeFrame.SHORT),
    ];

    const results = aggregateScores(rows, AggregationMethod.EQUAL);

    expect(results.map((result) => [result.timeFrame, result.scope])).toEqual([
      [TimeFrame.SHORT, ScopeCategory.S1S2],
      [TimeFrame.SHORT, ScopeCategory.S3],
      [TimeFrame.MID, ScopeCategory.S1S2],
    ]);
  });

  it('adds one aggregate per group after the overall one', () => {
    const rows = [
      row('A', 2, { sector: 'Steel' }),
      row('B', 3, { sector: 'Power' }),
      row('C', 4, { sector: 'Power' }),
      row('D', 3, { sector: 'Steel' }),
    ];

    const results = aggregateScores(rows, AggregationMethod.EQUAL, ['sector']);

    expect(results.map((result) => [result.group, result.score, result.companyCount])).toEqual([
      [OVERALL_GROUP, 3, 4],
      [{ sector: 'Power' }, 3.5, 2],
      [{ sector: 'Steel' }, 2.5, 2],
    ]);
  });

  it('groups rows without the column under null', () => {
    const rows = [row('A', 2, { region: 'Europe' }), row('B', 3)];

    const results = aggregateScores(rows, AggregationMethod.EQUAL, ['region']);

    expect(results.map((result) => result.group)).toEqual([
      OVERALL_GROUP,
      { region: 'Europe' },
      { region: null },
    ]);
  });

  it('rejects unknown grouping columns', () => {
    const rows = [row('A', 2, { sector: 'Steel' })];

    expect(() => aggregateScores(rows, AggregationMethod.EQUAL, ['country'])).toThrow(
      InvalidGroupingError
    );
    expect(() => aggregateScores(rows, AggregationMethod.EQUAL, ['country'])).toThrow(
      'Unknown grouping column(s): country'
    );
  });

  it('leaves the score out when the bucket has no weight', () => {
    const rows = [row('A', 2), row('B', 3)];

    const [result] = aggregateScores(rows, AggregationMethod.WATS);

    expect(result).not.toHaveProperty('score');
    expect(result.totalWeight).toBe(0);
    expect(result.companyCount).toBe(2);
  });

  it('excludes companies without an ownership denominator', () => {
    const rows = [
      row('A', 2, { investmentValue: 10, marketCap: 100, ghgS1S2: 50 }),
      row('B', 4, { investmentValue: 10, ghgS1S2: 50 }),
    ];

    const [result] = aggregateScores(rows, AggregationMethod.MOTS);

    expect(result.companyCount).toBe(1);
    expect(result.totalWeight).toBe(5);
    expect(result.score).toBe(2);
  });
});

describe('computeGroupingDistribution', () => {
  const company = (companyId: string, sector: string | null): WorkingCompany => ({
    companyId,
    companyName: companyId,
    fields: { companyId, sector },
    targets: [],
  });

  it('counts companies per group value', () => {
    const distribution = computeGroupingDistribution(
      [company('A', 'Steel'), company('B', 'Power'), company('C', 'Power')],
      ['sector']
    );

    expect(distribution.columns).toEqual(['sector']);
    expect(distribution.groups.map((group) => [group.group, group.companyCount])).toEqual([
      [{ sector: 'Power' }, 2],
      [{ sector: 'Steel' }, 1],
    ]);
    expect(distribution.groups[0].percentage).toBeCloseTo(66.667, 2);
    expect(distribution.groups[1].percentage).toBeCloseTo(33.333, 2);
  });

  it('returns no groups for an empty portfolio', () => {
    expect(computeGroupingDistribution([], ['sector']).groups).toEqual([]);
  });
});
