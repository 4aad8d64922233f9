// Emissions scope a target or score applies to
export const ScopeCategory = {
  S1S2: 's1s2',
  S3: 's3',
  S1S2S3: 's1s2s3',
} as const;
export type ScopeCategory = (typeof ScopeCategory)[keyof typeof ScopeCategory];

// Target horizon
export const TimeFrame = {
  SHORT: 'short',
  MID: 'mid',
  LONG: 'long',
} as const;
export type TimeFrame = (typeof TimeFrame)[keyof typeof TimeFrame];

// Canonical iteration order for scores and aggregates
export const SCOPE_ORDER: readonly ScopeCategory[] = [
  ScopeCategory.S1S2,
  ScopeCategory.S3,
  ScopeCategory.S1S2S3,
];
export const TIME_FRAME_ORDER: readonly TimeFrame[] = [
  TimeFrame.SHORT,
  TimeFrame.MID,
  TimeFrame.LONG,
];

// External validation status of a reduction target
export const TargetStatus = {
  VALIDATED: 'validated',
  UNVALIDATED: 'unvalidated',
  EXPIRED: 'expired',
} as const;
export type TargetStatus = (typeof TargetStatus)[keyof typeof TargetStatus];

/**
 * Portfolio weighting schemes.
 *
 * EQUAL weighs every company the same, WATS by investment value, TETS by the
 * company's emissions. The *OTS methods weigh by owned emissions, i.e.
 * investment divided by a financial denominator (market cap, enterprise value,
 * EV plus cash, total assets, revenue) times emissions.
 */
export const AggregationMethod = {
  EQUAL: 'EQUAL',
  WATS: 'WATS',
  TETS: 'TETS',
  MOTS: 'MOTS',
  EOTS: 'EOTS',
  ECOTS: 'ECOTS',
  AOTS: 'AOTS',
  ROTS: 'ROTS',
} as const;
export type AggregationMethod = (typeof AggregationMethod)[keyof typeof AggregationMethod];

// Data provider implementations known to the registry
export const ProviderType = {
  INLINE: 'inline',
  CSV: 'csv',
  S3: 's3',
} as const;
export type ProviderType = (typeof ProviderType)[keyof typeof ProviderType];

// What-if transformations applied to targets before scoring
export const ScenarioType = {
  SHIFT_TARGET_YEAR: 'SHIFT_TARGET_YEAR',
  SCALE_AMBITION: 'SCALE_AMBITION',
  MINIMUM_AMBITION: 'MINIMUM_AMBITION',
} as const;
export type ScenarioType = (typeof ScenarioType)[keyof typeof ScenarioType];
