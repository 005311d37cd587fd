import { FeatureVector } from './feature-vector';

export type Dimension = 'merge' | 'header' | 'formula' | 'richness' | 'pivot' | 'charts' | 'macro' | 'scale';

export const DIMENSIONS: readonly Dimension[] = ['merge', 'header', 'formula', 'richness', 'pivot', 'charts', 'macro', 'scale'];

export type ScoreBreakdown = Record<Dimension, number>;

export type WeightProfileId = 'base' | 'advanced';

export interface WeightProfile {
  id: WeightProfileId;
  /** Integer percentages; dimensions not listed weigh 0 */
  weights: Readonly<Partial<Record<Dimension, number>>>;
}

/** Structure-dominated weighting for documents without pivots, charts or macros */
export const BASE_PROFILE: WeightProfile = Object.freeze({
  id: 'base',
  weights: Object.freeze({ merge: 35, header: 25, formula: 15, richness: 15, scale: 10 }),
});

/** Every advanced dimension carries weight, so a small pivot or chart score still counts */
export const ADVANCED_PROFILE: WeightProfile = Object.freeze({
  id: 'advanced',
  weights: Object.freeze({ merge: 20, header: 10, formula: 15, richness: 10, pivot: 15, charts: 10, macro: 10, scale: 10 }),
});

export const WEIGHT_PROFILES: Readonly<Record<WeightProfileId, WeightProfile>> = Object.freeze({
  base: BASE_PROFILE,
  advanced: ADVANCED_PROFILE,
});

export function hasAdvancedFeatures(features: Pick<FeatureVector, 'pivotTableCount' | 'chartCount' | 'macroPresent'>): boolean {
  return features.pivotTableCount > 0 || features.chartCount > 0 || features.macroPresent;
}

export function selectProfile(features: Pick<FeatureVector, 'pivotTableCount' | 'chartCount' | 'macroPresent'>): WeightProfile {
  return hasAdvancedFeatures(features) ? ADVANCED_PROFILE : BASE_PROFILE;
}

export function weightSum(profile: WeightProfile): number {
  return DIMENSIONS.reduce((sum, dimension) => sum + (profile.weights[dimension] ?? 0), 0);
}

/** Σ subScore × weight / 100, rounded to two decimals */
export function combineScores(breakdown: ScoreBreakdown, profile: WeightProfile): number {
  const total = DIMENSIONS.reduce(
    (sum, dimension) => sum + breakdown[dimension] * (profile.weights[dimension] ?? 0),
    0
  ) / 100;
  return Math.round(total * 100) / 100;
}
