/**
 * Dimension sub-score functions. Each maps a raw signal onto 0..100,
 * never decreases as the signal grows, and saturates at 100.
 */

import { ScoringConfig } from './scoring-config';

const clamp = (value: number): number => Math.min(100, Math.max(0, value));

export function mergeScore(
  mergeCount: number,
  areaRatio: number,
  hasComplexMerge: boolean,
  config: Pick<ScoringConfig, 'mergeRatioSteps' | 'mergeRatioMaxScore' | 'complexMergeBonus'>
): number {
  if (mergeCount <= 0) return 0;
  const step = config.mergeRatioSteps.find((s) => areaRatio < s.below);
  const base = step ? step.score : config.mergeRatioMaxScore;
  return clamp(base + (hasComplexMerge ? config.complexMergeBonus : 0));
}

export function headerScore(levels: number, config: Pick<ScoringConfig, 'headerLevelScores'>): number {
  const table = config.headerLevelScores;
  if (table.length === 0 || levels <= 0) return 0;
  return clamp(table[Math.min(Math.floor(levels), table.length - 1)]);
}

/** 100·n / (n + half): 0 at 0, 50 at `half`, approaching 100 */
export function saturate(count: number, half: number): number {
  if (count <= 0) return 0;
  return clamp((100 * count) / (count + Math.max(half, Number.EPSILON)));
}

export function formulaScore(formulaCount: number, hyperlinkCount: number, config: Pick<ScoringConfig, 'formulaHalfSaturation'>): number {
  return saturate(formulaCount + hyperlinkCount, config.formulaHalfSaturation);
}

export function richnessScore(
  counts: { imageCount: number; styledCellCount: number; richTextRunCount: number },
  config: Pick<ScoringConfig, 'richnessBase' | 'richnessPerExtraItem' | 'richnessExtraCap'>
): number {
  const kind = (n: number) =>
    n > 0 ? config.richnessBase + Math.min(config.richnessExtraCap, config.richnessPerExtraItem * (n - 1)) : 0;
  return clamp(kind(counts.imageCount) + kind(counts.styledCellCount) + kind(counts.richTextRunCount));
}

/** First item scores `base`, each further item adds `step` */
export function steppedScore(count: number, base: number, step: number): number {
  if (count <= 0) return 0;
  return clamp(base + step * (count - 1));
}

export function macroScore(present: boolean): number {
  return present ? 100 : 0;
}

export function scaleScore(cells: number, config: Pick<ScoringConfig, 'scaleCeiling'>): number {
  if (cells <= 0) return 0;
  return clamp((100 * cells) / config.scaleCeiling);
}
