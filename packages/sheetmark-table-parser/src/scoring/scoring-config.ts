import { DEFAULT_HIGHLIGHT_RANGE, HighlightRange } from '../utils/color';

/**
 * Tunable constants of the scoring engine. Heuristic values; callers may
 * override any subset.
 */
export interface ScoringConfig {
  /** Merge sub-score by merged-area ratio: first step whose `below` exceeds the ratio */
  mergeRatioSteps: ReadonlyArray<{ below: number; score: number }>;
  /** Merge sub-score when the ratio passes every step */
  mergeRatioMaxScore: number;
  /** Added when a region spans several rows and several columns */
  complexMergeBonus: number;

  /** Rows from the top inspected for header structure */
  headerScanRows: number;
  /** Minimum share of text among a header row's values */
  headerTextRatio: number;
  /** Sub-score indexed by header level count; the last entry covers deeper headers */
  headerLevelScores: ReadonlyArray<number>;

  /** Formula + hyperlink count at which the sub-score reaches 50 */
  formulaHalfSaturation: number;

  /** Contribution of each present richness kind (images, styled cells, script runs) */
  richnessBase: number;
  richnessPerExtraItem: number;
  richnessExtraCap: number;
  /** Richness sub-score that forces HTML */
  richnessOverrideThreshold: number;

  pivotBase: number;
  pivotStep: number;
  chartBase: number;
  chartStep: number;

  /** rows x cols of the largest sheet that scores 100 */
  scaleCeiling: number;

  /** Totals up to these bounds classify as simple / medium */
  simpleMax: number;
  mediumMax: number;

  highlightRange: HighlightRange;
}

export const DEFAULT_SCORING_CONFIG: Readonly<ScoringConfig> = Object.freeze({
  mergeRatioSteps: [
    { below: 0.05, score: 20 },
    { below: 0.15, score: 50 },
  ],
  mergeRatioMaxScore: 80,
  complexMergeBonus: 20,
  headerScanRows: 5,
  headerTextRatio: 1,
  headerLevelScores: [0, 0, 30, 60, 100],
  formulaHalfSaturation: 10,
  richnessBase: 40,
  richnessPerExtraItem: 2,
  richnessExtraCap: 20,
  richnessOverrideThreshold: 40,
  pivotBase: 70,
  pivotStep: 15,
  chartBase: 50,
  chartStep: 25,
  scaleCeiling: 10000,
  simpleMax: 30,
  mediumMax: 60,
  highlightRange: DEFAULT_HIGHLIGHT_RANGE,
});

export function resolveScoringConfig(overrides: Partial<ScoringConfig> = {}): ScoringConfig {
  return { ...DEFAULT_SCORING_CONFIG, ...overrides };
}
