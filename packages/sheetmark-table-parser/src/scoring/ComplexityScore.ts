import type { FeatureDetails, FeatureName } from '../providers/types';
import { deepFreeze } from '../utils/freeze';
import type { FeatureVector } from './feature-vector';
import type { Dimension, ScoreBreakdown, WeightProfileId } from './weight-profiles';

export type ComplexityLevel = 'simple' | 'medium' | 'complex';

export type RenderFormat = 'markdown' | 'html';

export type OverrideReason = 'has_images' | 'has_styles' | 'has_rich_text';

export interface LevelThresholds {
  simpleMax: number;
  mediumMax: number;
}

export function classifyLevel(total: number, thresholds: LevelThresholds): ComplexityLevel {
  if (total <= thresholds.simpleMax) return 'simple';
  if (total <= thresholds.mediumMax) return 'medium';
  return 'complex';
}

export interface ComplexityScoreInit {
  total: number;
  breakdown: ScoreBreakdown;
  profile: WeightProfileId;
  weights: Partial<Record<Dimension, number>>;
  recommendedFormat: RenderFormat;
  overrideReason: OverrideReason | null;
  features: FeatureVector;
  thresholds: LevelThresholds;
  faults?: string[];
  suppressed?: FeatureName[];
  details?: FeatureDetails;
}

/**
 * Result of scoring one document, frozen on construction. The level is
 * derived from the total on read.
 */
export class ComplexityScore {
  readonly total: number;
  readonly breakdown: Readonly<ScoreBreakdown>;
  readonly profile: WeightProfileId;
  readonly weights: Readonly<Partial<Record<Dimension, number>>>;
  readonly recommendedFormat: RenderFormat;
  readonly overrideReason: OverrideReason | null;
  readonly features: Readonly<FeatureVector>;
  /** Messages of providers that failed and were treated as absent */
  readonly faults: readonly string[];
  /** Providers skipped because the load was degraded */
  readonly suppressed: readonly FeatureName[];
  readonly details: Readonly<FeatureDetails>;
  private readonly thresholds: LevelThresholds;

  constructor(init: ComplexityScoreInit) {
    this.total = init.total;
    this.breakdown = Object.freeze({ ...init.breakdown });
    this.profile = init.profile;
    this.weights = Object.freeze({ ...init.weights });
    this.recommendedFormat = init.recommendedFormat;
    this.overrideReason = init.overrideReason;
    this.features = Object.freeze({ ...init.features });
    this.faults = Object.freeze([...(init.faults ?? [])]);
    this.suppressed = Object.freeze([...(init.suppressed ?? [])]);
    this.details = deepFreeze(structuredClone(init.details ?? {}));
    this.thresholds = Object.freeze({ simpleMax: init.thresholds.simpleMax, mediumMax: init.thresholds.mediumMax });
    Object.freeze(this);
  }

  get level(): ComplexityLevel {
    return classifyLevel(this.total, this.thresholds);
  }

  toJSON() {
    return {
      total: this.total,
      level: this.level,
      profile: this.profile,
      recommendedFormat: this.recommendedFormat,
      overrideReason: this.overrideReason,
      breakdown: this.breakdown,
      weights: this.weights,
      features: this.features,
      faults: this.faults,
      suppressed: this.suppressed,
    };
  }
}
