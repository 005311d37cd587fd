/**
 * Complexity scoring engine.
 *
 * Extracts a feature vector from a loaded document (structure from the
 * grid, everything else from injected feature providers), maps each
 * dimension to a 0-100 sub-score, weights them with the base or advanced
 * profile and recommends an output format.
 */

import { ErrorFactory } from '@sheetmark/errors';
import { TabularDocument } from '../models/document.model';
import { defaultFeatureProviders } from '../providers';
import {
  FeatureCounts,
  FeatureDetails,
  FeatureFragment,
  FeatureName,
  FeatureProvider,
  FeatureProviders,
} from '../providers/types';
import { logger as rootLogger } from '../utils/logger';
import { ComplexityScore, OverrideReason, RenderFormat, classifyLevel } from './ComplexityScore';
import { FeatureVector, ZERO_COUNTS, mergeCounts, mergeDetails } from './feature-vector';
import { ScoringConfig, resolveScoringConfig } from './scoring-config';
import { analyzeStructure } from './structure';
import {
  formulaScore,
  headerScore,
  macroScore,
  mergeScore,
  richnessScore,
  scaleScore,
  steppedScore,
} from './sub-scores';
import { ScoreBreakdown, combineScores, hasAdvancedFeatures, selectProfile } from './weight-profiles';

const logger = rootLogger.child({ component: 'scorer' });

/** Consulted in this order */
const PROVIDER_ORDER: readonly FeatureName[] = [
  'images',
  'styles',
  'richText',
  'formulas',
  'pivotTables',
  'charts',
  'macros',
  'shapes',
];

/**
 * Only the full object model reads images and styles. Rich-text runs are
 * consulted whenever the loaded cells carry them.
 */
const STYLE_DEPENDENT: ReadonlySet<FeatureName> = new Set<FeatureName>(['images', 'styles']);

interface CollectedFeatures {
  counts: FeatureCounts;
  details: FeatureDetails;
  faults: string[];
  suppressed: FeatureName[];
}

export class ComplexityScorer {
  private readonly providers: FeatureProviders;
  private readonly config: ScoringConfig;

  constructor(providers?: FeatureProviders, config: Partial<ScoringConfig> = {}) {
    this.config = resolveScoringConfig(config);
    this.providers = providers ?? defaultFeatureProviders({ highlightRange: this.config.highlightRange });
  }

  score(document: TabularDocument): ComplexityScore {
    const config = this.config;
    const structure = analyzeStructure(document, config);
    const collected = this.collectFeatures(document);
    const counts = collected.counts;

    const breakdown: ScoreBreakdown = {
      merge: mergeScore(structure.mergeCount, structure.mergeAreaRatio, structure.hasComplexMerge, config),
      header: headerScore(structure.headerLevels, config),
      formula: formulaScore(counts.formulaCount, counts.hyperlinkCount, config),
      richness: richnessScore(counts, config),
      pivot: steppedScore(counts.pivotTableCount, config.pivotBase, config.pivotStep),
      charts: steppedScore(counts.chartCount, config.chartBase, config.chartStep),
      macro: macroScore(counts.macroPresent),
      scale: scaleScore(structure.maxCells, config),
    };

    const features: FeatureVector = {
      ...structure,
      ...counts,
      contentRichness: breakdown.richness,
      hasAdvancedFeatures: hasAdvancedFeatures(counts),
      hasHighContentRichness: breakdown.richness >= config.richnessOverrideThreshold,
    };

    const profile = selectProfile(counts);
    const total = combineScores(breakdown, profile);
    const { format, reason } = recommendFormat(total, features, config);

    const result = new ComplexityScore({
      total,
      breakdown,
      profile: profile.id,
      weights: profile.weights,
      recommendedFormat: format,
      overrideReason: reason,
      features,
      thresholds: config,
      faults: collected.faults,
      suppressed: collected.suppressed,
      details: collected.details,
    });

    logger.debug('Sub-scores', { breakdown });
    logger.info('Scored document', {
      total,
      level: result.level,
      profile: profile.id,
      recommendedFormat: format,
      overrideReason: reason,
    });

    return result;
  }

  private collectFeatures(document: TabularDocument): CollectedFeatures {
    const collected: CollectedFeatures = { counts: { ...ZERO_COUNTS }, details: {}, faults: [], suppressed: [] };
    const degraded = document.load.fidelity === 'degraded';

    for (const name of PROVIDER_ORDER) {
      const provider = this.providers[name];
      if (!provider) continue;

      if (degraded && STYLE_DEPENDENT.has(name)) {
        collected.suppressed.push(name);
        continue;
      }

      const views: Array<{ view: TabularDocument; sheet?: string }> =
        provider.scope === 'sheet'
          ? document.sheets.map((sheet) => ({ view: { ...document, sheets: [sheet] }, sheet: sheet.name }))
          : [{ view: document }];

      for (const { view, sheet } of views) {
        const fragment = this.runProvider(provider, view, collected, sheet);
        collected.counts = mergeCounts(collected.counts, fragment.counts);
        collected.details = mergeDetails(collected.details, fragment.details);
      }
    }

    return collected;
  }

  private runProvider(
    provider: FeatureProvider,
    document: TabularDocument,
    collected: CollectedFeatures,
    sheet?: string
  ): FeatureFragment {
    try {
      return provider.extract(document);
    } catch (error) {
      const fault = ErrorFactory.featureFault(provider.name, error, sheet);
      collected.faults.push(fault.message);
      logger.debug('Feature provider failed; treating feature as absent', {
        provider: provider.name,
        sheet,
        errorId: fault.errorId,
      });
      return { counts: {} };
    }
  }
}

/**
 * Level-based recommendation, upgraded to HTML when content richness
 * reaches the override threshold. The override never downgrades.
 */
export function recommendFormat(
  total: number,
  features: Pick<FeatureVector, 'contentRichness' | 'imageCount' | 'styledCellCount' | 'richTextRunCount'>,
  config: Pick<ScoringConfig, 'simpleMax' | 'mediumMax' | 'richnessOverrideThreshold'>
): { format: RenderFormat; reason: OverrideReason | null } {
  const level = classifyLevel(total, config);
  const format: RenderFormat = level === 'complex' ? 'html' : 'markdown';

  if (features.contentRichness < config.richnessOverrideThreshold) {
    return { format, reason: null };
  }

  const reason: OverrideReason | null =
    features.imageCount > 0 ? 'has_images'
      : features.styledCellCount > 0 ? 'has_styles'
        : features.richTextRunCount > 0 ? 'has_rich_text'
          : null;

  return { format: 'html', reason };
}

/**
 * Score with the given providers (default: the standard set)
 */
export function score(
  document: TabularDocument,
  providers?: FeatureProviders,
  config?: Partial<ScoringConfig>
): ComplexityScore {
  return new ComplexityScorer(providers, config).score(document);
}
