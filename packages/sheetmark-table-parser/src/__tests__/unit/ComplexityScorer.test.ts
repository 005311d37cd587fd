/**
 * ComplexityScorer Unit Tests
 *
 * Tests cover:
 * - Level classification and the level-based format
 * - Content-richness override to HTML
 * - Profile switch on advanced features
 * - Provider faults and degraded-load suppression
 */

import { Sheet, textCell } from '../../models/document.model';
import { SheetBuilder } from '../../models/sheet-builder';
import { FeatureProviders, formulaProvider } from '../../providers';
import { classifyLevel } from '../../scoring/ComplexityScore';
import { ComplexityScorer, recommendFormat, score } from '../../scoring/ComplexityScorer';
import { DEFAULT_SCORING_CONFIG } from '../../scoring/scoring-config';
import { headerLevels } from '../../scoring/structure';
import { ADVANCED_PROFILE } from '../../scoring/weight-profiles';
import { buildDocument, buildSheet, region, samplePNG } from '../utils/fixtures';

const smallTable = () => buildSheet('Sheet1', [['a', 'b'], [1, 2]]);

const pictureSheet = () =>
  new SheetBuilder('Pics').setCell(0, 0, textCell('a')).addImage({ extension: 'png', data: samplePNG }).build();

describe('ComplexityScorer', () => {
  it('scores a plain table as simple Markdown', () => {
    const result = score(buildDocument([smallTable()]));

    expect(result.total).toBe(0);
    expect(result.level).toBe('simple');
    expect(result.profile).toBe('base');
    expect(result.recommendedFormat).toBe('markdown');
    expect(result.overrideReason).toBeNull();
    expect(result.breakdown.merge).toBe(0);
    expect(result.breakdown.header).toBe(0);
    expect(result.features.headerLevels).toBe(1);
    expect(result.faults).toEqual([]);
  });

  it('forces HTML for rich content even when the level says Markdown', () => {
    const result = score(buildDocument([pictureSheet()]));

    expect(result.breakdown.richness).toBe(40);
    expect(result.level).toBe('simple');
    expect(result.recommendedFormat).toBe('html');
    expect(result.overrideReason).toBe('has_images');
    expect(result.features.hasHighContentRichness).toBe(true);
    expect(result.details.images).toEqual([{ sheet: 'Pics', index: 1, extension: 'png', anchor: undefined }]);
  });

  it('names styles as the override reason when there are no images', () => {
    const sheet = buildSheet('Marked', [['h'], ['a']], [], [[1, 0, { backgroundColor: '#FFFF00' }]]);
    const result = score(buildDocument([sheet]));

    expect(result.recommendedFormat).toBe('html');
    expect(result.overrideReason).toBe('has_styles');
    expect(result.details.highlightedCells).toEqual(['Marked!A2']);
  });

  it('suppresses style-dependent providers for degraded loads', () => {
    const result = score(buildDocument([pictureSheet()], { engine: 'sheetjs', fidelity: 'degraded' }));

    expect(result.suppressed).toEqual(['images', 'styles']);
    expect(result.features.imageCount).toBe(0);
    expect(result.breakdown.richness).toBe(0);
    expect(result.recommendedFormat).toBe('markdown');
    expect(result.overrideReason).toBeNull();
  });

  it('still upgrades degraded loads that carry script runs', () => {
    const water = new SheetBuilder('Lab')
      .setCell(0, 0, {
        value: { kind: 'text', text: 'H2O' },
        richText: [
          { text: 'H', script: 'normal' },
          { text: '2', script: 'subscript' },
          { text: 'O', script: 'normal' },
        ],
      })
      .build();

    const result = score(buildDocument([water], { engine: 'ooxml', fidelity: 'degraded' }));

    expect(result.suppressed).toEqual(['images', 'styles']);
    expect(result.features.richTextRunCount).toBe(1);
    expect(result.breakdown.richness).toBe(40);
    expect(result.recommendedFormat).toBe('html');
    expect(result.overrideReason).toBe('has_rich_text');
  });

  it('classifies deep merged headers with many formulas as complex', () => {
    const sheet = buildSheet(
      'Report',
      [
        ['Annual', null, null],
        ['A', 'B', 'C'],
        ['D', 'E', 'F'],
        ['G', 'H', 'I'],
        ['x', 1, 2],
      ],
      [region(0, 0, 0, 2)]
    );
    const providers: FeatureProviders = {
      formulas: { name: 'formulas', extract: () => ({ counts: { formulaCount: 30 } }) },
    };

    const result = new ComplexityScorer(providers).score(buildDocument([sheet]));

    expect(result.breakdown).toMatchObject({ merge: 80, header: 100, formula: 75, richness: 0 });
    expect(result.breakdown.scale).toBeCloseTo(0.15);
    expect(result.total).toBeCloseTo(64.27, 1);
    expect(result.level).toBe('complex');
    expect(result.recommendedFormat).toBe('html');
    expect(result.overrideReason).toBeNull();
  });

  it('switches to the advanced profile when a pivot table is present', () => {
    const providers: FeatureProviders = {
      pivotTables: { name: 'pivotTables', extract: () => ({ counts: { pivotTableCount: 1 } }) },
    };

    const result = new ComplexityScorer(providers).score(buildDocument([smallTable()]));

    expect(result.profile).toBe('advanced');
    expect(result.weights).toEqual(ADVANCED_PROFILE.weights);
    expect(result.breakdown.pivot).toBe(70);
    expect(result.total).toBe(10.5);
    expect(result.features.hasAdvancedFeatures).toBe(true);
  });

  it('records a failing provider as a fault and treats the feature as absent', () => {
    const providers: FeatureProviders = {
      charts: {
        name: 'charts',
        extract: () => {
          throw new Error('boom');
        },
      },
    };

    const result = new ComplexityScorer(providers).score(buildDocument([smallTable()]));

    expect(result.faults).toEqual(['Feature provider "charts" failed: boom']);
    expect(result.features.chartCount).toBe(0);
    expect(result.profile).toBe('base');
  });

  it('isolates a failing sheet-scoped provider to the sheet that tripped it', () => {
    const formulaSheet = (name: string, formula: string): Sheet =>
      new SheetBuilder(name).setCell(0, 0, { value: { kind: 'formula', formula } }).build();
    const providers: FeatureProviders = {
      formulas: {
        name: 'formulas',
        scope: 'sheet',
        extract: (document) => {
          if (document.sheets.some((sheet) => sheet.name === 'Broken')) {
            throw new Error('unreadable token');
          }
          return formulaProvider.extract(document);
        },
      },
    };

    const result = new ComplexityScorer(providers).score(
      buildDocument([formulaSheet('Costs', 'SUM(A2:A9)'), formulaSheet('Broken', 'A1'), formulaSheet('Rates', 'B1/C1*100')])
    );

    expect(result.faults).toEqual(['Feature provider "formulas" failed on sheet "Broken": unreadable token']);
    expect(result.features.formulaCount).toBe(2);
    expect(result.details.formulas?.total).toBe(2);
    expect(result.details.formulas?.samples.map((sample) => sample.address)).toEqual(['Costs!A1', 'Rates!A1']);
  });

  it('freezes details deeply and keeps them apart from the provider output', () => {
    const result = score(buildDocument([pictureSheet()]));

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.details.images)).toBe(true);
    expect(Object.isFrozen(result.details.images?.[0])).toBe(true);
  });

  it('derives the level from the total on read and serialises it', () => {
    const result = score(buildDocument([smallTable()]));
    expect(result.toJSON()).toMatchObject({ total: 0, level: 'simple', recommendedFormat: 'markdown' });
    expect(Object.isFrozen(result.breakdown)).toBe(true);
  });

  it('accepts configuration overrides', () => {
    const result = new ComplexityScorer(undefined, { simpleMax: -1, mediumMax: -1 }).score(buildDocument([smallTable()]));
    expect(result.level).toBe('complex');
    expect(result.recommendedFormat).toBe('html');
  });
});

describe('recommendFormat', () => {
  const features = { contentRichness: 0, imageCount: 0, styledCellCount: 0, richTextRunCount: 0 };

  it('follows the level below the richness threshold', () => {
    expect(recommendFormat(30, features, DEFAULT_SCORING_CONFIG)).toEqual({ format: 'markdown', reason: null });
    expect(recommendFormat(60, features, DEFAULT_SCORING_CONFIG)).toEqual({ format: 'markdown', reason: null });
    expect(recommendFormat(60.01, features, DEFAULT_SCORING_CONFIG)).toEqual({ format: 'html', reason: null });
  });

  it('upgrades to HTML and names the first rich feature', () => {
    const rich = { ...features, contentRichness: 40, styledCellCount: 3, richTextRunCount: 1 };
    expect(recommendFormat(10, rich, DEFAULT_SCORING_CONFIG)).toEqual({ format: 'html', reason: 'has_styles' });
    expect(recommendFormat(10, { ...rich, imageCount: 1 }, DEFAULT_SCORING_CONFIG)).toEqual({
      format: 'html',
      reason: 'has_images',
    });
    expect(recommendFormat(10, { ...features, contentRichness: 40, richTextRunCount: 2 }, DEFAULT_SCORING_CONFIG)).toEqual({
      format: 'html',
      reason: 'has_rich_text',
    });
  });

  it('never downgrades a complex document', () => {
    expect(recommendFormat(90, { ...features, contentRichness: 80, imageCount: 1 }, DEFAULT_SCORING_CONFIG).format).toBe('html');
  });
});

describe('classifyLevel', () => {
  it('uses inclusive upper bounds', () => {
    const thresholds = { simpleMax: 30, mediumMax: 60 };
    expect([0, 30, 30.01, 60, 60.01, 100].map((t) => classifyLevel(t, thresholds))).toEqual([
      'simple',
      'simple',
      'medium',
      'medium',
      'complex',
      'complex',
    ]);
  });
});

describe('headerLevels', () => {
  const headerConfig = { headerScanRows: 5, headerTextRatio: 1 };

  it('is one without merges near the top', () => {
    expect(headerLevels(buildSheet('Flat', [['a', 'b'], ['c', 'd'], [1, 2]]), headerConfig)).toBe(1);
  });

  it('is the depth of the deepest merge in the band', () => {
    const sheet = buildSheet('Deep', [['Group', 'x'], [null, 1], [null, 2], [3, 4]], [region(0, 0, 2, 0)]);
    expect(headerLevels(sheet, headerConfig)).toBe(3);
  });

  it('counts populated text rows under a merged title', () => {
    const sheet = buildSheet('Titled', [['Title', null], ['a', 'b'], ['c', 'd'], [1, 2]], [region(0, 0, 0, 1)]);
    expect(headerLevels(sheet, headerConfig)).toBe(3);
  });

  it('is zero for an empty sheet', () => {
    expect(headerLevels(buildSheet('Empty', []), headerConfig)).toBe(0);
  });
});
