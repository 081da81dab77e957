/**
 * Facesheet Extractor
 *
 * Page-level wrapper around the extraction driver: timing, warnings for
 * labels that are absent, logging, and the page result envelope.
 */

import type {
  ExtractedField,
  FieldSpec,
  PageExtractionResult,
  PageInfo,
  SelfExclusionMode,
  Token,
} from '../types';
import {
  DEFAULT_MIN_CONFIDENCE,
  DEFAULT_VERTICAL_TOLERANCE,
  type AssociationOptions,
} from './associator';
import { extractFieldOutcome, type FieldOutcome } from './field-extractor';
import { logger } from '../logger';

export const ALGORITHM_VERSION = '1.0.0';

export interface FacesheetExtractorResult {
  fields: ExtractedField[];
  outcomes: FieldOutcome[];
  warnings: string[];
  metadata: {
    algorithmVersion: string;
    minConfidence: number;
    verticalTolerance: number;
    selfExclusion: SelfExclusionMode;
    durationMs: number;
  };
}

export class FacesheetExtractor {
  readonly fieldSpecs: readonly FieldSpec[];
  private readonly options: Required<AssociationOptions>;

  constructor(fieldSpecs: readonly FieldSpec[], options: AssociationOptions = {}) {
    this.fieldSpecs = fieldSpecs;
    this.options = {
      minConfidence: options.minConfidence ?? DEFAULT_MIN_CONFIDENCE,
      verticalTolerance: options.verticalTolerance ?? DEFAULT_VERTICAL_TOLERANCE,
      selfExclusion: options.selfExclusion ?? 'identity',
    };
  }

  extract(tokens: readonly Token[]): FacesheetExtractorResult {
    const startTime = Date.now();

    logger.debug('Starting field extraction', {
      token_count: tokens.length,
      field_count: this.fieldSpecs.length,
    });

    const outcomes = this.fieldSpecs.map(spec => extractFieldOutcome(spec, tokens, this.options));
    const warnings = outcomes
      .filter(o => o.status === 'missing')
      .map(o => `Label "${o.field.label}" not found on page`);

    const durationMs = Date.now() - startTime;

    logger.info('Field extraction complete', {
      token_count: tokens.length,
      found: outcomes.filter(o => o.status === 'found').length,
      empty: outcomes.filter(o => o.status === 'empty').length,
      missing: warnings.length,
      duration_ms: durationMs,
    });

    return {
      fields: outcomes.map(o => o.field),
      outcomes,
      warnings,
      metadata: {
        algorithmVersion: ALGORITHM_VERSION,
        minConfidence: this.options.minConfidence,
        verticalTolerance: this.options.verticalTolerance,
        selfExclusion: this.options.selfExclusion,
        durationMs,
      },
    };
  }
}

/**
 * Build the page result envelope from extractor output
 */
export function buildPageResult(
  extractorResult: FacesheetExtractorResult,
  page: PageInfo,
  correlationId: string
): PageExtractionResult {
  return {
    schema_version: '1.0',
    correlation_id: correlationId,
    page,
    fields: extractorResult.fields,
    warnings: extractorResult.warnings,
    extraction_metadata: {
      algorithm_version: extractorResult.metadata.algorithmVersion,
      min_confidence: extractorResult.metadata.minConfidence,
      vertical_tolerance: extractorResult.metadata.verticalTolerance,
      self_exclusion: extractorResult.metadata.selfExclusion,
      duration_ms: extractorResult.metadata.durationMs,
    },
    created_at: new Date().toISOString(),
  };
}
