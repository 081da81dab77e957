/**
 * Facesheet Extraction Module
 *
 * token stream -> locate label -> associate value -> decompose name
 */

export type { TokenSource } from './types';

export { TokenDataError, FieldConfigError, OcrError } from './errors';

export { tokensFromOcrData, tokensToOcrData, createToken, parseConfidence } from './tokens';

export { locateLabel, type LocatedLabel } from './locator';

export {
  associateValue,
  selectCandidates,
  DEFAULT_MIN_CONFIDENCE,
  DEFAULT_VERTICAL_TOLERANCE,
  type AssociationOptions,
} from './associator';

export { decomposeName } from './name-decomposer';

export {
  extractField,
  extractFieldOutcome,
  extractAllFields,
  type FieldStatus,
  type FieldOutcome,
} from './field-extractor';

export {
  FacesheetExtractor,
  buildPageResult,
  ALGORITHM_VERSION,
  type FacesheetExtractorResult,
} from './facesheet-extractor';

export {
  parseFieldType,
  parseFieldConfig,
  loadFieldConfig,
  toFieldSpec,
  toFieldConfigRow,
} from './field-config';
