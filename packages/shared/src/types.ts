/**
 * Shared TypeScript Types
 *
 * Types for the facesheet extraction pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Tokens
// ============================================================================

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * One OCR-recognized text span. Tokens are never mutated once built.
 */
export interface Token {
  readonly text: string;
  readonly box: Readonly<BoundingBox>;
  readonly confidence: number;
}

/**
 * Dictionary-of-parallel-arrays shape produced by OCR engines
 * (Tesseract `image_to_data` / TSV). All arrays share one length and
 * index i of every array describes the same token.
 */
export interface OcrData {
  text: string[];
  left: number[];
  top: number[];
  width: number[];
  height: number[];
  conf: Array<number | string>;
}

// ============================================================================
// Field Configuration
// ============================================================================

export type FieldType = 'Plain' | 'Name';

export interface FieldSpec {
  label: string;
  maxHorizontalDistance: number;
  fieldType: FieldType;
}

/**
 * Row shape of the field configuration file (config/fields.json)
 */
export interface FieldConfigRow {
  label: string;
  max_horizontal_distance: number;
  field_type: string;
}

// ============================================================================
// Extraction Output
// ============================================================================

export interface ParsedName {
  first: string;
  middle: string;
  last: string;
}

export interface ExtractedField {
  label: string;
  value: string;
  /** Present only for Name fields */
  parsed?: ParsedName;
}

/**
 * How the label token is kept out of its own value:
 * - 'identity': only the label token itself (by stream index)
 * - 'text': every token whose text equals the label token's text
 */
export type SelfExclusionMode = 'identity' | 'text';

export interface PageInfo {
  page_id: string;
  image_path: string;
  token_count: number;
}

export interface ExtractionMetadata {
  algorithm_version: string;
  min_confidence: number;
  vertical_tolerance: number;
  self_exclusion: SelfExclusionMode;
  duration_ms: number;
}

export interface PageExtractionResult {
  schema_version: '1.0';
  correlation_id: string;
  page: PageInfo;
  fields: ExtractedField[];
  warnings: string[];
  extraction_metadata: ExtractionMetadata;
  created_at: string;
}

// ============================================================================
// API Types
// ============================================================================

export interface ExtractRequest {
  tokens?: Token[];
  ocr_data?: OcrData;
  /** Field configuration rows; validated by the field configuration loader */
  fields?: unknown[];
}

export interface ScanRequest {
  directory?: string;
  extensions?: string[];
  max_pages?: number;
}

export interface ScanResponse {
  correlation_id: string;
  enqueued: Array<{ page_id: string; image_path: string; job_id: string }>;
}

export type PageJobState =
  | 'waiting'
  | 'active'
  | 'completed'
  | 'failed'
  | 'delayed'
  | 'prioritized'
  | 'waiting-children'
  | 'unknown';

export interface PageStatusResponse {
  job_id: string;
  state: PageJobState;
  result?: PageExtractionResult;
  failed_reason?: string;
}

export interface ErrorEnvelope {
  error: {
    code: 'invalid_request' | 'not_found' | 'service_unavailable' | 'internal_error';
    message: string;
    correlation_id: string;
  };
}
