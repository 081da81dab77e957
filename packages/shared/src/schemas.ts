/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for field configuration and page results.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { ExtractRequest, FieldConfigRow, PageExtractionResult } from './types';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

const FIELD_CONFIG_SCHEMA = 'field_config.schema.json';
const PAGE_RESULT_SCHEMA = 'page_extraction_result.schema.json';
const EXTRACT_REQUEST_SCHEMA = 'extract_request.schema.json';

const schemaCache = new Map<string, object>();
let fieldConfigValidator: ValidateFunction<FieldConfigRow[]> | null = null;
let pageResultValidator: ValidateFunction<PageExtractionResult> | null = null;
let extractRequestValidator: ValidateFunction<ExtractRequest> | null = null;

function loadSchema(schemaName: string): object {
  const cached = schemaCache.get(schemaName);
  if (cached) return cached;

  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output (dist/packages/shared/src)
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to working directory
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const schema: object = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
      schemaCache.set(schemaName, schema);
      return schema;
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

function getFieldConfigValidator(): ValidateFunction<FieldConfigRow[]> {
  if (!fieldConfigValidator) {
    fieldConfigValidator = ajv.compile<FieldConfigRow[]>(loadSchema(FIELD_CONFIG_SCHEMA));
  }
  return fieldConfigValidator;
}

function getPageResultValidator(): ValidateFunction<PageExtractionResult> {
  if (!pageResultValidator) {
    pageResultValidator = ajv.compile<PageExtractionResult>(loadSchema(PAGE_RESULT_SCHEMA));
  }
  return pageResultValidator;
}

function getExtractRequestValidator(): ValidateFunction<ExtractRequest> {
  if (!extractRequestValidator) {
    extractRequestValidator = ajv.compile<ExtractRequest>(loadSchema(EXTRACT_REQUEST_SCHEMA));
  }
  return extractRequestValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(e => `${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Type guard for field configuration rows (field_config.schema.json)
 */
export function isFieldConfig(data: unknown): data is FieldConfigRow[] {
  return getFieldConfigValidator()(data);
}

/**
 * Validate field configuration rows against field_config.schema.json
 */
export function validateFieldConfig(data: unknown): ValidationResult {
  const validate = getFieldConfigValidator();

  if (!validate(data)) {
    const errors = formatErrors(validate.errors);
    logger.warn('Field configuration validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate a PageExtractionResult against page_extraction_result.schema.json
 */
export function validatePageResult(data: unknown): ValidationResult {
  const validate = getPageResultValidator();

  if (!validate(data)) {
    const errors = formatErrors(validate.errors);
    logger.warn('PageExtractionResult validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate a POST /extract body. Field rows are checked separately by
 * the field configuration loader.
 */
export function validateExtractRequest(
  data: unknown
): { valid: true; request: ExtractRequest } | { valid: false; errors: string[] } {
  const validate = getExtractRequestValidator();

  if (!validate(data)) {
    return { valid: false, errors: formatErrors(validate.errors) };
  }

  return { valid: true, request: data };
}
