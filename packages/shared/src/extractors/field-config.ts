/**
 * Field Configuration
 *
 * Loads the ordered (label, max horizontal distance, field type) rows
 * that drive extraction. Structural problems are fatal here so they
 * never reach the core.
 */

import fs from 'fs';
import type { FieldConfigRow, FieldSpec, FieldType } from '../types';
import { isFieldConfig, validateFieldConfig } from '../schemas';
import { logger } from '../logger';
import { FieldConfigError } from './errors';

/**
 * Unrecognized field types fall back to Plain.
 */
export function parseFieldType(value: string): FieldType {
  return value === 'Name' ? 'Name' : 'Plain';
}

export function toFieldSpec(row: FieldConfigRow): FieldSpec {
  return {
    label: row.label,
    maxHorizontalDistance: row.max_horizontal_distance,
    fieldType: parseFieldType(row.field_type),
  };
}

export function toFieldConfigRow(spec: FieldSpec): FieldConfigRow {
  return {
    label: spec.label,
    max_horizontal_distance: spec.maxHorizontalDistance,
    field_type: spec.fieldType,
  };
}

/**
 * Validate raw configuration rows and map them to field specs.
 *
 * @throws FieldConfigError if the rows do not match field_config.schema.json
 */
export function parseFieldConfig(raw: unknown): FieldSpec[] {
  if (!isFieldConfig(raw)) {
    const { errors } = validateFieldConfig(raw);
    throw new FieldConfigError('Invalid field configuration', errors);
  }

  const unknownTypes = raw.filter(row => row.field_type !== 'Name' && row.field_type !== 'Plain');
  if (unknownTypes.length > 0) {
    logger.warn('Unrecognized field types treated as Plain', {
      labels: unknownTypes.map(row => row.label),
    });
  }

  return raw.map(toFieldSpec);
}

/**
 * Read and parse a JSON field configuration file.
 */
export function loadFieldConfig(filePath: string): FieldSpec[] {
  let raw: unknown;

  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new FieldConfigError(
      `Cannot read field configuration ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const specs = parseFieldConfig(raw);

  logger.info('Loaded field configuration', {
    path: filePath,
    field_count: specs.length,
    labels: specs.map(s => s.label),
  });

  return specs;
}
