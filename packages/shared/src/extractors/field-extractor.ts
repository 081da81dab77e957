/**
 * Field Extraction Driver
 *
 * Runs locator + associator for every configured field, in configuration
 * order, and decomposes Name fields. Fields never share state: the same
 * token may end up in more than one value.
 */

import type { ExtractedField, FieldSpec, Token } from '../types';
import { locateLabel } from './locator';
import { associateValue, type AssociationOptions } from './associator';
import { decomposeName } from './name-decomposer';

/**
 * - 'found': label located and a value assembled
 * - 'empty': label located but no candidate qualified
 * - 'missing': label not on the page
 */
export type FieldStatus = 'found' | 'empty' | 'missing';

export interface FieldOutcome {
  field: ExtractedField;
  status: FieldStatus;
}

function buildField(spec: FieldSpec, value: string): ExtractedField {
  if (spec.fieldType === 'Name') {
    return { label: spec.label, value, parsed: decomposeName(value) };
  }
  return { label: spec.label, value };
}

/**
 * Extract one field and report whether its label was found.
 */
export function extractFieldOutcome(
  spec: FieldSpec,
  tokens: readonly Token[],
  options: AssociationOptions = {}
): FieldOutcome {
  const label = locateLabel(spec.label, tokens);
  if (!label) {
    return { field: buildField(spec, ''), status: 'missing' };
  }

  const value = associateValue(label, tokens, spec.maxHorizontalDistance, options);
  return { field: buildField(spec, value), status: value === '' ? 'empty' : 'found' };
}

export function extractField(
  spec: FieldSpec,
  tokens: readonly Token[],
  options: AssociationOptions = {}
): ExtractedField {
  return extractFieldOutcome(spec, tokens, options).field;
}

/**
 * Extract every configured field. Output order follows `specs`.
 */
export function extractAllFields(
  tokens: readonly Token[],
  specs: readonly FieldSpec[],
  options: AssociationOptions = {}
): ExtractedField[] {
  return specs.map(spec => extractField(spec, tokens, options));
}
