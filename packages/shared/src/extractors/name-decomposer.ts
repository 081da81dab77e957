/**
 * Name Decomposer
 *
 * Splits a free-text name into first / middle / last.
 *
 * Comma notation ("Last, First Middle"):
 * - 2 words after the comma -> first, middle
 * - 1 word -> first
 * - anything else -> the text before the comma becomes first, last stays empty
 *
 * Space notation ("First Middle Last"):
 * - 3 words -> first, middle, last
 * - 2 words -> first, middle
 * - 1 word -> first
 * - 0 or 4+ words -> all empty
 */

import type { ParsedName } from '../types';

function splitWords(text: string): string[] {
  const trimmed = text.trim();
  return trimmed === '' ? [] : trimmed.split(/\s+/);
}

export function decomposeName(text: string): ParsedName {
  let first = '';
  let middle = '';
  let last = '';

  const commaIndex = text.indexOf(',');

  if (commaIndex !== -1) {
    const beforeComma = text.slice(0, commaIndex);
    const parts = splitWords(text.slice(commaIndex + 1));
    last = beforeComma;

    if (parts.length === 2) {
      [first, middle] = parts;
    } else if (parts.length === 1) {
      [first] = parts;
    } else {
      first = beforeComma;
      last = '';
    }
  } else {
    const parts = splitWords(text);

    if (parts.length === 3) {
      [first, middle, last] = parts;
    } else if (parts.length === 2) {
      [first, middle] = parts;
    } else if (parts.length === 1) {
      [first] = parts;
    }
  }

  return { first: first.trim(), middle: middle.trim(), last: last.trim() };
}
