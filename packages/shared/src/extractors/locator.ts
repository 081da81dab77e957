/**
 * Field Locator
 *
 * Finds the token that carries a field's label on a page.
 */

import type { Token } from '../types';

export interface LocatedLabel {
  token: Token;
  /** Position of the label token in the input stream */
  index: number;
}

/**
 * Return the first token, in stream order, whose text starts with `label`
 * (case-insensitive). `null` means the field is not on this page.
 *
 * The stream is scanned as given; it is never sorted.
 */
export function locateLabel(label: string, tokens: readonly Token[]): LocatedLabel | null {
  const prefix = label.toLowerCase();

  for (let index = 0; index < tokens.length; index++) {
    const token = tokens[index];
    if (token.text.toLowerCase().startsWith(prefix)) {
      return { token, index };
    }
  }

  return null;
}
