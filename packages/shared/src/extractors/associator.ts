/**
 * Value Associator
 *
 * Collects the tokens that make up a label's value: same text line,
 * to the right of the label, within the field's horizontal band.
 */

import type { SelfExclusionMode, Token } from '../types';
import type { LocatedLabel } from './locator';

export const DEFAULT_MIN_CONFIDENCE = 10;
export const DEFAULT_VERTICAL_TOLERANCE = 10;

export interface AssociationOptions {
  /** Candidates below this OCR confidence are ignored (default 10) */
  minConfidence?: number;
  /** Maximum vertical offset, exclusive, for a token on the label's line (default 10) */
  verticalTolerance?: number;
  /** How the label token is excluded from its own value (default 'identity') */
  selfExclusion?: SelfExclusionMode;
}

/**
 * Select the candidate tokens for a label, ordered left to right.
 */
export function selectCandidates(
  label: LocatedLabel,
  tokens: readonly Token[],
  maxHorizontalDistance: number,
  options: AssociationOptions = {}
): Token[] {
  const minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
  const verticalTolerance = options.verticalTolerance ?? DEFAULT_VERTICAL_TOLERANCE;
  const selfExclusion = options.selfExclusion ?? 'identity';
  const labelBox = label.token.box;

  const candidates: Array<{ token: Token; index: number }> = [];

  tokens.forEach((token, index) => {
    if (token.confidence < minConfidence) return;

    if (selfExclusion === 'identity' ? index === label.index : token.text === label.token.text) {
      return;
    }

    // A colon marks another label
    if (token.text.includes(':')) return;

    if (Math.abs(token.box.y - labelBox.y) >= verticalTolerance) return;

    const dx = token.box.x - labelBox.x;
    if (dx <= 0 || dx >= maxHorizontalDistance) return;

    candidates.push({ token, index });
  });

  // Equal x keeps stream order
  candidates.sort((a, b) => a.token.box.x - b.token.box.x || a.index - b.index);

  return candidates.map(c => c.token);
}

/**
 * Assemble a label's value: candidate texts joined by single spaces,
 * or '' when nothing qualifies.
 */
export function associateValue(
  label: LocatedLabel,
  tokens: readonly Token[],
  maxHorizontalDistance: number,
  options: AssociationOptions = {}
): string {
  return selectCandidates(label, tokens, maxHorizontalDistance, options)
    .map(token => token.text)
    .join(' ');
}
