/**
 * Token Model
 *
 * Converts the OCR engine's dictionary of parallel arrays into one record
 * per token, and back again for tools that index by column name.
 */

import type { OcrData, Token } from '../types';
import { TokenDataError } from './errors';

const OCR_COLUMNS = ['text', 'left', 'top', 'width', 'height', 'conf'] as const;

/**
 * Parse an OCR confidence. Tesseract reports -1 for rows that are not
 * words; anything unparsable is treated the same way.
 */
export function parseConfidence(value: number | string): number {
  const parsed = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(parsed) ? parsed : -1;
}

/**
 * Build token records from OCR parallel arrays.
 *
 * @throws TokenDataError if a column is missing or the columns differ in length
 */
export function tokensFromOcrData(data: OcrData): Token[] {
  for (const column of OCR_COLUMNS) {
    if (!Array.isArray(data[column])) {
      throw new TokenDataError(`OCR data column "${column}" is missing or not an array`);
    }
  }

  const count = data.text.length;
  const mismatched = OCR_COLUMNS.filter(column => data[column].length !== count);
  if (mismatched.length > 0) {
    throw new TokenDataError(
      `OCR data columns differ in length: expected ${count} entries, mismatched ${mismatched.join(', ')}`
    );
  }

  const tokens: Token[] = [];
  for (let i = 0; i < count; i++) {
    tokens.push(
      createToken(
        String(data.text[i] ?? ''),
        { x: data.left[i], y: data.top[i], width: data.width[i], height: data.height[i] },
        parseConfidence(data.conf[i])
      )
    );
  }
  return tokens;
}

/**
 * Rebuild the parallel-array view of a token collection.
 */
export function tokensToOcrData(tokens: readonly Token[]): OcrData {
  return {
    text: tokens.map(t => t.text),
    left: tokens.map(t => t.box.x),
    top: tokens.map(t => t.box.y),
    width: tokens.map(t => t.box.width),
    height: tokens.map(t => t.box.height),
    conf: tokens.map(t => t.confidence),
  };
}

export function createToken(
  text: string,
  box: { x: number; y: number; width: number; height: number },
  confidence: number
): Token {
  return Object.freeze({
    text,
    box: Object.freeze({ ...box }),
    confidence,
  });
}
