/**
 * Test Helpers
 *
 * Token builders and a sample facesheet page.
 */

import { createToken, type Token } from '@facesheet/shared';

/**
 * Build a token; width/height default to a typical word box.
 */
export function tok(
  text: string,
  x: number,
  y: number,
  confidence: number = 90,
  width: number = 40,
  height: number = 15
): Token {
  return createToken(text, { x, y, width, height }, confidence);
}

/**
 * A facesheet page laid out as two columns of label/value rows.
 * Stream order is deliberately not reading order.
 */
export const SAMPLE_PAGE: Token[] = [
  tok('Smith,', 160, 102),
  tok('Patient', 20, 100, 95, 70),
  tok('Name:', 95, 101, 95, 50),
  tok('John', 230, 99),
  tok('Robert', 290, 101),
  tok('Visit', 20, 140),
  tok('ID:', 65, 140, 92, 25),
  tok('V-20931', 100, 141, 88, 70),
  tok('MR#:', 420, 140, 93, 40),
  tok('0048812', 470, 142, 91, 70),
  tok('DOB:', 20, 180),
  tok('04/12/1961', 70, 181, 87, 90),
  tok('Age:', 420, 180),
  tok('63', 470, 178),
  tok('Sex:', 20, 220),
  tok('M', 70, 221, 96, 12),
  tok('SSN:', 420, 220),
  tok('000-12-3456', 470, 219, 85, 100),
  tok('~', 560, 221, 4, 8),
];
