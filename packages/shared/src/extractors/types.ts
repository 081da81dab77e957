/**
 * Extraction Collaborator Types
 */

import type { Token } from '../types';

/**
 * Supplies the recognized tokens of one page image.
 * Implementations own their engine settings; nothing here is process-wide.
 */
export interface TokenSource {
  readonly name: string;
  readTokens(imagePath: string): Promise<Token[]>;
}
