/**
 * Value Associator Tests
 */

import {
  associateValue,
  selectCandidates,
  locateLabel,
  type LocatedLabel,
  type Token,
} from '@facesheet/shared';
import { tok } from './helpers';

function labelAt(tokens: Token[], index: number): LocatedLabel {
  return { token: tokens[index], index };
}

describe('associateValue', () => {
  it('should skip colon-bearing tokens and keep the value to the right', () => {
    const tokens = [tok('Visit', 10, 10, 90, 40, 15), tok('ID:', 55, 10, 90, 20, 15), tok('12345', 80, 12)];

    expect(associateValue(labelAt(tokens, 0), tokens, 100)).toBe('12345');
  });

  it('should join candidates left to right regardless of input order', () => {
    const tokens = [
      tok('Robert', 290, 101),
      tok('Name', 20, 100),
      tok('Smith,', 160, 102),
      tok('John', 230, 99),
    ];

    expect(associateValue(labelAt(tokens, 1), tokens, 400)).toBe('Smith, John Robert');
  });

  it('should produce the same value for every permutation of the input', () => {
    const base = [tok('Name', 20, 100), tok('C', 200, 100), tok('A', 60, 100), tok('B', 120, 100)];
    const permutations = [
      [0, 1, 2, 3],
      [3, 2, 1, 0],
      [1, 3, 0, 2],
      [2, 0, 3, 1],
    ];

    for (const order of permutations) {
      const tokens = order.map(i => base[i]);
      const label = locateLabel('Name', tokens);
      expect(label).not.toBeNull();
      if (label) {
        expect(associateValue(label, tokens, 400)).toBe('A B C');
      }
    }
  });

  it('should keep only tokens within the vertical tolerance', () => {
    const tokens = [
      tok('Age', 10, 50),
      tok('above', 60, 41), // 9 above
      tok('below', 90, 59), // 9 below
      tok('far-above', 120, 40), // 10 above
      tok('far-below', 150, 60), // 10 below
    ];

    expect(associateValue(labelAt(tokens, 0), tokens, 500)).toBe('above below');
  });

  it('should honour a custom vertical tolerance', () => {
    const tokens = [tok('Age', 10, 50), tok('near', 60, 52), tok('drift', 90, 56)];

    expect(associateValue(labelAt(tokens, 0), tokens, 500, { verticalTolerance: 5 })).toBe('near');
  });

  it('should keep only tokens strictly inside the horizontal band', () => {
    const tokens = [
      tok('MR', 100, 10),
      tok('left', 40, 10),
      tok('same-x', 100, 10),
      tok('inside', 149, 10), // dx 49
      tok('edge', 150, 10), // dx 50
    ];

    expect(associateValue(labelAt(tokens, 0), tokens, 50)).toBe('inside');
  });

  it('should drop candidates below the confidence floor', () => {
    const tokens = [tok('SSN', 10, 10), tok('000-12-3456', 60, 10, 10), tok('~', 160, 10, 9.99)];

    expect(associateValue(labelAt(tokens, 0), tokens, 300)).toBe('000-12-3456');
  });

  it('should honour a custom confidence floor', () => {
    const tokens = [tok('SSN', 10, 10), tok('000-12-3456', 60, 10, 50)];

    expect(associateValue(labelAt(tokens, 0), tokens, 300, { minConfidence: 60 })).toBe('');
  });

  it('should return an empty string when nothing qualifies', () => {
    const tokens = [tok('DOB', 10, 10), tok('Age:', 60, 10)];

    expect(associateValue(labelAt(tokens, 0), tokens, 300)).toBe('');
  });

  it('should not mutate the input tokens', () => {
    const tokens = [tok('Name', 20, 100), tok('B', 120, 100), tok('A', 60, 100)];
    const before = tokens.slice();

    associateValue(labelAt(tokens, 0), tokens, 400);

    expect(tokens).toEqual(before);
    expect(tokens[1].text).toBe('B');
  });

  describe('self-exclusion', () => {
    const tokens = [tok('MR', 10, 10), tok('MR', 60, 10), tok('17', 100, 10)];

    it('should exclude only the label token itself by default', () => {
      expect(associateValue(labelAt(tokens, 0), tokens, 200)).toBe('MR 17');
    });

    it('should exclude every token with the label text in text mode', () => {
      expect(associateValue(labelAt(tokens, 0), tokens, 200, { selfExclusion: 'text' })).toBe('17');
    });
  });
});

describe('selectCandidates', () => {
  it('should keep stream order for tokens sharing an x coordinate', () => {
    const tokens = [tok('Sex', 10, 10), tok('second', 60, 12), tok('first', 60, 8)];

    const candidates = selectCandidates(labelAt(tokens, 0), tokens, 100);

    expect(candidates.map(t => t.text)).toEqual(['second', 'first']);
  });
});
