/**
 * Name Decomposer Tests
 */

import { decomposeName } from '@facesheet/shared';

describe('decomposeName', () => {
  describe('comma notation', () => {
    it('should split "Last, First Middle"', () => {
      expect(decomposeName('Smith, John Robert')).toEqual({
        first: 'John',
        middle: 'Robert',
        last: 'Smith',
      });
    });

    it('should split "Last, First"', () => {
      expect(decomposeName('Smith, John')).toEqual({ first: 'John', middle: '', last: 'Smith' });
    });

    it('should move the text before the comma to first when three names follow', () => {
      expect(decomposeName('Smith, John Robert Lee')).toEqual({
        first: 'Smith',
        middle: '',
        last: '',
      });
    });

    it('should move the text before the comma to first when nothing follows', () => {
      expect(decomposeName('Smith,')).toEqual({ first: 'Smith', middle: '', last: '' });
    });

    it('should split on the first comma only', () => {
      expect(decomposeName('Smith, John, Jr')).toEqual({ first: 'John,', middle: 'Jr', last: 'Smith' });
    });

    it('should trim every part', () => {
      expect(decomposeName('  Smith ,   John   Robert ')).toEqual({
        first: 'John',
        middle: 'Robert',
        last: 'Smith',
      });
    });
  });

  describe('space notation', () => {
    it('should split "First Middle Last"', () => {
      expect(decomposeName('John Robert Smith')).toEqual({
        first: 'John',
        middle: 'Robert',
        last: 'Smith',
      });
    });

    it('should treat two names as first and middle', () => {
      expect(decomposeName('John Smith')).toEqual({ first: 'John', middle: 'Smith', last: '' });
    });

    it('should treat a single name as first', () => {
      expect(decomposeName('Madonna')).toEqual({ first: 'Madonna', middle: '', last: '' });
    });

    it('should return all empty parts for an empty string', () => {
      expect(decomposeName('')).toEqual({ first: '', middle: '', last: '' });
    });

    it('should return all empty parts for whitespace only', () => {
      expect(decomposeName('   ')).toEqual({ first: '', middle: '', last: '' });
    });

    it('should return all empty parts for four or more names', () => {
      expect(decomposeName('John Robert Lee Smith')).toEqual({ first: '', middle: '', last: '' });
    });
  });
});
