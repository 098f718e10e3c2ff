/**
 * Code Structure Tests
 */

import { describe, it, expect } from 'vitest';
import {
  immediateParent,
  isValidCode,
  joinCode,
  levelOfCode,
  parentCodes,
  parentPrefix,
  splitCode,
} from '../../../core/codes.js';

describe('codes', () => {
  describe('splitCode / joinCode', () => {
    it('should split a code into province, prefecture and county groups', () => {
      expect(splitCode(331024)).toEqual([33, 10, 24]);
      expect(splitCode(110000)).toEqual([11, 0, 0]);
    });

    it('should join groups back into the same code', () => {
      expect(joinCode(splitCode(331024))).toBe(331024);
      expect(joinCode([65, 42, 1])).toBe(654201);
    });
  });

  describe('levelOfCode', () => {
    it('should derive the level from trailing zero groups', () => {
      expect(levelOfCode(330000)).toBe(1);
      expect(levelOfCode(331000)).toBe(2);
      expect(levelOfCode(331024)).toBe(3);
    });
  });

  describe('parentCodes', () => {
    it('should list the enclosing division at each level', () => {
      expect(parentCodes(331024)).toEqual([330000, 331000, 331024]);
      expect(parentCodes(110100)).toEqual([110000, 110100, 110100]);
    });
  });

  describe('immediateParent', () => {
    it('should return the next level up', () => {
      expect(immediateParent(331024, 3)).toBe(331000);
      expect(immediateParent(331000, 2)).toBe(330000);
    });

    it('should return null for a province', () => {
      expect(immediateParent(330000, 1)).toBeNull();
    });
  });

  describe('parentPrefix', () => {
    it('should keep four digits for counties and two for prefectures', () => {
      expect(parentPrefix(110108, 3)).toBe('1101');
      expect(parentPrefix(110100, 2)).toBe('11');
    });

    it('should give every province the empty prefix', () => {
      expect(parentPrefix(110000, 1)).toBe('');
      expect(parentPrefix(650000, 1)).toBe('');
    });
  });

  describe('isValidCode', () => {
    it('should accept six-digit integers only', () => {
      expect(isValidCode(110000)).toBe(true);
      expect(isValidCode(99999)).toBe(false);
      expect(isValidCode(1100000)).toBe(false);
      expect(isValidCode(110000.5)).toBe(false);
    });
  });
});
