/**
 * Name Normalization Tests
 */

import { describe, it, expect } from 'vitest';
import { normalizeName, stripAdminSuffix, toSimplified } from '../../../matching/normalize.js';

describe('normalizeName', () => {
  it('should fold traditional characters, spacing and the type suffix', () => {
    expect(normalizeName(' 海澱 區 ')).toBe('海淀');
    expect(normalizeName('海淀区')).toBe('海淀');
  });

  it('should make two spellings of one division compare equal', () => {
    expect(normalizeName('東城區')).toBe(normalizeName('东城区'));
    expect(normalizeName('門頭溝區')).toBe(normalizeName('门头沟区'));
  });

  it('should accept a custom variant table', () => {
    const variants = new Map([['甲', '乙']]);

    expect(normalizeName('甲县', variants)).toBe('乙');
  });
});

describe('stripAdminSuffix', () => {
  it('should strip the longest suffix', () => {
    expect(stripAdminSuffix('长阳土家族自治县')).toBe('长阳土家族');
    expect(stripAdminSuffix('大兴安岭地区')).toBe('大兴安岭');
    expect(stripAdminSuffix('北京市')).toBe('北京');
  });

  it('should keep a name that is only a suffix', () => {
    expect(stripAdminSuffix('市')).toBe('市');
    expect(stripAdminSuffix('区')).toBe('区');
  });
});

describe('toSimplified', () => {
  it('should replace only traditional characters', () => {
    expect(toSimplified('石家庄市')).toBe('石家庄市');
    expect(toSimplified('蘇州')).toBe('苏州');
  });
});
