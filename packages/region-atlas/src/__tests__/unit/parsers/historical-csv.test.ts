/**
 * CITAS Historical Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { parseHistoricalCsv, translateLegacyCode } from '../../../parsers/historical-csv.js';

const CITAS = [
  'C-gbcode,N-hanzi,N-pinyin,N-local,todate',
  '110108,海淀区,Haidian,Beijing: Haidian qu,19941231',
  '11-01-09,门头沟区,Mentougou,,19941231',
  '110199,旧区,Jiuqu,,19871231',
  '1101xx,石景山区,Shijingshan,,19941231',
  '610100,西安市,Xi`an,Xi`an shi,19941231',
  'bad,某地,Moudi,,19941231',
].join('\n');

describe('translateLegacyCode', () => {
  it('should accept six-digit codes with separators or a decimal tail', () => {
    expect(translateLegacyCode('110108')).toEqual({ kind: 'canonical', code: 110108 });
    expect(translateLegacyCode('11-01-08')).toEqual({ kind: 'canonical', code: 110108 });
    expect(translateLegacyCode('110108.0')).toEqual({ kind: 'canonical', code: 110108 });
    expect(translateLegacyCode(' 11 01 08 ')).toEqual({ kind: 'canonical', code: 110108 });
  });

  it('should pad abbreviated province and prefecture codes', () => {
    expect(translateLegacyCode('11')).toEqual({ kind: 'canonical', code: 110000 });
    expect(translateLegacyCode('1101')).toEqual({ kind: 'canonical', code: 110100 });
  });

  it('should keep only the parent prefix for masked codes', () => {
    expect(translateLegacyCode('1101xx')).toEqual({ kind: 'partial', prefix: '1101', level: 3 });
    expect(translateLegacyCode('11****')).toEqual({ kind: 'partial', prefix: '11', level: 2 });
  });

  it('should refuse anything else', () => {
    expect(translateLegacyCode('bad')).toBeNull();
    expect(translateLegacyCode('11xx')).toBeNull();
    expect(translateLegacyCode('1234567')).toBeNull();
  });

  it('should refuse codes with a zero province group', () => {
    expect(translateLegacyCode('000000')).toBeNull();
    expect(translateLegacyCode('00')).toBeNull();
    expect(translateLegacyCode('01')).toBeNull();
    expect(translateLegacyCode('0101')).toBeNull();
    expect(translateLegacyCode('00xxxx')).toBeNull();
  });
});

describe('parseHistoricalCsv', () => {
  it('should keep rows valid on the configured todate', () => {
    const { records, issues } = parseHistoricalCsv(CITAS, { todate: '19941231' });

    expect(records).toEqual([
      {
        source: 'historical',
        position: 0,
        sourceKey: '110108',
        code: 110108,
        level: 3,
        parentPrefix: '1101',
        nameZh: '海淀区',
        namePinyin: 'Haidian',
        nameEn: 'Beijing: Haidian qu',
      },
      {
        source: 'historical',
        position: 1,
        sourceKey: '11-01-09',
        code: 110109,
        level: 3,
        parentPrefix: '1101',
        nameZh: '门头沟区',
        namePinyin: 'Mentougou',
      },
      {
        source: 'historical',
        position: 2,
        sourceKey: '1101xx',
        code: null,
        level: 3,
        parentPrefix: '1101',
        nameZh: '石景山区',
        namePinyin: 'Shijingshan',
      },
      {
        source: 'historical',
        position: 3,
        sourceKey: '610100',
        code: 610100,
        level: 2,
        parentPrefix: '61',
        nameZh: '西安市',
        namePinyin: "Xi'an",
        nameEn: "Xi'an shi",
      },
    ]);
    expect(issues).toEqual([
      { source: 'historical', location: 'row 7', message: 'unrecognized legacy code "bad"' },
    ]);
  });

  it('should report a zero code as a row issue', () => {
    const content = ['legacy_code,name_zh', '000000,全国', '11,北京市'].join('\n');

    const { records, issues } = parseHistoricalCsv(content, { todate: null });

    expect(records.map((record) => record.code)).toEqual([110000]);
    expect(issues).toEqual([
      { source: 'historical', location: 'row 2', message: 'unrecognized legacy code "000000"' },
    ]);
  });

  it('should keep every row when no todate is set', () => {
    const { records } = parseHistoricalCsv(CITAS, { todate: null });

    expect(records.map((record) => record.sourceKey)).toEqual([
      '110108',
      '11-01-09',
      '110199',
      '1101xx',
      '610100',
    ]);
  });

  it('should read plain headers and ignore todate when the column is absent', () => {
    const content = ['legacy_code,name_zh,name_pinyin', '3301xx,城区,Chengqu'].join('\n');

    const { records } = parseHistoricalCsv(content, { todate: '19941231' });

    expect(records).toEqual([
      {
        source: 'historical',
        position: 0,
        sourceKey: '3301xx',
        code: null,
        level: 3,
        parentPrefix: '3301',
        nameZh: '城区',
        namePinyin: 'Chengqu',
      },
    ]);
  });

  it('should report a row without a Chinese name', () => {
    const content = ['C-gbcode,N-hanzi,N-pinyin', '110105,,Chaoyang'].join('\n');

    const { records, issues } = parseHistoricalCsv(content, { todate: null });

    expect(records).toEqual([]);
    expect(issues).toEqual([
      { source: 'historical', location: 'row 2', message: 'nameZh: missing name_zh' },
    ]);
  });
});
