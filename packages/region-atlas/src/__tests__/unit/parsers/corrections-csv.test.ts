/**
 * Corrections Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { parseCorrectionsCsv } from '../../../parsers/corrections-csv.js';

describe('parseCorrectionsCsv', () => {
  it('should read sparse rows keyed by code', () => {
    const { records, issues } = parseCorrectionsCsv(
      ['code,name_en,latitude', '110100,Beijing city area,', '110108,,39.96'].join('\n')
    );

    expect(issues).toEqual([]);
    expect(records).toEqual([
      { code: 110100, nameEn: 'Beijing city area' },
      { code: 110108, latitude: 39.96 },
    ]);
  });

  it('should label rejected rows with the corrections file', () => {
    const { records, issues } = parseCorrectionsCsv(['code,alpha', '110000,B3J'].join('\n'));

    expect(records).toEqual([]);
    expect(issues).toEqual([
      { source: 'corrections', location: 'corrections row 2', message: 'alpha: alpha must be 2-3 letters' },
    ]);
  });
});
