/**
 * SQLite Writer Tests
 *
 * Writes to a temp directory and reads the table back with better-sqlite3.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { mkdir, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { WriteFailureError } from '../../../core/errors.js';
import type { RegionRecord } from '../../../core/types.js';
import { writeUnifiedDatabase } from '../../../writer/sqlite-writer.js';
import { createTempDir, removeTempDir } from '../../utils/fixtures.js';

const RECORDS: readonly RegionRecord[] = [
  { code: 110108, nameZh: '海淀区', level: 3, namePinyin: 'Haidian', latitude: 39.96, longitude: 116.3 },
  { code: 110000, nameZh: '北京市', level: 1, alpha: 'BJ' },
];

describe('writeUnifiedDatabase', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should store one row per record with NULL for absent fields', async () => {
    const dbPath = join(dir, 'unified.db');

    await writeUnifiedDatabase(RECORDS, dbPath);

    const db = new Database(dbPath, { readonly: true });
    try {
      expect(db.prepare('SELECT * FROM codes ORDER BY code').all()).toEqual([
        {
          code: 110000,
          name_zh: '北京市',
          level: 1,
          name_pinyin: null,
          name_en: null,
          alpha: 'BJ',
          latitude: null,
          longitude: null,
        },
        {
          code: 110108,
          name_zh: '海淀区',
          level: 3,
          name_pinyin: 'Haidian',
          name_en: null,
          alpha: null,
          latitude: 39.96,
          longitude: 116.3,
        },
      ]);
    } finally {
      db.close();
    }
    await expect(readdir(dir)).resolves.toEqual(['unified.db']);
  });

  it('should replace an existing database', async () => {
    const dbPath = join(dir, 'unified.db');
    await writeFile(dbPath, 'not a database');

    await writeUnifiedDatabase(RECORDS.slice(1), dbPath);

    const db = new Database(dbPath, { readonly: true });
    try {
      expect(db.prepare('SELECT code FROM codes').all()).toEqual([{ code: 110000 }]);
    } finally {
      db.close();
    }
  });

  it('should clean up and throw when the database cannot be moved into place', async () => {
    const dbPath = join(dir, 'unified.db');
    await mkdir(join(dbPath, 'occupied'), { recursive: true });

    await expect(writeUnifiedDatabase(RECORDS, dbPath)).rejects.toBeInstanceOf(WriteFailureError);
    await expect(readdir(dir)).resolves.toEqual(['unified.db']);
  });
});
