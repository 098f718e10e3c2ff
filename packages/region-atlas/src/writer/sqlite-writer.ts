/**
 * SQLite copy of the unified table
 *
 * Built in a temporary file beside the target and renamed into place, so
 * readers see the previous database until the new one is complete.
 *
 * @module writer/sqlite-writer
 */

import { mkdir, rename } from 'fs/promises';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { WriteFailureError, toError } from '../core/errors.js';
import type { RegionRecord } from '../core/types.js';
import { removeTempFile, tempPathFor } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';

const logger = createLogger({ module: 'sqlite-writer' });

function createSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE codes (
      code INTEGER PRIMARY KEY,
      name_zh TEXT NOT NULL,
      level INTEGER NOT NULL,
      name_pinyin TEXT,
      name_en TEXT,
      alpha TEXT,
      latitude REAL,
      longitude REAL
    );
  `);
}

function insertRecords(db: Database.Database, records: readonly RegionRecord[]): void {
  const insert = db.prepare(`
    INSERT INTO codes (code, name_zh, level, name_pinyin, name_en, alpha, latitude, longitude)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const insertAll = db.transaction((rows: readonly RegionRecord[]) => {
    for (const record of rows) {
      insert.run(
        record.code,
        record.nameZh,
        record.level,
        record.namePinyin ?? null,
        record.nameEn ?? null,
        record.alpha ?? null,
        record.latitude ?? null,
        record.longitude ?? null
      );
    }
  });

  insertAll(records);
}

/**
 * Write records to a `codes` table at `dbPath`
 *
 * @throws {WriteFailureError} if building or renaming the database fails
 */
export async function writeUnifiedDatabase(
  records: readonly RegionRecord[],
  dbPath: string
): Promise<void> {
  const tempPath = tempPathFor(dbPath);

  try {
    await mkdir(dirname(dbPath), { recursive: true });
    const db = new Database(tempPath);
    try {
      createSchema(db);
      insertRecords(db, [...records].sort((a, b) => a.code - b.code));
    } finally {
      db.close();
    }
    await rename(tempPath, dbPath);
  } catch (error) {
    await removeTempFile(tempPath);
    throw new WriteFailureError(dbPath, toError(error));
  }

  logger.info('Wrote SQLite database', { path: dbPath, records: records.length });
}
