/**
 * SQLite storage
 *
 * One database file holds the `reviews` and `captchas` tables. The handle is
 * opened once by buildApp(), shared by the stores, and closed on shutdown.
 * WAL mode plus SQLite's own write lock serializes concurrent inserts/deletes.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { ReviewsError, ServiceUnavailableError } from '../reviews/errors';
import { logger } from '../observability/logger';

export type ReviewsDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS reviews (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    text TEXT NOT NULL,
    ts INTEGER NOT NULL,
    client_id TEXT,
    delete_token TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS captchas (
    cid TEXT PRIMARY KEY,
    answer TEXT NOT NULL,
    expires_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_reviews_ts ON reviews(ts DESC);
  CREATE INDEX IF NOT EXISTS idx_reviews_client ON reviews(client_id, ts DESC);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_reviews_delete_token ON reviews(delete_token);
`;

export function openDatabase(filename: string): ReviewsDatabase {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  const db = new Database(filename);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);

  logger.info({ filename }, 'Reviews database opened');
  return db;
}

/**
 * Run a storage operation, converting driver failures (including a closed
 * handle) into ServiceUnavailableError. ReviewsErrors pass through untouched.
 */
export function withStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof ReviewsError) throw err;
    logger.error({ err, operation }, 'Storage operation failed');
    throw new ServiceUnavailableError('storage unavailable');
  }
}
