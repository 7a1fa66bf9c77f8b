import sqlite3 from 'sqlite3';
import fs from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger';

const IN_MEMORY_PATH = ':memory:';
const DEFAULT_BUSY_TIMEOUT_MS = 5000;
const HEALTH_CHECK_QUERY = 'SELECT 1 as result';
const HEALTH_CHECK_EXPECTED_VALUE = 1;

let db: sqlite3.Database | null = null;

export interface DatabaseConfig {
  /** File path, or ":memory:" for a private in-process database */
  path: string;
  verbose?: boolean;
  busyTimeoutMs?: number;
}

function resolveLocation(location: string): string {
  return location === IN_MEMORY_PATH ? location : path.resolve(location);
}

/**
 * Opens the fingerprint database once per process. Resolves when the file is
 * open; rejects if SQLite cannot open it.
 */
export async function initDatabase(config: DatabaseConfig): Promise<sqlite3.Database> {
  if (db) {
    return db;
  }

  const sqlite = config.verbose ? sqlite3.verbose() : sqlite3;
  const location = resolveLocation(config.path);
  if (location !== IN_MEMORY_PATH) {
    await fs.mkdir(path.dirname(location), { recursive: true });
  }

  const opened = await new Promise<sqlite3.Database>((resolve, reject) => {
    const database = new sqlite.Database(location, (err) => {
      if (err) {
        reject(new Error(`Failed to open SQLite database at ${location}: ${err.message}`));
      } else {
        resolve(database);
      }
    });
  });

  opened.configure('busyTimeout', config.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS);
  logger.debug(`Connected to SQLite database at ${location}`);

  db = opened;
  return db;
}

export function getDatabase(): sqlite3.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

export function closeDatabase(): Promise<void> {
  const database = db;
  if (!database) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    database.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      db = null;
      logger.debug('Database connection closed');
      resolve();
    });
  });
}

export function run(sql: string, params: unknown[] = []): Promise<{ lastID: number; changes: number }> {
  return new Promise((resolve, reject) => {
    getDatabase().run(sql, params, function (err) {
      if (err) {
        reject(err);
      } else {
        resolve({ lastID: this.lastID, changes: this.changes });
      }
    });
  });
}

export function exec(sql: string): Promise<void> {
  return new Promise((resolve, reject) => {
    getDatabase().exec(sql, (err) => (err ? reject(err) : resolve()));
  });
}

export function get<T>(sql: string, params: unknown[] = []): Promise<T | undefined> {
  return new Promise((resolve, reject) => {
    getDatabase().get(sql, params, (err, row) => (err ? reject(err) : resolve(row as T | undefined)));
  });
}

export function all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
  return new Promise((resolve, reject) => {
    getDatabase().all(sql, params, (err, rows) => (err ? reject(err) : resolve(rows as T[])));
  });
}

export async function healthCheck(): Promise<boolean> {
  if (!db) {
    return false;
  }
  try {
    const result = await get<{ result: number }>(HEALTH_CHECK_QUERY);
    return result?.result === HEALTH_CHECK_EXPECTED_VALUE;
  } catch (err) {
    logger.error('Database health check failed:', err);
    return false;
  }
}
