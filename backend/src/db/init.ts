import fs from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger';
import { exec, get } from './connection';

const SCHEMA_FILE_NAME = 'schema.sql';
const REGISTRY_TABLE = 'fingerprints';
const TABLE_LOOKUP_QUERY = "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?";

export async function initSchema(): Promise<void> {
  const schemaSql = await fs.readFile(path.join(__dirname, SCHEMA_FILE_NAME), 'utf8');

  try {
    await exec(schemaSql);
  } catch (err) {
    logger.error('Failed to apply the fingerprint registry schema:', err);
    throw err;
  }
}

export async function hasRegistryTable(): Promise<boolean> {
  const row = await get<{ name: string }>(TABLE_LOOKUP_QUERY, [REGISTRY_TABLE]);
  return row !== undefined;
}

/**
 * Creates the registry on first start. The schema only uses IF NOT EXISTS,
 * so applying it to an existing database adds whatever is missing.
 */
export async function ensureSchema(): Promise<void> {
  if (!(await hasRegistryTable())) {
    logger.info('Fingerprint registry not found. Initializing...');
  }
  await initSchema();
}
