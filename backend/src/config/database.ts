import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import logger from '../utils/logger';
import { runMigrations } from '../database/migrate';

/**
 * SQLite Database Configuration
 * Provides a process-wide connection for the server and a factory for tests
 */

export type StoreMode = 'file' | 'memory' | 'memory-fallback';

export interface OpenedDatabase {
  db: Database.Database;
  mode: StoreMode;
}

const UNREADABLE_STORE_CODES = new Set(['SQLITE_NOTADB', 'SQLITE_CORRUPT']);

function isUnreadableStore(error: unknown): boolean {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return UNREADABLE_STORE_CODES.has(error.code);
  }
  return false;
}

function connect(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = new Database(dbPath);

  try {
    // Enable foreign keys
    db.pragma('foreign_keys = ON');

    // WAL lets readers proceed while a write transaction is open
    if (dbPath !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }

    runMigrations(db);
  } catch (error) {
    db.close();
    throw error;
  }

  return db;
}

/**
 * Open a database at the given path and bring its schema up to date.
 *
 * An unreadable file (not a database, or corrupt) does not stop the service:
 * it keeps running on an empty in-memory store and reports mode `memory-fallback`.
 * Anything stored while in that mode is lost on restart.
 */
export function openDatabase(dbPath: string): OpenedDatabase {
  try {
    const db = connect(dbPath);
    logger.info('Database connection established', { path: dbPath });
    return { db, mode: dbPath === ':memory:' ? 'memory' : 'file' };
  } catch (error) {
    if (!isUnreadableStore(error)) {
      logger.error('Failed to connect to database', {
        path: dbPath,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    logger.error('Database file is unreadable, continuing with an empty in-memory store', {
      path: dbPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return { db: connect(':memory:'), mode: 'memory-fallback' };
  }
}

let dbInstance: OpenedDatabase | null = null;

/**
 * Get the database instance (singleton pattern)
 */
export function getDatabase(dbPath: string): OpenedDatabase {
  if (!dbInstance) {
    dbInstance = openDatabase(dbPath);
  }
  return dbInstance;
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
  if (dbInstance) {
    try {
      dbInstance.db.close();
      dbInstance = null;
      logger.info('Database connection closed');
    } catch (error) {
      logger.error('Error closing database', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
