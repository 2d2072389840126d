import Database from 'better-sqlite3';
import { run as runInitialSchemaMigration } from './migrations/001_initial_schema';

/**
 * Apply every migration in order. Each one is idempotent.
 */
export function runMigrations(db: Database.Database): void {
  runInitialSchemaMigration(db);
}
