import Database from 'better-sqlite3';
import logger from '../../utils/logger';

/**
 * Migration 001: Initial Schema
 *
 * Creates the message log, the patient directory keyed by phone,
 * and the appointment table (one row per patient per local day, enforced in code).
 */

const MIGRATION_ID = '001_initial_schema';

export function run(db: Database.Database): void {
  const tableExists = db.prepare(
    "SELECT name FROM sqlite_master WHERE type='table' AND name='appointments'"
  ).get();

  if (tableExists) {
    logger.debug(`Migration ${MIGRATION_ID}: already applied, skipping`);
    return;
  }

  logger.info(`Migration ${MIGRATION_ID}: applying...`);

  const migrate = db.transaction(() => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        direction TEXT NOT NULL CHECK (direction IN ('in', 'out')),
        channel TEXT NOT NULL CHECK (channel IN ('live', 'mock', 'simulate')),
        intent TEXT NOT NULL DEFAULT 'other',
        from_number TEXT NOT NULL DEFAULT '',
        to_number TEXT NOT NULL DEFAULT '',
        body TEXT NOT NULL DEFAULT '',
        note TEXT NOT NULL DEFAULT '',
        provider_message_id TEXT
      )
    `);
    db.exec(`CREATE INDEX IF NOT EXISTS idx_messages_timestamp ON messages(timestamp)`);

    db.exec(`
      CREATE TABLE IF NOT EXISTS patients (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        phone TEXT UNIQUE NOT NULL,
        address TEXT NOT NULL DEFAULT '',
        city TEXT NOT NULL DEFAULT '',
        state TEXT NOT NULL DEFAULT '',
        zip TEXT NOT NULL DEFAULT '',
        latitude REAL,
        longitude REAL,
        therapist TEXT NOT NULL DEFAULT '',
        notes TEXT NOT NULL DEFAULT '',
        created_at TEXT DEFAULT (datetime('now')),
        updated_at TEXT DEFAULT (datetime('now'))
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS appointments (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        patient_id INTEGER NOT NULL REFERENCES patients(id),
        therapist TEXT NOT NULL DEFAULT '',
        start_at TEXT NOT NULL,
        duration_minutes INTEGER NOT NULL DEFAULT 60,
        status TEXT NOT NULL DEFAULT 'pending'
          CHECK (status IN ('pending', 'confirmed', 'reschedule', 'canceled')),
        source TEXT NOT NULL DEFAULT 'manual'
          CHECK (source IN ('inbound', 'manual', 'system')),
        note TEXT NOT NULL DEFAULT '',
        created_at TEXT DEFAULT (datetime('now')),
        updated_at TEXT DEFAULT (datetime('now'))
      )
    `);
    db.exec(`CREATE INDEX IF NOT EXISTS idx_appointments_patient_start ON appointments(patient_id, start_at)`);
    db.exec(`CREATE INDEX IF NOT EXISTS idx_appointments_start ON appointments(start_at)`);
  });

  migrate();
  logger.info(`Migration ${MIGRATION_ID}: applied successfully`);
}
