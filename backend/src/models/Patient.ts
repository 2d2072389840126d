import Database from 'better-sqlite3';
import { loggers } from '../utils/logger';
import { Patient, PatientInput } from '../types/domain';

/**
 * Patient Model
 * Patients are keyed by phone; inbound messages are correlated through it
 */

export class PatientModel {
  constructor(private readonly db: Database.Database) {}

  /**
   * Get all patients
   */
  getAll(limit: number = 100, offset: number = 0): Patient[] {
    try {
      const stmt = this.db.prepare(`
        SELECT * FROM patients
        ORDER BY name ASC
        LIMIT ? OFFSET ?
      `);

      const patients = stmt.all(limit, offset) as Patient[];

      loggers.dbOperation('SELECT', 'patients', { count: patients.length });

      return patients;
    } catch (error) {
      throw new Error(
        `Error fetching patients: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  getById(id: number): Patient | null {
    try {
      const patient = this.db
        .prepare(`SELECT * FROM patients WHERE id = ?`)
        .get(id) as Patient | undefined;

      loggers.dbOperation('SELECT', 'patients', { id });

      return patient || null;
    } catch (error) {
      throw new Error(
        `Error fetching patient: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  /**
   * Phone must already be normalized (see utils/phone)
   */
  getByPhone(phone: string): Patient | null {
    try {
      const patient = this.db
        .prepare(`SELECT * FROM patients WHERE phone = ?`)
        .get(phone) as Patient | undefined;

      loggers.dbOperation('SELECT', 'patients', { phone });

      return patient || null;
    } catch (error) {
      throw new Error(
        `Error fetching patient by phone: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  /**
   * Create or update a patient by phone number.
   * Null coordinates on update keep the stored ones.
   */
  upsertByPhone(patient: PatientInput): Patient {
    try {
      const stmt = this.db.prepare(`
        INSERT INTO patients (
          name, phone, address, city, state, zip, latitude, longitude, therapist, notes
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(phone) DO UPDATE SET
          name = excluded.name,
          address = excluded.address,
          city = excluded.city,
          state = excluded.state,
          zip = excluded.zip,
          latitude = COALESCE(excluded.latitude, patients.latitude),
          longitude = COALESCE(excluded.longitude, patients.longitude),
          therapist = excluded.therapist,
          notes = excluded.notes,
          updated_at = datetime('now')
      `);

      stmt.run(
        patient.name,
        patient.phone,
        patient.address,
        patient.city,
        patient.state,
        patient.zip,
        patient.latitude,
        patient.longitude,
        patient.therapist,
        patient.notes
      );

      loggers.dbOperation('UPSERT', 'patients', { phone: patient.phone });

      const stored = this.getByPhone(patient.phone);
      if (!stored) {
        throw new Error(`patient ${patient.phone} missing after upsert`);
      }
      return stored;
    } catch (error) {
      throw new Error(
        `Error upserting patient: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }
}
