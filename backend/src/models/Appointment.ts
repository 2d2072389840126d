import Database from 'better-sqlite3';
import { loggers } from '../utils/logger';
import { dayBounds, localDay } from '../utils/date';
import {
  Appointment,
  AppointmentStatus,
  AppointmentUpsert,
  DayAppointment,
} from '../types/domain';

/**
 * Appointment Model
 * Holds at most one appointment per patient per local calendar day
 */

export interface UpsertResult {
  appointment: Appointment;
  created: boolean;
}

export class AppointmentModel {
  constructor(
    private readonly db: Database.Database,
    private readonly timeZone: string
  ) {}

  getById(id: number): Appointment | null {
    try {
      const appointment = this.db
        .prepare(`SELECT * FROM appointments WHERE id = ?`)
        .get(id) as Appointment | undefined;

      loggers.dbOperation('SELECT', 'appointments', { id });

      return appointment || null;
    } catch (error) {
      throw new Error(
        `Error fetching appointment: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  /**
   * Create or update the patient's appointment on the local day of `start`.
   *
   * Matching is by day, not by exact time: a later message about a different
   * time on the same day overwrites the earlier one.
   */
  upsertForDay(input: AppointmentUpsert): UpsertResult {
    const { start, end } = dayBounds(localDay(input.start, this.timeZone), this.timeZone);
    const startAt = input.start.toISOString();

    const upsert = this.db.transaction((): UpsertResult => {
      const existing = this.db
        .prepare(`
          SELECT id FROM appointments
          WHERE patient_id = ? AND start_at >= ? AND start_at < ?
          ORDER BY id ASC
          LIMIT 1
        `)
        .get(input.patientId, start.toISOString(), end.toISOString()) as { id: number } | undefined;

      if (existing) {
        this.db
          .prepare(`
            UPDATE appointments
            SET therapist = ?, start_at = ?, duration_minutes = ?, status = ?,
                source = ?, note = ?, updated_at = datetime('now')
            WHERE id = ?
          `)
          .run(
            input.therapist,
            startAt,
            input.durationMinutes,
            input.status,
            input.source,
            input.note,
            existing.id
          );

        loggers.dbOperation('UPDATE', 'appointments', { id: existing.id, patientId: input.patientId });
        return { appointment: this.requireById(existing.id), created: false };
      }

      const result = this.db
        .prepare(`
          INSERT INTO appointments (
            patient_id, therapist, start_at, duration_minutes, status, source, note
          )
          VALUES (?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          input.patientId,
          input.therapist,
          startAt,
          input.durationMinutes,
          input.status,
          input.source,
          input.note
        );

      const id = Number(result.lastInsertRowid);
      loggers.dbOperation('INSERT', 'appointments', { id, patientId: input.patientId });
      return { appointment: this.requireById(id), created: true };
    });

    try {
      return upsert();
    } catch (error) {
      throw new Error(
        `Error upserting appointment: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  /**
   * Appointments of one local day joined with patient fields, earliest first
   */
  listForDay(day: string, therapist?: string): DayAppointment[] {
    const { start, end } = dayBounds(day, this.timeZone);

    try {
      const params: Array<string> = [start.toISOString(), end.toISOString()];
      let therapistClause = '';
      if (therapist) {
        therapistClause = 'AND lower(a.therapist) = lower(?)';
        params.push(therapist);
      }

      const rows = this.db
        .prepare(`
          SELECT
            a.*,
            p.name AS patient_name,
            p.phone AS patient_phone,
            p.address, p.city, p.state, p.zip,
            p.latitude, p.longitude
          FROM appointments a
          JOIN patients p ON p.id = a.patient_id
          WHERE a.start_at >= ? AND a.start_at < ?
          ${therapistClause}
          ORDER BY a.start_at ASC, a.id ASC
        `)
        .all(...params) as DayAppointment[];

      loggers.dbOperation('SELECT', 'appointments', { day, therapist, count: rows.length });

      return rows;
    } catch (error) {
      throw new Error(
        `Error listing appointments for day: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  /**
   * Update appointment status
   */
  updateStatus(id: number, status: AppointmentStatus): Appointment | null {
    try {
      const result = this.db
        .prepare(`
          UPDATE appointments
          SET status = ?, updated_at = datetime('now')
          WHERE id = ?
        `)
        .run(status, id);

      loggers.dbOperation('UPDATE', 'appointments', { id, status });

      return result.changes > 0 ? this.getById(id) : null;
    } catch (error) {
      throw new Error(
        `Error updating appointment status: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  private requireById(id: number): Appointment {
    const appointment = this.getById(id);
    if (!appointment) {
      throw new Error(`appointment ${id} missing after write`);
    }
    return appointment;
  }
}
