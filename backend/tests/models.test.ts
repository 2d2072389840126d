import { beforeEach, describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import { zonedDateTime } from '../src/utils/date';
import { openDatabase } from '../src/config/database';
import { AppointmentModel } from '../src/models/Appointment';
import { MessageModel } from '../src/models/Message';
import { PatientModel } from '../src/models/Patient';
import { AppointmentUpsert } from '../src/types/domain';
import { patientInput, TEST_TIME_ZONE } from './helpers';

describe('models', () => {
  let db: Database.Database;
  let patients: PatientModel;
  let appointments: AppointmentModel;
  let messages: MessageModel;

  beforeEach(() => {
    db = openDatabase(':memory:').db;
    patients = new PatientModel(db);
    appointments = new AppointmentModel(db, TEST_TIME_ZONE);
    messages = new MessageModel(db);
  });

  describe('PatientModel', () => {
    it('upserts by phone', () => {
      const first = patients.upsertByPhone(patientInput({ name: 'Ada' }));
      const second = patients.upsertByPhone(patientInput({ name: 'Ada Lovelace', therapist: 'Lee' }));

      expect(second.id).toBe(first.id);
      expect(second.name).toBe('Ada Lovelace');
      expect(second.therapist).toBe('Lee');
      expect(patients.getAll()).toHaveLength(1);
    });

    it('keeps stored coordinates when an update carries none', () => {
      patients.upsertByPhone(patientInput());
      const updated = patients.upsertByPhone(
        patientInput({ name: 'Ada', latitude: null, longitude: null })
      );

      expect(updated.name).toBe('Ada');
      expect(updated.latitude).toBe(37.3);
      expect(updated.longitude).toBe(-121.9);
    });

    it('finds patients by phone and id', () => {
      const stored = patients.upsertByPhone(patientInput());
      expect(patients.getByPhone('+14085550111')?.id).toBe(stored.id);
      expect(patients.getById(stored.id)?.phone).toBe('+14085550111');
      expect(patients.getByPhone('+19995550000')).toBeNull();
      expect(patients.getById(999)).toBeNull();
    });

    it('lists patients by name', () => {
      patients.upsertByPhone(patientInput({ name: 'Zed', phone: '+14085550001' }));
      patients.upsertByPhone(patientInput({ name: 'Amy', phone: '+14085550002' }));
      expect(patients.getAll().map((p) => p.name)).toEqual(['Amy', 'Zed']);
      expect(patients.getAll(1, 1).map((p) => p.name)).toEqual(['Zed']);
    });
  });

  describe('AppointmentModel', () => {
    let patientId: number;

    function visit(day: string, hour: number, overrides: Partial<AppointmentUpsert> = {}): AppointmentUpsert {
      return {
        patientId,
        therapist: 'Kim',
        start: zonedDateTime(day, hour, 0, TEST_TIME_ZONE),
        durationMinutes: 60,
        status: 'pending',
        source: 'manual',
        note: '',
        ...overrides,
      };
    }

    beforeEach(() => {
      patientId = patients.upsertByPhone(patientInput()).id;
    });

    it('creates one appointment per patient per local day', () => {
      const first = appointments.upsertForDay(visit('2024-01-05', 10));
      const second = appointments.upsertForDay(visit('2024-01-05', 14, { status: 'confirmed' }));

      expect(first.created).toBe(true);
      expect(second.created).toBe(false);
      expect(second.appointment.id).toBe(first.appointment.id);
      expect(second.appointment.start_at).toBe('2024-01-05T22:00:00.000Z');
      expect(second.appointment.status).toBe('confirmed');
      expect(appointments.listForDay('2024-01-05')).toHaveLength(1);
    });

    it('is idempotent for identical input', () => {
      appointments.upsertForDay(visit('2024-01-05', 10));
      const again = appointments.upsertForDay(visit('2024-01-05', 10));

      expect(again.created).toBe(false);
      expect(appointments.listForDay('2024-01-05')).toHaveLength(1);
    });

    it('keeps appointments on different days apart', () => {
      appointments.upsertForDay(visit('2024-01-05', 10));
      const other = appointments.upsertForDay(visit('2024-01-06', 10));

      expect(other.created).toBe(true);
      expect(appointments.listForDay('2024-01-05')).toHaveLength(1);
      expect(appointments.listForDay('2024-01-06')).toHaveLength(1);
    });

    it('buckets late-evening visits into the local day', () => {
      // 23:30 Pacific is already the next day in UTC
      appointments.upsertForDay({ ...visit('2024-01-05', 0), start: zonedDateTime('2024-01-05', 23, 30, TEST_TIME_ZONE) });

      expect(appointments.listForDay('2024-01-05')).toHaveLength(1);
      expect(appointments.listForDay('2024-01-06')).toHaveLength(0);
    });

    it('lists a day in start order with patient fields and a case-insensitive therapist filter', () => {
      const other = patients.upsertByPhone(patientInput({ name: 'Bo', phone: '+14085550222', therapist: 'Lee' }));
      appointments.upsertForDay(visit('2024-01-05', 15));
      appointments.upsertForDay({ ...visit('2024-01-05', 9), patientId: other.id, therapist: 'Lee' });

      const day = appointments.listForDay('2024-01-05');
      expect(day.map((a) => a.patient_name)).toEqual(['Bo', 'Test Patient']);
      expect(day[1]).toMatchObject({ patient_phone: '+14085550111', city: 'San Jose', latitude: 37.3 });

      expect(appointments.listForDay('2024-01-05', 'kim').map((a) => a.therapist)).toEqual(['Kim']);
      expect(appointments.listForDay('2024-01-05', 'Nobody')).toEqual([]);
    });

    it('updates status and reports missing appointments', () => {
      const { appointment } = appointments.upsertForDay(visit('2024-01-05', 10));

      expect(appointments.updateStatus(appointment.id, 'canceled')?.status).toBe('canceled');
      expect(appointments.updateStatus(999, 'canceled')).toBeNull();
    });
  });

  describe('MessageModel', () => {
    it('appends with defaults and lists newest first', () => {
      messages.append({ direction: 'in', channel: 'simulate', from: '+14085550111', to: '', body: 'first', timestamp: '2024-01-01T10:00:00.000Z' });
      const second = messages.append({ direction: 'out', channel: 'mock', from: '', to: '+14085550111', body: 'second', timestamp: '2024-01-01T10:00:01.000Z' });

      expect(second).toMatchObject({ intent: 'other', note: '', provider_message_id: null });
      expect(messages.list(10).map((m) => m.body)).toEqual(['second', 'first']);
      expect(messages.list(1).map((m) => m.body)).toEqual(['second']);
    });

    it('breaks timestamp ties by insertion order', () => {
      const at = '2024-01-01T10:00:00.000Z';
      messages.append({ direction: 'in', channel: 'simulate', from: 'a', to: '', body: 'one', timestamp: at });
      messages.append({ direction: 'in', channel: 'simulate', from: 'a', to: '', body: 'two', timestamp: at });

      expect(messages.list(10).map((m) => m.body)).toEqual(['two', 'one']);
    });

    it('searches bodies case-insensitively', () => {
      messages.append({ direction: 'in', channel: 'simulate', from: 'a', to: '', body: 'See you FRIDAY' });
      messages.append({ direction: 'in', channel: 'simulate', from: 'a', to: '', body: 'monday then' });

      expect(messages.list(10, 'friday').map((m) => m.body)).toEqual(['See you FRIDAY']);
    });

    it('clamps the page size', () => {
      messages.append({ direction: 'in', channel: 'simulate', from: 'a', to: '', body: 'only' });
      expect(messages.list(0)).toHaveLength(1);
      expect(messages.list(-5)).toHaveLength(1);
    });

    it('counts intents', () => {
      messages.append({ direction: 'in', channel: 'simulate', from: 'a', to: '', body: 'yes', intent: 'confirm' });
      messages.append({ direction: 'in', channel: 'simulate', from: 'a', to: '', body: 'ok', intent: 'confirm' });
      messages.append({ direction: 'in', channel: 'simulate', from: 'a', to: '', body: '3pm', intent: 'time' });

      expect(messages.countByIntent()).toEqual([
        { intent: 'confirm', count: 2 },
        { intent: 'time', count: 1 },
      ]);
    });
  });
});
