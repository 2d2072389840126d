import { describe, it, expect } from 'vitest';
import { openDatabase } from '../src/config/database';
import { AppServices } from '../src/container';
import { seedDemoData } from '../src/database/seed';
import { AppointmentModel } from '../src/models/Appointment';
import { PatientModel } from '../src/models/Patient';
import { OfflineMapsProvider } from '../src/services/maps';
import { ScheduleService } from '../src/services/scheduleService';
import { PatientInput } from '../src/types/domain';
import { zonedDateTime } from '../src/utils/date';
import { addPatient, createTestServices, FakeMapsProvider, MONDAY_MORNING, TEST_TIME_ZONE } from './helpers';

const DAY = '2024-01-05';

async function book(services: AppServices, hour: number, patient: Partial<PatientInput>): Promise<void> {
  const stored = await addPatient(services, patient);
  services.appointments.upsertForDay({
    patientId: stored.id,
    therapist: stored.therapist,
    start: zonedDateTime(DAY, hour, 0, TEST_TIME_ZONE),
    durationMinutes: 45,
    status: 'pending',
    source: 'manual',
    note: '',
  });
}

async function bookDay(services: AppServices): Promise<void> {
  await book(services, 9, { name: 'Ann', phone: '+14085550001', latitude: 37.0, longitude: -122.0 });
  await book(services, 10, { name: 'Ben', phone: '+14085550002', latitude: 37.0, longitude: -122.2 });
  await book(services, 11, { name: 'Cal', phone: '+14085550003', latitude: 37.0, longitude: -122.1 });
  await book(services, 8, { name: 'Dee', phone: '+14085550004', latitude: null, longitude: null });
}

describe('ScheduleService', () => {
  it('lists the day chronologically without route data', async () => {
    const services = createTestServices();
    await bookDay(services);

    const day = await services.schedule.getDay(DAY);

    expect(day).toMatchObject({ date: DAY, therapist: null, optimized: false, drive_time: false });
    expect(day.appointments.map((s) => s.patient_name)).toEqual(['Dee', 'Ann', 'Ben', 'Cal']);
    expect(day.appointments[0]).toMatchObject({
      patient_phone: '+14085550004',
      start_iso: '2024-01-05T08:00:00-08:00',
      duration_minutes: 45,
      lat: null,
      lon: null,
    });
    expect(day.appointments[1].drive_to_next_seconds).toBeUndefined();
  });

  it('orders by nearest neighbor and annotates estimated legs', async () => {
    const services = createTestServices();
    await bookDay(services);

    const day = await services.schedule.getDay(DAY, undefined, { optimize: true });
    const [ann, cal, ben, dee] = day.appointments;

    expect(day.optimized).toBe(true);
    expect(day.appointments.map((s) => s.patient_name)).toEqual(['Ann', 'Cal', 'Ben', 'Dee']);
    expect(ann.drive_to_next_source).toBe('estimate');
    expect(ann.drive_to_next_km).toBeCloseTo(8.88, 1);
    expect(ann.drive_to_next_text).toBe('13 mins');
    expect(cal.drive_to_next_source).toBe('estimate');
    // next stop has no coordinates
    expect(ben.drive_to_next_seconds).toBeUndefined();
    expect(dee.drive_to_next_seconds).toBeUndefined();
  });

  it('uses maps drive times when the provider answers', async () => {
    const maps = new FakeMapsProvider({
      drive: () => ({ seconds: 600, meters: 5000, text: '10 mins' }),
    });
    const services = createTestServices({}, { maps });
    await bookDay(services);

    const day = await services.schedule.getDay(DAY, undefined, { optimize: true });

    expect(day.drive_time).toBe(true);
    expect(day.appointments.map((s) => s.patient_name)).toEqual(['Ann', 'Ben', 'Cal', 'Dee']);
    expect(day.appointments[0]).toMatchObject({
      drive_to_next_seconds: 600,
      drive_to_next_text: '10 mins',
      drive_to_next_km: 5,
      drive_to_next_source: 'maps',
    });
  });

  it('filters by therapist', async () => {
    const services = createTestServices();
    await bookDay(services);
    await book(services, 12, { name: 'Eve', phone: '+14085550005', therapist: 'Lee' });

    const day = await services.schedule.getDay(DAY, 'lee');

    expect(day.therapist).toBe('lee');
    expect(day.appointments.map((s) => s.patient_name)).toEqual(['Eve']);
  });

  it('returns an empty day', async () => {
    const services = createTestServices();
    const day = await services.schedule.getDay('2024-02-01', undefined, { optimize: true });
    expect(day.appointments).toEqual([]);
  });

  it('resolves today in the clinic time zone', () => {
    const services = createTestServices();
    expect(services.schedule.today(MONDAY_MORNING)).toBe('2024-01-01');
    expect(services.schedule.today(new Date('2024-01-02T05:00:00.000Z'))).toBe('2024-01-01');
  });
});

describe('seedDemoData', () => {
  it('seeds three visits for today and can run twice', async () => {
    const { db } = openDatabase(':memory:');
    const patients = new PatientModel(db);
    const appointments = new AppointmentModel(db, TEST_TIME_ZONE);

    seedDemoData(patients, appointments, TEST_TIME_ZONE, MONDAY_MORNING);
    seedDemoData(patients, appointments, TEST_TIME_ZONE, MONDAY_MORNING);

    const schedule = new ScheduleService(appointments, new OfflineMapsProvider(), TEST_TIME_ZONE, 40);
    const day = await schedule.getDay('2024-01-01', 'Demo Therapist');

    expect(patients.getAll()).toHaveLength(3);
    expect(day.appointments.map((s) => s.start_iso)).toEqual([
      '2024-01-01T09:30:00-08:00',
      '2024-01-01T11:00:00-08:00',
      '2024-01-01T13:00:00-08:00',
    ]);
  });
});
