import { AppointmentModel } from '../models/Appointment';
import { PatientModel } from '../models/Patient';
import { PatientInput } from '../types/domain';
import { localDay, zonedDateTime } from '../utils/date';
import logger from '../utils/logger';

/**
 * Demo data: three patients on one therapist's route with visits today.
 * Idempotent: patients upsert by phone and visits upsert by day.
 */

const DEMO_PATIENTS: Array<PatientInput & { visit: { hour: number; minute: number } }> = [
  {
    name: 'John Doe',
    phone: '+14085550100',
    address: '10600 N Tantau Ave',
    city: 'Cupertino',
    state: 'CA',
    zip: '95014',
    latitude: 37.3318,
    longitude: -122.0090,
    therapist: 'Demo Therapist',
    notes: 'demo',
    visit: { hour: 9, minute: 30 },
  },
  {
    name: 'Jane Smith',
    phone: '+14085550101',
    address: '1500 Charleston Rd',
    city: 'Mountain View',
    state: 'CA',
    zip: '94043',
    latitude: 37.4220,
    longitude: -122.0841,
    therapist: 'Demo Therapist',
    notes: 'demo',
    visit: { hour: 11, minute: 0 },
  },
  {
    name: 'Ana Lopez',
    phone: '+14085550102',
    address: '200 E Santa Clara St',
    city: 'San Jose',
    state: 'CA',
    zip: '95113',
    latitude: 37.3382,
    longitude: -121.8863,
    therapist: 'Demo Therapist',
    notes: 'demo',
    visit: { hour: 13, minute: 0 },
  },
];

export function seedDemoData(
  patients: PatientModel,
  appointments: AppointmentModel,
  timeZone: string,
  now: Date = new Date()
): void {
  const today = localDay(now, timeZone);

  for (const { visit, ...patient } of DEMO_PATIENTS) {
    const stored = patients.upsertByPhone(patient);
    appointments.upsertForDay({
      patientId: stored.id,
      therapist: stored.therapist,
      start: zonedDateTime(today, visit.hour, visit.minute, timeZone),
      durationMinutes: 60,
      status: 'pending',
      source: 'system',
      note: 'demo visit',
    });
  }

  logger.info('Demo data seeded', { day: today, patients: DEMO_PATIENTS.length });
}
