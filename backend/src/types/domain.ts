/**
 * Domain type definitions
 * Row shapes match the SQLite schema in database/migrations/001_initial_schema.ts
 */

export const INTENTS = ['confirm', 'reschedule', 'cancel', 'time', 'other'] as const;
export type Intent = (typeof INTENTS)[number];

export type MessageDirection = 'in' | 'out';
export type MessageChannel = 'live' | 'mock' | 'simulate';

export interface Message {
  id: number;
  timestamp: string;
  direction: MessageDirection;
  channel: MessageChannel;
  intent: Intent;
  from: string;
  to: string;
  body: string;
  note: string;
  provider_message_id: string | null;
}

export type NewMessage = Omit<Message, 'id' | 'timestamp' | 'provider_message_id' | 'intent' | 'note'> & {
  timestamp?: string;
  intent?: Intent;
  note?: string;
  provider_message_id?: string | null;
};

export interface Patient {
  id: number;
  name: string;
  phone: string;
  address: string;
  city: string;
  state: string;
  zip: string;
  latitude: number | null;
  longitude: number | null;
  therapist: string;
  notes: string;
  created_at?: string;
  updated_at?: string;
}

export type PatientInput = Omit<Patient, 'id' | 'created_at' | 'updated_at'>;

export const APPOINTMENT_STATUSES = ['pending', 'confirmed', 'reschedule', 'canceled'] as const;
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

export const APPOINTMENT_SOURCES = ['inbound', 'manual', 'system'] as const;
export type AppointmentSource = (typeof APPOINTMENT_SOURCES)[number];

export interface Appointment {
  id: number;
  patient_id: number;
  therapist: string;
  start_at: string;
  duration_minutes: number;
  status: AppointmentStatus;
  source: AppointmentSource;
  note: string;
  created_at?: string;
  updated_at?: string;
}

export interface AppointmentUpsert {
  patientId: number;
  therapist: string;
  start: Date;
  durationMinutes: number;
  status: AppointmentStatus;
  source: AppointmentSource;
  note: string;
}

/**
 * Appointment joined with the patient fields the day view needs
 */
export interface DayAppointment extends Appointment {
  patient_name: string;
  patient_phone: string;
  address: string;
  city: string;
  state: string;
  zip: string;
  latitude: number | null;
  longitude: number | null;
}

export interface Coordinates {
  lat: number;
  lon: number;
}
