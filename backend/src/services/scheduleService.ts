import { AppointmentModel } from '../models/Appointment';
import { DayAppointment } from '../types/domain';
import { formatLocalIso, localDay } from '../utils/date';
import { hasCoordinates } from '../utils/geo';
import logger from '../utils/logger';
import { MapsProvider } from './maps';
import { coordinatesOf, createLegEstimator, optimizeRoute } from './routeOptimizer';

/**
 * Day Schedule View
 * Read-only: builds the ordered stop list for a date and, optionally, a therapist
 */

export interface ScheduleStop {
  appointment_id: number;
  patient_id: number;
  patient_name: string;
  patient_phone: string;
  therapist: string;
  start_iso: string;
  duration_minutes: number;
  status: DayAppointment['status'];
  source: DayAppointment['source'];
  note: string;
  address: string;
  city: string;
  state: string;
  zip: string;
  lat: number | null;
  lon: number | null;
  drive_to_next_seconds?: number;
  drive_to_next_text?: string;
  drive_to_next_km?: number;
  drive_to_next_source?: 'maps' | 'estimate';
}

export interface DaySchedule {
  date: string;
  therapist: string | null;
  optimized: boolean;
  drive_time: boolean;
  appointments: ScheduleStop[];
}

export interface DayScheduleOptions {
  optimize?: boolean;
}

export class ScheduleService {
  constructor(
    private readonly appointments: AppointmentModel,
    private readonly maps: MapsProvider,
    private readonly timeZone: string,
    private readonly fallbackSpeedKmh: number
  ) {}

  today(now: Date = new Date()): string {
    return localDay(now, this.timeZone);
  }

  async getDay(date: string, therapist?: string, options: DayScheduleOptions = {}): Promise<DaySchedule> {
    const rows = this.appointments.listForDay(date, therapist);
    const stops = rows.map((row) => this.toStop(row));

    if (!options.optimize) {
      return {
        date,
        therapist: therapist || null,
        optimized: false,
        drive_time: this.maps.mode === 'live',
        appointments: stops,
      };
    }

    const estimateLeg = createLegEstimator(this.maps, this.fallbackSpeedKmh);
    const ordered = await optimizeRoute(rows, estimateLeg);
    const byId = new Map(stops.map((stop) => [stop.appointment_id, stop]));
    const orderedStops = ordered.map((row) => byId.get(row.id) ?? this.toStop(row));

    for (let i = 0; i < ordered.length - 1; i++) {
      const from = ordered[i];
      const to = ordered[i + 1];
      if (!hasCoordinates(from) || !hasCoordinates(to)) {
        continue;
      }
      const leg = await estimateLeg(coordinatesOf(from), coordinatesOf(to));
      const stop = orderedStops[i];
      stop.drive_to_next_seconds = leg.seconds;
      stop.drive_to_next_text = leg.text;
      stop.drive_to_next_km = Math.round(leg.meters) / 1000;
      stop.drive_to_next_source = leg.source;
    }

    logger.info('Route optimized', {
      date,
      therapist,
      stops: orderedStops.length,
      mapsMode: this.maps.mode,
    });

    return {
      date,
      therapist: therapist || null,
      optimized: true,
      drive_time: this.maps.mode === 'live',
      appointments: orderedStops,
    };
  }

  private toStop(row: DayAppointment): ScheduleStop {
    return {
      appointment_id: row.id,
      patient_id: row.patient_id,
      patient_name: row.patient_name,
      patient_phone: row.patient_phone,
      therapist: row.therapist,
      start_iso: formatLocalIso(new Date(row.start_at), this.timeZone),
      duration_minutes: row.duration_minutes,
      status: row.status,
      source: row.source,
      note: row.note,
      address: row.address,
      city: row.city,
      state: row.state,
      zip: row.zip,
      lat: row.latitude,
      lon: row.longitude,
    };
  }
}
