import { PatientModel } from '../models/Patient';
import { Patient, PatientInput } from '../types/domain';
import logger from '../utils/logger';
import { normalizePhone } from '../utils/phone';
import { MapsProvider } from './maps';

/**
 * Patient Directory
 * Upserts by normalized phone and fills in coordinates when a maps provider is live
 */

export type PatientDraft = Omit<PatientInput, 'latitude' | 'longitude'> & {
  latitude?: number | null;
  longitude?: number | null;
};

export function formatAddress(patient: Pick<Patient, 'address' | 'city' | 'state' | 'zip'>): string {
  const region = [patient.state, patient.zip].filter(Boolean).join(' ');
  return [patient.address, patient.city, region].filter(Boolean).join(', ');
}

export class PatientService {
  constructor(
    private readonly patients: PatientModel,
    private readonly maps: MapsProvider
  ) {}

  findByPhone(phone: string): Patient | null {
    const normalized = normalizePhone(phone);
    return normalized ? this.patients.getByPhone(normalized) : null;
  }

  getById(id: number): Patient | null {
    return this.patients.getById(id);
  }

  list(limit?: number, offset?: number): Patient[] {
    return this.patients.getAll(limit, offset);
  }

  async upsert(draft: PatientDraft): Promise<Patient> {
    let latitude = draft.latitude ?? null;
    let longitude = draft.longitude ?? null;

    const address = formatAddress(draft);
    if ((latitude === null || longitude === null) && address && this.maps.mode === 'live') {
      const location = await this.maps.geocode(address);
      if (location) {
        latitude = location.lat;
        longitude = location.lon;
      } else {
        logger.warn('Geocoding skipped for patient', { phone: draft.phone });
      }
    }

    return this.patients.upsertByPhone({
      ...draft,
      phone: normalizePhone(draft.phone),
      latitude,
      longitude,
    });
  }
}
