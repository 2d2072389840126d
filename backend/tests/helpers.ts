import { Server } from 'http';
import { Application } from 'express';
import { buildConfig, AppConfig } from '../src/config/env';
import { openDatabase } from '../src/config/database';
import { AppServices, createServices, ServiceOverrides } from '../src/container';
import { DriveEstimate, MapsProvider, Place } from '../src/services/maps';
import { SmsProvider, SmsSendError, SmsSendResult } from '../src/services/sms';
import { Coordinates, Patient, PatientInput } from '../src/types/domain';

export const TEST_TIME_ZONE = 'America/Los_Angeles';
export const TEST_TOKEN = 'test-secret';

/** Monday 2024-01-01 10:00 in Los Angeles */
export const MONDAY_MORNING = new Date('2024-01-01T18:00:00.000Z');

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return buildConfig({
    NODE_ENV: 'test',
    DATABASE_PATH: ':memory:',
    TIMEZONE: TEST_TIME_ZONE,
    DEBUG_TOKEN: TEST_TOKEN,
    ...env,
  });
}

export function createTestServices(
  env: Record<string, string> = {},
  overrides: ServiceOverrides = {}
): AppServices {
  return createServices(testConfig(env), openDatabase(':memory:'), {
    now: () => MONDAY_MORNING,
    ...overrides,
  });
}

export function patientInput(overrides: Partial<PatientInput> = {}): PatientInput {
  return {
    name: 'Test Patient',
    phone: '+14085550111',
    address: '1 Main St',
    city: 'San Jose',
    state: 'CA',
    zip: '95113',
    latitude: 37.3,
    longitude: -121.9,
    therapist: 'Kim',
    notes: '',
    ...overrides,
  };
}

export function addPatient(services: AppServices, overrides: Partial<PatientInput> = {}): Promise<Patient> {
  return services.patients.upsert(patientInput(overrides));
}

/**
 * SMS provider that records what it was asked to send, or rejects every send
 */
export class RecordingSmsProvider implements SmsProvider {
  readonly channel = 'live' as const;
  readonly sent: Array<{ to: string; body: string }> = [];

  constructor(private readonly failWith?: string) {}

  async send(to: string, body: string): Promise<SmsSendResult> {
    if (this.failWith) {
      throw new SmsSendError(this.failWith, 400);
    }
    this.sent.push({ to, body });
    return { providerMessageId: `SM${this.sent.length}`, status: 'queued' };
  }
}

/**
 * Live-mode maps provider with canned answers
 */
export class FakeMapsProvider implements MapsProvider {
  readonly mode = 'live' as const;
  geocodeCalls = 0;
  driveCalls = 0;

  constructor(
    private readonly options: {
      location?: Coordinates | null;
      drive?: (origin: Place, destination: Place) => DriveEstimate | null;
    } = {}
  ) {}

  async geocode(_address: string): Promise<Coordinates | null> {
    this.geocodeCalls += 1;
    return this.options.location ?? null;
  }

  async driveTime(origin: Place, destination: Place): Promise<DriveEstimate | null> {
    this.driveCalls += 1;
    return this.options.drive ? this.options.drive(origin, destination) : null;
  }
}

export async function listen(app: Application): Promise<{ server: Server; baseUrl: string }> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address && typeof address === 'object') {
        resolve({ server, baseUrl: `http://127.0.0.1:${address.port}` });
      } else {
        reject(new Error('server has no TCP address'));
      }
    });
    server.on('error', reject);
  });
}

export function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
