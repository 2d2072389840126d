import { AppConfig } from './config/env';
import { OpenedDatabase, StoreMode } from './config/database';
import { AppointmentModel } from './models/Appointment';
import { MessageModel } from './models/Message';
import { PatientModel } from './models/Patient';
import { InboundMessageService } from './services/inboundMessageService';
import { createMapsProvider, MapsProvider } from './services/maps';
import { MessagingService } from './services/messagingService';
import { RequestMetrics } from './services/metricsService';
import { PatientService } from './services/patientService';
import { ScheduleService } from './services/scheduleService';
import { createSmsProvider, SmsProvider } from './services/sms';

/**
 * Service wiring.
 * Providers are chosen once here from configuration; handlers only see interfaces.
 */

export interface AppServices {
  config: AppConfig;
  storeMode: StoreMode;
  sms: SmsProvider;
  maps: MapsProvider;
  messages: MessageModel;
  appointments: AppointmentModel;
  patients: PatientService;
  messaging: MessagingService;
  inbound: InboundMessageService;
  schedule: ScheduleService;
  metrics: RequestMetrics;
  /** Clock used for "today" and for parsing relative times */
  now: () => Date;
}

export interface ServiceOverrides {
  sms?: SmsProvider;
  maps?: MapsProvider;
  now?: () => Date;
}

export function createServices(
  config: AppConfig,
  database: OpenedDatabase,
  overrides: ServiceOverrides = {}
): AppServices {
  const sms = overrides.sms ?? createSmsProvider(config);
  const maps = overrides.maps ?? createMapsProvider(config);
  const now = overrides.now ?? (() => new Date());

  const messages = new MessageModel(database.db);
  const appointments = new AppointmentModel(database.db, config.timeZone);
  const patients = new PatientService(new PatientModel(database.db), maps);
  const messaging = new MessagingService(messages, sms);

  return {
    config,
    storeMode: database.mode,
    sms,
    maps,
    messages,
    appointments,
    patients,
    messaging,
    inbound: new InboundMessageService(
      messages,
      appointments,
      patients,
      messaging,
      config.timeZone,
      config.autoReply
    ),
    schedule: new ScheduleService(appointments, maps, config.timeZone, config.routeFallbackSpeedKmh),
    metrics: new RequestMetrics(),
    now,
  };
}
