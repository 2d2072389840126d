import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

/**
 * Application Configuration
 * Reads process.env once at startup into a validated, typed object
 */

export const SERVICE_NAME = 'Home Health Assistant';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => value?.trim() || '');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.string().default('development'),
  DATABASE_PATH: z.string().default('./data/home-health.db'),
  TIMEZONE: z.string().default('America/Los_Angeles'),
  SEED_DEMO_DATA: booleanFlag.default('false'),

  APP_VERSION: z.string().default('1.0.0'),
  BUILD_ID: z.string().optional(),
  RENDER_GIT_COMMIT: z.string().optional(),
  RENDER_REGION: z.string().default('local'),

  DEBUG_TOKEN: optionalSecret,
  FRONTEND_URL: z.string().optional(),

  TWILIO_ACCOUNT_SID: optionalSecret,
  TWILIO_AUTH_TOKEN: optionalSecret,
  TWILIO_MESSAGING_SERVICE_SID: optionalSecret,
  TWILIO_API_BASE: z.string().url().default('https://api.twilio.com'),
  SMS_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  AUTO_REPLY: booleanFlag.default('true'),

  GOOGLE_MAPS_API_KEY: optionalSecret,
  GOOGLE_MAPS_API_BASE: z.string().url().default('https://maps.googleapis.com'),
  MAPS_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  ROUTE_FALLBACK_SPEED_KMH: z.coerce.number().positive().default(40),

  ADMIN_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(50),
  RATE_LIMIT_WINDOW_SEC: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_MAX_SIMULATE: z.coerce.number().int().positive().default(30),
});

export interface TwilioSettings {
  accountSid: string;
  authToken: string;
  messagingServiceSid: string;
  apiBase: string;
  timeoutMs: number;
}

export interface MapsSettings {
  apiKey: string;
  apiBase: string;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  databasePath: string;
  timeZone: string;
  seedDemoData: boolean;
  version: string;
  buildId: string;
  gitCommit: string;
  region: string;
  debugToken: string;
  frontendUrl?: string;
  /** null when the Twilio credentials are incomplete, which selects the mock provider */
  twilio: TwilioSettings | null;
  /** null when no API key is set, which selects the offline provider */
  maps: MapsSettings | null;
  autoReply: boolean;
  routeFallbackSpeedKmh: number;
  adminPageSize: number;
  rateLimit: {
    windowMs: number;
    maxSimulate: number;
  };
}

/**
 * Build configuration from an environment map.
 * Tests pass their own map; the server passes process.env.
 */
export function buildConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  const twilioReady = Boolean(
    e.TWILIO_ACCOUNT_SID && e.TWILIO_AUTH_TOKEN && e.TWILIO_MESSAGING_SERVICE_SID
  );
  const buildId = e.BUILD_ID || e.RENDER_GIT_COMMIT || 'local';

  return {
    port: e.PORT,
    host: e.HOST,
    nodeEnv: e.NODE_ENV,
    databasePath: e.DATABASE_PATH,
    timeZone: e.TIMEZONE,
    seedDemoData: e.SEED_DEMO_DATA,
    version: e.APP_VERSION,
    buildId,
    gitCommit: e.RENDER_GIT_COMMIT || buildId,
    region: e.RENDER_REGION,
    debugToken: e.DEBUG_TOKEN,
    frontendUrl: e.FRONTEND_URL,
    twilio: twilioReady
      ? {
          accountSid: e.TWILIO_ACCOUNT_SID,
          authToken: e.TWILIO_AUTH_TOKEN,
          messagingServiceSid: e.TWILIO_MESSAGING_SERVICE_SID,
          apiBase: e.TWILIO_API_BASE,
          timeoutMs: e.SMS_TIMEOUT_MS,
        }
      : null,
    maps: e.GOOGLE_MAPS_API_KEY
      ? {
          apiKey: e.GOOGLE_MAPS_API_KEY,
          apiBase: e.GOOGLE_MAPS_API_BASE,
          timeoutMs: e.MAPS_TIMEOUT_MS,
        }
      : null,
    autoReply: e.AUTO_REPLY,
    routeFallbackSpeedKmh: e.ROUTE_FALLBACK_SPEED_KMH,
    adminPageSize: e.ADMIN_PAGE_SIZE,
    rateLimit: {
      windowMs: e.RATE_LIMIT_WINDOW_SEC * 1000,
      maxSimulate: e.RATE_LIMIT_MAX_SIMULATE,
    },
  };
}
