import { AppConfig } from '../../config/env';
import { MockSmsProvider } from './mockSmsProvider';
import { TwilioSmsProvider } from './twilioSmsProvider';
import { SmsProvider } from './types';

export * from './types';
export { MockSmsProvider } from './mockSmsProvider';
export { TwilioSmsProvider } from './twilioSmsProvider';

export function createSmsProvider(config: AppConfig): SmsProvider {
  return config.twilio ? new TwilioSmsProvider(config.twilio) : new MockSmsProvider();
}
