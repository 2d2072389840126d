import { v4 as uuidv4 } from 'uuid';
import logger from '../../utils/logger';
import { SmsProvider, SmsSendResult } from './types';

/**
 * Accepts every message without sending anything
 */
export class MockSmsProvider implements SmsProvider {
  readonly channel = 'mock' as const;

  async send(to: string, body: string): Promise<SmsSendResult> {
    logger.info('Mock SMS send', { to, length: body.length });
    return { providerMessageId: `mock-${uuidv4()}`, status: 'mock-sent' };
  }
}
