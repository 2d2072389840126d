import { MessageModel } from '../models/Message';
import { Intent, Message } from '../types/domain';
import { SmsProvider, SmsSendError } from './sms';

/**
 * Outbound messaging
 * Every attempt is logged, including the ones the provider rejects
 */

export type SendOutcome =
  | { status: 'sent'; providerStatus: string; providerMessageId: string; message: Message }
  | { status: 'failed'; error: string; message: Message };

export interface SendOptions {
  from?: string;
  intent?: Intent;
  note?: string;
}

export class MessagingService {
  constructor(
    private readonly messages: MessageModel,
    private readonly sms: SmsProvider
  ) {}

  get channel(): SmsProvider['channel'] {
    return this.sms.channel;
  }

  async send(to: string, body: string, options: SendOptions = {}): Promise<SendOutcome> {
    try {
      const result = await this.sms.send(to, body);
      const message = this.messages.append({
        direction: 'out',
        channel: this.sms.channel,
        intent: options.intent,
        from: options.from ?? '',
        to,
        body,
        note: options.note ?? '',
        provider_message_id: result.providerMessageId,
      });
      return {
        status: 'sent',
        providerStatus: result.status,
        providerMessageId: result.providerMessageId,
        message,
      };
    } catch (error) {
      if (!(error instanceof SmsSendError)) {
        throw error;
      }
      const message = this.messages.append({
        direction: 'out',
        channel: this.sms.channel,
        intent: options.intent,
        from: options.from ?? '',
        to,
        body,
        note: options.note ? `${options.note}; send-failed` : 'send-failed',
      });
      return { status: 'failed', error: error.message, message };
    }
  }
}
