import axios, { AxiosError, AxiosInstance } from 'axios';
import { z } from 'zod';
import { TwilioSettings } from '../../config/env';
import { loggers } from '../../utils/logger';
import { SmsProvider, SmsSendError, SmsSendResult } from './types';

/**
 * Twilio Programmable Messaging client (REST, form-encoded)
 */

const PROVIDER = 'twilio';

const MessageResourceSchema = z.object({
  sid: z.string(),
  status: z.string(),
});

export class TwilioSmsProvider implements SmsProvider {
  readonly channel = 'live' as const;
  private readonly http: AxiosInstance;

  constructor(private readonly settings: TwilioSettings) {
    this.http = axios.create({
      baseURL: settings.apiBase,
      timeout: settings.timeoutMs,
      auth: { username: settings.accountSid, password: settings.authToken },
    });
  }

  async send(to: string, body: string): Promise<SmsSendResult> {
    const form = new URLSearchParams({
      To: to,
      MessagingServiceSid: this.settings.messagingServiceSid,
      Body: body,
    });

    try {
      loggers.providerRequest(PROVIDER, 'messages.create', { to });

      const response = await this.http.post(
        `/2010-04-01/Accounts/${encodeURIComponent(this.settings.accountSid)}/Messages.json`,
        form.toString(),
        { headers: { 'Content-Type': 'application/x-www-form-urlencoded' } }
      );

      const parsed = MessageResourceSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new SmsSendError('Twilio returned an unexpected message resource');
      }
      return { providerMessageId: parsed.data.sid, status: parsed.data.status };
    } catch (error) {
      if (error instanceof SmsSendError) {
        loggers.providerError(PROVIDER, 'messages.create', error.message, false);
        throw error;
      }

      const status = error instanceof AxiosError ? error.response?.status : undefined;
      const message = error instanceof Error ? error.message : String(error);
      loggers.providerError(PROVIDER, 'messages.create', message, false);
      throw new SmsSendError(`Twilio send failed: ${message}`, status);
    }
  }
}
