/**
 * SMS provider contract
 */

export interface SmsSendResult {
  providerMessageId: string;
  /** Provider's own delivery state, e.g. "queued" or "mock-sent" */
  status: string;
}

export interface SmsProvider {
  /** Channel recorded on messages sent through this provider */
  readonly channel: 'live' | 'mock';
  /** Rejects with SmsSendError when the provider refuses or cannot be reached */
  send(to: string, body: string): Promise<SmsSendResult>;
}

export class SmsSendError extends Error {
  constructor(
    message: string,
    public readonly providerStatus?: number
  ) {
    super(message);
    this.name = 'SmsSendError';
  }
}
