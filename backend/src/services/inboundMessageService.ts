import { formatInTimeZone } from 'date-fns-tz';
import { AppointmentModel } from '../models/Appointment';
import { MessageModel } from '../models/Message';
import { Appointment, AppointmentStatus, Intent, MessageChannel } from '../types/domain';
import logger from '../utils/logger';
import { normalizePhone } from '../utils/phone';
import { classifyIntent } from './intentClassifier';
import { MessagingService, SendOutcome } from './messagingService';
import { PatientService } from './patientService';
import { DEFAULT_DURATION_MINUTES, ParseStatus, parseAppointmentTime } from './timeParser';

/**
 * Inbound message pipeline: classify, parse a time, correlate the sender to a
 * patient, upsert that day's appointment, log, and optionally text back.
 */

export interface InboundMessage {
  from: string;
  to?: string;
  body: string;
  channel: Extract<MessageChannel, 'live' | 'simulate'>;
  providerMessageId?: string;
}

export interface InboundResult {
  intent: Intent;
  parse: {
    status: ParseStatus;
    start: string | null;
    durationMinutes: number | null;
  };
  patientId: number | null;
  appointmentId: number | null;
  appointmentCreated: boolean | null;
  messageId: number;
  reply:
    | { status: 'skipped' }
    | { status: 'sent'; providerMessageId: string; body: string }
    | { status: 'failed'; error: string; body: string };
}

const STATUS_BY_INTENT: Record<Intent, AppointmentStatus> = {
  confirm: 'confirmed',
  reschedule: 'reschedule',
  cancel: 'canceled',
  time: 'pending',
  other: 'pending',
};

export function statusForIntent(intent: Intent): AppointmentStatus {
  return STATUS_BY_INTENT[intent];
}

export class InboundMessageService {
  constructor(
    private readonly messages: MessageModel,
    private readonly appointments: AppointmentModel,
    private readonly patients: PatientService,
    private readonly messaging: MessagingService,
    private readonly timeZone: string,
    private readonly autoReply: boolean
  ) {}

  async handle(inbound: InboundMessage, now: Date = new Date()): Promise<InboundResult> {
    const body = inbound.body.trim();
    const intent = classifyIntent(body);
    const parsed = parseAppointmentTime(body, now, this.timeZone);
    const patient = this.patients.findByPhone(inbound.from);

    let appointment: Appointment | null = null;
    let created: boolean | null = null;
    let note: string;

    if (!patient) {
      note = 'unknown patient';
    } else if (parsed.status !== 'ok' || !parsed.start) {
      note = parsed.status === 'invalid_time' ? 'invalid time' : 'no time found';
    } else {
      const result = this.appointments.upsertForDay({
        patientId: patient.id,
        therapist: patient.therapist,
        start: parsed.start,
        durationMinutes: parsed.durationMinutes ?? DEFAULT_DURATION_MINUTES,
        status: statusForIntent(intent),
        source: 'inbound',
        note: body,
      });
      appointment = result.appointment;
      created = result.created;
      note = `appointment ${appointment.id} ${created ? 'created' : 'updated'}`;
    }

    const message = this.messages.append({
      direction: 'in',
      channel: inbound.channel,
      intent,
      from: normalizePhone(inbound.from) || inbound.from,
      to: inbound.to ?? '',
      body,
      note,
      provider_message_id: inbound.providerMessageId ?? null,
    });

    logger.info('Inbound message handled', {
      messageId: message.id,
      intent,
      parseStatus: parsed.status,
      patientId: patient?.id ?? null,
      appointmentId: appointment?.id ?? null,
    });

    let reply: InboundResult['reply'] = { status: 'skipped' };
    if (this.autoReply && appointment) {
      reply = this.describeReply(await this.sendReply(inbound, appointment));
    }

    return {
      intent,
      parse: {
        status: parsed.status,
        start: parsed.start ? parsed.start.toISOString() : null,
        durationMinutes: parsed.durationMinutes,
      },
      patientId: patient?.id ?? null,
      appointmentId: appointment?.id ?? null,
      appointmentCreated: created,
      messageId: message.id,
      reply,
    };
  }

  replyText(appointment: Appointment): string {
    const when = formatInTimeZone(new Date(appointment.start_at), this.timeZone, "EEE, MMM d 'at' h:mm a");
    switch (appointment.status) {
      case 'confirmed':
        return `Thanks! Your visit is confirmed for ${when}.`;
      case 'reschedule':
        return `Got it. We noted ${when} as your requested time; your therapist will follow up.`;
      case 'canceled':
        return `Your visit on ${when} has been canceled.`;
      case 'pending':
        return `Thanks! We penciled you in for ${when}. Reply YES to confirm.`;
    }
  }

  private sendReply(inbound: InboundMessage, appointment: Appointment): Promise<SendOutcome> {
    return this.messaging.send(normalizePhone(inbound.from) || inbound.from, this.replyText(appointment), {
      from: inbound.to,
      note: 'auto-reply',
    });
  }

  private describeReply(outcome: SendOutcome): InboundResult['reply'] {
    if (outcome.status === 'sent') {
      return { status: 'sent', providerMessageId: outcome.providerMessageId, body: outcome.message.body };
    }
    return { status: 'failed', error: outcome.error, body: outcome.message.body };
  }
}
