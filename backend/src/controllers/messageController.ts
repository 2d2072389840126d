import { Request, Response } from 'express';
import { z } from 'zod';
import { AppServices } from '../container';
import { asyncHandler } from '../middleware/errorHandler';
import { normalizePhone } from '../utils/phone';

/**
 * Message Controller
 * Simulated and provider-delivered inbound SMS, and outbound sends
 */

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

const SimulateInboundSchema = z.object({
  from: z.string().trim().default(''),
  to: z.string().trim().optional(),
  body: z.string().trim().min(1, 'body is required'),
});

// Twilio posts form fields in PascalCase
const ProviderInboundSchema = z.object({
  From: z.string().min(1, 'From is required'),
  To: z.string().optional(),
  Body: z.string().default(''),
  MessageSid: z.string().optional(),
});

const SendSchema = z.object({
  to: z
    .string()
    .trim()
    .min(1, 'to is required')
    .refine((value) => normalizePhone(value) !== '', 'to must contain a phone number'),
  body: z.string().trim().min(1, 'body is required').max(1600, 'body is too long'),
});

const EMPTY_TWIML = '<?xml version="1.0" encoding="UTF-8"?><Response></Response>';

export function createMessageController(services: AppServices) {
  return {
    /**
     * POST /simulate-inbound
     * Run a message through the inbound pipeline as if a patient had texted it
     */
    simulateInbound: asyncHandler(async (req: Request, res: Response) => {
      const input = SimulateInboundSchema.parse(req.body ?? {});

      const result = await services.inbound.handle(
        { from: input.from, to: input.to, body: input.body, channel: 'simulate' },
        services.now()
      );

      res.json({
        status: 'success',
        ok: true,
        echo: input.body,
        ...result,
      });
    }),

    /**
     * POST /sms/inbound
     * Provider webhook; request signatures are expected to be checked upstream
     */
    providerInbound: asyncHandler(async (req: Request, res: Response) => {
      const input = ProviderInboundSchema.parse(req.body ?? {});

      await services.inbound.handle(
        {
          from: input.From,
          to: input.To,
          body: input.Body,
          channel: 'live',
          providerMessageId: input.MessageSid,
        },
        services.now()
      );

      res.type('text/xml').send(EMPTY_TWIML);
    }),

    /**
     * POST /send
     */
    send: asyncHandler(async (req: Request, res: Response) => {
      const input = SendSchema.parse(req.body ?? {});
      const outcome = await services.messaging.send(normalizePhone(input.to), input.body, {
        note: 'manual',
      });

      if (outcome.status === 'failed') {
        res.status(502).json({
          status: 'failed',
          message: outcome.error,
          messageId: outcome.message.id,
          channel: services.messaging.channel,
        });
        return;
      }

      res.json({
        status: services.messaging.channel === 'mock' ? 'mock-sent' : 'sent',
        sid: outcome.providerMessageId,
        provider_status: outcome.providerStatus,
        messageId: outcome.message.id,
        channel: services.messaging.channel,
      });
    }),
  };
}
