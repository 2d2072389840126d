import { Request, Response } from 'express';
import { z } from 'zod';
import { AppServices } from '../container';
import { asyncHandler } from '../middleware/errorHandler';
import { MAX_MESSAGE_PAGE } from '../models/Message';
import { toCsv } from '../utils/csv';

/**
 * Admin Controller
 * Message log browsing, intent histogram and CSV export
 */

const CSV_HEADER = [
  'id',
  'timestamp',
  'direction',
  'channel',
  'intent',
  'from',
  'to',
  'body',
  'note',
  'provider_message_id',
];

export function createAdminController(services: AppServices) {
  const MessagesQuerySchema = z.object({
    limit: z.coerce.number().int().default(services.config.adminPageSize),
    search: z.string().trim().optional(),
  });

  return {
    /**
     * GET /admin/messages?limit=50&search=friday
     */
    listMessages: asyncHandler(async (req: Request, res: Response) => {
      const query = MessagesQuerySchema.parse(req.query);
      const messages = services.messages.list(query.limit, query.search || undefined);
      res.json(messages);
    }),

    /**
     * GET /admin/intents
     */
    intents: asyncHandler(async (_req: Request, res: Response) => {
      res.json({ intents: services.messages.countByIntent(MAX_MESSAGE_PAGE) });
    }),

    /**
     * GET /admin/export.csv
     */
    exportCsv: asyncHandler(async (_req: Request, res: Response) => {
      const messages = services.messages.list(MAX_MESSAGE_PAGE);
      const csv = toCsv(
        CSV_HEADER,
        messages.map((m) => [
          m.id,
          m.timestamp,
          m.direction,
          m.channel,
          m.intent,
          m.from,
          m.to,
          m.body,
          m.note,
          m.provider_message_id,
        ])
      );

      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', 'attachment; filename="export.csv"');
      res.send(csv);
    }),
  };
}
