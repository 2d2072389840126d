import Database from 'better-sqlite3';
import { loggers } from '../utils/logger';
import { Intent, Message, MessageChannel, MessageDirection, NewMessage } from '../types/domain';

/**
 * Message Model
 * Append-only log of inbound and outbound SMS traffic
 */

interface MessageRow {
  id: number;
  timestamp: string;
  direction: MessageDirection;
  channel: MessageChannel;
  intent: Intent;
  from_number: string;
  to_number: string;
  body: string;
  note: string;
  provider_message_id: string | null;
}

function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    timestamp: row.timestamp,
    direction: row.direction,
    channel: row.channel,
    intent: row.intent,
    from: row.from_number,
    to: row.to_number,
    body: row.body,
    note: row.note,
    provider_message_id: row.provider_message_id,
  };
}

export const MAX_MESSAGE_PAGE = 1000;

export class MessageModel {
  constructor(private readonly db: Database.Database) {}

  /**
   * Append a message and return it as stored
   */
  append(message: NewMessage): Message {
    try {
      const timestamp = message.timestamp ?? new Date().toISOString();
      const stmt = this.db.prepare(`
        INSERT INTO messages (
          timestamp, direction, channel, intent, from_number, to_number, body, note, provider_message_id
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);

      const result = stmt.run(
        timestamp,
        message.direction,
        message.channel,
        message.intent ?? 'other',
        message.from,
        message.to,
        message.body,
        message.note ?? '',
        message.provider_message_id ?? null
      );

      loggers.dbOperation('INSERT', 'messages', {
        direction: message.direction,
        channel: message.channel,
      });

      return {
        id: Number(result.lastInsertRowid),
        timestamp,
        direction: message.direction,
        channel: message.channel,
        intent: message.intent ?? 'other',
        from: message.from,
        to: message.to,
        body: message.body,
        note: message.note ?? '',
        provider_message_id: message.provider_message_id ?? null,
      };
    } catch (error) {
      throw new Error(
        `Error appending message: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  /**
   * Newest first, optionally filtered by a case-insensitive body search
   */
  list(limit: number, search?: string): Message[] {
    const bounded = Math.max(1, Math.min(MAX_MESSAGE_PAGE, Math.floor(limit) || 1));

    try {
      const rows = search
        ? (this.db
            .prepare(`
              SELECT * FROM messages
              WHERE instr(lower(body), lower(?)) > 0
              ORDER BY timestamp DESC, id DESC
              LIMIT ?
            `)
            .all(search, bounded) as MessageRow[])
        : (this.db
            .prepare(`
              SELECT * FROM messages
              ORDER BY timestamp DESC, id DESC
              LIMIT ?
            `)
            .all(bounded) as MessageRow[]);

      loggers.dbOperation('SELECT', 'messages', { count: rows.length, search });

      return rows.map(toMessage);
    } catch (error) {
      throw new Error(
        `Error listing messages: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  /**
   * Intent histogram over the newest `limit` messages
   */
  countByIntent(limit: number = MAX_MESSAGE_PAGE): Array<{ intent: Intent; count: number }> {
    try {
      const rows = this.db
        .prepare(`
          SELECT intent, COUNT(*) AS count FROM (
            SELECT intent FROM messages ORDER BY timestamp DESC, id DESC LIMIT ?
          )
          GROUP BY intent
          ORDER BY count DESC, intent ASC
        `)
        .all(limit) as Array<{ intent: Intent; count: number }>;

      loggers.dbOperation('AGGREGATE', 'messages', { groups: rows.length });

      return rows;
    } catch (error) {
      throw new Error(
        `Error counting intents: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }
}
