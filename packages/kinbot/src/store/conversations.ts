import { z } from 'zod';

import { parseRows, type Clock, type StoreDatabase } from './database.js';

export type ConversationRole = 'user' | 'assistant';

export interface ConversationMessage {
  id: number;
  sessionId: string;
  role: ConversationRole;
  content: string;
  messageIndex: number;
  isSummary: boolean;
  createdAtMs: number;
}

const MessageRowSchema = z
  .object({
    id: z.number().int(),
    session_id: z.string(),
    role: z.enum(['user', 'assistant']),
    content: z.string(),
    message_index: z.number().int(),
    is_summary: z.number().int(),
    created_at_ms: z.number(),
  })
  .transform(
    (row): ConversationMessage => ({
      id: row.id,
      sessionId: row.session_id,
      role: row.role,
      content: row.content,
      messageIndex: row.message_index,
      isSummary: row.is_summary !== 0,
      createdAtMs: row.created_at_ms,
    }),
  );

const SessionCountRowSchema = z.object({
  session_id: z.string(),
  message_count: z.number().int(),
});

const MaxIndexRowSchema = z.object({ max_index: z.number().int().nullable() });

const MESSAGE_COLUMNS = 'id, session_id, role, content, message_index, is_summary, created_at_ms';

export class ConversationRepository {
  private readonly db: StoreDatabase;
  private readonly now: Clock;

  constructor(db: StoreDatabase, now: Clock = Date.now) {
    this.db = db;
    this.now = now;
  }

  list(sessionId: string): ConversationMessage[] {
    const rows = this.db
      .prepare(`SELECT ${MESSAGE_COLUMNS} FROM conversation_messages WHERE session_id = ? ORDER BY message_index, id`)
      .all(sessionId);

    return parseRows('conversation_messages', MessageRowSchema, rows);
  }

  append(sessionId: string, role: ConversationRole, content: string): ConversationMessage {
    const insert = this.db.transaction((): ConversationMessage => {
      const maxRow = MaxIndexRowSchema.parse(
        this.db
          .prepare('SELECT MAX(message_index) AS max_index FROM conversation_messages WHERE session_id = ?')
          .get(sessionId),
      );
      const messageIndex = (maxRow.max_index ?? -1) + 1;
      const createdAtMs = this.now();

      const result = this.db
        .prepare(
          `INSERT INTO conversation_messages (session_id, role, content, message_index, is_summary, created_at_ms)
           VALUES (?, ?, ?, ?, 0, ?)`,
        )
        .run(sessionId, role, content, messageIndex, createdAtMs);

      return {
        id: Number(result.lastInsertRowid),
        sessionId,
        role,
        content,
        messageIndex,
        isSummary: false,
        createdAtMs,
      };
    });

    return insert();
  }

  /**
   * Replaces the given messages with one summary message placed at the lowest replaced index.
   * Returns false, changing nothing, when any of them is already gone.
   */
  replaceWithSummary(sessionId: string, replacedIds: number[], summary: string): boolean {
    if (replacedIds.length === 0) {
      return false;
    }

    const replace = this.db.transaction((): boolean => {
      const current = this.list(sessionId).filter((message) => replacedIds.includes(message.id));
      if (current.length !== replacedIds.length) {
        return false;
      }

      const summaryIndex = Math.min(...current.map((message) => message.messageIndex));
      const remove = this.db.prepare('DELETE FROM conversation_messages WHERE id = ? AND session_id = ?');
      for (const id of replacedIds) {
        remove.run(id, sessionId);
      }

      this.db
        .prepare(
          `INSERT INTO conversation_messages (session_id, role, content, message_index, is_summary, created_at_ms)
           VALUES (?, 'user', ?, ?, 1, ?)`,
        )
        .run(sessionId, summary, summaryIndex, this.now());

      return true;
    });

    return replace();
  }

  sessionsAtOrAbove(threshold: number): string[] {
    const rows = this.db
      .prepare(
        `SELECT session_id, COUNT(*) AS message_count FROM conversation_messages
         GROUP BY session_id HAVING COUNT(*) >= ? ORDER BY session_id`,
      )
      .all(threshold);

    return parseRows('conversation_messages', SessionCountRowSchema, rows).map((row) => row.session_id);
  }
}
