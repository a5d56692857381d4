import { z } from 'zod';

import { MEMORY_TYPES, type MemoryType } from '../decoder/tags.js';
import { isPrivate } from '../memory/privacy.js';
import { parseRow, parseRows, type Clock, type StoreDatabase } from './database.js';

export interface Memory {
  id: number;
  personId: string | null;
  zoneId: number | null;
  memoryType: MemoryType;
  content: string;
  importance: number;
  createdAtMs: number;
  expiresAtMs: number | null;
}

export interface SaveMemoryInput {
  personId?: string | null;
  zoneId?: number | null;
  memoryType: MemoryType;
  content: string;
  importance?: number;
  expiresAtMs?: number | null;
}

export type SaveMemoryResult = { status: 'stored'; memory: Memory } | { status: 'rejected_private' };

export interface ContextBundle {
  general: Memory[];
  person: Memory[];
  zone: Memory[];
}

export const DEFAULT_IMPORTANCE: Readonly<Record<MemoryType, number>> = {
  person_fact: 7,
  zone_info: 6,
  experience: 5,
  general: 5,
};

const MemoryRowSchema = z
  .object({
    id: z.number().int(),
    person_id: z.string().nullable(),
    zone_id: z.number().int().nullable(),
    memory_type: z.enum(MEMORY_TYPES),
    content: z.string(),
    importance: z.number().int(),
    created_at_ms: z.number(),
    expires_at_ms: z.number().nullable(),
  })
  .transform(
    (row): Memory => ({
      id: row.id,
      personId: row.person_id,
      zoneId: row.zone_id,
      memoryType: row.memory_type,
      content: row.content,
      importance: row.importance,
      createdAtMs: row.created_at_ms,
      expiresAtMs: row.expires_at_ms,
    }),
  );

const MEMORY_COLUMNS = 'id, person_id, zone_id, memory_type, content, importance, created_at_ms, expires_at_ms';
const NOT_EXPIRED = '(expires_at_ms IS NULL OR expires_at_ms > ?)';

function clampImportance(value: number): number {
  if (!Number.isFinite(value)) {
    return 5;
  }

  return Math.min(10, Math.max(1, Math.round(value)));
}

export class MemoryRepository {
  private readonly db: StoreDatabase;
  private readonly now: Clock;

  constructor(db: StoreDatabase, now: Clock = Date.now) {
    this.db = db;
    this.now = now;
  }

  /** Content that trips the privacy filter is never written; that is a normal outcome, not an error. */
  save(input: SaveMemoryInput): SaveMemoryResult {
    const content = input.content.trim();
    if (isPrivate(content)) {
      return { status: 'rejected_private' };
    }

    if (!content) {
      throw new Error('memory content is required');
    }

    const importance = clampImportance(input.importance ?? DEFAULT_IMPORTANCE[input.memoryType]);
    const result = this.db
      .prepare(
        `INSERT INTO memories (person_id, zone_id, memory_type, content, importance, created_at_ms, expires_at_ms)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.personId ?? null,
        input.zoneId ?? null,
        input.memoryType,
        content,
        importance,
        this.now(),
        input.expiresAtMs ?? null,
      );

    const memory = this.getById(Number(result.lastInsertRowid));
    if (!memory) {
      throw new Error(`memory ${String(result.lastInsertRowid)} could not be read back`);
    }

    return { status: 'stored', memory };
  }

  getById(id: number): Memory | null {
    const row = this.db.prepare(`SELECT ${MEMORY_COLUMNS} FROM memories WHERE id = ?`).get(id);
    return parseRow('memories', MemoryRowSchema, row);
  }

  /** All memories of one scope (`null` is the general pool), most important first. */
  listForScope(personId: string | null, options: { includeExpired?: boolean } = {}): Memory[] {
    const includeExpired = options.includeExpired ?? false;
    const statement = this.db.prepare(
      `SELECT ${MEMORY_COLUMNS} FROM memories
       WHERE person_id IS ? ${includeExpired ? '' : `AND ${NOT_EXPIRED}`}
       ORDER BY importance DESC, created_at_ms DESC, id DESC`,
    );

    const rows = includeExpired ? statement.all(personId) : statement.all(personId, this.now());
    return parseRows('memories', MemoryRowSchema, rows);
  }

  /** Unexpired memories at or above `minImportance`, newest first. */
  getRecentImportant(
    personId: string | null,
    options: { minImportance?: number; limit?: number } = {},
  ): Memory[] {
    const rows = this.db
      .prepare(
        `SELECT ${MEMORY_COLUMNS} FROM memories
         WHERE person_id IS ? AND importance >= ? AND ${NOT_EXPIRED}
         ORDER BY created_at_ms DESC, id DESC
         LIMIT ?`,
      )
      .all(personId, options.minImportance ?? 5, this.now(), Math.max(0, options.limit ?? 5));

    return parseRows('memories', MemoryRowSchema, rows);
  }

  getZoneFacts(zoneId: number, limit = 5): Memory[] {
    const rows = this.db
      .prepare(
        `SELECT ${MEMORY_COLUMNS} FROM memories
         WHERE zone_id = ? AND memory_type = 'zone_info' AND ${NOT_EXPIRED}
         ORDER BY importance DESC, created_at_ms DESC, id DESC
         LIMIT ?`,
      )
      .all(zoneId, this.now(), Math.max(0, limit));

    return parseRows('memories', MemoryRowSchema, rows);
  }

  getContextBundle(options: {
    personId: string | null;
    zoneId: number | null;
    minImportance: number;
    limit: number;
  }): ContextBundle {
    const { personId, zoneId, minImportance, limit } = options;

    return {
      general: this.getRecentImportant(null, { minImportance, limit }),
      person: personId ? this.getRecentImportant(personId, { minImportance, limit }) : [],
      zone: zoneId !== null ? this.getZoneFacts(zoneId, limit) : [],
    };
  }
}
