import { mkdirSync } from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';
import type { z } from 'zod';

import { componentLogger } from '../logger.js';

export type StoreDatabase = Database.Database;

export type Clock = () => number;

const log = componentLogger('store');

export const IN_MEMORY_STORE = ':memory:';

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS people (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    person_id TEXT NOT NULL UNIQUE,
    name TEXT NOT NULL,
    first_seen_ms INTEGER NOT NULL,
    last_seen_ms INTEGER NOT NULL,
    interaction_count INTEGER NOT NULL DEFAULT 0,
    notes TEXT NOT NULL DEFAULT ''
  );

  CREATE TABLE IF NOT EXISTS face_embeddings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    person_id TEXT NOT NULL REFERENCES people(person_id),
    embedding BLOB NOT NULL,
    captured_at_ms INTEGER NOT NULL,
    source_lighting TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_face_embeddings_person
    ON face_embeddings(person_id, captured_at_ms);

  CREATE TABLE IF NOT EXISTS zones (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE COLLATE NOCASE,
    category TEXT NOT NULL DEFAULT 'unknown',
    description TEXT NOT NULL DEFAULT '',
    accessible INTEGER NOT NULL DEFAULT 1,
    is_current INTEGER NOT NULL DEFAULT 0,
    created_at_ms INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS zone_paths (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    from_zone_id INTEGER NOT NULL REFERENCES zones(id),
    to_zone_id INTEGER NOT NULL REFERENCES zones(id),
    direction_hint TEXT NOT NULL DEFAULT '',
    distance_cm REAL,
    UNIQUE (from_zone_id, to_zone_id)
  );

  CREATE TABLE IF NOT EXISTS memories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    person_id TEXT,
    zone_id INTEGER REFERENCES zones(id),
    memory_type TEXT NOT NULL,
    content TEXT NOT NULL,
    importance INTEGER NOT NULL CHECK (importance BETWEEN 1 AND 10),
    created_at_ms INTEGER NOT NULL,
    expires_at_ms INTEGER
  );
  CREATE INDEX IF NOT EXISTS idx_memories_scope
    ON memories(person_id, importance DESC, created_at_ms DESC);
  CREATE INDEX IF NOT EXISTS idx_memories_zone
    ON memories(zone_id, memory_type);

  CREATE TABLE IF NOT EXISTS conversation_messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id TEXT NOT NULL,
    role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
    content TEXT NOT NULL,
    message_index INTEGER NOT NULL,
    is_summary INTEGER NOT NULL DEFAULT 0,
    created_at_ms INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_conversation_messages_session
    ON conversation_messages(session_id, message_index);
`;

export function openStore(dbPath: string): StoreDatabase {
  if (dbPath !== IN_MEMORY_STORE) {
    mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  if (dbPath !== IN_MEMORY_STORE) {
    db.pragma('journal_mode = WAL');
  }

  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA_SQL);
  return db;
}

/** Validates raw rows, dropping (and logging) any that do not match the expected shape. */
export function parseRows<T extends z.ZodTypeAny>(table: string, schema: T, rows: unknown[]): Array<z.infer<T>> {
  const parsedRows: Array<z.infer<T>> = [];

  for (const row of rows) {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      log.warn({ table, issues: parsed.error.issues.length }, 'store: skipping malformed row');
      continue;
    }

    parsedRows.push(parsed.data);
  }

  return parsedRows;
}

export function parseRow<T extends z.ZodTypeAny>(table: string, schema: T, row: unknown): z.infer<T> | null {
  if (row === undefined) {
    return null;
  }

  return parseRows(table, schema, [row])[0] ?? null;
}
