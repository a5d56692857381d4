import { z } from 'zod';

import { parseRow, parseRows, type Clock, type StoreDatabase } from './database.js';

export interface Person {
  id: number;
  personId: string;
  name: string;
  firstSeenMs: number;
  lastSeenMs: number;
  interactionCount: number;
  notes: string;
}

export interface FaceEmbedding {
  id: number;
  personId: string;
  vector: number[];
  capturedAtMs: number;
  sourceLighting: string | null;
}

export class PersonNotFoundError extends Error {
  public readonly personId: string;

  constructor(personId: string) {
    super(`Person not found: ${personId}`);
    this.name = 'PersonNotFoundError';
    this.personId = personId;
  }
}

const PersonRowSchema = z
  .object({
    id: z.number().int(),
    person_id: z.string().min(1),
    name: z.string(),
    first_seen_ms: z.number(),
    last_seen_ms: z.number(),
    interaction_count: z.number().int().nonnegative(),
    notes: z.string(),
  })
  .transform(
    (row): Person => ({
      id: row.id,
      personId: row.person_id,
      name: row.name,
      firstSeenMs: row.first_seen_ms,
      lastSeenMs: row.last_seen_ms,
      interactionCount: row.interaction_count,
      notes: row.notes,
    }),
  );

const EmbeddingRowSchema = z
  .object({
    id: z.number().int(),
    person_id: z.string().min(1),
    embedding: z.instanceof(Buffer),
    captured_at_ms: z.number(),
    source_lighting: z.string().nullable(),
  })
  .transform(
    (row): FaceEmbedding => ({
      id: row.id,
      personId: row.person_id,
      vector: decodeVector(row.embedding),
      capturedAtMs: row.captured_at_ms,
      sourceLighting: row.source_lighting,
    }),
  );

const FLOAT32_BYTES = 4;

export function encodeVector(vector: number[]): Buffer {
  const buffer = Buffer.alloc(vector.length * FLOAT32_BYTES);
  vector.forEach((value, index) => {
    buffer.writeFloatLE(value, index * FLOAT32_BYTES);
  });
  return buffer;
}

export function decodeVector(buffer: Buffer): number[] {
  const vector: number[] = [];
  for (let offset = 0; offset + FLOAT32_BYTES <= buffer.length; offset += FLOAT32_BYTES) {
    vector.push(buffer.readFloatLE(offset));
  }
  return vector;
}

/** Lower-case ASCII slug used as a stable person id for names learned in conversation. */
export function personSlug(name: string): string {
  const slug = name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');

  return `person_${slug || 'unknown'}`;
}

const PERSON_COLUMNS = 'id, person_id, name, first_seen_ms, last_seen_ms, interaction_count, notes';

export class PeopleRepository {
  private readonly db: StoreDatabase;
  private readonly now: Clock;

  constructor(db: StoreDatabase, now: Clock = Date.now) {
    this.db = db;
    this.now = now;
  }

  getByPersonId(personId: string): Person | null {
    const row = this.db.prepare(`SELECT ${PERSON_COLUMNS} FROM people WHERE person_id = ?`).get(personId);
    return parseRow('people', PersonRowSchema, row);
  }

  /** Creates the person, or records another sighting of an existing one. */
  getOrCreate(personId: string, name: string): Person {
    const nowMs = this.now();

    this.db
      .prepare(
        `INSERT INTO people (person_id, name, first_seen_ms, last_seen_ms, interaction_count)
         VALUES (?, ?, ?, ?, 1)
         ON CONFLICT(person_id) DO UPDATE SET
           last_seen_ms = excluded.last_seen_ms,
           interaction_count = people.interaction_count + 1`,
      )
      .run(personId, name.trim() || personId, nowMs, nowMs);

    const person = this.getByPersonId(personId);
    if (!person) {
      throw new PersonNotFoundError(personId);
    }

    return person;
  }

  touch(personId: string): boolean {
    const result = this.db
      .prepare(
        'UPDATE people SET last_seen_ms = ?, interaction_count = interaction_count + 1 WHERE person_id = ?',
      )
      .run(this.now(), personId);

    return result.changes > 0;
  }

  updateName(personId: string, name: string): boolean {
    const trimmed = name.trim();
    if (!trimmed) {
      return false;
    }

    const result = this.db.prepare('UPDATE people SET name = ? WHERE person_id = ?').run(trimmed, personId);
    return result.changes > 0;
  }

  addEmbedding(personId: string, vector: number[], sourceLighting?: string): FaceEmbedding {
    if (!this.getByPersonId(personId)) {
      throw new PersonNotFoundError(personId);
    }

    const capturedAtMs = this.now();
    const result = this.db
      .prepare(
        'INSERT INTO face_embeddings (person_id, embedding, captured_at_ms, source_lighting) VALUES (?, ?, ?, ?)',
      )
      .run(personId, encodeVector(vector), capturedAtMs, sourceLighting ?? null);

    return {
      id: Number(result.lastInsertRowid),
      personId,
      vector: [...vector],
      capturedAtMs,
      sourceLighting: sourceLighting ?? null,
    };
  }

  getEmbeddings(personId: string): FaceEmbedding[] {
    const rows = this.db
      .prepare(
        `SELECT id, person_id, embedding, captured_at_ms, source_lighting
         FROM face_embeddings WHERE person_id = ? ORDER BY captured_at_ms, id`,
      )
      .all(personId);

    return parseRows('face_embeddings', EmbeddingRowSchema, rows);
  }

  getAllEmbeddings(): FaceEmbedding[] {
    const rows = this.db
      .prepare(
        `SELECT id, person_id, embedding, captured_at_ms, source_lighting
         FROM face_embeddings ORDER BY person_id, captured_at_ms, id`,
      )
      .all();

    return parseRows('face_embeddings', EmbeddingRowSchema, rows);
  }

  listAll(): Person[] {
    const rows = this.db.prepare(`SELECT ${PERSON_COLUMNS} FROM people ORDER BY last_seen_ms DESC, id`).all();
    return parseRows('people', PersonRowSchema, rows);
  }
}
