import { z } from 'zod';

import { ZoneCategorySchema, type ZoneCategory } from '../protocol.js';
import { parseRow, parseRows, type Clock, type StoreDatabase } from './database.js';

export interface Zone {
  id: number;
  name: string;
  category: ZoneCategory;
  description: string;
  accessible: boolean;
  isCurrent: boolean;
  createdAtMs: number;
}

export interface ZonePath {
  id: number;
  fromZoneId: number;
  toZoneId: number;
  directionHint: string;
  distanceCm: number | null;
}

export class ZoneNotFoundError extends Error {
  public readonly zoneName: string;

  constructor(zoneName: string) {
    super(`Zone not found: ${zoneName}`);
    this.name = 'ZoneNotFoundError';
    this.zoneName = zoneName;
  }
}

const ZoneRowSchema = z
  .object({
    id: z.number().int(),
    name: z.string().min(1),
    category: z.string(),
    description: z.string(),
    accessible: z.number().int(),
    is_current: z.number().int(),
    created_at_ms: z.number(),
  })
  .transform(
    (row): Zone => ({
      id: row.id,
      name: row.name,
      category: normalizeCategory(row.category),
      description: row.description,
      accessible: row.accessible !== 0,
      isCurrent: row.is_current !== 0,
      createdAtMs: row.created_at_ms,
    }),
  );

const ZonePathRowSchema = z
  .object({
    id: z.number().int(),
    from_zone_id: z.number().int(),
    to_zone_id: z.number().int(),
    direction_hint: z.string(),
    distance_cm: z.number().nullable(),
  })
  .transform(
    (row): ZonePath => ({
      id: row.id,
      fromZoneId: row.from_zone_id,
      toZoneId: row.to_zone_id,
      directionHint: row.direction_hint,
      distanceCm: row.distance_cm,
    }),
  );

export function normalizeCategory(raw: string): ZoneCategory {
  const parsed = ZoneCategorySchema.safeParse(raw.trim().toLowerCase());
  return parsed.success ? parsed.data : 'unknown';
}

const ZONE_COLUMNS = 'id, name, category, description, accessible, is_current, created_at_ms';
const PATH_COLUMNS = 'id, from_zone_id, to_zone_id, direction_hint, distance_cm';

export class ZoneRepository {
  private readonly db: StoreDatabase;
  private readonly now: Clock;

  constructor(db: StoreDatabase, now: Clock = Date.now) {
    this.db = db;
    this.now = now;
  }

  getByName(name: string): Zone | null {
    const row = this.db.prepare(`SELECT ${ZONE_COLUMNS} FROM zones WHERE name = ?`).get(name.trim());
    return parseRow('zones', ZoneRowSchema, row);
  }

  getById(id: number): Zone | null {
    const row = this.db.prepare(`SELECT ${ZONE_COLUMNS} FROM zones WHERE id = ?`).get(id);
    return parseRow('zones', ZoneRowSchema, row);
  }

  /** Idempotent by name. An existing zone only gains a category or description it was missing. */
  getOrCreate(name: string, category: ZoneCategory = 'unknown', description = ''): Zone {
    const trimmedName = name.trim();
    if (!trimmedName) {
      throw new Error('zone name is required');
    }

    this.db
      .prepare(
        `INSERT INTO zones (name, category, description, created_at_ms)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(name) DO UPDATE SET
           category = CASE WHEN zones.category = 'unknown' THEN excluded.category ELSE zones.category END,
           description = CASE WHEN zones.description = '' THEN excluded.description ELSE zones.description END`,
      )
      .run(trimmedName, category, description.trim(), this.now());

    const zone = this.getByName(trimmedName);
    if (!zone) {
      throw new ZoneNotFoundError(trimmedName);
    }

    return zone;
  }

  /** One row per directed pair; adding the same pair again replaces its hint and distance. */
  addPath(fromZoneId: number, toZoneId: number, directionHint: string, distanceCm?: number): ZonePath {
    this.db
      .prepare(
        `INSERT INTO zone_paths (from_zone_id, to_zone_id, direction_hint, distance_cm)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(from_zone_id, to_zone_id) DO UPDATE SET
           direction_hint = excluded.direction_hint,
           distance_cm = excluded.distance_cm`,
      )
      .run(fromZoneId, toZoneId, directionHint.trim(), distanceCm ?? null);

    const row = this.db
      .prepare(`SELECT ${PATH_COLUMNS} FROM zone_paths WHERE from_zone_id = ? AND to_zone_id = ?`)
      .get(fromZoneId, toZoneId);
    const path = parseRow('zone_paths', ZonePathRowSchema, row);
    if (!path) {
      throw new Error(`zone path ${fromZoneId} -> ${toZoneId} could not be read back`);
    }

    return path;
  }

  getPathsFrom(zoneId: number): ZonePath[] {
    const rows = this.db.prepare(`SELECT ${PATH_COLUMNS} FROM zone_paths WHERE from_zone_id = ? ORDER BY id`).all(zoneId);
    return parseRows('zone_paths', ZonePathRowSchema, rows);
  }

  /** Clears every flag and sets the named zone inside one transaction. */
  setCurrentZone(name: string): Zone {
    const trimmedName = name.trim();

    const switchCurrent = this.db.transaction(() => {
      this.db.prepare('UPDATE zones SET is_current = 0 WHERE is_current <> 0').run();
      const result = this.db.prepare('UPDATE zones SET is_current = 1 WHERE name = ?').run(trimmedName);
      if (result.changes === 0) {
        throw new ZoneNotFoundError(trimmedName);
      }
    });

    switchCurrent();

    const zone = this.getByName(trimmedName);
    if (!zone) {
      throw new ZoneNotFoundError(trimmedName);
    }

    return zone;
  }

  /** Clears the current flag, or only when `name` is the current zone if given. */
  clearCurrentZone(name?: string): boolean {
    const result =
      name === undefined
        ? this.db.prepare('UPDATE zones SET is_current = 0 WHERE is_current <> 0').run()
        : this.db.prepare('UPDATE zones SET is_current = 0 WHERE is_current <> 0 AND name = ?').run(name.trim());

    return result.changes > 0;
  }

  getCurrentZone(): Zone | null {
    const row = this.db.prepare(`SELECT ${ZONE_COLUMNS} FROM zones WHERE is_current <> 0 ORDER BY id LIMIT 1`).get();
    return parseRow('zones', ZoneRowSchema, row);
  }

  listAll(): Zone[] {
    const rows = this.db.prepare(`SELECT ${ZONE_COLUMNS} FROM zones ORDER BY name`).all();
    return parseRows('zones', ZoneRowSchema, rows);
  }

  /**
   * Breadth-first search over outgoing edges. Returns the edges of the first path with the fewest
   * hops, or an empty list when either zone is unknown, there is no route, or both names match.
   */
  findPath(fromName: string, toName: string): ZonePath[] {
    const from = this.getByName(fromName);
    const to = this.getByName(toName);
    if (!from || !to || from.id === to.id) {
      return [];
    }

    const rows = this.db.prepare(`SELECT ${PATH_COLUMNS} FROM zone_paths ORDER BY id`).all();
    const adjacency = new Map<number, ZonePath[]>();
    for (const edge of parseRows('zone_paths', ZonePathRowSchema, rows)) {
      const outgoing = adjacency.get(edge.fromZoneId) ?? [];
      outgoing.push(edge);
      adjacency.set(edge.fromZoneId, outgoing);
    }

    const reachedBy = new Map<number, ZonePath>();
    const visited = new Set<number>([from.id]);
    const queue: number[] = [from.id];

    for (let head = 0; head < queue.length; head += 1) {
      const current = queue[head];
      if (current === undefined) {
        break;
      }

      for (const edge of adjacency.get(current) ?? []) {
        if (visited.has(edge.toZoneId)) {
          continue;
        }

        visited.add(edge.toZoneId);
        reachedBy.set(edge.toZoneId, edge);

        if (edge.toZoneId === to.id) {
          return this.unwind(reachedBy, from.id, to.id);
        }

        queue.push(edge.toZoneId);
      }
    }

    return [];
  }

  private unwind(reachedBy: Map<number, ZonePath>, fromId: number, toId: number): ZonePath[] {
    const path: ZonePath[] = [];
    let cursor = toId;

    while (cursor !== fromId) {
      const edge = reachedBy.get(cursor);
      if (!edge) {
        return [];
      }

      path.unshift(edge);
      cursor = edge.fromZoneId;
    }

    return path;
  }
}
