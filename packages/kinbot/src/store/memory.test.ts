import { beforeEach, describe, expect, it } from 'vitest';

import { IN_MEMORY_STORE, openStore } from './database.js';
import { MemoryRepository } from './memory.js';
import { ZoneRepository } from './zones.js';

describe('MemoryRepository', () => {
  let nowMs: number;
  let memories: MemoryRepository;
  let zones: ZoneRepository;

  beforeEach(() => {
    nowMs = 10_000;
    const db = openStore(IN_MEMORY_STORE);
    memories = new MemoryRepository(db, () => nowMs);
    zones = new ZoneRepository(db, () => nowMs);
  });

  it('rejects private content without storing it', () => {
    expect(memories.save({ memoryType: 'general', content: 'Mi contraseña es test-secret' })).toEqual({
      status: 'rejected_private',
    });
    expect(memories.listForScope(null, { includeExpired: true })).toEqual([]);
  });

  it('fills the default importance per type and clamps explicit values', () => {
    const fact = memories.save({ personId: 'person_luis', memoryType: 'person_fact', content: 'Le gusta el café' });
    const high = memories.save({ memoryType: 'general', content: 'Hoy llueve', importance: 42 });
    const low = memories.save({ memoryType: 'experience', content: 'Vimos un gato', importance: -3 });

    expect(fact.status === 'stored' && fact.memory.importance).toBe(7);
    expect(high.status === 'stored' && high.memory.importance).toBe(10);
    expect(low.status === 'stored' && low.memory.importance).toBe(1);
  });

  it('trims content and refuses empty memories', () => {
    const saved = memories.save({ memoryType: 'general', content: '  Hoy es lunes  ' });

    expect(saved).toEqual({
      status: 'stored',
      memory: {
        id: 1,
        personId: null,
        zoneId: null,
        memoryType: 'general',
        content: 'Hoy es lunes',
        importance: 5,
        createdAtMs: 10_000,
        expiresAtMs: null,
      },
    });
    expect(() => memories.save({ memoryType: 'general', content: '   ' })).toThrow('memory content is required');
  });

  it('lists a scope by importance and keeps scopes apart', () => {
    memories.save({ memoryType: 'general', content: 'uno', importance: 3 });
    nowMs += 1;
    memories.save({ memoryType: 'general', content: 'dos', importance: 8 });
    nowMs += 1;
    memories.save({ memoryType: 'general', content: 'tres', importance: 8 });
    memories.save({ personId: 'person_ana', memoryType: 'person_fact', content: 'Toca el violín' });

    expect(memories.listForScope(null).map((memory) => memory.content)).toEqual(['tres', 'dos', 'uno']);
    expect(memories.listForScope('person_ana').map((memory) => memory.content)).toEqual(['Toca el violín']);
  });

  it('hides expired memories unless asked for them', () => {
    memories.save({ memoryType: 'general', content: 'caduca pronto', expiresAtMs: 10_500 });
    memories.save({ memoryType: 'general', content: 'permanente' });

    nowMs = 10_500;

    expect(memories.listForScope(null).map((memory) => memory.content)).toEqual(['permanente']);
    expect(memories.listForScope(null, { includeExpired: true })).toHaveLength(2);
    expect(memories.getRecentImportant(null).map((memory) => memory.content)).toEqual(['permanente']);
  });

  it('returns recent important memories newest first within the limit', () => {
    memories.save({ memoryType: 'general', content: 'vieja', importance: 9 });
    nowMs += 1;
    memories.save({ memoryType: 'general', content: 'irrelevante', importance: 2 });
    nowMs += 1;
    memories.save({ memoryType: 'general', content: 'media', importance: 6 });
    nowMs += 1;
    memories.save({ memoryType: 'general', content: 'nueva', importance: 5 });

    expect(
      memories.getRecentImportant(null, { minImportance: 5, limit: 2 }).map((memory) => memory.content),
    ).toEqual(['nueva', 'media']);
  });

  it('assembles a context bundle from the three scopes', () => {
    const cocina = zones.getOrCreate('Cocina', 'kitchen');
    memories.save({ memoryType: 'general', content: 'Hoy es fiesta' });
    memories.save({ personId: 'person_luis', memoryType: 'person_fact', content: 'Le gusta el fútbol' });
    memories.save({ zoneId: cocina.id, memoryType: 'zone_info', content: 'La nevera hace ruido' });
    memories.save({ zoneId: cocina.id, memoryType: 'experience', content: 'Se cayó un vaso' });

    const bundle = memories.getContextBundle({
      personId: 'person_luis',
      zoneId: cocina.id,
      minImportance: 5,
      limit: 5,
    });

    expect(bundle.general.map((memory) => memory.content)).toEqual([
      'Se cayó un vaso',
      'La nevera hace ruido',
      'Hoy es fiesta',
    ]);
    expect(bundle.person.map((memory) => memory.content)).toEqual(['Le gusta el fútbol']);
    expect(bundle.zone.map((memory) => memory.content)).toEqual(['La nevera hace ruido']);
  });

  it('leaves person and zone sections empty without a scope', () => {
    memories.save({ personId: 'person_luis', memoryType: 'person_fact', content: 'Le gusta el fútbol' });

    expect(memories.getContextBundle({ personId: null, zoneId: null, minImportance: 1, limit: 5 })).toEqual({
      general: [],
      person: [],
      zone: [],
    });
  });
});
