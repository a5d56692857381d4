import { describe, expect, it } from 'vitest';

import {
  composeEmojis,
  emotionToEmojis,
  extractMemoryDirectives,
  extractPersonName,
  extractZoneDirectives,
  parseActionsTag,
  parseEmojisTag,
  parseEmotionTag,
  parseMediaSummary,
  resolveHeader,
} from './tags.js';

describe('header tag parsers', () => {
  it('reads a leading emotion tag case-insensitively and drops the whitespace after it', () => {
    expect(parseEmotionTag('[emotion:Happy]  Hola')).toEqual({ matched: true, value: 'happy', rest: 'Hola' });
  });

  it('maps an unknown emotion to neutral', () => {
    expect(parseEmotionTag('[emotion:furious] x')).toEqual({ matched: true, value: 'neutral', rest: 'x' });
  });

  it('only matches tags at the start of the text', () => {
    expect(parseEmotionTag('Hola [emotion:sad]')).toEqual({
      matched: false,
      value: 'neutral',
      rest: 'Hola [emotion:sad]',
    });
  });

  it('upper-cases emoji codes and skips empty entries', () => {
    expect(parseEmojisTag('[emojis:1f600, 2728,] ok')).toEqual({
      matched: true,
      value: ['1F600', '2728'],
      rest: 'ok',
    });
  });

  it('parses action steps with params and durations', () => {
    const result = parseActionsTag('[actions:wave|move_forward_cm:30:1000] Vamos');

    expect(result.matched).toBe(true);
    expect(result.value).toEqual([
      { action: 'wave' },
      { action: 'move_forward_cm', params: [30], duration_ms: 1000 },
    ]);
    expect(result.rest).toBe('Vamos');
  });
});

describe('resolveHeader', () => {
  it('waits while a header tag could still be completed', () => {
    expect(resolveHeader('[emotion:happy][emo', false)).toEqual({ status: 'need_more' });
  });

  it('treats an incomplete tag as text once the input is final', () => {
    expect(resolveHeader('[emotion:happy][emo', true)).toEqual({
      status: 'resolved',
      header: { emotion: 'happy', emotionTagged: true, emojis: [], actions: [] },
      rest: '[emo',
    });
  });

  it('applies the parsers in order: emotion, emojis, actions', () => {
    expect(resolveHeader('[emojis:1F600] [emotion:sad] hi', true)).toEqual({
      status: 'resolved',
      header: { emotion: 'neutral', emotionTagged: false, emojis: ['1F600'], actions: [] },
      rest: '[emotion:sad] hi',
    });
  });
});

describe('emoji selection', () => {
  it('uses the emotion list when no contextual codes were given', () => {
    expect(composeEmojis([], 'sad')).toEqual(['1F622', '1F625', '1F614']);
  });

  it('puts contextual codes first, then two emotion codes', () => {
    expect(composeEmojis(['1F355'], 'happy')).toEqual(['1F355', '1F600', '1F603']);
  });

  it('falls back to the neutral list for unknown emotions', () => {
    expect(emotionToEmojis('grumpy')).toEqual(['1F610', '1F642']);
  });
});

describe('body directives', () => {
  it('reads a media summary, terminated or not', () => {
    expect(parseMediaSummary('Vale [media_summary: un perro ] y mas')).toBe('un perro');
    expect(parseMediaSummary('x [media_summary: a cat')).toBe('a cat');
    expect(parseMediaSummary('nothing here')).toBeNull();
  });

  it('extracts memories, reading an unknown type as part of a general fact', () => {
    expect(
      extractMemoryDirectives(
        '[memory:person_fact:Le gusta el cafe] [memory:opinion:el azul es bonito] [memory:general:  ]',
      ),
    ).toEqual([
      { memoryType: 'person_fact', content: 'Le gusta el cafe' },
      { memoryType: 'general', content: 'opinion:el azul es bonito' },
    ]);
  });

  it('takes the first person name', () => {
    expect(extractPersonName('[person_name: Ana ] then [person_name:Luis]')).toBe('Ana');
    expect(extractPersonName('[person_name:   ]')).toBeNull();
  });

  it('extracts zones and keeps colons inside descriptions', () => {
    expect(
      extractZoneDirectives('[zone_learn:Cocina:KITCHEN:donde se cocina: tiene horno] [zone_learn:Desvan:attic:]'),
    ).toEqual([
      { name: 'Cocina', category: 'kitchen', description: 'donde se cocina: tiene horno' },
      { name: 'Desvan', category: 'unknown', description: '' },
    ]);
  });
});
