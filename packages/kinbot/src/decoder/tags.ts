import { z } from 'zod';

import { loadDataFile } from '../data.js';
import { parseMotionSteps, type MotionStep } from '../motion/compiler.js';
import { ZoneCategorySchema, type ZoneCategory } from '../protocol.js';

export const EMOTION_TAGS = [
  'happy',
  'excited',
  'sad',
  'empathy',
  'confused',
  'surprised',
  'love',
  'cool',
  'greeting',
  'neutral',
  'curious',
  'worried',
  'playful',
] as const;

export type EmotionTag = (typeof EMOTION_TAGS)[number];

export const DEFAULT_EMOTION: EmotionTag = 'neutral';

/** Longest tag body the decoder waits for before treating an opener as plain text. */
export const TAG_BODY_MAX = 500;

export const MEMORY_TYPES = ['experience', 'zone_info', 'person_fact', 'general'] as const;

export type MemoryType = (typeof MEMORY_TYPES)[number];

const EmotionEmojiTableSchema = z.record(z.array(z.string().trim().min(1)).min(1));

const EMOTION_EMOJIS = loadDataFile('emotions.json', EmotionEmojiTableSchema);

const EMOTION_TAG_SET: ReadonlySet<string> = new Set(EMOTION_TAGS);

function isEmotionTag(value: string): value is EmotionTag {
  return EMOTION_TAG_SET.has(value);
}

export interface TagMatch<T> {
  matched: boolean;
  value: T;
  rest: string;
}

export function normalizeEmotion(raw: string): EmotionTag {
  const normalized = raw.trim().toLowerCase();
  return isEmotionTag(normalized) ? normalized : DEFAULT_EMOTION;
}

export function emotionToEmojis(emotion: string): string[] {
  const tag = normalizeEmotion(emotion);
  const emojis = Object.hasOwn(EMOTION_EMOJIS, tag) ? EMOTION_EMOJIS[tag] : undefined;
  return [...(emojis ?? EMOTION_EMOJIS[DEFAULT_EMOTION] ?? [])];
}

/** Contextual codes first, then up to two emotion codes as a fallback; emotion codes alone otherwise. */
export function composeEmojis(contextual: string[], emotion: string): string[] {
  const emotionEmojis = emotionToEmojis(emotion);
  if (contextual.length === 0) {
    return emotionEmojis;
  }

  return [...contextual, ...emotionEmojis.slice(0, 2)];
}

const EMOTION_TAG_PATTERN = /^\s*\[emotion:([^\]]*)\]\s*/i;
const EMOJIS_TAG_PATTERN = /^\s*\[emojis:([^\]]*)\]\s*/i;
const ACTIONS_TAG_PATTERN = /^\s*\[actions:([^\]]*)\]\s*/i;

export function parseEmotionTag(text: string): TagMatch<EmotionTag> {
  const match = EMOTION_TAG_PATTERN.exec(text);
  if (!match) {
    return { matched: false, value: DEFAULT_EMOTION, rest: text };
  }

  return {
    matched: true,
    value: normalizeEmotion(match[1] ?? ''),
    rest: text.slice(match[0].length),
  };
}

export function parseEmojisTag(text: string): TagMatch<string[]> {
  const match = EMOJIS_TAG_PATTERN.exec(text);
  if (!match) {
    return { matched: false, value: [], rest: text };
  }

  const codes = (match[1] ?? '')
    .split(',')
    .map((code) => code.trim().toUpperCase())
    .filter((code) => code.length > 0);

  return { matched: true, value: codes, rest: text.slice(match[0].length) };
}

export function parseActionsTag(text: string): TagMatch<MotionStep[]> {
  const match = ACTIONS_TAG_PATTERN.exec(text);
  if (!match) {
    return { matched: false, value: [], rest: text };
  }

  return { matched: true, value: parseMotionSteps(match[1] ?? ''), rest: text.slice(match[0].length) };
}

export interface HeaderTags {
  emotion: EmotionTag;
  emotionTagged: boolean;
  emojis: string[];
  actions: MotionStep[];
}

type HeaderParser = (text: string, header: HeaderTags) => { matched: boolean; rest: string };

function headerStep<T>(parse: (text: string) => TagMatch<T>, apply: (header: HeaderTags, value: T) => void): HeaderParser {
  return (text, header) => {
    const result = parse(text);
    if (result.matched) {
      apply(header, result.value);
    }

    return { matched: result.matched, rest: result.rest };
  };
}

/** Leading tags in the order they are accepted. Each parser sees what the previous one left. */
export const HEADER_PARSERS: readonly HeaderParser[] = [
  headerStep(parseEmotionTag, (header, value) => {
    header.emotion = value;
    header.emotionTagged = true;
  }),
  headerStep(parseEmojisTag, (header, value) => {
    header.emojis = value;
  }),
  headerStep(parseActionsTag, (header, value) => {
    header.actions = value;
  }),
];

export type HeaderResolution =
  | { status: 'need_more' }
  | { status: 'resolved'; header: HeaderTags; rest: string };

function emptyHeader(): HeaderTags {
  return { emotion: DEFAULT_EMOTION, emotionTagged: false, emojis: [], actions: [] };
}

function mayStillComplete(rest: string): boolean {
  const trimmed = rest.trimStart();
  return trimmed.length === 0 || (trimmed.startsWith('[') && !trimmed.includes(']'));
}

/**
 * Runs the header pipeline over `text`. Unless `final` is set, reports `need_more` while the next
 * tag could still be completed by later input, so the outcome does not depend on chunking.
 */
export function resolveHeader(text: string, final: boolean): HeaderResolution {
  const header = emptyHeader();
  let rest = text;

  for (const parser of HEADER_PARSERS) {
    if (!final && mayStillComplete(rest)) {
      return { status: 'need_more' };
    }

    rest = parser(rest, header).rest;
  }

  return { status: 'resolved', header, rest };
}

export const BODY_MARKERS = [
  'media_summary',
  'memory',
  'person_name',
  'zone_learn',
  'emotion',
  'emojis',
  'actions',
] as const;

export type BodyMarker = (typeof BODY_MARKERS)[number];

export function parseMediaSummary(text: string): string | null {
  const match = /\[media_summary:([^\]]*)(?:\]|$)/i.exec(text);
  if (!match) {
    return null;
  }

  const summary = (match[1] ?? '').trim();
  return summary.length > 0 ? summary : null;
}

export interface MemoryDirective {
  memoryType: MemoryType;
  content: string;
}

export interface ZoneDirective {
  name: string;
  category: ZoneCategory;
  description: string;
}

const MEMORY_DIRECTIVE_PATTERN = new RegExp(`\\[memory:([^\\]]{0,${TAG_BODY_MAX}})\\]`, 'gi');
const PERSON_NAME_PATTERN = new RegExp(`\\[person_name:([^\\]]{0,${TAG_BODY_MAX}})\\]`, 'i');
const ZONE_DIRECTIVE_PATTERN = new RegExp(`\\[zone_learn:([^\\]]{0,${TAG_BODY_MAX}})\\]`, 'gi');

function normalizeMemoryType(raw: string): MemoryType | null {
  const normalized = raw.trim().toLowerCase();
  return MEMORY_TYPES.find((type) => type === normalized) ?? null;
}

/**
 * `[memory:type:content]`. An unrecognised type prefix is read as part of a `general` fact.
 */
export function extractMemoryDirectives(text: string): MemoryDirective[] {
  const directives: MemoryDirective[] = [];

  for (const match of text.matchAll(MEMORY_DIRECTIVE_PATTERN)) {
    const body = match[1] ?? '';
    const separator = body.indexOf(':');
    const memoryType = separator >= 0 ? normalizeMemoryType(body.slice(0, separator)) : null;
    const content = (memoryType ? body.slice(separator + 1) : body).trim();

    if (content.length === 0) {
      continue;
    }

    directives.push({ memoryType: memoryType ?? 'general', content });
  }

  return directives;
}

export function extractPersonName(text: string): string | null {
  const match = PERSON_NAME_PATTERN.exec(text);
  const name = match?.[1]?.trim() ?? '';
  return name.length > 0 ? name : null;
}

export function extractZoneDirectives(text: string): ZoneDirective[] {
  const directives: ZoneDirective[] = [];

  for (const match of text.matchAll(ZONE_DIRECTIVE_PATTERN)) {
    const [rawName = '', rawCategory = '', ...descriptionParts] = (match[1] ?? '').split(':');
    const name = rawName.trim();
    if (name.length === 0) {
      continue;
    }

    const category = ZoneCategorySchema.safeParse(rawCategory.trim().toLowerCase());
    directives.push({
      name,
      category: category.success ? category.data : 'unknown',
      description: descriptionParts.join(':').trim(),
    });
  }

  return directives;
}
