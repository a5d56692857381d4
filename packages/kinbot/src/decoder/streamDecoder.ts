import type { MotionStep } from '../motion/compiler.js';
import {
  BODY_MARKERS,
  DEFAULT_EMOTION,
  extractMemoryDirectives,
  extractPersonName,
  extractZoneDirectives,
  resolveHeader,
  TAG_BODY_MAX,
  type BodyMarker,
  type EmotionTag,
  type HeaderTags,
  type MemoryDirective,
  type ZoneDirective,
} from './tags.js';

/** Only this many leading characters are ever examined for header tags. */
export const HEADER_BUFFER_MAX = 500;

export interface DecodedResponse {
  emotion: EmotionTag;
  emojis: string[];
  actions: MotionStep[];
  text: string;
  mediaSummary: string | null;
  memories: MemoryDirective[];
  personName: string | null;
  zones: ZoneDirective[];
}

export interface DecoderEvents {
  /** Fires once, before any text. */
  onHeader?: (header: HeaderTags) => void;
  onText?: (text: string) => void;
}

interface MarkerHit {
  index: number;
  marker: BodyMarker;
  openerLength: number;
}

const OPENERS = BODY_MARKERS.map((marker) => ({ marker, opener: `[${marker}:` }));

// Openers are matched against the original text so returned indices slice it exactly;
// lower-casing the whole string can change its length.
function openerAt(text: string, index: number): MarkerHit | null {
  for (const { marker, opener } of OPENERS) {
    if (text.slice(index, index + opener.length).toLowerCase() === opener) {
      return { index, marker, openerLength: opener.length };
    }
  }

  return null;
}

function findMarker(text: string): MarkerHit | null {
  for (let index = text.indexOf('['); index !== -1; index = text.indexOf('[', index + 1)) {
    const hit = openerAt(text, index);
    if (hit) {
      return hit;
    }
  }

  return null;
}

/** Length of the longest suffix of `text` that could still grow into a marker opener. */
function partialOpenerLength(text: string): number {
  const start = text.lastIndexOf('[');
  if (start === -1) {
    return 0;
  }

  const tail = text.slice(start);
  const lowerTail = tail.toLowerCase();
  return OPENERS.some(({ opener }) => opener.length > tail.length && opener.startsWith(lowerTail)) ? tail.length : 0;
}

function endsWithWhitespaceOrEmpty(text: string): boolean {
  return text.length === 0 || /\s$/.test(text);
}

/**
 * Incremental decoder for one response stream. Leading header tags are buffered until they resolve;
 * after that text is forwarded as it arrives, holding back only a possible partial tag opener.
 * Every control tag is removed from the forwarded text, whatever the chunk boundaries.
 */
export class StreamDecoder {
  private readonly events: DecoderEvents;

  private raw = '';
  private headerBuffer = '';
  private header: HeaderTags | null = null;
  private pending = '';
  private visible = '';
  private skipWhitespace = true;
  private mediaSummary: string | null = null;
  private finished = false;

  constructor(events: DecoderEvents = {}) {
    this.events = events;
  }

  push(chunk: string): void {
    if (this.finished) {
      throw new Error('StreamDecoder.push called after finish().');
    }

    if (chunk.length === 0) {
      return;
    }

    this.raw += chunk;

    if (this.header) {
      this.feedBody(chunk, false);
      return;
    }

    this.headerBuffer += chunk;
    this.tryResolveHeader(false);
  }

  finish(): DecodedResponse {
    if (!this.finished) {
      this.finished = true;

      if (!this.header) {
        this.tryResolveHeader(true);
      }

      this.feedBody('', true);
    }

    const header = this.header ?? {
      emotion: DEFAULT_EMOTION,
      emotionTagged: false,
      emojis: [],
      actions: [],
    };

    return {
      emotion: header.emotion,
      emojis: header.emojis,
      actions: header.actions,
      text: this.visible.trim(),
      mediaSummary: this.mediaSummary,
      memories: extractMemoryDirectives(this.raw),
      personName: extractPersonName(this.raw),
      zones: extractZoneDirectives(this.raw),
    };
  }

  private tryResolveHeader(atEnd: boolean): void {
    const examined = this.headerBuffer.slice(0, HEADER_BUFFER_MAX);
    const overflow = this.headerBuffer.slice(HEADER_BUFFER_MAX);
    const capped = this.headerBuffer.length >= HEADER_BUFFER_MAX;

    if (!atEnd && !capped && !examined.includes(']') && !this.cannotStartWithTag(examined)) {
      return;
    }

    const resolution = resolveHeader(examined, atEnd || capped);
    if (resolution.status === 'need_more') {
      return;
    }

    this.header = resolution.header;
    this.headerBuffer = '';
    this.events.onHeader?.(resolution.header);
    this.feedBody(resolution.rest + overflow, false);
  }

  private cannotStartWithTag(text: string): boolean {
    const trimmed = text.trimStart();
    return trimmed.length > 0 && !trimmed.startsWith('[');
  }

  private emit(text: string): void {
    if (text.length === 0) {
      return;
    }

    this.visible += text;
    this.events.onText?.(text);
  }

  private feedBody(text: string, atEnd: boolean): void {
    this.pending += text;

    for (;;) {
      if (this.skipWhitespace) {
        this.pending = this.pending.trimStart();
        if (this.pending.length === 0) {
          return;
        }

        this.skipWhitespace = false;
      }

      const hit = findMarker(this.pending);
      if (!hit) {
        const hold = atEnd ? 0 : partialOpenerLength(this.pending);
        this.emit(this.pending.slice(0, this.pending.length - hold));
        this.pending = this.pending.slice(this.pending.length - hold);
        return;
      }

      this.emit(this.pending.slice(0, hit.index));

      const contentStart = hit.index + hit.openerLength;
      const close = this.pending.indexOf(']', contentStart);
      const available = this.pending.length - contentStart;

      if (close === -1 && available <= TAG_BODY_MAX) {
        if (atEnd) {
          if (hit.marker === 'media_summary') {
            this.captureSummary(this.pending.slice(contentStart));
          }

          this.pending = '';
          return;
        }

        this.pending = this.pending.slice(hit.index);
        return;
      }

      if (close === -1 || close - contentStart > TAG_BODY_MAX) {
        this.pending = this.pending.slice(contentStart);
        continue;
      }

      if (hit.marker === 'media_summary') {
        this.captureSummary(this.pending.slice(contentStart, close));
      }

      this.pending = this.pending.slice(close + 1);
      this.skipWhitespace = endsWithWhitespaceOrEmpty(this.visible);
    }
  }

  private captureSummary(content: string): void {
    const summary = content.trim();
    if (this.mediaSummary === null && summary.length > 0) {
      this.mediaSummary = summary;
    }
  }
}

/** Decodes a complete response in one pass. */
export function decodeResponse(text: string): DecodedResponse {
  const decoder = new StreamDecoder();
  decoder.push(text);
  return decoder.finish();
}

export function stripControlTags(text: string): string {
  return decodeResponse(text).text;
}
