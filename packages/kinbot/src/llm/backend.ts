import type { ConversationRole } from '../store/conversations.js';

export type MediaKind = 'audio' | 'image' | 'video';

export interface MediaPart {
  kind: MediaKind;
  mimeType: string;
  data: Buffer;
}

export interface TurnInput {
  text: string | null;
  media: MediaPart[];
}

export interface HistoryEntry {
  role: ConversationRole;
  content: string;
}

export interface GenerateRequest {
  history: HistoryEntry[];
  input: TurnInput;
  context: string;
}

export interface SummarizeRequest {
  messages: HistoryEntry[];
}

/**
 * A generative text model. `stream` yields response fragments lazily and may throw once;
 * `summarize` condenses a slice of conversation history into one paragraph.
 */
export interface GenerativeBackend {
  readonly name: string;
  stream(request: GenerateRequest): AsyncIterable<string>;
  summarize(request: SummarizeRequest): Promise<string>;
}

export class BackendError extends Error {
  public readonly code: 'AGENT_ERROR' | 'UNSUPPORTED_MEDIA';

  constructor(message: string, code: 'AGENT_ERROR' | 'UNSUPPORTED_MEDIA' = 'AGENT_ERROR') {
    super(message);
    this.name = 'BackendError';
    this.code = code;
  }
}

export class UnsupportedMediaError extends BackendError {
  public readonly kind: MediaKind;

  constructor(backend: string, kind: MediaKind) {
    super(`${backend} backend cannot take ${kind} input.`, 'UNSUPPORTED_MEDIA');
    this.name = 'UnsupportedMediaError';
    this.kind = kind;
  }
}
