import { randomUUID } from 'node:crypto';

import { StreamDecoder, type DecodedResponse } from '../decoder/streamDecoder.js';
import type { ConversationHistory } from '../history/conversationHistory.js';
import { BackendError, type GenerativeBackend, type MediaPart, type TurnInput } from '../llm/backend.js';
import { buildExplorationInstruction } from '../llm/prompts.js';
import { componentLogger, errorMessage, type Logger } from '../logger.js';
import { buildDefaultExplorationSequence, buildFaceScanSequence, buildMoveSequence } from '../motion/compiler.js';
import {
  AuthMessageSchema,
  ClientMessageSchema,
  ErrorCode,
  INTERNAL_ERROR_CLOSE_CODE,
  makeAuthOk,
  makeError,
  makeExplorationActions,
  makeFaceScanActions,
  makeLowBatteryAlert,
  newSessionId,
  POLICY_VIOLATION_CLOSE_CODE,
  type AudioEndMessage,
  type BatteryStatusMessage,
  type ClientMessage,
  type ExploreModeMessage,
  type ImageMessage,
  type InteractionStartMessage,
  type MultimodalMessage,
  type PersonDetectedMessage,
  type ServerMessage,
  type VideoMessage,
  type ZoneUpdateMessage,
} from '../protocol.js';
import type { Clock } from '../store/database.js';
import type { MemoryRepository } from '../store/memory.js';
import type { PeopleRepository } from '../store/people.js';
import type { ZoneRepository } from '../store/zones.js';
import { apiKeyMatches } from './auth.js';
import { loadTurnContext, runResponseCycle, type ResponseCycleDeps } from './responseCycle.js';
import {
  persistZoneDirectives,
  scheduleTurnSideEffects,
  type SessionIdentity,
  type SideEffectDeps,
} from './sideEffects.js';
import type { BackgroundTasks } from './tasks.js';

export const AUDIO_PLACEHOLDER = '[audio]';
export const VISUAL_PLACEHOLDER = '[image/video]';

const EXPLORATION_DESCRIPTION = 'Exploration';

export type SessionState = 'connecting' | 'authenticating' | 'active' | 'closed';

export interface SessionTransport {
  send(message: ServerMessage): void;
  close(code: number, reason: string): void;
}

export interface SessionSettings {
  apiKey: string;
  handshakeTimeoutMs: number;
  batteryLowThreshold: number;
  memory: { contextMinImportance: number; contextLimit: number };
}

export interface SessionDeps {
  backend: GenerativeBackend;
  history: ConversationHistory;
  people: PeopleRepository;
  zones: ZoneRepository;
  memories: MemoryRepository;
  tasks: BackgroundTasks;
  settings: SessionSettings;
  logger?: Logger;
  now?: Clock;
}

export class SessionProtocolError extends Error {
  public readonly code: ErrorCode;
  public readonly requestId: string | undefined;

  constructor(message: string, options: { code?: ErrorCode; requestId?: string } = {}) {
    super(message);
    this.name = 'SessionProtocolError';
    this.code = options.code ?? ErrorCode.InvalidMessage;
    this.requestId = options.requestId;
  }
}

export class EmptyAudioError extends SessionProtocolError {
  constructor(requestId: string) {
    super('No audio frames were received before audio_end.', { code: ErrorCode.EmptyAudio, requestId });
    this.name = 'EmptyAudioError';
  }
}

class SerialTaskQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const runPromise = this.tail.then(task, task);

    this.tail = runPromise.then(
      () => undefined,
      () => undefined,
    );

    return runPromise;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function decodeBase64(data: string, field: string, requestId: string): Buffer {
  const bytes = Buffer.from(data, 'base64');
  if (bytes.length === 0) {
    throw new SessionProtocolError(`${field} is not valid base64 data.`, { requestId });
  }

  return bytes;
}

/** What the history keeps for the user side of a turn. */
export function userTurnFor(turn: TurnInput, mediaSummary: string | null): string {
  if (turn.media.length === 0) {
    return turn.text ?? '';
  }

  if (mediaSummary) {
    return mediaSummary;
  }

  return turn.media.some((part) => part.kind === 'audio') ? AUDIO_PLACEHOLDER : VISUAL_PLACEHOLDER;
}

/**
 * One duplex connection. Frames are handled strictly in arrival order; the first one must be a
 * valid `auth` message. Persistence triggered by a response runs as background tasks.
 */
export class Session {
  private readonly transport: SessionTransport;
  private readonly deps: SessionDeps;
  private readonly log: Logger;
  private readonly now: Clock;
  private readonly queue = new SerialTaskQueue();

  private currentState: SessionState = 'connecting';
  private id: string | null = null;
  private handshakeTimer: ReturnType<typeof setTimeout> | null = null;

  private audioChunks: Buffer[] = [];
  private currentRequestId: string | null = null;
  private identity: SessionIdentity | null = null;
  private pendingEmbedding: number[] | null = null;
  private zoneName: string | null = null;

  constructor(transport: SessionTransport, deps: SessionDeps) {
    this.transport = transport;
    this.deps = deps;
    this.log = deps.logger ?? componentLogger('session');
    this.now = deps.now ?? Date.now;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get sessionId(): string | null {
    return this.id;
  }

  /** Starts the handshake clock. */
  open(): void {
    if (this.currentState !== 'connecting') {
      return;
    }

    this.currentState = 'authenticating';
    this.handshakeTimer = setTimeout(() => {
      this.handshakeTimer = null;
      if (this.currentState === 'authenticating') {
        this.rejectHandshake('auth timeout');
      }
    }, this.deps.settings.handshakeTimeoutMs);
  }

  receive(data: Buffer, isBinary: boolean): Promise<void> {
    if (this.currentState === 'closed') {
      return Promise.resolve();
    }

    return this.queue.run(() => this.process(data, isBinary));
  }

  /** The transport went away. Scheduled background work keeps running. */
  handleTransportClosed(): void {
    if (this.currentState === 'closed') {
      return;
    }

    this.teardown('transport closed');
  }

  private async process(data: Buffer, isBinary: boolean): Promise<void> {
    if (this.currentState === 'closed') {
      return;
    }

    try {
      if (this.currentState !== 'active') {
        this.authenticate(data, isBinary);
        return;
      }

      if (isBinary) {
        this.audioChunks.push(data);
        return;
      }

      await this.dispatch(this.parseMessage(data.toString('utf8')));
    } catch (error) {
      if (error instanceof SessionProtocolError) {
        this.replyProtocolError(error);
        return;
      }

      this.fail(error);
    }
  }

  /** A transport that cannot take the reply ends the session like any other fault. */
  private replyProtocolError(error: SessionProtocolError): void {
    try {
      this.send(makeError(error.code, error.message, { request_id: error.requestId }));
    } catch (sendError) {
      this.fail(sendError);
    }
  }

  private authenticate(data: Buffer, isBinary: boolean): void {
    if (isBinary) {
      this.rejectHandshake('binary frame before auth');
      return;
    }

    const parsed = AuthMessageSchema.safeParse(parseJson(data.toString('utf8')));
    if (!parsed.success) {
      this.rejectHandshake('expected auth message');
      return;
    }

    if (!apiKeyMatches(parsed.data.api_key, this.deps.settings.apiKey)) {
      this.rejectHandshake('invalid api key');
      return;
    }

    this.clearHandshakeTimer();
    this.id = parsed.data.session_id ?? newSessionId();
    this.zoneName = this.deps.zones.getCurrentZone()?.name ?? null;
    this.currentState = 'active';
    this.send(makeAuthOk(this.id));

    this.log.info(
      { sessionId: this.id, deviceId: parsed.data.device_id, resumed: parsed.data.session_id !== undefined },
      'session: authenticated',
    );
  }

  private parseMessage(text: string): ClientMessage {
    const payload = parseJson(text);
    if (!isRecord(payload)) {
      throw new SessionProtocolError('Expected a JSON object message.');
    }

    const requestId = typeof payload.request_id === 'string' ? payload.request_id : undefined;
    const parsed = ClientMessageSchema.safeParse(payload);
    if (!parsed.success) {
      const type = typeof payload.type === 'string' ? payload.type : '(missing)';
      throw new SessionProtocolError(`Invalid or unsupported message of type ${type}.`, { requestId });
    }

    return parsed.data;
  }

  private requestIdFor(message: { request_id?: string }): string {
    return message.request_id ?? this.currentRequestId ?? randomUUID();
  }

  private async dispatch(message: ClientMessage): Promise<void> {
    switch (message.type) {
      case 'auth':
        throw new SessionProtocolError('Session is already authenticated.');
      case 'interaction_start':
        this.startInteraction(message);
        return;
      case 'text': {
        const content = message.content.trim();
        if (!content) {
          return;
        }

        await this.runTurn(this.requestIdFor(message), { text: content, media: [] });
        return;
      }
      case 'audio_end':
        await this.finishAudio(message);
        return;
      case 'image':
      case 'video':
        await this.runVisual(message);
        return;
      case 'multimodal':
        await this.runMultimodal(message);
        return;
      case 'explore_mode':
        await this.explore(message);
        return;
      case 'face_scan_mode':
        this.send(makeFaceScanActions(this.requestIdFor(message), buildFaceScanSequence()));
        return;
      case 'zone_update':
        this.updateZone(message);
        return;
      case 'person_detected':
        this.detectPerson(message);
        return;
      case 'battery_status':
        this.reportBattery(message);
        return;
    }
  }

  private startInteraction(message: InteractionStartMessage): void {
    this.audioChunks = [];
    this.currentRequestId = message.request_id ?? randomUUID();
    this.identity = message.person_id
      ? { personId: message.person_id, confidence: message.face_confidence }
      : null;
    this.pendingEmbedding = message.face_embedding ?? null;

    this.log.debug(
      { sessionId: this.id, requestId: this.currentRequestId, personId: this.identity?.personId },
      'session: interaction started',
    );
  }

  private async finishAudio(message: AudioEndMessage): Promise<void> {
    const requestId = this.requestIdFor(message);
    const audio = Buffer.concat(this.audioChunks);
    this.audioChunks = [];

    if (audio.length === 0) {
      throw new EmptyAudioError(requestId);
    }

    await this.runTurn(requestId, { text: null, media: [{ kind: 'audio', mimeType: message.mime, data: audio }] });
  }

  private async runVisual(message: ImageMessage | VideoMessage): Promise<void> {
    const requestId = this.requestIdFor(message);
    const text = message.text?.trim() || null;
    const media: MediaPart = {
      kind: message.type,
      mimeType: message.mime,
      data: decodeBase64(message.data, 'data', requestId),
    };

    await this.runTurn(requestId, { text, media: [media] });
  }

  private async runMultimodal(message: MultimodalMessage): Promise<void> {
    const requestId = this.requestIdFor(message);
    const media: MediaPart[] = [];

    if (message.audio) {
      media.push({ kind: 'audio', mimeType: message.audio_mime, data: decodeBase64(message.audio, 'audio', requestId) });
    }

    if (message.image) {
      media.push({ kind: 'image', mimeType: message.image_mime, data: decodeBase64(message.image, 'image', requestId) });
    }

    if (message.video) {
      media.push({ kind: 'video', mimeType: message.video_mime, data: decodeBase64(message.video, 'video', requestId) });
    }

    const text = message.text?.trim() || null;
    if (media.length === 0 && !text) {
      throw new SessionProtocolError('multimodal message carries no content.', { requestId });
    }

    await this.runTurn(requestId, { text, media });
  }

  private cycleDeps(): ResponseCycleDeps {
    return {
      backend: this.deps.backend,
      history: this.deps.history,
      people: this.deps.people,
      zones: this.deps.zones,
      memories: this.deps.memories,
      memorySettings: this.deps.settings.memory,
      send: (message) => {
        this.send(message);
      },
      now: this.now,
    };
  }

  private sideEffectDeps(): SideEffectDeps {
    return {
      history: this.deps.history,
      people: this.deps.people,
      zones: this.deps.zones,
      memories: this.deps.memories,
      tasks: this.deps.tasks,
      log: this.log,
    };
  }

  private async runTurn(requestId: string, turn: TurnInput): Promise<void> {
    const sessionId = this.requireSessionId();
    const identity = this.identity;
    const pendingEmbedding = this.pendingEmbedding;
    const zoneName = this.zoneName;

    let decoded: DecodedResponse;
    try {
      decoded = await runResponseCycle(this.cycleDeps(), { requestId, sessionId, turn, identity, zoneName });
    } catch (error) {
      this.sendTurnError(requestId, error);
      return;
    }

    if (decoded.personName) {
      this.pendingEmbedding = null;
    }

    scheduleTurnSideEffects(this.sideEffectDeps(), {
      sessionId,
      userTurn: userTurnFor(turn, decoded.mediaSummary),
      decoded,
      identity,
      pendingEmbedding,
      zoneName,
    });
  }

  private async explore(message: ExploreModeMessage): Promise<void> {
    const requestId = this.requestIdFor(message);
    const instruction = buildExplorationInstruction({
      durationMinutes: message.duration_minutes,
      zoneName: this.zoneName,
    });

    let decoded: DecodedResponse;
    try {
      const context = loadTurnContext(this.cycleDeps(), this.identity, this.zoneName);
      const decoder = new StreamDecoder();
      for await (const fragment of this.deps.backend.stream({
        history: [],
        input: { text: instruction, media: [] },
        context,
      })) {
        decoder.push(fragment);
      }

      decoded = decoder.finish();
    } catch (error) {
      this.sendTurnError(requestId, error);
      return;
    }

    const actions =
      decoded.actions.length > 0
        ? buildMoveSequence(EXPLORATION_DESCRIPTION, decoded.actions).steps
        : buildDefaultExplorationSequence();

    this.send(
      makeExplorationActions(requestId, {
        actions,
        exploration_speech: decoded.text,
        duration_minutes: message.duration_minutes,
      }),
    );

    persistZoneDirectives(this.sideEffectDeps(), decoded.zones);
  }

  private updateZone(message: ZoneUpdateMessage): void {
    const { zone_name: name, category, action } = message;
    const zones = this.deps.zones;

    switch (action) {
      case 'enter':
        this.zoneName = name;
        this.deps.tasks.spawn('zone_enter', () => {
          zones.getOrCreate(name, category);
          zones.setCurrentZone(name);
        });
        break;
      case 'discover':
        this.deps.tasks.spawn('zone_discover', () => {
          zones.getOrCreate(name, category);
        });
        break;
      case 'leave':
        if (this.zoneName?.toLowerCase() === name.toLowerCase()) {
          this.zoneName = null;
        }

        this.deps.tasks.spawn('zone_leave', () => {
          zones.clearCurrentZone(name);
        });
        break;
    }

    this.log.debug({ sessionId: this.id, zone: name, action }, 'session: zone update');
  }

  private detectPerson(message: PersonDetectedMessage): void {
    if (!message.known || !message.person_id) {
      this.identity = null;
      return;
    }

    const personId = message.person_id;
    this.identity = { personId, confidence: message.confidence };
    this.deps.tasks.spawn('person_detected', () => {
      this.deps.people.touch(personId);
    });
  }

  private reportBattery(message: BatteryStatusMessage): void {
    if (message.battery_level > this.deps.settings.batteryLowThreshold) {
      return;
    }

    this.log.warn({ sessionId: this.id, level: message.battery_level, source: message.source }, 'session: battery low');
    this.send(makeLowBatteryAlert(message.battery_level, message.source));
  }

  private sendTurnError(requestId: string, error: unknown): void {
    const code = error instanceof BackendError ? error.code : ErrorCode.AgentError;
    this.log.error({ sessionId: this.id, requestId, err: errorMessage(error) }, 'session: response cycle failed');
    this.send(makeError(code, errorMessage(error), { request_id: requestId }));
  }

  private requireSessionId(): string {
    if (this.id === null) {
      throw new Error('session is not authenticated');
    }

    return this.id;
  }

  private send(message: ServerMessage): void {
    if (this.currentState === 'closed') {
      return;
    }

    this.transport.send(message);
  }

  private rejectHandshake(reason: string): void {
    this.log.warn({ reason }, 'session: handshake rejected');
    this.transport.close(POLICY_VIOLATION_CLOSE_CODE, reason);
    this.teardown(reason);
  }

  private fail(error: unknown): void {
    this.log.error({ sessionId: this.id, err: errorMessage(error) }, 'session: unexpected fault');

    try {
      this.send(makeError(ErrorCode.InternalError, 'Internal server error.', { recoverable: false }));
      this.transport.close(INTERNAL_ERROR_CLOSE_CODE, 'internal error');
    } catch (closeError) {
      this.log.warn({ sessionId: this.id, err: errorMessage(closeError) }, 'session: failed to report fault');
    } finally {
      this.teardown('internal error');
    }
  }

  private clearHandshakeTimer(): void {
    if (this.handshakeTimer) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = null;
    }
  }

  private teardown(reason: string): void {
    this.clearHandshakeTimer();
    this.currentState = 'closed';
    this.audioChunks = [];
    this.log.info({ sessionId: this.id, reason }, 'session: closed');
  }
}
