import { afterEach, describe, expect, it, vi } from 'vitest';

import { ConversationHistory } from '../history/conversationHistory.js';
import { UnsupportedMediaError } from '../llm/backend.js';
import { buildDefaultExplorationSequence, buildFaceScanSequence } from '../motion/compiler.js';
import type { ServerMessage } from '../protocol.js';
import { ConversationRepository } from '../store/conversations.js';
import { IN_MEMORY_STORE, openStore } from '../store/database.js';
import { MemoryRepository } from '../store/memory.js';
import { PeopleRepository } from '../store/people.js';
import { ZoneRepository } from '../store/zones.js';
import { RecordingTransport, ScriptedBackend, type ScriptedTurn } from '../testing/fakes.js';
import { Session } from './session.js';
import { BackgroundTasks } from './tasks.js';

const API_KEY = 'test-secret';
const RESUMED_SESSION_ID = '6f1c2a8e-3b4d-4c5e-9f60-718293a4b5c6';

function createHarness(turns: ScriptedTurn[] = [], transport = new RecordingTransport()) {
  const db = openStore(IN_MEMORY_STORE);
  const clock = () => 1_000;
  const backend = new ScriptedBackend(turns);
  const repository = new ConversationRepository(db, clock);
  const history = new ConversationHistory({ repository, backend, compactionThreshold: 20, keepRecent: 5 });
  const people = new PeopleRepository(db, clock);
  const zones = new ZoneRepository(db, clock);
  const memories = new MemoryRepository(db, clock);
  const tasks = new BackgroundTasks();

  const session = new Session(transport, {
    backend,
    history,
    people,
    zones,
    memories,
    tasks,
    settings: {
      apiKey: API_KEY,
      handshakeTimeoutMs: 1_000,
      batteryLowThreshold: 20,
      memory: { contextMinImportance: 5, contextLimit: 5 },
    },
    now: clock,
  });
  session.open();

  const sendJson = (message: unknown): Promise<void> =>
    session.receive(Buffer.from(JSON.stringify(message), 'utf8'), false);

  const authenticate = async (extra: Record<string, unknown> = {}): Promise<string> => {
    await sendJson({ type: 'auth', api_key: API_KEY, ...extra });
    transport.sent.length = 0;
    return session.sessionId ?? '';
  };

  return { backend, history, people, zones, memories, tasks, transport, session, sendJson, authenticate };
}

function types(messages: ServerMessage[]): string[] {
  return messages.map((message) => message.type);
}

afterEach(() => {
  vi.useRealTimers();
});

describe('Session handshake', () => {
  it('answers a valid auth with a fresh session id', async () => {
    const { transport, session, sendJson } = createHarness();

    await sendJson({ type: 'auth', api_key: API_KEY, device_id: 'robot-1' });

    expect(session.state).toBe('active');
    expect(transport.sent).toEqual([{ type: 'auth_ok', session_id: session.sessionId }]);
    expect(session.sessionId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('closes with a policy violation on a wrong key', async () => {
    const { transport, session, sendJson } = createHarness();

    await sendJson({ type: 'auth', api_key: 'wrong' });
    await sendJson({ type: 'auth', api_key: API_KEY });

    expect(transport.sent).toEqual([]);
    expect(transport.closed).toEqual([{ code: 1008, reason: 'invalid api key' }]);
    expect(session.state).toBe('closed');
  });

  it('requires auth as the first message', async () => {
    const { transport, sendJson } = createHarness();

    await sendJson({ type: 'text', content: 'hola' });

    expect(transport.closed).toEqual([{ code: 1008, reason: 'expected auth message' }]);
  });

  it('rejects a binary first frame', async () => {
    const { transport, session } = createHarness();

    await session.receive(Buffer.from([1, 2, 3]), true);

    expect(transport.closed).toEqual([{ code: 1008, reason: 'binary frame before auth' }]);
  });

  it('closes when no auth arrives in time', () => {
    vi.useFakeTimers();
    const { transport, session } = createHarness();

    vi.advanceTimersByTime(999);
    expect(transport.closed).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(transport.closed).toEqual([{ code: 1008, reason: 'auth timeout' }]);
    expect(session.state).toBe('closed');
  });

  it('resumes the history of a known session id', async () => {
    const { backend, history, transport, sendJson } = createHarness([['Sí, me acuerdo.']]);
    history.add(RESUMED_SESSION_ID, 'user', 'Me gusta el té');
    history.add(RESUMED_SESSION_ID, 'assistant', 'Anotado.');

    await sendJson({ type: 'auth', api_key: API_KEY, session_id: RESUMED_SESSION_ID });
    await sendJson({ type: 'text', request_id: 'r1', content: '¿Te acuerdas?' });

    expect(transport.sent[0]).toEqual({ type: 'auth_ok', session_id: RESUMED_SESSION_ID });
    expect(backend.requests[0]?.history).toEqual([
      { role: 'user', content: 'Me gusta el té' },
      { role: 'assistant', content: 'Anotado.' },
    ]);
  });
});

describe('Session response cycle', () => {
  it('streams a text turn in order and persists it afterwards', async () => {
    const harness = createHarness([
      ['[emotion:hap', 'py][actions:nod:400] ¡Hola', '! [memory:general:Hoy es el cumple de Luis] Toma una foto.'],
    ]);
    const sessionId = await harness.authenticate();

    await harness.sendJson({ type: 'text', request_id: 'r1', content: '  Hola robot  ' });

    expect(harness.transport.sent).toEqual([
      { type: 'emotion', request_id: 'r1', emotion: 'happy' },
      { type: 'text_chunk', request_id: 'r1', text: '¡Hola' },
      { type: 'text_chunk', request_id: 'r1', text: '! ' },
      { type: 'text_chunk', request_id: 'r1', text: 'Toma una foto.' },
      { type: 'capture_request', request_id: 'r1', capture_type: 'photo' },
      {
        type: 'response_meta',
        request_id: 'r1',
        response_text: '¡Hola! Toma una foto.',
        expression: { emojis: ['1F600', '1F603', '1F60A'], duration_per_emoji: 2_000, transition: 'bounce' },
        actions: [
          {
            type: 'move_sequence',
            description: 'Suggested movement',
            steps: [
              { action: 'move_forward_cm', params: [2], duration_ms: 200 },
              { action: 'move_backward_cm', params: [2], duration_ms: 200 },
            ],
            total_duration_ms: 400,
            step_count: 2,
            emotion_during: 'happy',
          },
        ],
      },
      { type: 'stream_end', request_id: 'r1', processing_time_ms: 0 },
    ]);
    expect(harness.backend.requests[0]?.input).toEqual({ text: 'Hola robot', media: [] });

    await harness.tasks.idle();

    expect(harness.history.get(sessionId)).toEqual([
      { role: 'user', content: 'Hola robot' },
      { role: 'assistant', content: '¡Hola! Toma una foto.' },
    ]);
    expect(harness.memories.listForScope(null).map((memory) => memory.content)).toEqual([
      'Hoy es el cumple de Luis',
    ]);
  });

  it('ignores blank text', async () => {
    const harness = createHarness();
    await harness.authenticate();

    await harness.sendJson({ type: 'text', content: '   ' });

    expect(harness.transport.sent).toEqual([]);
    expect(harness.backend.requests).toEqual([]);
  });

  it('reports audio_end without frames', async () => {
    const harness = createHarness();
    await harness.authenticate();

    await harness.sendJson({ type: 'interaction_start', request_id: 'r2' });
    await harness.sendJson({ type: 'audio_end' });

    expect(harness.transport.sent).toEqual([
      {
        type: 'error',
        error_code: 'EMPTY_AUDIO',
        message: 'No audio frames were received before audio_end.',
        recoverable: true,
        request_id: 'r2',
      },
    ]);
    expect(harness.backend.requests).toEqual([]);
  });

  it('answers buffered audio and records the media summary', async () => {
    const harness = createHarness([['[emotion:curious] [media_summary: Ana pregunta por el tiempo] Hará sol.']]);
    harness.people.getOrCreate('person_ana', 'Ana');
    const sessionId = await harness.authenticate();

    await harness.sendJson({ type: 'interaction_start', request_id: 'r3', person_id: 'person_ana' });
    await harness.session.receive(Buffer.from([1, 2]), true);
    await harness.session.receive(Buffer.from([3]), true);
    await harness.sendJson({ type: 'audio_end', mime: 'audio/wav' });

    expect(harness.backend.requests[0]).toEqual({
      history: [],
      input: { text: null, media: [{ kind: 'audio', mimeType: 'audio/wav', data: Buffer.from([1, 2, 3]) }] },
      context: 'Current person: Ana (id person_ana)',
    });
    expect(types(harness.transport.sent)).toEqual(['emotion', 'text_chunk', 'response_meta', 'stream_end']);
    expect(harness.transport.sent[0]).toEqual({
      type: 'emotion',
      request_id: 'r3',
      emotion: 'curious',
      person_identified: 'person_ana',
    });

    await harness.tasks.idle();

    expect(harness.history.get(sessionId)).toEqual([
      { role: 'user', content: 'Ana pregunta por el tiempo' },
      { role: 'assistant', content: 'Hará sol.' },
    ]);
    expect(harness.people.getByPersonId('person_ana')?.interactionCount).toBe(2);
  });

  it('learns a name together with the pending face embedding', async () => {
    const harness = createHarness([['[emotion:greeting] ¡Encantado, Marta! [person_name:Marta]']]);
    await harness.authenticate();
    const embedding = Array.from({ length: 128 }, () => 0.5);

    await harness.sendJson({ type: 'interaction_start', request_id: 'r4', face_embedding: embedding });
    await harness.sendJson({ type: 'text', content: 'Me llamo Marta' });

    expect(harness.transport.sent.at(-2)).toMatchObject({
      type: 'response_meta',
      request_id: 'r4',
      response_text: '¡Encantado, Marta!',
      person_name: 'Marta',
    });

    await harness.tasks.idle();

    expect(harness.people.getByPersonId('person_marta')?.name).toBe('Marta');
    expect(harness.people.getEmbeddings('person_marta').map((stored) => stored.vector)).toEqual([embedding]);
  });

  it('turns a backend failure into an agent error', async () => {
    const harness = createHarness([{ fragments: ['[emotion:sad] Lo'], error: new Error('model overloaded') }]);
    const sessionId = await harness.authenticate();

    await harness.sendJson({ type: 'text', request_id: 'r5', content: '¿Qué tal?' });

    expect(harness.transport.sent).toEqual([
      { type: 'emotion', request_id: 'r5', emotion: 'sad' },
      { type: 'text_chunk', request_id: 'r5', text: 'Lo' },
      { type: 'error', error_code: 'AGENT_ERROR', message: 'model overloaded', recoverable: true, request_id: 'r5' },
    ]);

    await harness.tasks.idle();
    expect(harness.history.get(sessionId)).toEqual([]);
  });

  it('reports media the backend cannot take', async () => {
    const harness = createHarness([{ fragments: [], error: new UnsupportedMediaError('scripted', 'video') }]);
    await harness.authenticate();

    await harness.sendJson({ type: 'video', request_id: 'r6', data: 'AAEC' });

    expect(harness.transport.sent).toEqual([
      {
        type: 'error',
        error_code: 'UNSUPPORTED_MEDIA',
        message: 'scripted backend cannot take video input.',
        recoverable: true,
        request_id: 'r6',
      },
    ]);
    expect(harness.backend.requests[0]?.input.media).toEqual([
      { kind: 'video', mimeType: 'video/mp4', data: Buffer.from([0, 1, 2]) },
    ]);
  });

  it('uses the detected person for later turns', async () => {
    const harness = createHarness([['[emotion:happy] ¡Hola, Ana!']]);
    harness.people.getOrCreate('person_ana', 'Ana');
    await harness.authenticate();

    await harness.sendJson({ type: 'person_detected', known: true, person_id: 'person_ana', confidence: 0.9 });
    await harness.sendJson({ type: 'text', request_id: 'r7', content: 'Hola' });

    expect(harness.transport.sent[0]).toEqual({
      type: 'emotion',
      request_id: 'r7',
      emotion: 'happy',
      person_identified: 'person_ana',
      confidence: 0.9,
    });

    await harness.tasks.idle();
    expect(harness.people.getByPersonId('person_ana')?.interactionCount).toBe(3);
  });
});

describe('Session protocol errors', () => {
  it('answers unknown message types and keeps the session open', async () => {
    const harness = createHarness();
    await harness.authenticate();

    await harness.sendJson({ type: 'dance', request_id: 'r9' });
    await harness.session.receive(Buffer.from('not json', 'utf8'), false);
    await harness.sendJson({ type: 'auth', api_key: API_KEY });

    expect(harness.transport.sent).toEqual([
      {
        type: 'error',
        error_code: 'INVALID_MESSAGE',
        message: 'Invalid or unsupported message of type dance.',
        recoverable: true,
        request_id: 'r9',
      },
      { type: 'error', error_code: 'INVALID_MESSAGE', message: 'Expected a JSON object message.', recoverable: true },
      { type: 'error', error_code: 'INVALID_MESSAGE', message: 'Session is already authenticated.', recoverable: true },
    ]);
    expect(harness.session.state).toBe('active');
  });

  it('rejects undecodable base64 media', async () => {
    const harness = createHarness();
    await harness.authenticate();

    await harness.sendJson({ type: 'image', request_id: 'r10', data: '!!!!' });

    expect(harness.transport.sent).toEqual([
      {
        type: 'error',
        error_code: 'INVALID_MESSAGE',
        message: 'data is not valid base64 data.',
        recoverable: true,
        request_id: 'r10',
      },
    ]);
  });

  it('closes with an internal error when sending fails unexpectedly', async () => {
    class FailingTransport extends RecordingTransport {
      override send(message: ServerMessage): void {
        if (message.type === 'face_scan_actions') {
          throw new Error('socket buffer full');
        }

        super.send(message);
      }
    }

    const harness = createHarness([], new FailingTransport());
    await harness.authenticate();

    await harness.sendJson({ type: 'face_scan_mode', request_id: 'fs1' });

    expect(harness.transport.sent).toEqual([
      { type: 'error', error_code: 'INTERNAL_ERROR', message: 'Internal server error.', recoverable: false },
    ]);
    expect(harness.transport.closed).toEqual([{ code: 1011, reason: 'internal error' }]);
    expect(harness.session.state).toBe('closed');
  });

  it('closes instead of rejecting when the error reply cannot be sent', async () => {
    class ErrorRefusingTransport extends RecordingTransport {
      override send(message: ServerMessage): void {
        if (message.type === 'error') {
          throw new Error('socket closed');
        }

        super.send(message);
      }
    }

    const harness = createHarness([], new ErrorRefusingTransport());
    await harness.authenticate();

    await expect(harness.sendJson({ type: 'dance', request_id: 'r11' })).resolves.toBeUndefined();

    expect(harness.transport.sent).toEqual([]);
    expect(harness.transport.closed).toEqual([{ code: 1011, reason: 'internal error' }]);
    expect(harness.session.state).toBe('closed');
  });
});

describe('Session commands', () => {
  it('sends the face scan sequence', async () => {
    const harness = createHarness();
    await harness.authenticate();

    await harness.sendJson({ type: 'face_scan_mode', request_id: 'fs1' });

    expect(harness.transport.sent).toEqual([
      { type: 'face_scan_actions', request_id: 'fs1', actions: buildFaceScanSequence() },
    ]);
  });

  it('explores with the default pattern and stores learned zones', async () => {
    const harness = createHarness([['[emotion:curious] Voy a explorar. [zone_learn:Pasillo:unknown:Largo y estrecho]']]);
    await harness.authenticate();

    await harness.sendJson({ type: 'explore_mode', request_id: 'ex1' });

    expect(harness.transport.sent).toEqual([
      {
        type: 'exploration_actions',
        request_id: 'ex1',
        actions: buildDefaultExplorationSequence(),
        exploration_speech: 'Voy a explorar.',
        duration_minutes: 5,
      },
    ]);
    expect(harness.backend.requests[0]?.history).toEqual([]);

    await harness.tasks.idle();
    expect(harness.zones.getByName('pasillo')?.description).toBe('Largo y estrecho');
  });

  it('tracks the current zone across enter and leave', async () => {
    const harness = createHarness([['Estamos en la cocina.']]);
    await harness.authenticate();

    await harness.sendJson({ type: 'zone_update', zone_name: 'Cocina', category: 'kitchen', action: 'enter' });
    await harness.tasks.idle();
    expect(harness.zones.getCurrentZone()?.name).toBe('Cocina');

    await harness.sendJson({ type: 'text', content: '¿Dónde estamos?' });
    expect(harness.backend.requests[0]?.context).toBe('Current location: Cocina [kitchen]');

    await harness.sendJson({ type: 'zone_update', zone_name: 'cocina', action: 'leave' });
    await harness.tasks.idle();
    expect(harness.zones.getCurrentZone()).toBeNull();
  });

  it('alerts only at or below the battery threshold', async () => {
    const harness = createHarness();
    await harness.authenticate();

    await harness.sendJson({ type: 'battery_status', battery_level: 50 });
    await harness.sendJson({ type: 'battery_status', battery_level: 20, source: 'base' });

    expect(harness.transport.sent).toEqual([{ type: 'low_battery_alert', battery_level: 20, source: 'base' }]);
  });
});
