import { classifyCaptureIntent } from '../decoder/intent.js';
import { StreamDecoder, type DecodedResponse } from '../decoder/streamDecoder.js';
import { composeEmojis } from '../decoder/tags.js';
import type { ConversationHistory } from '../history/conversationHistory.js';
import type { GenerativeBackend, TurnInput } from '../llm/backend.js';
import { buildContextText } from '../memory/context.js';
import { buildMoveSequenceAction } from '../motion/compiler.js';
import {
  makeCaptureRequest,
  makeEmotion,
  makeResponseMeta,
  makeStreamEnd,
  makeTextChunk,
  type ServerMessage,
} from '../protocol.js';
import type { Clock } from '../store/database.js';
import type { MemoryRepository } from '../store/memory.js';
import type { PeopleRepository } from '../store/people.js';
import type { ZoneRepository } from '../store/zones.js';
import type { SessionIdentity } from './sideEffects.js';

export const SUGGESTED_MOVE_DESCRIPTION = 'Suggested movement';

export interface ResponseCycleDeps {
  backend: GenerativeBackend;
  history: ConversationHistory;
  people: PeopleRepository;
  zones: ZoneRepository;
  memories: MemoryRepository;
  memorySettings: { contextMinImportance: number; contextLimit: number };
  send: (message: ServerMessage) => void;
  now: Clock;
}

export interface ResponseCycleInput {
  requestId: string;
  sessionId: string;
  turn: TurnInput;
  identity: SessionIdentity | null;
  zoneName: string | null;
}

export function loadTurnContext(
  deps: Pick<ResponseCycleDeps, 'people' | 'zones' | 'memories' | 'memorySettings'>,
  identity: SessionIdentity | null,
  zoneName: string | null,
): string {
  const personId = identity?.personId ?? null;
  const zone = zoneName ? deps.zones.getByName(zoneName) : null;
  const bundle = deps.memories.getContextBundle({
    personId,
    zoneId: zone?.id ?? null,
    minImportance: deps.memorySettings.contextMinImportance,
    limit: deps.memorySettings.contextLimit,
  });

  return buildContextText({
    bundle,
    personId,
    personName: personId ? (deps.people.getByPersonId(personId)?.name ?? null) : null,
    zone,
  });
}

/**
 * One backend turn: emotion, text chunks, an optional capture request, response_meta, stream_end.
 * Throws when the backend or the decoder fails; whatever was already sent stays sent.
 */
export async function runResponseCycle(deps: ResponseCycleDeps, input: ResponseCycleInput): Promise<DecodedResponse> {
  const startedAtMs = deps.now();
  const { requestId, identity } = input;
  const send = deps.send;

  const context = loadTurnContext(deps, identity, input.zoneName);
  const history = deps.history.get(input.sessionId);

  let emotionSent = false;
  const sendEmotion = (emotion: string): void => {
    if (emotionSent) {
      return;
    }

    emotionSent = true;
    send(
      makeEmotion(
        requestId,
        emotion,
        identity ? { person_id: identity.personId, confidence: identity.confidence } : undefined,
      ),
    );
  };

  const decoder = new StreamDecoder({
    onHeader: (header) => {
      sendEmotion(header.emotion);
    },
    onText: (text) => {
      send(makeTextChunk(requestId, text));
    },
  });

  for await (const fragment of deps.backend.stream({ history, input: input.turn, context })) {
    decoder.push(fragment);
  }

  const decoded = decoder.finish();
  sendEmotion(decoded.emotion);

  const capture = classifyCaptureIntent(decoded.text);
  if (capture) {
    send(makeCaptureRequest(requestId, capture));
  }

  send(
    makeResponseMeta(requestId, {
      response_text: decoded.text,
      emojis: composeEmojis(decoded.emojis, decoded.emotion),
      actions:
        decoded.actions.length > 0
          ? [buildMoveSequenceAction(SUGGESTED_MOVE_DESCRIPTION, decoded.actions, decoded.emotion)]
          : [],
      ...(decoded.personName ? { person_name: decoded.personName } : {}),
    }),
  );

  send(makeStreamEnd(requestId, deps.now() - startedAtMs));
  return decoded;
}
