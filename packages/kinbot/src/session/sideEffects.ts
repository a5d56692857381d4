import type { DecodedResponse } from '../decoder/streamDecoder.js';
import type { ZoneDirective } from '../decoder/tags.js';
import type { ConversationHistory } from '../history/conversationHistory.js';
import type { Logger } from '../logger.js';
import type { MemoryRepository } from '../store/memory.js';
import { personSlug, type PeopleRepository } from '../store/people.js';
import type { ZoneRepository } from '../store/zones.js';
import type { BackgroundTasks } from './tasks.js';

export interface SessionIdentity {
  personId: string;
  confidence?: number;
}

export interface SideEffectDeps {
  history: ConversationHistory;
  people: PeopleRepository;
  zones: ZoneRepository;
  memories: MemoryRepository;
  tasks: BackgroundTasks;
  log: Logger;
}

export interface CompletedTurn {
  sessionId: string;
  userTurn: string;
  decoded: DecodedResponse;
  identity: SessionIdentity | null;
  pendingEmbedding: number[] | null;
  zoneName: string | null;
}

export function persistZoneDirectives(deps: SideEffectDeps, zones: ZoneDirective[]): void {
  if (zones.length === 0) {
    return;
  }

  deps.tasks.spawn('zones', () => {
    for (const zone of zones) {
      deps.zones.getOrCreate(zone.name, zone.category, zone.description);
    }
  });
}

/** Schedules every write a finished response implies. Nothing here is awaited by the caller. */
export function scheduleTurnSideEffects(deps: SideEffectDeps, turn: CompletedTurn): void {
  const { decoded, identity, sessionId } = turn;
  const personName = decoded.personName;
  const personId = identity?.personId ?? (personName ? personSlug(personName) : null);

  deps.tasks.spawn('history', async () => {
    deps.history.add(sessionId, 'user', turn.userTurn);
    deps.history.add(sessionId, 'assistant', decoded.text);
    await deps.history.compactIfNeeded(sessionId);
  });

  if (personName && personId) {
    const embedding = turn.pendingEmbedding;

    deps.tasks.spawn('person', () => {
      const person = deps.people.getOrCreate(personId, personName);
      if (person.name !== personName) {
        deps.people.updateName(personId, personName);
      }

      if (embedding) {
        deps.people.addEmbedding(personId, embedding);
        deps.log.info({ personId }, 'session: stored face embedding');
      }
    });
  }

  if (decoded.memories.length > 0) {
    const zoneName = turn.zoneName;

    deps.tasks.spawn('memories', () => {
      const zoneId = zoneName ? (deps.zones.getByName(zoneName)?.id ?? null) : null;

      for (const directive of decoded.memories) {
        const result = deps.memories.save({
          memoryType: directive.memoryType,
          content: directive.content,
          personId: directive.memoryType === 'person_fact' ? personId : null,
          zoneId: directive.memoryType === 'zone_info' ? zoneId : null,
        });

        if (result.status === 'rejected_private') {
          deps.log.info({ memoryType: directive.memoryType }, 'session: memory rejected by privacy filter');
        }
      }
    });
  }

  persistZoneDirectives(deps, decoded.zones);

  if (identity && !personName) {
    deps.tasks.spawn('touch', () => {
      deps.people.touch(identity.personId);
    });
  }
}
