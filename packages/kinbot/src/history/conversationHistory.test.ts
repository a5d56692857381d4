import { beforeEach, describe, expect, it } from 'vitest';

import { IN_MEMORY_STORE, openStore } from '../store/database.js';
import { ConversationRepository } from '../store/conversations.js';
import { ScriptedBackend } from '../testing/fakes.js';
import { ConversationHistory } from './conversationHistory.js';

function fill(history: ConversationHistory, sessionId: string, count: number): void {
  for (let index = 0; index < count; index += 1) {
    history.add(sessionId, index % 2 === 0 ? 'user' : 'assistant', `m${index}`);
  }
}

describe('ConversationHistory', () => {
  let repository: ConversationRepository;

  beforeEach(() => {
    repository = new ConversationRepository(openStore(IN_MEMORY_STORE), () => 1_000);
  });

  function historyWith(backend: ScriptedBackend): ConversationHistory {
    return new ConversationHistory({ repository, backend, compactionThreshold: 20, keepRecent: 5 });
  }

  it('keeps messages in order', () => {
    const history = historyWith(new ScriptedBackend());
    fill(history, 's1', 2);

    expect(history.get('s1')).toEqual([
      { role: 'user', content: 'm0' },
      { role: 'assistant', content: 'm1' },
    ]);
    expect(history.get('other')).toEqual([]);
  });

  it('summarizes everything but the newest messages at the threshold', async () => {
    const backend = new ScriptedBackend([], async () => '  They talked about the weather.  ');
    const history = historyWith(backend);
    fill(history, 's1', 20);

    await expect(history.compactIfNeeded('s1')).resolves.toBe('compacted');

    expect(backend.summarizeRequests).toHaveLength(1);
    expect(backend.summarizeRequests[0]?.messages.map((message) => message.content)).toEqual(
      Array.from({ length: 15 }, (_, index) => `m${index}`),
    );
    expect(history.get('s1')).toEqual([
      { role: 'user', content: '[SUMMARY] They talked about the weather.' },
      { role: 'assistant', content: 'm15' },
      { role: 'user', content: 'm16' },
      { role: 'assistant', content: 'm17' },
      { role: 'user', content: 'm18' },
      { role: 'assistant', content: 'm19' },
    ]);
    expect(repository.list('s1')[0]).toMatchObject({ isSummary: true, messageIndex: 0 });
  });

  it('does nothing below the threshold', async () => {
    const backend = new ScriptedBackend();
    const history = historyWith(backend);
    fill(history, 's1', 19);

    await expect(history.compactIfNeeded('s1')).resolves.toBe('below_threshold');
    expect(backend.summarizeRequests).toEqual([]);
    expect(history.get('s1')).toHaveLength(19);
  });

  it('leaves history unchanged when summarizing fails', async () => {
    const history = historyWith(
      new ScriptedBackend([], async () => {
        throw new Error('quota exceeded');
      }),
    );
    fill(history, 's1', 20);

    await expect(history.compactIfNeeded('s1')).resolves.toBe('failed');
    expect(history.get('s1')).toHaveLength(20);
  });

  it('treats an empty summary as a failure', async () => {
    const history = historyWith(new ScriptedBackend([], async () => '   '));
    fill(history, 's1', 20);

    await expect(history.compactIfNeeded('s1')).resolves.toBe('failed');
    expect(history.get('s1')[0]).toEqual({ role: 'user', content: 'm0' });
  });

  it('runs one compaction per session at a time', async () => {
    let release: (summary: string) => void = () => undefined;
    const pending = new Promise<string>((resolve) => {
      release = resolve;
    });
    const history = historyWith(new ScriptedBackend([], () => pending));
    fill(history, 's1', 20);

    const first = history.compactIfNeeded('s1');
    await expect(history.compactIfNeeded('s1')).resolves.toBe('in_progress');

    release('short');
    await expect(first).resolves.toBe('compacted');
    expect(history.get('s1')).toHaveLength(6);
  });

  it('reports stale when messages vanish during summarizing', async () => {
    const backend = new ScriptedBackend([], async (request) => {
      const firstId = repository.list('s1')[0]?.id ?? 0;
      repository.replaceWithSummary('s1', [firstId], 'elsewhere');
      return `covered ${request.messages.length}`;
    });
    const history = historyWith(backend);
    fill(history, 's1', 20);

    await expect(history.compactIfNeeded('s1')).resolves.toBe('stale');
    expect(history.get('s1')).toHaveLength(20);
  });

  it('lists sessions that reached the threshold', () => {
    const history = historyWith(new ScriptedBackend());
    fill(history, 'big', 20);
    fill(history, 'small', 3);

    expect(history.sessionsNeedingCompaction()).toEqual(['big']);
  });
});
