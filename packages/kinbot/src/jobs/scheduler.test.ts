import { describe, expect, it } from 'vitest';

import { ConversationHistory } from '../history/conversationHistory.js';
import { ConversationRepository } from '../store/conversations.js';
import { IN_MEMORY_STORE, openStore } from '../store/database.js';
import { ScriptedBackend } from '../testing/fakes.js';
import { createGuardedTick, runCompactionSweep, startScheduler } from './scheduler.js';

describe('createGuardedTick', () => {
  it('skips ticks while the previous run is still going', async () => {
    let runs = 0;
    let release: () => void = () => undefined;
    const tick = createGuardedTick('compaction_sweep', async () => {
      runs += 1;
      await new Promise<void>((resolve) => {
        release = resolve;
      });
    });

    const first = tick();
    await tick();
    expect(runs).toBe(1);

    release();
    await first;
    const third = tick();
    release();
    await third;

    expect(runs).toBe(2);
  });

  it('contains job failures', async () => {
    const tick = createGuardedTick('compaction_sweep', async () => {
      throw new Error('store locked');
    });

    await expect(tick()).resolves.toBeUndefined();
  });
});

describe('runCompactionSweep', () => {
  it('compacts only sessions at the threshold', async () => {
    const repository = new ConversationRepository(openStore(IN_MEMORY_STORE));
    const backend = new ScriptedBackend([], async () => 'condensed');
    const history = new ConversationHistory({ repository, backend, compactionThreshold: 4, keepRecent: 1 });

    for (let index = 0; index < 4; index += 1) {
      history.add('long', 'user', `l${index}`);
    }
    history.add('short', 'user', 's0');

    await expect(runCompactionSweep(history)).resolves.toBe(1);
    expect(history.get('long')).toEqual([
      { role: 'user', content: '[SUMMARY] condensed' },
      { role: 'user', content: 'l3' },
    ]);
    expect(history.get('short')).toHaveLength(1);
  });
});

describe('startScheduler', () => {
  it('schedules nothing when the sweep is disabled', () => {
    let ran = false;
    const handle = startScheduler({
      jobs: { enabled: false, timezone: 'UTC', compactionSweep: { enabled: true, cron: '*/15 * * * *' } },
      runCompactionSweep: async () => {
        ran = true;
      },
    });

    handle.stop();
    expect(ran).toBe(false);
  });

  it('rejects an invalid cron expression', () => {
    expect(() =>
      startScheduler({
        jobs: { enabled: true, timezone: 'UTC', compactionSweep: { enabled: true, cron: 'whenever' } },
        runCompactionSweep: async () => undefined,
      }),
    ).toThrow('[kinbot] scheduler: invalid compaction_sweep cron "whenever" for timezone "UTC"');
  });
});
