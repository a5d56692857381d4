import { CronJob } from 'cron';

import type { KinbotConfig } from '../config.js';
import type { ConversationHistory } from '../history/conversationHistory.js';
import { componentLogger, errorMessage } from '../logger.js';

const log = componentLogger('scheduler');

interface SchedulerOptions {
  jobs: KinbotConfig['jobs'];
  runCompactionSweep: () => Promise<void>;
}

export interface SchedulerHandle {
  stop: () => void;
}

type ScheduledJobName = 'compaction_sweep';

export function createGuardedTick(name: ScheduledJobName, runJob: () => Promise<void>): () => Promise<void> {
  let inFlight = false;
  let overlapLogged = false;

  return async () => {
    if (inFlight) {
      if (!overlapLogged) {
        overlapLogged = true;
        log.warn(`scheduler: ${name} job is still running; skipping overlapping tick.`);
      }
      return;
    }

    inFlight = true;
    overlapLogged = false;

    log.debug(`scheduler: running ${name} job...`);

    try {
      await runJob();
    } catch (error) {
      log.error(`scheduler: ${name} job failed: ${errorMessage(error)}`);
    } finally {
      inFlight = false;
      overlapLogged = false;
    }
  };
}

/** Compacts every session whose stored history has reached the threshold, one at a time. */
export async function runCompactionSweep(history: ConversationHistory): Promise<number> {
  let compacted = 0;

  for (const sessionId of history.sessionsNeedingCompaction()) {
    if ((await history.compactIfNeeded(sessionId)) === 'compacted') {
      compacted += 1;
    }
  }

  return compacted;
}

function createCronJob(name: ScheduledJobName, cronExpr: string, timezone: string, onTick: () => void): CronJob {
  try {
    return CronJob.from({
      cronTime: cronExpr,
      onTick,
      start: false,
      timeZone: timezone,
    });
  } catch (error) {
    throw new Error(
      `[kinbot] scheduler: invalid ${name} cron "${cronExpr}" for timezone "${timezone}": ${errorMessage(error)}`,
    );
  }
}

export function startScheduler(options: SchedulerOptions): SchedulerHandle {
  const { jobs: config } = options;

  if (!config.enabled || !config.compactionSweep.enabled) {
    log.info('scheduler: compaction_sweep job disabled.');
    return {
      stop: () => {},
    };
  }

  const guardedTick = createGuardedTick('compaction_sweep', options.runCompactionSweep);
  const job = createCronJob('compaction_sweep', config.compactionSweep.cron, config.timezone, () => {
    void guardedTick();
  });

  job.start();
  log.info(
    `scheduler: compaction_sweep job scheduled cron="${config.compactionSweep.cron}" timezone="${config.timezone}".`,
  );

  return {
    stop: () => {
      try {
        job.stop();
      } catch (error) {
        log.warn(`scheduler: failed to stop job cleanly: ${errorMessage(error)}`);
      }
    },
  };
}
