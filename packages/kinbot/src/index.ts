import { type Server } from 'node:http';

import { loadKinbotConfig, loadKinbotSecrets } from './config.js';
import { ConversationHistory } from './history/conversationHistory.js';
import { runCompactionSweep, startScheduler, type SchedulerHandle } from './jobs/scheduler.js';
import { createBackend } from './llm/factory.js';
import { errorMessage, logger } from './logger.js';
import { startServer } from './server.js';
import { BackgroundTasks } from './session/tasks.js';
import { ConversationRepository } from './store/conversations.js';
import { openStore, type StoreDatabase } from './store/database.js';
import { MemoryRepository } from './store/memory.js';
import { PeopleRepository } from './store/people.js';
import { ZoneRepository } from './store/zones.js';

const SERVER_CLOSE_TIMEOUT_MS = 5_000;
const SHUTDOWN_GRACE_TIMEOUT_MS = 20_000;

function closeServer(server: Server, timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    let settled = false;

    const finish = (error?: Error): void => {
      if (settled) {
        return;
      }

      settled = true;
      if (error) {
        reject(error);
        return;
      }

      resolve();
    };

    const timeoutId = setTimeout(() => {
      server.closeAllConnections();
      finish(new Error(`server close timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    server.close((error) => {
      clearTimeout(timeoutId);
      if (error) {
        finish(error);
        return;
      }

      finish();
    });
  });
}

async function main(): Promise<void> {
  const config = loadKinbotConfig();
  const secrets = loadKinbotSecrets(config.secretsFilePath);
  const backend = createBackend(config.model, secrets.modelApiKey);

  logger.info(
    { backend: backend.name, provider: config.model.provider, model: config.model.id, store: config.storePath },
    'kinbot: starting',
  );

  let db: StoreDatabase | null = openStore(config.storePath);
  const people = new PeopleRepository(db);
  const zones = new ZoneRepository(db);
  const memories = new MemoryRepository(db);
  const history = new ConversationHistory({
    repository: new ConversationRepository(db),
    backend,
    compactionThreshold: config.history.compactionThreshold,
    keepRecent: config.history.keepRecent,
  });
  const tasks = new BackgroundTasks();

  let scheduler: SchedulerHandle | null = null;
  let server: Server | null = null;
  let shutdownInFlight: Promise<void> | null = null;

  const shutdown = async (): Promise<void> => {
    if (shutdownInFlight) {
      return shutdownInFlight;
    }

    shutdownInFlight = (async () => {
      logger.info('kinbot: shutting down...');

      scheduler?.stop();
      scheduler = null;

      if (server) {
        try {
          await closeServer(server, SERVER_CLOSE_TIMEOUT_MS);
        } catch (error) {
          logger.error(`kinbot: failed to close server: ${errorMessage(error)}`);
        } finally {
          server = null;
        }
      }

      if (tasks.size > 0) {
        logger.info({ pending: tasks.size }, 'kinbot: waiting for background tasks');
      }
      await tasks.idle();

      db?.close();
      db = null;
    })();

    return shutdownInFlight;
  };

  let isShuttingDown = false;
  let forceExitTimer: ReturnType<typeof setTimeout> | null = null;

  const forceTerminate = (reason: string, exitCode: number): never => {
    if (forceExitTimer) {
      clearTimeout(forceExitTimer);
      forceExitTimer = null;
    }

    logger.error(`kinbot: ${reason}`);

    if (server) {
      server.closeAllConnections();
      server = null;
    }

    process.exit(exitCode);
  };

  const handleSignal = (signal: NodeJS.Signals): void => {
    if (isShuttingDown) {
      forceTerminate(`received ${signal} during shutdown; forcing exit`, 130);
      return;
    }

    isShuttingDown = true;

    forceExitTimer = setTimeout(() => {
      forceTerminate(`graceful shutdown timed out after ${SHUTDOWN_GRACE_TIMEOUT_MS}ms; forcing exit`, 1);
    }, SHUTDOWN_GRACE_TIMEOUT_MS);

    void shutdown()
      .then(() => {
        if (forceExitTimer) {
          clearTimeout(forceExitTimer);
          forceExitTimer = null;
        }

        process.exit(0);
      })
      .catch((error: unknown) => {
        forceTerminate(`shutdown failed after ${signal}: ${errorMessage(error)}`, 1);
      });
  };

  process.on('SIGINT', () => {
    handleSignal('SIGINT');
  });

  process.on('SIGTERM', () => {
    handleSignal('SIGTERM');
  });

  process.on('SIGHUP', () => {
    handleSignal('SIGHUP');
  });

  try {
    scheduler = startScheduler({
      jobs: config.jobs,
      runCompactionSweep: async () => {
        const compacted = await runCompactionSweep(history);
        if (compacted > 0) {
          logger.info({ compacted }, 'kinbot: compaction sweep finished');
        }
      },
    });

    server = startServer({
      port: config.server.port,
      wsPath: config.server.wsPath,
      restorePath: config.server.restorePath,
      maxPayloadBytes: config.server.maxPayloadBytes,
      apiKey: secrets.apiKey,
      sessionDeps: {
        backend,
        history,
        people,
        zones,
        memories,
        tasks,
        settings: {
          apiKey: secrets.apiKey,
          handshakeTimeoutMs: config.auth.handshakeTimeoutMs,
          batteryLowThreshold: config.battery.lowThreshold,
          memory: config.memory,
        },
      },
    });
  } catch (error) {
    await shutdown();
    throw error;
  }
}

void main().catch((error: unknown) => {
  logger.fatal(`kinbot: fatal startup error: ${errorMessage(error)}`);
  process.exit(1);
});
