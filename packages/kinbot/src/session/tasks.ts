import { componentLogger, errorMessage, type Logger } from '../logger.js';

/**
 * Fire-and-forget work scheduled after a response. Each task runs on a later microtask behind its
 * own error boundary; failures are logged and dropped. `idle()` lets shutdown and tests wait.
 */
export class BackgroundTasks {
  private readonly log: Logger;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(logger: Logger = componentLogger('tasks')) {
    this.log = logger;
  }

  get size(): number {
    return this.inFlight.size;
  }

  spawn(name: string, task: () => Promise<void> | void): void {
    const run = Promise.resolve()
      .then(task)
      .catch((error: unknown) => {
        this.log.error({ task: name, err: errorMessage(error) }, 'tasks: background task failed');
      })
      .finally(() => {
        this.inFlight.delete(run);
      });

    this.inFlight.add(run);
  }

  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
