import { getErrorMessage } from "../errors.js";
import { logger } from "../logger.js";

export type Task = () => Promise<void>;

/**
 * Runs background tasks one at a time, off the key-handling path. Each
 * editor owns its executor; nothing here is process-global.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();

  /** Queues `task` behind any running one and returns immediately. */
  spawn(task: Task) {
    this.tail = this.tail.then(task).catch((error: unknown) => {
      // tasks catch their own errors
      logger.error("Background task failed", { error: getErrorMessage(error) });
    });
  }

  /** Resolves once every spawned task has settled. */
  idle(): Promise<void> {
    return this.tail;
  }
}
