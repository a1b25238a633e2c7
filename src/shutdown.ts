import type { Logger } from './logger.js';

export interface Stoppable {
  stop(): unknown;
}

export interface Closable {
  close(): Promise<unknown>;
}

/**
 * Stops the cron task, closes the server and exits. Exits with 1 when the
 * server fails to close.
 */
export function createShutdown(
  task: Stoppable,
  server: Closable,
  log: Logger,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: string) => Promise<void> {
  return async (signal) => {
    log.info(`Received ${signal}, shutting down`);
    task.stop();
    try {
      await server.close();
    } catch (error) {
      log.error({ err: error }, 'Error closing server');
      exit(1);
      return;
    }
    exit(0);
  };
}
