// Process-level error handlers and graceful shutdown.

import type { Server } from 'http';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errorResponse';

const SHUTDOWN_TIMEOUT_MS = 10_000;

const processLogger = logger.getSubLogger({ name: 'process' });

let serverInstance: Server | null = null;
let shuttingDown = false;

/**
 * Set server instance for graceful shutdown
 */
export function setServerInstance(server: Server): void {
  serverInstance = server;
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    processLogger.error('Unhandled Promise Rejection', {
      reason: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    processLogger.fatal('Uncaught Exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  signals.forEach((signal) => {
    process.on(signal, () => {
      processLogger.info(`Received ${signal}, starting graceful shutdown`);
      gracefulShutdown(signal, 0);
    });
  });
}

/**
 * Stops accepting connections and exits once open ones finish, or after the timeout.
 * Open SSE streams hold their connection, so the timeout is what ends them.
 */
function gracefulShutdown(reason: string, exitCode: number): void {
  if (shuttingDown) return;
  shuttingDown = true;
  processLogger.info(`Graceful shutdown initiated: ${reason}`);

  const forceExit = setTimeout(() => {
    processLogger.warn('Forced shutdown after timeout');
    process.exit(exitCode || 1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  if (!serverInstance) {
    process.exit(exitCode);
    return;
  }
  serverInstance.close((err) => {
    if (err) processLogger.error('Error closing HTTP server', { error: err.message });
    else processLogger.info('HTTP server closed');
    process.exit(err ? 1 : exitCode);
  });
}
