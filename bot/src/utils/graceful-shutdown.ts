/**
 * Graceful Shutdown Handler
 *
 * Runs registered cleanup functions on SIGTERM and SIGINT, then exits.
 * The process is terminated if cleanup does not finish in time.
 */

import { logger } from '@autodeploy/logger';

interface ShutdownState {
  isShuttingDown: boolean;
  forceShutdownTimeout: NodeJS.Timeout | null;
}

const shutdownState: ShutdownState = {
  isShuttingDown: false,
  forceShutdownTimeout: null,
};

const GRACEFUL_SHUTDOWN_TIMEOUT = 30000;

const cleanupFunctions: Array<() => Promise<void>> = [];

export function addCleanupFunction(fn: () => Promise<void>): void {
  cleanupFunctions.push(fn);
}

/**
 * Run every cleanup function; failures are logged and do not stop the others.
 */
export async function runCleanup(): Promise<void> {
  await Promise.all(
    cleanupFunctions.map(async (fn, index) => {
      try {
        await fn();
        logger.debug(`Cleanup function ${index + 1} completed`);
      } catch (error) {
        logger.error({
          error: error instanceof Error ? error.message : String(error),
          functionIndex: index,
        }, 'Cleanup function failed');
      }
    })
  );
}

async function executeGracefulShutdown(signal: string): Promise<void> {
  if (shutdownState.isShuttingDown) {
    logger.warn(`Received ${signal} but shutdown already in progress`);
    return;
  }
  shutdownState.isShuttingDown = true;

  logger.info({
    signal,
    timeout: GRACEFUL_SHUTDOWN_TIMEOUT,
    cleanupFunctions: cleanupFunctions.length,
  }, 'Starting graceful shutdown');

  shutdownState.forceShutdownTimeout = setTimeout(() => {
    logger.error('Graceful shutdown timeout reached, terminating process');
    process.exit(1);
  }, GRACEFUL_SHUTDOWN_TIMEOUT);

  await runCleanup();

  clearTimeout(shutdownState.forceShutdownTimeout);
  logger.info('Graceful shutdown completed successfully');
  process.exit(0);
}

function handleShutdownSignal(signal: string): void {
  executeGracefulShutdown(signal).catch((error: unknown) => {
    logger.error({
      error: error instanceof Error ? error.message : String(error),
      signal,
    }, 'Failed to execute graceful shutdown');
    process.exit(1);
  });
}

let handlersInstalled = false;

export function initializeGracefulShutdown(): void {
  if (handlersInstalled) {
    return;
  }

  process.on('SIGTERM', () => handleShutdownSignal('SIGTERM'));
  process.on('SIGINT', () => handleShutdownSignal('SIGINT'));
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error({
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    }, 'Unhandled promise rejection');
  });
  process.on('uncaughtException', (error: Error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception, forcing shutdown');
    process.exit(1);
  });

  handlersInstalled = true;
  logger.info({ gracefulTimeout: GRACEFUL_SHUTDOWN_TIMEOUT }, 'Graceful shutdown handlers initialized');
}
