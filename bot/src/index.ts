/**
 * Autodeploy - Single Entry Point
 */

// Load environment variables first
import './env-loader.js';

import { loadEnv } from '@autodeploy/config';
import { logger } from '@autodeploy/logger';
import { AutodeployApplication } from './main.js';
import { addCleanupFunction, initializeGracefulShutdown } from './utils/graceful-shutdown.js';

async function start(): Promise<void> {
  const app = new AutodeployApplication(loadEnv());

  initializeGracefulShutdown();
  addCleanupFunction(() => app.shutdown());

  await app.initialize();
}

start().catch((error: unknown) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Failed to start autodeploy');
  process.exit(1);
});
