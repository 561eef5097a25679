/**
 * @fileoverview QueryTrail server entry point
 */
import { createLogger, preloadSettings } from '@querytrail/core';
import { QueryTrailServer } from './server.js';

const logger = createLogger('main');

// =============================================================================
// CLI Entry Point
// =============================================================================

async function main(): Promise<void> {
  const server = new QueryTrailServer({ settings: await preloadSettings() });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down...`);
    await server.stop();
    process.exit(0);
  };
  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed', error instanceof Error ? error : { error: String(error) });
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: String(reason) });
    process.exit(1);
  });

  await server.start();

  logger.info('Server ready. Press Ctrl+C to stop.');
}

const isMain = process.argv[1]?.endsWith('index.js') || process.argv[1]?.endsWith('index.ts');
if (isMain) {
  main().catch((error: unknown) => {
    logger.error('Failed to start server', error instanceof Error ? error : { error: String(error) });
    process.exit(1);
  });
}

// =============================================================================
// Exports
// =============================================================================

export { QueryTrailServer, type QueryTrailServerOptions } from './server.js';
export {
  RpcHttpServer,
  MAX_BODY_BYTES,
  type RpcHttpServerConfig,
  type HealthResponse,
} from './http-server.js';
