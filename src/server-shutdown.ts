import type { ServerType } from '@hono/node-server';
import { logger } from './lib/logger';
import type { AnswerOrchestrator } from './services/assistant/answer-orchestrator';

const SHUTDOWN_TIMEOUT_MS = 30_000;

function closeServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function gracefulShutdown(
  signal: string,
  server: ServerType,
  orchestrator: AnswerOrchestrator
): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal');

  const timeout = setTimeout(() => {
    logger.error('Shutdown timed out after 30s, forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    orchestrator.shutdown();

    logger.info('Closing HTTP server');
    await closeServer(server);

    clearTimeout(timeout);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    clearTimeout(timeout);
    logger.error({ err: error }, 'Error during shutdown');
    process.exit(1);
  }
}

export function registerGracefulShutdownHandlers(server: ServerType, orchestrator: AnswerOrchestrator): void {
  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM', server, orchestrator);
  });
  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT', server, orchestrator);
  });
}
