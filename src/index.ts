import { Server } from 'http';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { closeDatabaseConnection } from '@/db/connection.js';
import { createContainer } from '@/container.js';
import { createApp } from '@/app.js';

async function startServer(): Promise<void> {
  const env = getEnvironment();
  const container = createContainer(env);
  const app = createApp({
    health: container.health,
    orchestrator: container.orchestrator,
    workerStats: () => container.workers.getStats(),
    environment: env.NODE_ENV,
  });

  const hasKey = Boolean((env.VISUALIZATION_API_KEY || '').trim());
  logger.info(`API key configured for internal routes: ${hasKey}`);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(env.PORT, () => {
      logger.info('Page Visualization Workflow Service started', {
        environment: env.NODE_ENV,
        port: env.PORT,
        project: env.GOOGLE_CLOUD_PROJECT_ID,
      });
      resolve(listening);
    });
    listening.on('error', reject);
  });

  await container.workers.start();
  setupGracefulShutdown(server, async () => {
    await container.workers.stop();
    if (env.JOB_STORE === 'postgres') {
      await closeDatabaseConnection();
    }
  });
}

function setupGracefulShutdown(server: Server, cleanup: () => Promise<void>): void {
  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully`);
    server.close(() => {
      cleanup()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown cleanup failed', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
  logger.error('Server failed to start', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
