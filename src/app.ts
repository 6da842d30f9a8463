import express from 'express';
import helmet from 'helmet';
import { logger } from '@/config/logger.js';
import { HealthService, SERVICE_NAME, SERVICE_VERSION } from '@/shared/health.js';
import { createInternalRouter, type InternalRouterDependencies } from '@/routes/internal.js';
import apiKeyAuth from '@/middleware/apiKeyAuth.js';
import { VisualizationError } from '@/shared/errors.js';

export interface AppDependencies extends InternalRouterDependencies {
  health: HealthService;
  environment: string;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/health', async (_req, res) => {
    try {
      const healthStatus = await deps.health.checkHealth(deps.environment);
      const statusCode = healthStatus.status === 'unhealthy' ? 503 : 200;
      res.status(statusCode).json(healthStatus);
    } catch (error) {
      logger.error('Health check endpoint error', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(503).json({
        status: 'unhealthy',
        service: SERVICE_NAME,
        timestamp: new Date().toISOString(),
        environment: deps.environment,
        version: SERVICE_VERSION,
      });
    }
  });

  // Basic route
  app.get('/', (_req, res) => {
    res.json({
      message: 'Page Visualization Workflow Service',
      version: SERVICE_VERSION,
      environment: deps.environment,
    });
  });

  app.use('/internal', apiKeyAuth, createInternalRouter(deps));

  // 404 handler
  app.use((req: express.Request, res: express.Response) => {
    res.status(404).json({
      error: 'Not found',
      path: req.path,
    });
  });

  // Error handling middleware
  app.use((error: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof VisualizationError) {
      res.status(error.httpStatus).json({ error: error.code, message: error.message });
      return;
    }
    logger.error('Unhandled error', { error: error.message });
    res.status(500).json({
      error: 'Internal server error',
      message: deps.environment === 'development' ? error.message : 'Something went wrong',
    });
  });

  return app;
}
