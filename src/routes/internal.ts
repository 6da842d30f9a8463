/**
 * Internal API Routes
 * Queue and worker introspection for operators
 */

import { Router } from 'express';
import { logger } from '@/config/logger.js';
import type { VisualizationOrchestrator } from '@/services/visualization-orchestrator.js';
import type { WorkerPoolStats } from '@/workers/worker-pool.js';

export interface InternalRouterDependencies {
  orchestrator: Pick<VisualizationOrchestrator, 'getQueueStatus'>;
  workerStats: () => WorkerPoolStats;
}

export function createInternalRouter(deps: InternalRouterDependencies): Router {
  const router = Router();

  /**
   * GET /internal/queue
   */
  router.get('/queue', async (_req, res) => {
    try {
      const queue = await deps.orchestrator.getQueueStatus();
      res.json({
        success: true,
        queue,
        workers: deps.workerStats(),
      });
    } catch (error) {
      logger.error('Failed to read queue status', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(500).json({
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  return router;
}
