/**
 * Composition root: wires the job store, collaborators, executor, facade and worker pool.
 */

import { getEnvironment, getOrchestratorConfig, type Environment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { AIGateway } from '@/ai/gateway.js';
import { InMemoryJobRepository } from '@/adapters/memory/in-memory-job-repository.js';
import { DrizzleVisualizationJobRepository } from '@/adapters/database/visualization-job-repository.js';
import { HttpCatalogClient } from '@/services/catalog-client.js';
import { HttpPromptSynthesizer } from '@/services/prompt-synthesizer.js';
import {
  CompositeNotificationChannel,
  HttpNotificationChannel,
  InProcessNotificationChannel,
} from '@/services/notification-client.js';
import type { INotificationChannel, IVisualizationJobRepository } from '@/shared/interfaces.js';
import { StorageService } from '@/services/storage.js';
import { ProgressTrackerService } from '@/services/progress-tracker.js';
import { PipelineExecutor } from '@/services/pipeline-executor.js';
import { VisualizationOrchestrator } from '@/services/visualization-orchestrator.js';
import { WorkerPool } from '@/workers/worker-pool.js';
import { HealthService } from '@/shared/health.js';
import { SharpImageProcessor } from '@/utils/imageUtils.js';

export interface VisualizationContainer {
  repository: IVisualizationJobRepository;
  orchestrator: VisualizationOrchestrator;
  executor: PipelineExecutor;
  workers: WorkerPool;
  events: InProcessNotificationChannel;
  health: HealthService;
}

export function createContainer(env: Environment = getEnvironment()): VisualizationContainer {
  const config = getOrchestratorConfig(env);
  const repository: IVisualizationJobRepository =
    env.JOB_STORE === 'memory' ? new InMemoryJobRepository() : new DrizzleVisualizationJobRepository();

  const gateway = AIGateway.fromEnvironment();
  const catalog = HttpCatalogClient.fromEnvironment();
  const events = new InProcessNotificationChannel();
  const http = HttpNotificationChannel.fromEnvironment();
  const notifications: INotificationChannel = http ? new CompositeNotificationChannel([events, http]) : events;
  const storage = new StorageService();
  const progress = new ProgressTrackerService(gateway.getDefaultProvider());

  const executor = new PipelineExecutor(
    {
      repository,
      catalog,
      promptSynthesizer: HttpPromptSynthesizer.fromEnvironment(),
      gateway,
      storage,
      notifications,
      imageProcessor: new SharpImageProcessor(),
      progress,
    },
    config,
  );

  const orchestrator = new VisualizationOrchestrator(
    { repository, catalog, notifications, storage, progress },
    config,
  );
  const workers = new WorkerPool(repository, executor, config);
  orchestrator.attachWorkers(workers);

  const health = new HealthService({
    repository,
    jobStoreBackend: env.JOB_STORE,
    workerStats: () => workers.getStats(),
  });

  logger.info('Visualization container created', {
    jobStore: env.JOB_STORE,
    defaultProvider: gateway.getDefaultProvider(),
    workerConcurrency: config.workerConcurrency,
  });

  return { repository, orchestrator, executor, workers, events, health };
}
