import { logger } from '@/config/logger.js';
import type { IVisualizationJobRepository } from '@/shared/interfaces.js';
import type { WorkerPoolStats } from '@/workers/worker-pool.js';

type CheckStatus = 'healthy' | 'unhealthy';

export interface HealthStatus {
  status: 'healthy' | 'unhealthy' | 'degraded';
  service: string;
  timestamp: string;
  environment: string;
  version: string;
  checks: {
    jobStore: {
      status: CheckStatus;
      message: string;
      backend: string;
      responseTime?: number;
    };
    workers: {
      status: CheckStatus;
      message: string;
      running: boolean;
      activeJobs: number;
      concurrency: number;
    };
  };
}

export interface HealthDependencies {
  repository: IVisualizationJobRepository;
  jobStoreBackend: string;
  workerStats: () => WorkerPoolStats;
}

export const SERVICE_NAME = 'page-visualization-workflow';
export const SERVICE_VERSION = '0.1.0';

export class HealthService {
  constructor(private readonly deps: HealthDependencies) {}

  async checkHealth(environment: string): Promise<HealthStatus> {
    const timestamp = new Date().toISOString();
    const jobStore = await this.checkJobStore();
    const workers = this.checkWorkers();

    // A reachable store with stopped workers still accepts requests
    const overallStatus =
      jobStore.status === 'healthy' && workers.status === 'healthy'
        ? 'healthy'
        : jobStore.status === 'healthy'
          ? 'degraded'
          : 'unhealthy';

    return {
      status: overallStatus,
      service: SERVICE_NAME,
      timestamp,
      environment,
      version: SERVICE_VERSION,
      checks: { jobStore, workers },
    };
  }

  private async checkJobStore(): Promise<HealthStatus['checks']['jobStore']> {
    const startTime = Date.now();
    try {
      await this.deps.repository.ping();
      const responseTime = Date.now() - startTime;
      logger.debug(`Job store health check successful (${responseTime}ms)`);
      return {
        status: 'healthy',
        message: 'Job store reachable',
        backend: this.deps.jobStoreBackend,
        responseTime,
      };
    } catch (error) {
      const responseTime = Date.now() - startTime;
      const errorMessage = error instanceof Error ? error.message : 'Unknown job store error';
      logger.error(`Job store health check failed (${responseTime}ms)`, { error: errorMessage });
      return {
        status: 'unhealthy',
        message: `Job store unreachable: ${errorMessage}`,
        backend: this.deps.jobStoreBackend,
        responseTime,
      };
    }
  }

  private checkWorkers(): HealthStatus['checks']['workers'] {
    const stats = this.deps.workerStats();
    return {
      status: stats.running ? 'healthy' : 'unhealthy',
      message: stats.running ? 'Worker pool running' : 'Worker pool stopped',
      running: stats.running,
      activeJobs: stats.activeJobs,
      concurrency: stats.concurrency,
    };
  }
}
