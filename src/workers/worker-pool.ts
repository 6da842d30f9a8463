/**
 * Visualization Worker Pool
 * Runs a fixed number of claim loops inside the service process. Each loop claims the next
 * eligible job, hands it to the pipeline executor and backs off while the queue is empty.
 */

import { hostname } from 'os';
import { randomUUID } from 'crypto';
import { logger } from '@/config/logger.js';
import type { OrchestratorConfig } from '@/config/environment.js';
import type { IVisualizationJobRepository } from '@/shared/interfaces.js';
import type { ExecutionOutcome } from '@/services/pipeline-executor.js';
import type { WorkerWakeup } from '@/services/visualization-orchestrator.js';
import type { VisualizationJob } from '@/types/visualization.js';

export interface JobExecutor {
  execute(job: VisualizationJob): Promise<ExecutionOutcome>;
  handleFailedJob(job: VisualizationJob): Promise<ExecutionOutcome>;
}

export type WorkerPoolConfig = Pick<
  OrchestratorConfig,
  'workerConcurrency' | 'pollIntervalMs' | 'maxPollIntervalMs' | 'staleClaimMs'
>;

export interface WorkerPoolStats {
  running: boolean;
  concurrency: number;
  activeJobs: number;
  processed: number;
  completed: number;
  failed: number;
  retried: number;
  skipped: number;
}

export const STALE_CLAIM_MESSAGE = 'Worker stopped before finishing the job';

export class WorkerPool implements WorkerWakeup {
  private running = false;
  private loops: Promise<void>[] = [];
  private sleepers = new Set<() => void>();
  private readonly poolId: string;
  private stats = { activeJobs: 0, processed: 0, completed: 0, failed: 0, retried: 0, skipped: 0 };

  constructor(
    private readonly repository: IVisualizationJobRepository,
    private readonly executor: JobExecutor,
    private readonly config: WorkerPoolConfig,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.poolId = `${hostname()}-${randomUUID().slice(0, 8)}`;
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;

    await this.recoverStaleClaims();

    for (let index = 0; index < this.config.workerConcurrency; index++) {
      this.loops.push(this.runLoop(`${this.poolId}-${index}`));
    }

    logger.info('Worker pool started', {
      poolId: this.poolId,
      concurrency: this.config.workerConcurrency,
      pollIntervalMs: this.config.pollIntervalMs,
    });
  }

  /**
   * Stops claiming and resolves once every in-flight job has finished.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.wakeSleepers();
    await Promise.all(this.loops);
    this.loops = [];
    logger.info('Worker pool stopped', { poolId: this.poolId, ...this.stats });
  }

  /** Cuts any idle wait short; called when a job has just been created. */
  wake(): void {
    this.wakeSleepers();
  }

  getStats(): WorkerPoolStats {
    return {
      running: this.running,
      concurrency: this.config.workerConcurrency,
      ...this.stats,
    };
  }

  private async recoverStaleClaims(): Promise<void> {
    const cutoff = new Date(this.now().getTime() - this.config.staleClaimMs);
    try {
      const stale = await this.repository.failStaleClaims(cutoff, STALE_CLAIM_MESSAGE);
      if (stale.length === 0) {
        return;
      }
      logger.warn('Recovered stale job claims', { count: stale.length, jobIds: stale.map((job) => job.id) });
      for (const job of stale) {
        const outcome = await this.executor.handleFailedJob(job);
        if (outcome === 'retry_scheduled') {
          this.stats.retried += 1;
        }
      }
    } catch (error) {
      logger.error('Stale claim recovery failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async runLoop(workerId: string): Promise<void> {
    let delay = this.config.pollIntervalMs;

    while (this.running) {
      let job: VisualizationJob | null = null;
      try {
        job = await this.repository.claimNext(workerId, this.now());
      } catch (error) {
        logger.error('Worker failed to claim a job', {
          workerId,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      if (!job) {
        if (!this.running) {
          break;
        }
        const woken = await this.idle(delay);
        delay = woken ? this.config.pollIntervalMs : Math.min(delay * 2, this.config.maxPollIntervalMs);
        continue;
      }

      delay = this.config.pollIntervalMs;
      await this.process(workerId, job);
    }
  }

  private async process(workerId: string, job: VisualizationJob): Promise<void> {
    this.stats.activeJobs += 1;
    logger.debug('Worker claimed job', { workerId, jobId: job.id, priority: job.priority });
    try {
      const outcome = await this.executor.execute(job);
      this.stats.processed += 1;
      switch (outcome) {
        case 'completed':
          this.stats.completed += 1;
          break;
        case 'failed':
          this.stats.failed += 1;
          break;
        case 'retry_scheduled':
          this.stats.retried += 1;
          break;
        case 'skipped':
          this.stats.skipped += 1;
          break;
      }
    } catch (error) {
      this.stats.processed += 1;
      this.stats.failed += 1;
      logger.error('Executor threw for job', {
        workerId,
        jobId: job.id,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.stats.activeJobs -= 1;
    }
  }

  /** Resolves true when woken early, false when the delay ran out. */
  private idle(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      const wakeUp = () => {
        clearTimeout(timer);
        this.sleepers.delete(wakeUp);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.sleepers.delete(wakeUp);
        resolve(false);
      }, ms);
      this.sleepers.add(wakeUp);
    });
  }

  private wakeSleepers(): void {
    for (const wakeUp of [...this.sleepers]) {
      wakeUp();
    }
  }
}
