/**
 * Progress Tracker
 * Maps job status to a completion percentage and estimates remaining and waiting time.
 */

import { describeProvider } from '@/ai/provider-catalog.js';
import type {
  ImageProviderKey,
  VisualizationJob,
  VisualizationJobStatus,
} from '@/types/visualization.js';

const STAGE_PERCENT: Record<Exclude<VisualizationJobStatus, 'failed' | 'cancelled'>, number> = {
  pending: 0,
  queued: 5,
  generating_prompt: 10,
  processing: 30,
  uploading: 80,
  completed: 100,
};

// Share of the provider's average generation time still ahead at each stage
const REMAINING_SHARE: Record<VisualizationJobStatus, number> = {
  pending: 1.3,
  queued: 1.25,
  generating_prompt: 1.2,
  processing: 1,
  uploading: 0.1,
  completed: 0,
  failed: 0,
  cancelled: 0,
};

export class ProgressTrackerService {
  constructor(private readonly defaultProvider: ImageProviderKey) {}

  /**
   * Percentage for a status. Failed and cancelled jobs report the last stage they reached,
   * given as `lastActiveStatus`.
   */
  percentFor(status: VisualizationJobStatus, lastActiveStatus?: VisualizationJobStatus): number {
    if (status === 'failed' || status === 'cancelled') {
      if (!lastActiveStatus || lastActiveStatus === 'failed' || lastActiveStatus === 'cancelled') {
        return 0;
      }
      return STAGE_PERCENT[lastActiveStatus];
    }
    return STAGE_PERCENT[status];
  }

  /** Best guess at the last stage a failed or cancelled job reached. */
  lastReachedStatus(job: VisualizationJob): VisualizationJobStatus {
    if (job.status !== 'failed' && job.status !== 'cancelled') {
      return job.status;
    }
    if (job.images.length > 0) {
      return 'uploading';
    }
    if (job.promptData) {
      return 'processing';
    }
    if (job.processingStartedAt) {
      return 'generating_prompt';
    }
    if (job.claimedAt) {
      return 'queued';
    }
    return 'pending';
  }

  jobPercent(job: VisualizationJob): number {
    return this.percentFor(job.status, this.lastReachedStatus(job));
  }

  averageSecondsFor(provider: ImageProviderKey | null): number {
    return describeProvider(provider ?? this.defaultProvider).averageGenerationSeconds;
  }

  estimateRemainingSeconds(job: VisualizationJob): number {
    return Math.ceil(this.averageSecondsFor(job.preferredProvider) * REMAINING_SHARE[job.status]);
  }

  /**
   * Wait before a pending job at 1-based `position` starts, with `concurrency` workers draining
   * jobs that take `averageSeconds` each.
   */
  estimateWaitSeconds(position: number, concurrency: number, averageSeconds: number): number {
    if (position <= 0) {
      return 0;
    }
    const rounds = Math.ceil(position / Math.max(1, concurrency));
    return Math.ceil(rounds * averageSeconds);
  }
}
