/**
 * In-memory job store.
 *
 * Every method body runs synchronously up to its return, so a read-check-write inside one call
 * cannot interleave with another call on the event loop. That is what makes `claimNext` and
 * `transition` atomic here.
 */

import type { IVisualizationJobRepository } from '@/shared/interfaces.js';
import {
  emptyStatusCounts,
  type GeneratedImage,
  type NewVisualizationJob,
  type VisualizationJob,
  type VisualizationJobPatch,
  type VisualizationJobStatus,
  type VisualizationTrigger,
} from '@/types/visualization.js';
import { assertTransition, isFinal } from '@/services/job-status.js';
import { AlreadyInProgressError, NotFoundError } from '@/shared/errors.js';

// Statuses a worker holds a job in; any of them may move to failed
const IN_FLIGHT: readonly VisualizationJobStatus[] = ['queued', 'generating_prompt', 'processing', 'uploading'];

interface StoredJob {
  seq: number;
  job: VisualizationJob;
}

export class InMemoryJobRepository implements IVisualizationJobRepository {
  private jobs = new Map<string, StoredJob>();
  private seq = 0;

  async create(input: NewVisualizationJob): Promise<VisualizationJob> {
    this.assertNoActiveDuplicate(input.id, input.bookId, input.pageId, input.trigger);
    const now = new Date();
    const job: VisualizationJob = {
      ...structuredClone(input),
      createdAt: now,
      updatedAt: now,
      images: [],
      selectedImageId: null,
    };
    this.jobs.set(job.id, { seq: this.seq++, job });
    return structuredClone(job);
  }

  async findById(jobId: string): Promise<VisualizationJob | null> {
    const stored = this.jobs.get(jobId);
    return stored ? structuredClone(stored.job) : null;
  }

  async findActiveForPage(
    bookId: string,
    pageId: string,
    triggers: readonly VisualizationTrigger[],
  ): Promise<VisualizationJob | null> {
    for (const { job } of this.ordered()) {
      if (
        job.bookId === bookId &&
        job.pageId === pageId &&
        triggers.includes(job.trigger) &&
        !isFinal(job.status)
      ) {
        return structuredClone(job);
      }
    }
    return null;
  }

  async listByBook(bookId: string): Promise<VisualizationJob[]> {
    return this.newestFirst()
      .filter((job) => job.bookId === bookId)
      .map((job) => structuredClone(job));
  }

  async listByUser(userId: string): Promise<VisualizationJob[]> {
    return this.newestFirst()
      .filter((job) => job.userId === userId)
      .map((job) => structuredClone(job));
  }

  async countByStatus(): Promise<Record<VisualizationJobStatus, number>> {
    const result = emptyStatusCounts();
    for (const { job } of this.jobs.values()) {
      result[job.status] += 1;
    }
    return result;
  }

  async countAhead(target: VisualizationJob): Promise<number> {
    const stored = this.jobs.get(target.id);
    if (!stored || stored.job.status !== 'pending') {
      return 0;
    }
    const queue = this.claimOrder(null);
    return Math.max(0, queue.findIndex((entry) => entry.job.id === target.id));
  }

  async averageProcessingSeconds(sampleSize: number): Promise<number | null> {
    const durations = [...this.jobs.values()]
      .map(({ job }) => job)
      .filter((job) => job.status === 'completed' && job.processingStartedAt && job.completedAt)
      .sort((a, b) => (b.completedAt?.getTime() ?? 0) - (a.completedAt?.getTime() ?? 0))
      .slice(0, sampleSize)
      .map((job) => ((job.completedAt?.getTime() ?? 0) - (job.processingStartedAt?.getTime() ?? 0)) / 1000);
    if (durations.length === 0) {
      return null;
    }
    return durations.reduce((sum, d) => sum + d, 0) / durations.length;
  }

  async claimNext(workerId: string, now: Date): Promise<VisualizationJob | null> {
    const next = this.claimOrder(now)[0];
    if (!next) {
      return null;
    }
    next.job = {
      ...next.job,
      status: 'queued',
      claimedBy: workerId,
      claimedAt: now,
      updatedAt: now,
    };
    return structuredClone(next.job);
  }

  async transition(
    jobId: string,
    from: VisualizationJobStatus,
    patch: VisualizationJobPatch,
  ): Promise<VisualizationJob | null> {
    assertTransition(from, patch.status);
    const stored = this.jobs.get(jobId);
    if (!stored || stored.job.status !== from) {
      return null;
    }
    if (isFinal(from) && !isFinal(patch.status)) {
      // Re-entering the active set must respect the one-active-job-per-target rule
      this.assertNoActiveDuplicate(jobId, stored.job.bookId, stored.job.pageId, stored.job.trigger);
    }
    stored.job = { ...stored.job, ...structuredClone(patch), updatedAt: new Date() };
    return structuredClone(stored.job);
  }

  async failStaleClaims(olderThan: Date, message: string): Promise<VisualizationJob[]> {
    const failed: VisualizationJob[] = [];
    for (const stored of this.jobs.values()) {
      const { job } = stored;
      if (IN_FLIGHT.includes(job.status) && job.updatedAt < olderThan) {
        stored.job = {
          ...job,
          status: 'failed',
          errorMessage: message,
          errorCategory: 'transient',
          updatedAt: new Date(),
        };
        failed.push(structuredClone(stored.job));
      }
    }
    return failed;
  }

  async addImages(
    jobId: string,
    images: GeneratedImage[],
    selectedImageId: string,
  ): Promise<VisualizationJob> {
    const stored = this.require(jobId);
    const merged = [...stored.job.images, ...structuredClone(images)].map((image) => ({
      ...image,
      isSelected: image.id === selectedImageId,
    }));
    stored.job = { ...stored.job, images: merged, selectedImageId, updatedAt: new Date() };
    return structuredClone(stored.job);
  }

  async selectImage(jobId: string, imageId: string): Promise<VisualizationJob> {
    const stored = this.require(jobId);
    if (!stored.job.images.some((image) => image.id === imageId && !image.isDeleted)) {
      throw new NotFoundError('Image', imageId);
    }
    stored.job = {
      ...stored.job,
      images: stored.job.images.map((image) => ({ ...image, isSelected: image.id === imageId })),
      selectedImageId: imageId,
      updatedAt: new Date(),
    };
    return structuredClone(stored.job);
  }

  async deleteImage(jobId: string, imageId: string): Promise<VisualizationJob> {
    const stored = this.require(jobId);
    if (!stored.job.images.some((image) => image.id === imageId && !image.isDeleted)) {
      throw new NotFoundError('Image', imageId);
    }
    const images = stored.job.images.map((image) =>
      image.id === imageId ? { ...image, isDeleted: true, isSelected: false } : image,
    );
    let selectedImageId = stored.job.selectedImageId;
    if (selectedImageId === imageId) {
      selectedImageId = images.find((image) => !image.isDeleted)?.id ?? null;
    }
    stored.job = {
      ...stored.job,
      images: images.map((image) => ({ ...image, isSelected: image.id === selectedImageId })),
      selectedImageId,
      updatedAt: new Date(),
    };
    return structuredClone(stored.job);
  }

  async delete(jobId: string): Promise<boolean> {
    return this.jobs.delete(jobId);
  }

  async ping(): Promise<void> {}

  private require(jobId: string): StoredJob {
    const stored = this.jobs.get(jobId);
    if (!stored) {
      throw new NotFoundError('Job', jobId);
    }
    return stored;
  }

  private assertNoActiveDuplicate(
    jobId: string,
    bookId: string,
    pageId: string | null,
    trigger: VisualizationTrigger,
  ): void {
    if (!pageId) return;
    for (const { job } of this.jobs.values()) {
      if (
        job.id !== jobId &&
        job.bookId === bookId &&
        job.pageId === pageId &&
        job.trigger === trigger &&
        !isFinal(job.status)
      ) {
        throw new AlreadyInProgressError(
          `A ${trigger} job for page ${pageId} is already in progress`,
          job.id,
        );
      }
    }
  }

  private ordered(): StoredJob[] {
    return [...this.jobs.values()].sort((a, b) => a.seq - b.seq);
  }

  private newestFirst(): VisualizationJob[] {
    return this.ordered()
      .reverse()
      .map((entry) => entry.job);
  }

  /** Pending jobs in claim order; `now` filters out jobs still backing off. */
  private claimOrder(now: Date | null): StoredJob[] {
    return [...this.jobs.values()]
      .filter(({ job }) => job.status === 'pending' && (!now || job.availableAt <= now))
      .sort(
        (a, b) =>
          b.job.priority - a.job.priority ||
          a.job.createdAt.getTime() - b.job.createdAt.getTime() ||
          a.seq - b.seq,
      );
  }
}
