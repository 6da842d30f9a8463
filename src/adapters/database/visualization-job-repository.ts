/**
 * PostgreSQL job store (Drizzle).
 * Claims run `SELECT ... FOR UPDATE SKIP LOCKED` followed by an update conditioned on the
 * status, so concurrent workers never receive the same row.
 */

import { and, asc, count, desc, eq, gt, inArray, lt, lte, ne, notInArray, or, sql } from 'drizzle-orm';
import { getDatabase, type Database } from '@/db/connection.js';
import {
  generatedImages,
  visualizationJobs,
  type SelectGeneratedImage,
  type SelectVisualizationJob,
} from '@/db/schema/index.js';
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
import { assertTransition } from '@/services/job-status.js';
import { AlreadyInProgressError, NotFoundError } from '@/shared/errors.js';
import { logger } from '@/config/logger.js';

const FINAL_STATUSES: VisualizationJobStatus[] = ['completed', 'failed', 'cancelled'];
const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  const code = typeof error === 'object' && error !== null ? Reflect.get(error, 'code') : undefined;
  if (code === UNIQUE_VIOLATION) {
    return true;
  }
  const cause = error instanceof Error ? error.cause : undefined;
  return cause !== undefined && isUniqueViolation(cause);
}

export function toGeneratedImage(row: SelectGeneratedImage): GeneratedImage {
  return {
    id: row.imageId,
    jobId: row.jobId,
    url: row.url,
    thumbnailUrl: row.thumbnailUrl,
    storagePath: row.storagePath,
    width: row.width,
    height: row.height,
    fileSizeBytes: row.fileSizeBytes,
    format: row.format,
    mimeType: row.mimeType,
    provider: row.provider,
    revisedPrompt: row.revisedPrompt,
    generatedAt: row.generatedAt,
    isSelected: row.isSelected,
    isDeleted: row.isDeleted,
  };
}

export function toVisualizationJob(
  row: SelectVisualizationJob,
  images: SelectGeneratedImage[],
): VisualizationJob {
  return {
    id: row.jobId,
    bookId: row.bookId,
    pageId: row.pageId,
    chapterId: row.chapterId,
    trigger: row.trigger,
    userId: row.userId,
    status: row.status,
    preferredProvider: row.preferredProvider,
    priority: row.priority,
    promptData: row.promptData,
    textSelection: row.textSelection,
    parameters: row.parameters,
    errorMessage: row.errorMessage,
    errorCategory: row.errorCategory,
    retryCount: row.retryCount,
    retriedAfterRejection: row.retriedAfterRejection,
    regeneratedFromJobId: row.regeneratedFromJobId,
    claimedBy: row.claimedBy,
    claimedAt: row.claimedAt,
    availableAt: row.availableAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    processingStartedAt: row.processingStartedAt,
    completedAt: row.completedAt,
    images: [...images].sort((a, b) => a.position - b.position).map(toGeneratedImage),
    selectedImageId: row.selectedImageId,
  };
}

export class DrizzleVisualizationJobRepository implements IVisualizationJobRepository {
  constructor(private readonly db: Database = getDatabase()) {}

  async create(job: NewVisualizationJob): Promise<VisualizationJob> {
    try {
      const [row] = await this.db
        .insert(visualizationJobs)
        .values({
          jobId: job.id,
          bookId: job.bookId,
          pageId: job.pageId,
          chapterId: job.chapterId,
          trigger: job.trigger,
          userId: job.userId,
          status: job.status,
          preferredProvider: job.preferredProvider,
          priority: job.priority,
          promptData: job.promptData,
          textSelection: job.textSelection,
          parameters: job.parameters,
          errorMessage: job.errorMessage,
          errorCategory: job.errorCategory,
          retryCount: job.retryCount,
          retriedAfterRejection: job.retriedAfterRejection,
          regeneratedFromJobId: job.regeneratedFromJobId,
          claimedBy: job.claimedBy,
          claimedAt: job.claimedAt,
          availableAt: job.availableAt,
          processingStartedAt: job.processingStartedAt,
          completedAt: job.completedAt,
        })
        .returning();

      if (!row) {
        throw new Error(`Failed to create visualization job: ${job.id}`);
      }
      return toVisualizationJob(row, []);
    } catch (error) {
      if (isUniqueViolation(error)) {
        const existing = job.pageId
          ? await this.findActiveForPage(job.bookId, job.pageId, [job.trigger])
          : null;
        throw new AlreadyInProgressError(
          `A ${job.trigger} job for page ${job.pageId ?? 'n/a'} is already in progress`,
          existing?.id ?? null,
        );
      }
      logger.error('Failed to create visualization job', {
        error: error instanceof Error ? error.message : String(error),
        jobId: job.id,
        bookId: job.bookId,
      });
      throw error;
    }
  }

  async findById(jobId: string): Promise<VisualizationJob | null> {
    const [row] = await this.db
      .select()
      .from(visualizationJobs)
      .where(eq(visualizationJobs.jobId, jobId));
    if (!row) {
      return null;
    }
    const images = await this.db
      .select()
      .from(generatedImages)
      .where(eq(generatedImages.jobId, jobId));
    return toVisualizationJob(row, images);
  }

  async findActiveForPage(
    bookId: string,
    pageId: string,
    triggers: readonly VisualizationTrigger[],
  ): Promise<VisualizationJob | null> {
    if (triggers.length === 0) {
      return null;
    }
    const [row] = await this.db
      .select()
      .from(visualizationJobs)
      .where(
        and(
          eq(visualizationJobs.bookId, bookId),
          eq(visualizationJobs.pageId, pageId),
          inArray(visualizationJobs.trigger, [...triggers]),
          notInArray(visualizationJobs.status, FINAL_STATUSES),
        ),
      )
      .limit(1);
    return row ? toVisualizationJob(row, []) : null;
  }

  async listByBook(bookId: string): Promise<VisualizationJob[]> {
    const rows = await this.db
      .select()
      .from(visualizationJobs)
      .where(eq(visualizationJobs.bookId, bookId))
      .orderBy(desc(visualizationJobs.createdAt));
    return this.withImages(rows);
  }

  async listByUser(userId: string): Promise<VisualizationJob[]> {
    const rows = await this.db
      .select()
      .from(visualizationJobs)
      .where(eq(visualizationJobs.userId, userId))
      .orderBy(desc(visualizationJobs.createdAt));
    return this.withImages(rows);
  }

  async countByStatus(): Promise<Record<VisualizationJobStatus, number>> {
    const rows = await this.db
      .select({ status: visualizationJobs.status, total: count() })
      .from(visualizationJobs)
      .groupBy(visualizationJobs.status);
    const result = emptyStatusCounts();
    for (const row of rows) {
      result[row.status] = Number(row.total);
    }
    return result;
  }

  async countAhead(job: VisualizationJob): Promise<number> {
    if (job.status !== 'pending') {
      return 0;
    }
    const [row] = await this.db
      .select({ total: count() })
      .from(visualizationJobs)
      .where(
        and(
          eq(visualizationJobs.status, 'pending'),
          ne(visualizationJobs.jobId, job.id),
          or(
            gt(visualizationJobs.priority, job.priority),
            and(
              eq(visualizationJobs.priority, job.priority),
              lt(visualizationJobs.createdAt, job.createdAt),
            ),
          ),
        ),
      );
    return row ? Number(row.total) : 0;
  }

  async averageProcessingSeconds(sampleSize: number): Promise<number | null> {
    const rows = await this.db
      .select({
        startedAt: visualizationJobs.processingStartedAt,
        completedAt: visualizationJobs.completedAt,
      })
      .from(visualizationJobs)
      .where(eq(visualizationJobs.status, 'completed'))
      .orderBy(desc(visualizationJobs.completedAt))
      .limit(sampleSize);

    const durations = rows.flatMap((row) =>
      row.startedAt && row.completedAt
        ? [(row.completedAt.getTime() - row.startedAt.getTime()) / 1000]
        : [],
    );
    if (durations.length === 0) {
      return null;
    }
    return durations.reduce((sum, d) => sum + d, 0) / durations.length;
  }

  async claimNext(workerId: string, now: Date): Promise<VisualizationJob | null> {
    const claimed = await this.db.transaction(async (tx) => {
      const [candidate] = await tx
        .select({ jobId: visualizationJobs.jobId })
        .from(visualizationJobs)
        .where(and(eq(visualizationJobs.status, 'pending'), lte(visualizationJobs.availableAt, now)))
        .orderBy(desc(visualizationJobs.priority), asc(visualizationJobs.createdAt))
        .limit(1)
        .for('update', { skipLocked: true });

      if (!candidate) {
        return null;
      }

      const [row] = await tx
        .update(visualizationJobs)
        .set({ status: 'queued', claimedBy: workerId, claimedAt: now, updatedAt: now })
        .where(and(eq(visualizationJobs.jobId, candidate.jobId), eq(visualizationJobs.status, 'pending')))
        .returning();
      return row ?? null;
    });

    if (!claimed) {
      return null;
    }
    logger.debug('Visualization job claimed', { jobId: claimed.jobId, workerId });
    return this.findById(claimed.jobId);
  }

  async transition(
    jobId: string,
    from: VisualizationJobStatus,
    patch: VisualizationJobPatch,
  ): Promise<VisualizationJob | null> {
    assertTransition(from, patch.status);
    try {
      const [row] = await this.db
        .update(visualizationJobs)
        .set({ ...patch, updatedAt: new Date() })
        .where(and(eq(visualizationJobs.jobId, jobId), eq(visualizationJobs.status, from)))
        .returning();
      if (!row) {
        return null;
      }
      const images = await this.db
        .select()
        .from(generatedImages)
        .where(eq(generatedImages.jobId, jobId));
      return toVisualizationJob(row, images);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new AlreadyInProgressError(`Another job for the same target of ${jobId} is in progress`);
      }
      throw error;
    }
  }

  async failStaleClaims(olderThan: Date, message: string): Promise<VisualizationJob[]> {
    const rows = await this.db
      .update(visualizationJobs)
      .set({
        status: 'failed',
        errorMessage: message,
        errorCategory: 'transient',
        updatedAt: new Date(),
      })
      .where(
        and(
          inArray(visualizationJobs.status, ['queued', 'generating_prompt', 'processing', 'uploading']),
          lt(visualizationJobs.updatedAt, olderThan),
        ),
      )
      .returning();
    return rows.map((row) => toVisualizationJob(row, []));
  }

  async addImages(
    jobId: string,
    images: GeneratedImage[],
    selectedImageId: string,
  ): Promise<VisualizationJob> {
    await this.db.transaction(async (tx) => {
      const [existing] = await tx
        .select({ total: count() })
        .from(generatedImages)
        .where(eq(generatedImages.jobId, jobId));
      const offset = existing ? Number(existing.total) : 0;

      if (images.length > 0) {
        await tx.insert(generatedImages).values(
          images.map((image, index) => ({
            imageId: image.id,
            jobId,
            url: image.url,
            thumbnailUrl: image.thumbnailUrl,
            storagePath: image.storagePath,
            width: image.width,
            height: image.height,
            fileSizeBytes: image.fileSizeBytes,
            format: image.format,
            mimeType: image.mimeType,
            provider: image.provider,
            revisedPrompt: image.revisedPrompt,
            isSelected: image.id === selectedImageId,
            isDeleted: image.isDeleted,
            position: offset + index,
            generatedAt: image.generatedAt,
          })),
        );
      }
      await this.applySelection(tx, jobId, selectedImageId);
    });
    return this.require(jobId);
  }

  async selectImage(jobId: string, imageId: string): Promise<VisualizationJob> {
    await this.db.transaction(async (tx) => {
      const [image] = await tx
        .select({ imageId: generatedImages.imageId })
        .from(generatedImages)
        .where(
          and(
            eq(generatedImages.jobId, jobId),
            eq(generatedImages.imageId, imageId),
            eq(generatedImages.isDeleted, false),
          ),
        );
      if (!image) {
        throw new NotFoundError('Image', imageId);
      }
      await this.applySelection(tx, jobId, imageId);
    });
    return this.require(jobId);
  }

  async deleteImage(jobId: string, imageId: string): Promise<VisualizationJob> {
    await this.db.transaction(async (tx) => {
      const [deleted] = await tx
        .update(generatedImages)
        .set({ isDeleted: true, isSelected: false })
        .where(
          and(
            eq(generatedImages.jobId, jobId),
            eq(generatedImages.imageId, imageId),
            eq(generatedImages.isDeleted, false),
          ),
        )
        .returning();
      if (!deleted) {
        throw new NotFoundError('Image', imageId);
      }

      const [job] = await tx
        .select({ selectedImageId: visualizationJobs.selectedImageId })
        .from(visualizationJobs)
        .where(eq(visualizationJobs.jobId, jobId));
      if (job?.selectedImageId !== imageId) {
        return;
      }

      const [replacement] = await tx
        .select({ imageId: generatedImages.imageId })
        .from(generatedImages)
        .where(and(eq(generatedImages.jobId, jobId), eq(generatedImages.isDeleted, false)))
        .orderBy(asc(generatedImages.position))
        .limit(1);
      await this.applySelection(tx, jobId, replacement?.imageId ?? null);
    });
    return this.require(jobId);
  }

  async delete(jobId: string): Promise<boolean> {
    const rows = await this.db
      .delete(visualizationJobs)
      .where(eq(visualizationJobs.jobId, jobId))
      .returning({ jobId: visualizationJobs.jobId });
    return rows.length > 0;
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`SELECT 1 as health_check`);
  }

  private async applySelection(
    tx: Pick<Database, 'update'>,
    jobId: string,
    imageId: string | null,
  ): Promise<void> {
    await tx
      .update(generatedImages)
      .set({
        isSelected: imageId ? sql`${generatedImages.imageId} = ${imageId}` : false,
      })
      .where(eq(generatedImages.jobId, jobId));
    await tx
      .update(visualizationJobs)
      .set({ selectedImageId: imageId, updatedAt: new Date() })
      .where(eq(visualizationJobs.jobId, jobId));
  }

  private async require(jobId: string): Promise<VisualizationJob> {
    const job = await this.findById(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    return job;
  }

  private async withImages(rows: SelectVisualizationJob[]): Promise<VisualizationJob[]> {
    if (rows.length === 0) {
      return [];
    }
    const images = await this.db
      .select()
      .from(generatedImages)
      .where(
        inArray(
          generatedImages.jobId,
          rows.map((row) => row.jobId),
        ),
      );
    return rows.map((row) =>
      toVisualizationJob(
        row,
        images.filter((image) => image.jobId === row.jobId),
      ),
    );
  }
}
