/**
 * Visualization Orchestrator
 * Caller-facing operations over visualization jobs. Validation and ownership errors are thrown
 * synchronously; nothing in here runs the pipeline itself.
 */

import { ZodError, type z } from 'zod';
import { logger } from '@/config/logger.js';
import type { OrchestratorConfig } from '@/config/environment.js';
import type {
  BookVisualizationSettings,
  CatalogPage,
  ICatalogClient,
  IImageStorage,
  INotificationChannel,
  IVisualizationJobRepository,
} from '@/shared/interfaces.js';
import {
  AlreadyInProgressError,
  ForbiddenError,
  InvalidStateError,
  InvalidTargetError,
  NotFoundError,
  RetryLimitExceededError,
  ValidationError,
} from '@/shared/errors.js';
import {
  autoNovelRequestSchema,
  buildNewJob,
  defaultParameters,
  normalizeTextSelection,
  pageRequestSchema,
  selectedImage,
  textSelectionRequestSchema,
  type AutoNovelRequest,
  type PageVisualizationRequest,
  type TextSelectionVisualizationRequest,
} from '@/services/visualization-job.js';
import {
  canCancel,
  canRetry,
  isFinal,
  isProcessing,
  statusLabel,
} from '@/services/job-status.js';
import { ProgressTrackerService } from '@/services/progress-tracker.js';
import type {
  AutoNovelResult,
  ImageProviderKey,
  JobStatusView,
  QueueStatus,
  SkippedPage,
  VisualizationJob,
  VisualizationTrigger,
} from '@/types/visualization.js';

const PAGE_CONFLICT_TRIGGERS: readonly VisualizationTrigger[] = ['page_request', 'auto_novel'];
const SELECTION_CONFLICT_TRIGGERS: readonly VisualizationTrigger[] = ['text_selection_request'];
const DEFAULT_AVERAGE_PROCESSING_SECONDS = 30;
const AVERAGE_SAMPLE_SIZE = 50;

export interface WorkerWakeup {
  wake(): void;
}

export interface OrchestratorDependencies {
  repository: IVisualizationJobRepository;
  catalog: ICatalogClient;
  notifications: INotificationChannel;
  storage: IImageStorage;
  progress: ProgressTrackerService;
  now?: () => Date;
}

export type OrchestratorSettings = Pick<OrchestratorConfig, 'maxRetries' | 'workerConcurrency'>;

export interface ActorOptions {
  isAdmin?: boolean;
}

export interface RetryOptions extends ActorOptions {
  userId?: string;
}

function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  try {
    return schema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw ValidationError.fromZod(error);
    }
    throw error;
  }
}

export class VisualizationOrchestrator {
  private readonly repository: IVisualizationJobRepository;
  private readonly catalog: ICatalogClient;
  private readonly notifications: INotificationChannel;
  private readonly storage: IImageStorage;
  private readonly progress: ProgressTrackerService;
  private readonly now: () => Date;
  private workers: WorkerWakeup | null = null;

  constructor(
    deps: OrchestratorDependencies,
    private readonly settings: OrchestratorSettings,
  ) {
    this.repository = deps.repository;
    this.catalog = deps.catalog;
    this.notifications = deps.notifications;
    this.storage = deps.storage;
    this.progress = deps.progress;
    this.now = deps.now ?? (() => new Date());
  }

  /** Newly created jobs wake the attached pool instead of waiting for its next poll. */
  attachWorkers(workers: WorkerWakeup): void {
    this.workers = workers;
  }

  async requestPageVisualization(input: PageVisualizationRequest): Promise<VisualizationJob> {
    const request = parseInput(pageRequestSchema, input);
    const settings = await this.requireVisualizableBook(request.bookId);
    const page = await this.requirePage(request.bookId, request.pageId);

    const existing = await this.repository.findActiveForPage(request.bookId, page.id, PAGE_CONFLICT_TRIGGERS);
    if (existing) {
      throw new AlreadyInProgressError(
        `Page ${page.id} already has a visualization in progress`,
        existing.id,
      );
    }

    const job = await this.repository.create(
      buildNewJob(
        {
          bookId: request.bookId,
          pageId: page.id,
          chapterId: page.chapterId,
          trigger: 'page_request',
          userId: request.userId,
          preferredProvider: this.providerFor(request.preferredProvider, settings),
          parameters: request.parameters ?? defaultParameters(),
          ...(request.priority !== undefined && { priority: request.priority }),
        },
        this.now(),
      ),
    );

    logger.info('Page visualization requested', {
      jobId: job.id,
      bookId: job.bookId,
      pageId: job.pageId,
      userId: job.userId,
    });
    this.announce(job);
    return job;
  }

  async requestTextSelectionVisualization(
    input: TextSelectionVisualizationRequest,
  ): Promise<VisualizationJob> {
    const request = parseInput(textSelectionRequestSchema, input);
    const settings = await this.requireVisualizableBook(request.bookId);
    const page = await this.requirePage(request.bookId, request.selection.pageId);
    const selection = normalizeTextSelection(request.selection);

    const existing = await this.repository.findActiveForPage(
      request.bookId,
      page.id,
      SELECTION_CONFLICT_TRIGGERS,
    );
    if (existing) {
      throw new AlreadyInProgressError(
        `A text selection on page ${page.id} is already being visualized`,
        existing.id,
      );
    }

    const job = await this.repository.create(
      buildNewJob(
        {
          bookId: request.bookId,
          pageId: page.id,
          chapterId: selection.chapterId ?? page.chapterId,
          trigger: 'text_selection_request',
          userId: request.userId,
          preferredProvider: this.providerFor(request.preferredProvider, settings),
          parameters: request.parameters ?? defaultParameters(),
          textSelection: selection,
          ...(request.priority !== undefined && { priority: request.priority }),
        },
        this.now(),
      ),
    );

    logger.info('Text selection visualization requested', {
      jobId: job.id,
      bookId: job.bookId,
      pageId: job.pageId,
      selectionLength: selection.selectedText.length,
    });
    this.announce(job);
    return job;
  }

  async startAutoNovelGeneration(input: AutoNovelRequest): Promise<AutoNovelResult> {
    const request = parseInput(autoNovelRequestSchema, input);
    const settings = await this.requireVisualizableBook(request.bookId);
    const pages = await this.catalog.getBookPages(request.bookId);
    const candidates = this.autoNovelCandidates(settings, pages);

    const jobs: VisualizationJob[] = [];
    const skipped: SkippedPage[] = [];
    let alreadyVisualized = 0;

    for (const page of candidates) {
      if (page.hasVisualization) {
        alreadyVisualized += 1;
        continue;
      }

      const blocking = await this.repository.findActiveForPage(request.bookId, page.id, PAGE_CONFLICT_TRIGGERS);
      if (blocking) {
        skipped.push({ pageId: page.id, reason: 'already_in_progress', jobId: blocking.id });
        continue;
      }

      try {
        const job = await this.repository.create(
          buildNewJob(
            {
              bookId: request.bookId,
              pageId: page.id,
              chapterId: page.chapterId,
              trigger: 'auto_novel',
              userId: request.userId,
              preferredProvider: this.providerFor(request.preferredProvider, settings),
              parameters: request.parameters ?? defaultParameters(),
            },
            this.now(),
          ),
        );
        jobs.push(job);
        this.announce(job);
      } catch (error) {
        if (error instanceof AlreadyInProgressError) {
          skipped.push({ pageId: page.id, reason: 'already_in_progress', jobId: error.existingJobId ?? '' });
          continue;
        }
        throw error;
      }
    }

    logger.info('Auto novel generation started', {
      bookId: request.bookId,
      mode: settings.mode,
      candidates: candidates.length,
      created: jobs.length,
      skipped: skipped.length,
      alreadyVisualized,
    });

    return { jobs, skipped, alreadyVisualized };
  }

  async cancelJob(jobId: string, userId: string, reason: string, options: ActorOptions = {}): Promise<true> {
    const job = await this.requireJob(jobId);
    this.assertActor(job, userId, options.isAdmin);

    if (!canCancel(job.status)) {
      throw new InvalidStateError(`Job ${jobId} cannot be cancelled while ${job.status}`);
    }

    const message = reason.trim() || 'Cancelled by user';
    const cancelled = await this.repository.transition(jobId, job.status, {
      status: 'cancelled',
      errorMessage: message,
      errorCategory: 'cancelled',
      claimedBy: null,
      claimedAt: null,
    });

    if (!cancelled) {
      // A worker moved the job first
      const latest = await this.requireJob(jobId);
      throw new InvalidStateError(`Job ${jobId} cannot be cancelled while ${latest.status}`);
    }

    logger.info('Visualization job cancelled', { jobId, userId, reason: message });
    this.publish(cancelled, { message, lastReached: job.status });
    return true;
  }

  async retryJob(jobId: string, options: RetryOptions = {}): Promise<true> {
    const job = await this.requireJob(jobId);
    if (options.userId !== undefined) {
      this.assertActor(job, options.userId, options.isAdmin);
    }

    if (!canRetry(job.status)) {
      throw new InvalidStateError(`Job ${jobId} cannot be retried while ${job.status}`);
    }
    if (job.retryCount >= this.settings.maxRetries) {
      throw new RetryLimitExceededError(jobId, this.settings.maxRetries);
    }
    const permanent = job.status === 'failed' && job.errorCategory === 'permanent';
    if (permanent && job.retriedAfterRejection) {
      throw new RetryLimitExceededError(jobId, job.retryCount);
    }

    await this.assertTargetIdle(job);

    const retried = await this.repository.transition(jobId, job.status, {
      status: 'pending',
      retryCount: job.retryCount + 1,
      ...(permanent && { retriedAfterRejection: true }),
      errorMessage: null,
      errorCategory: null,
      claimedBy: null,
      claimedAt: null,
      availableAt: this.now(),
      processingStartedAt: null,
      completedAt: null,
    });
    if (!retried) {
      const latest = await this.requireJob(jobId);
      throw new InvalidStateError(`Job ${jobId} cannot be retried while ${latest.status}`);
    }

    logger.info('Visualization job retried', { jobId, retryCount: retried.retryCount });
    this.announce(retried);
    return true;
  }

  async regenerate(originalJobId: string, userId: string): Promise<VisualizationJob> {
    const original = await this.requireJob(originalJobId);
    if (original.status !== 'completed') {
      throw new InvalidStateError(`Only completed jobs can be regenerated; job ${originalJobId} is ${original.status}`);
    }
    await this.assertTargetIdle(original);

    const job = await this.repository.create(
      buildNewJob(
        {
          bookId: original.bookId,
          pageId: original.pageId,
          chapterId: original.chapterId,
          trigger: original.trigger,
          userId,
          preferredProvider: original.preferredProvider,
          parameters: original.parameters,
          textSelection: original.textSelection,
          priority: original.priority,
          regeneratedFromJobId: original.id,
        },
        this.now(),
      ),
    );

    logger.info('Visualization regenerated', { jobId: job.id, originalJobId });
    this.announce(job);
    return job;
  }

  async getJob(jobId: string): Promise<VisualizationJob> {
    return this.requireJob(jobId);
  }

  async getJobStatus(jobId: string): Promise<JobStatusView> {
    const job = await this.requireJob(jobId);

    let queuePosition: number | null = null;
    let estimatedWaitSeconds: number | null = null;
    if (job.status === 'pending') {
      queuePosition = (await this.repository.countAhead(job)) + 1;
      estimatedWaitSeconds = this.progress.estimateWaitSeconds(
        queuePosition,
        this.settings.workerConcurrency,
        this.progress.averageSecondsFor(job.preferredProvider),
      );
    } else if (!isFinal(job.status)) {
      estimatedWaitSeconds = this.progress.estimateRemainingSeconds(job);
    }

    return {
      jobId: job.id,
      status: job.status,
      statusLabel: statusLabel(job.status),
      progressPercent: this.progress.jobPercent(job),
      errorMessage: job.errorMessage,
      retryCount: job.retryCount,
      canCancel: canCancel(job.status),
      canRetry: canRetry(job.status) && job.retryCount < this.settings.maxRetries,
      hasImages: job.images.some((image) => !image.isDeleted),
      isFinal: isFinal(job.status),
      isProcessing: isProcessing(job.status),
      selectedImageUrl: selectedImage(job)?.url ?? null,
      queuePosition,
      estimatedWaitSeconds,
      createdAt: job.createdAt,
      processingStartedAt: job.processingStartedAt,
      completedAt: job.completedAt,
    };
  }

  async getJobsByBook(bookId: string): Promise<VisualizationJob[]> {
    return this.repository.listByBook(bookId);
  }

  async getJobsByUser(userId: string): Promise<VisualizationJob[]> {
    return this.repository.listByUser(userId);
  }

  async selectImage(jobId: string, imageId: string, userId: string, options: ActorOptions = {}): Promise<VisualizationJob> {
    const job = await this.requireJob(jobId);
    this.assertActor(job, userId, options.isAdmin);
    if (job.status !== 'completed') {
      throw new InvalidStateError(`Images can only be selected on completed jobs; job ${jobId} is ${job.status}`);
    }

    const updated = await this.repository.selectImage(jobId, imageId);
    const image = selectedImage(updated);
    if (image && updated.pageId && !updated.textSelection) {
      try {
        await this.catalog.setPageVisualization({
          bookId: updated.bookId,
          chapterId: updated.chapterId,
          pageId: updated.pageId,
          imageUrl: image.url,
          thumbnailUrl: image.thumbnailUrl,
          jobId: updated.id,
        });
      } catch (error) {
        logger.error('Catalog update after image selection failed', {
          jobId,
          imageId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return updated;
  }

  async deleteImage(jobId: string, imageId: string, userId: string, options: ActorOptions = {}): Promise<VisualizationJob> {
    const job = await this.requireJob(jobId);
    this.assertActor(job, userId, options.isAdmin);
    if (!isFinal(job.status)) {
      throw new InvalidStateError(`Images cannot be deleted while job ${jobId} is ${job.status}`);
    }
    return this.repository.deleteImage(jobId, imageId);
  }

  async deleteJob(jobId: string, userId: string, options: ActorOptions = {}): Promise<true> {
    const job = await this.requireJob(jobId);
    this.assertActor(job, userId, options.isAdmin);
    if (!isFinal(job.status)) {
      throw new InvalidStateError(`Job ${jobId} cannot be deleted while ${job.status}`);
    }

    for (const image of job.images) {
      const paths = [image.storagePath];
      if (image.thumbnailUrl) {
        paths.push(image.storagePath.replace(/\.[a-z]+$/, '_thumb.jpg'));
      }
      for (const path of paths) {
        try {
          await this.storage.deleteFile(path);
        } catch (error) {
          logger.warn('Stored image could not be removed', {
            jobId,
            path,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }

    const deleted = await this.repository.delete(jobId);
    if (!deleted) {
      throw new NotFoundError('Job', jobId);
    }
    logger.info('Visualization job deleted', { jobId, userId, images: job.images.length });
    return true;
  }

  async getQueueStatus(): Promise<QueueStatus> {
    const counts = await this.repository.countByStatus();
    const average = await this.repository.averageProcessingSeconds(AVERAGE_SAMPLE_SIZE);
    return {
      pending: counts.pending,
      queued: counts.queued,
      processing: counts.generating_prompt + counts.processing + counts.uploading,
      averageProcessingSeconds: average ?? DEFAULT_AVERAGE_PROCESSING_SECONDS,
      workerConcurrency: this.settings.workerConcurrency,
    };
  }

  /** Re-activating work on a page must not overlap another active job for the same target. */
  private async assertTargetIdle(job: VisualizationJob): Promise<void> {
    if (!job.pageId) {
      return;
    }
    const triggers =
      job.trigger === 'text_selection_request' ? SELECTION_CONFLICT_TRIGGERS : PAGE_CONFLICT_TRIGGERS;
    const existing = await this.repository.findActiveForPage(job.bookId, job.pageId, triggers);
    if (existing && existing.id !== job.id) {
      throw new AlreadyInProgressError(
        `Page ${job.pageId} already has a visualization in progress`,
        existing.id,
      );
    }
  }

  private async requireJob(jobId: string): Promise<VisualizationJob> {
    const job = await this.repository.findById(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    return job;
  }

  private async requirePage(bookId: string, pageId: string): Promise<CatalogPage> {
    const page = await this.catalog.getPage(pageId);
    if (!page || page.bookId !== bookId) {
      throw new InvalidTargetError(`Page ${pageId} does not exist in book ${bookId}`);
    }
    return page;
  }

  private async requireVisualizableBook(bookId: string): Promise<BookVisualizationSettings> {
    const settings = await this.catalog.getBookVisualizationSettings(bookId);
    if (!settings) {
      throw new InvalidTargetError(`Book ${bookId} does not exist`);
    }
    if (!settings.isPublished) {
      throw new InvalidTargetError(`Book ${bookId} is not published`);
    }
    if (!settings.isEnabled || settings.mode === 'none') {
      throw new InvalidTargetError(`Visualization is not enabled for book ${bookId}`);
    }
    return settings;
  }

  private autoNovelCandidates(settings: BookVisualizationSettings, pages: CatalogPage[]): CatalogPage[] {
    const ordered = [...pages].sort((a, b) => a.pageNumber - b.pageNumber);
    switch (settings.mode) {
      case 'author_defined':
      case 'user_selected':
        return ordered.filter((page) => page.isVisualizationPoint);
      case 'per_page':
        return ordered;
      case 'per_chapter': {
        const seen = new Set<string>();
        return ordered.filter((page) => {
          const chapter = page.chapterId ?? '';
          if (seen.has(chapter)) {
            return false;
          }
          seen.add(chapter);
          return true;
        });
      }
      default:
        return [];
    }
  }

  private providerFor(
    requested: ImageProviderKey | undefined,
    settings: BookVisualizationSettings,
  ): ImageProviderKey | null {
    return requested ?? settings.preferredProvider ?? null;
  }

  private assertActor(job: VisualizationJob, userId: string, isAdmin = false): void {
    if (!isAdmin && job.userId !== userId) {
      throw new ForbiddenError();
    }
  }

  private announce(job: VisualizationJob): void {
    this.publish(job, {});
    this.workers?.wake();
  }

  private publish(
    job: VisualizationJob,
    extra: { message?: string; lastReached?: VisualizationJob['status'] } = {},
  ): void {
    try {
      this.notifications.publish({
        jobId: job.id,
        userId: job.userId,
        bookId: job.bookId,
        pageId: job.pageId,
        status: job.status,
        progressPercent: extra.lastReached
          ? this.progress.percentFor(job.status, extra.lastReached)
          : this.progress.jobPercent(job),
        message: extra.message ?? statusLabel(job.status),
        timestamp: this.now().toISOString(),
      });
    } catch (error) {
      logger.warn('Progress event not published', {
        jobId: job.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
