/**
 * Pipeline Executor
 * Drives one claimed job through prompt synthesis, image generation and upload. Every status change
 * is persisted before the next external call, and nothing thrown in here escapes `execute()`.
 */

import { randomUUID } from 'crypto';
import { logger } from '@/config/logger.js';
import type { OrchestratorConfig } from '@/config/environment.js';
import { ProviderError } from '@/ai/errors.js';
import { describeProvider } from '@/ai/provider-catalog.js';
import type { IImageGateway, ImageResult } from '@/ai/interfaces.js';
import type {
  CatalogPage,
  ICatalogClient,
  IImageStorage,
  INotificationChannel,
  IPromptSynthesizer,
  IVisualizationJobRepository,
} from '@/shared/interfaces.js';
import { calculateDelay } from '@/shared/retry-utils.js';
import { canTransition, statusLabel } from '@/services/job-status.js';
import { selectionFullContext } from '@/services/visualization-job.js';
import { ProgressTrackerService } from '@/services/progress-tracker.js';
import { extensionFor, mimeTypeFor, type ImageProcessor } from '@/utils/imageUtils.js';
import type {
  FailureCategory,
  GeneratedImage,
  ImageProviderKey,
  PromptData,
  VisualizationJob,
  VisualizationJobPatch,
  VisualizationJobStatus,
} from '@/types/visualization.js';

export type ExecutionOutcome = 'completed' | 'failed' | 'retry_scheduled' | 'skipped';

export type PipelineExecutorConfig = Pick<
  OrchestratorConfig,
  'maxRetries' | 'autoRetryTransient' | 'retryBaseDelayMs' | 'retryMaxDelayMs' | 'thumbnailWidth'
> & {
  retryJitterMs?: number;
};

export interface PipelineDependencies {
  repository: IVisualizationJobRepository;
  catalog: ICatalogClient;
  promptSynthesizer: IPromptSynthesizer;
  gateway: IImageGateway;
  storage: IImageStorage;
  notifications: INotificationChannel;
  imageProcessor: ImageProcessor;
  progress?: ProgressTrackerService;
  now?: () => Date;
}

const AUTO_RETRY_CATEGORIES: readonly FailureCategory[] = ['transient', 'prompt'];

/** A stage failure with the category recorded on the job. */
export class StageFailure extends Error {
  constructor(
    public readonly category: FailureCategory,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'StageFailure';
  }
}

/** The stored status moved under us; the job belongs to someone else now. */
class JobSupersededError extends Error {
  constructor(jobId: string, expected: VisualizationJobStatus) {
    super(`Job ${jobId} is no longer ${expected}`);
    this.name = 'JobSupersededError';
  }
}

const describe = (error: unknown) => (error instanceof Error ? error.message : String(error));

export class PipelineExecutor {
  private readonly repository: IVisualizationJobRepository;
  private readonly catalog: ICatalogClient;
  private readonly promptSynthesizer: IPromptSynthesizer;
  private readonly gateway: IImageGateway;
  private readonly storage: IImageStorage;
  private readonly notifications: INotificationChannel;
  private readonly imageProcessor: ImageProcessor;
  private readonly progress: ProgressTrackerService;
  private readonly now: () => Date;

  constructor(
    deps: PipelineDependencies,
    private readonly config: PipelineExecutorConfig,
  ) {
    this.repository = deps.repository;
    this.catalog = deps.catalog;
    this.promptSynthesizer = deps.promptSynthesizer;
    this.gateway = deps.gateway;
    this.storage = deps.storage;
    this.notifications = deps.notifications;
    this.imageProcessor = deps.imageProcessor;
    this.progress = deps.progress ?? new ProgressTrackerService(deps.gateway.getDefaultProvider());
    this.now = deps.now ?? (() => new Date());
  }

  async execute(job: VisualizationJob): Promise<ExecutionOutcome> {
    let current = job;
    const log = { jobId: job.id, bookId: job.bookId, pageId: job.pageId };

    try {
      if (current.status === 'pending') {
        current = await this.advance(current, { status: 'queued', claimedAt: this.now() });
      }
      if (current.status !== 'queued') {
        logger.warn('Pipeline: job is not in a runnable state, skipping', { ...log, status: current.status });
        return 'skipped';
      }

      // Loses to a cancel between claim and start
      const started = await this.repository.transition(current.id, 'queued', {
        status: 'generating_prompt',
        processingStartedAt: this.now(),
      });
      if (!started) {
        logger.info('Pipeline: job left the queue before it started', log);
        return 'skipped';
      }
      this.publish(current);
      current = started;
      this.publish(current);

      const provider = current.preferredProvider ?? this.gateway.getDefaultProvider();
      const promptData = await this.synthesizePrompt(current, provider);

      current = await this.advance(current, { status: 'processing', promptData });
      this.publish(current);

      const image = await this.generateImage(current, provider, promptData);

      current = await this.advance(current, { status: 'uploading' });
      this.publish(current);

      const stored = await this.storeImage(current, image);
      current = await this.record(current, stored);

      current = await this.advance(current, { status: 'completed', completedAt: this.now() });
      this.publish(current, { imageUrl: stored.url });

      logger.info('Pipeline: job completed', {
        ...log,
        provider,
        imageId: stored.id,
        durationMs: current.processingStartedAt
          ? this.now().getTime() - current.processingStartedAt.getTime()
          : undefined,
      });

      await this.writeBack(current, stored);
      return 'completed';
    } catch (error) {
      if (error instanceof JobSupersededError) {
        logger.warn('Pipeline: job status changed during execution, abandoning', {
          ...log,
          error: error.message,
        });
        return 'skipped';
      }
      return this.fail(current, error);
    }
  }

  /**
   * Applies the failure policy to a job that was failed outside the executor (stale claims).
   */
  async handleFailedJob(job: VisualizationJob): Promise<ExecutionOutcome> {
    try {
      this.publish(job);
      return await this.scheduleRetry(job);
    } catch (error) {
      logger.error('Pipeline: could not apply retry policy', { jobId: job.id, error: describe(error) });
      return 'failed';
    }
  }

  private async resolveSourceText(job: VisualizationJob): Promise<string> {
    if (job.textSelection) {
      const text = selectionFullContext(job.textSelection);
      if (!text) {
        throw new StageFailure('internal', 'Text selection is empty');
      }
      return text;
    }
    if (!job.pageId) {
      throw new StageFailure('internal', 'Job has neither a page nor a text selection');
    }

    let page: CatalogPage | null;
    try {
      page = await this.catalog.getPage(job.pageId);
    } catch (error) {
      throw new StageFailure('transient', `Catalog unavailable: ${describe(error)}`, error);
    }
    if (!page || !page.content.trim()) {
      throw new StageFailure('internal', `Page ${job.pageId} has no text to visualize`);
    }
    return page.content.trim();
  }

  private async resolveStyle(job: VisualizationJob): Promise<string | null> {
    if (job.parameters.style) {
      return job.parameters.style;
    }
    try {
      const settings = await this.catalog.getBookVisualizationSettings(job.bookId);
      return settings?.preferredStyle ?? null;
    } catch (error) {
      logger.warn('Pipeline: book style unavailable, continuing without it', {
        jobId: job.id,
        error: describe(error),
      });
      return null;
    }
  }

  private async synthesizePrompt(job: VisualizationJob, provider: ImageProviderKey): Promise<PromptData> {
    const originalText = await this.resolveSourceText(job);
    const style = await this.resolveStyle(job);
    const targetModel = describeProvider(provider).promptTargetModel;

    try {
      const enhancement = await this.promptSynthesizer.enhance({
        sourceText: originalText,
        style,
        targetModel,
        bookId: job.bookId,
        pageId: job.pageId,
        chapterId: job.chapterId,
      });
      return {
        originalText,
        enhancedPrompt: enhancement.enhancedPrompt,
        negativePrompt: enhancement.negativePrompt,
        style: enhancement.style,
        targetModel: enhancement.targetModel,
      };
    } catch (error) {
      throw new StageFailure('prompt', `Prompt generation failed: ${describe(error)}`, error);
    }
  }

  private async generateImage(
    job: VisualizationJob,
    provider: ImageProviderKey,
    promptData: PromptData,
  ): Promise<ImageResult> {
    try {
      return await this.gateway.generate({
        prompt: promptData.enhancedPrompt,
        negativePrompt: promptData.negativePrompt,
        parameters: job.parameters,
        provider,
      });
    } catch (error) {
      const category: FailureCategory = error instanceof ProviderError ? error.category : 'transient';
      throw new StageFailure(category, `[${provider}] ${describe(error)}`, error);
    }
  }

  private async storeImage(job: VisualizationJob, image: ImageResult): Promise<GeneratedImage> {
    const imageId = randomUUID();
    const info = await this.imageProcessor.inspect(image.buffer);
    const format = info?.format ?? image.format;
    const basePath = `visualizations/${job.bookId}/${job.id}/${imageId}`;
    const storagePath = `${basePath}.${extensionFor(format)}`;

    try {
      const url = await this.storage.uploadFile(storagePath, image.buffer, mimeTypeFor(format));
      const thumbnail = await this.imageProcessor.thumbnail(image.buffer, this.config.thumbnailWidth);
      const thumbnailUrl = thumbnail
        ? await this.storage.uploadFile(`${basePath}_thumb.jpg`, thumbnail, 'image/jpeg')
        : null;

      return {
        id: imageId,
        jobId: job.id,
        url,
        thumbnailUrl,
        storagePath,
        width: info?.width ?? image.width,
        height: info?.height ?? image.height,
        fileSizeBytes: image.buffer.length,
        format,
        mimeType: mimeTypeFor(format),
        provider: image.provider,
        revisedPrompt: image.revisedPrompt,
        generatedAt: this.now(),
        isSelected: true,
        isDeleted: false,
      };
    } catch (error) {
      throw new StageFailure('transient', `Upload failed: ${describe(error)}`, error);
    }
  }

  private async record(job: VisualizationJob, image: GeneratedImage): Promise<VisualizationJob> {
    try {
      return await this.repository.addImages(job.id, [image], image.id);
    } catch (error) {
      throw new StageFailure('transient', `Could not record generated image: ${describe(error)}`, error);
    }
  }

  private async writeBack(job: VisualizationJob, image: GeneratedImage): Promise<void> {
    // Selection illustrations do not replace the page illustration
    if (!job.pageId || job.textSelection) {
      return;
    }
    try {
      await this.catalog.setPageVisualization({
        bookId: job.bookId,
        chapterId: job.chapterId,
        pageId: job.pageId,
        imageUrl: image.url,
        thumbnailUrl: image.thumbnailUrl,
        jobId: job.id,
      });
    } catch (error) {
      logger.error('Pipeline: catalog write-back failed', {
        jobId: job.id,
        pageId: job.pageId,
        error: describe(error),
      });
    }
  }

  private async advance(job: VisualizationJob, patch: VisualizationJobPatch): Promise<VisualizationJob> {
    const updated = await this.repository.transition(job.id, job.status, patch);
    if (!updated) {
      throw new JobSupersededError(job.id, job.status);
    }
    return updated;
  }

  private async fail(job: VisualizationJob, error: unknown): Promise<ExecutionOutcome> {
    const category: FailureCategory = error instanceof StageFailure ? error.category : 'internal';
    const message = error instanceof StageFailure ? error.message : `Internal error: ${describe(error)}`;

    logger.warn('Pipeline: job failed', {
      jobId: job.id,
      status: job.status,
      category,
      error: message,
    });

    if (!canTransition(job.status, 'failed')) {
      logger.error('Pipeline: failure could not be recorded from this status', {
        jobId: job.id,
        status: job.status,
        error: message,
      });
      return 'failed';
    }

    try {
      const failed = await this.repository.transition(job.id, job.status, {
        status: 'failed',
        errorMessage: message,
        errorCategory: category,
      });
      if (!failed) {
        logger.warn('Pipeline: job status changed before the failure was recorded', { jobId: job.id });
        return 'failed';
      }
      this.publish(failed, { errorMessage: message, lastReached: job.status });
      return await this.scheduleRetry(failed);
    } catch (recordError) {
      logger.error('Pipeline: failed to record job failure', {
        jobId: job.id,
        error: describe(recordError),
        originalError: message,
      });
      return 'failed';
    }
  }

  private async scheduleRetry(job: VisualizationJob): Promise<ExecutionOutcome> {
    if (
      !this.config.autoRetryTransient ||
      job.status !== 'failed' ||
      !job.errorCategory ||
      !AUTO_RETRY_CATEGORIES.includes(job.errorCategory) ||
      job.retryCount >= this.config.maxRetries
    ) {
      return 'failed';
    }

    const attempt = job.retryCount + 1;
    const delayMs = calculateDelay(
      attempt,
      this.config.retryBaseDelayMs,
      this.config.retryMaxDelayMs,
      this.config.retryJitterMs ?? 0,
    );

    try {
      const pending = await this.repository.transition(job.id, 'failed', {
        status: 'pending',
        retryCount: attempt,
        availableAt: new Date(this.now().getTime() + delayMs),
        claimedBy: null,
        claimedAt: null,
        processingStartedAt: null,
        completedAt: null,
      });
      if (!pending) {
        return 'failed';
      }
      logger.info('Pipeline: automatic retry scheduled', {
        jobId: job.id,
        retryCount: attempt,
        delayMs,
      });
      this.publish(pending, { message: `Retry ${attempt} of ${this.config.maxRetries} scheduled` });
      return 'retry_scheduled';
    } catch (error) {
      logger.warn('Pipeline: automatic retry not possible', { jobId: job.id, error: describe(error) });
      return 'failed';
    }
  }

  private publish(
    job: VisualizationJob,
    extra: { imageUrl?: string; errorMessage?: string; message?: string; lastReached?: VisualizationJobStatus } = {},
  ): void {
    const progressPercent = extra.lastReached
      ? this.progress.percentFor(job.status, extra.lastReached)
      : this.progress.jobPercent(job);
    const errorMessage = extra.errorMessage ?? (job.status === 'failed' ? job.errorMessage : null);

    try {
      this.notifications.publish({
        jobId: job.id,
        userId: job.userId,
        bookId: job.bookId,
        pageId: job.pageId,
        status: job.status,
        progressPercent,
        message: extra.message ?? statusLabel(job.status),
        ...(errorMessage && { errorMessage }),
        ...(extra.imageUrl && { imageUrl: extra.imageUrl }),
        timestamp: this.now().toISOString(),
      });
    } catch (error) {
      logger.warn('Pipeline: progress event not published', { jobId: job.id, error: describe(error) });
    }
  }
}
