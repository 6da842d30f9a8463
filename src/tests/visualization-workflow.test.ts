import { describe, it, expect, jest, beforeEach } from '@jest/globals';

jest.mock('@/config/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  },
}));

import { InMemoryJobRepository } from '../adapters/memory/in-memory-job-repository';
import { VisualizationOrchestrator } from '../services/visualization-orchestrator';
import { PipelineExecutor } from '../services/pipeline-executor';
import { ProgressTrackerService } from '../services/progress-tracker';
import { TransientProviderError } from '../ai/errors';
import type { ImageGenerationRequest, ImageResult } from '../ai/interfaces';
import { AlreadyInProgressError, InvalidStateError } from '../shared/errors';
import {
  FakeCatalog,
  MemoryStorage,
  RecordingChannel,
  StubImageProcessor,
  fakeGateway,
  fakeSynthesizer,
  makePage,
  makeSettings,
} from './helpers/fixtures';

const NOW = new Date('2026-01-01T00:00:00Z');

describe('visualization workflow', () => {
  let repository: InMemoryJobRepository;
  let catalog: FakeCatalog;
  let channel: RecordingChannel;
  let storage: MemoryStorage;
  let orchestrator: VisualizationOrchestrator;

  beforeEach(() => {
    repository = new InMemoryJobRepository();
    catalog = new FakeCatalog();
    for (let n = 1; n <= 5; n++) {
      catalog.addPage(makePage({ id: `page-${n}`, pageNumber: n, isVisualizationPoint: true }));
    }
    catalog.settings.set('book-1', makeSettings({ mode: 'author_defined' }));
    channel = new RecordingChannel();
    storage = new MemoryStorage();
    orchestrator = new VisualizationOrchestrator(
      {
        repository,
        catalog,
        notifications: channel,
        storage,
        progress: new ProgressTrackerService('dalle3'),
        now: () => NOW,
      },
      { maxRetries: 3, workerConcurrency: 1 },
    );
  });

  function executorWith(generate?: (request: ImageGenerationRequest) => Promise<ImageResult>) {
    return new PipelineExecutor(
      {
        repository,
        catalog,
        promptSynthesizer: fakeSynthesizer().synthesizer,
        gateway: fakeGateway(generate).gateway,
        storage,
        notifications: channel,
        imageProcessor: new StubImageProcessor(),
        now: () => NOW,
      },
      {
        maxRetries: 3,
        autoRetryTransient: false,
        retryBaseDelayMs: 1000,
        retryMaxDelayMs: 60000,
        thumbnailWidth: 320,
        retryJitterMs: 0,
      },
    );
  }

  async function claim() {
    const job = await repository.claimNext('worker-1', NOW);
    if (!job) {
      throw new Error('nothing to claim');
    }
    return job;
  }

  it('takes a page request through to one selected image', async () => {
    const created = await orchestrator.requestPageVisualization({ bookId: 'book-1', pageId: 'page-1', userId: 'u' });

    expect(await executorWith().execute(await claim())).toBe('completed');

    const job = await orchestrator.getJob(created.id);
    expect(job.status).toBe('completed');
    expect(job.images).toHaveLength(1);
    expect(job.selectedImageId).toBe(job.images[0]?.id);
    expect(channel.statuses()).toEqual(['pending', 'queued', 'generating_prompt', 'processing', 'uploading', 'completed']);
  });

  it('refuses a second request for a page with a job in flight', async () => {
    const first = await orchestrator.requestPageVisualization({ bookId: 'book-1', pageId: 'page-1', userId: 'u' });
    await claim();

    await expect(
      orchestrator.requestPageVisualization({ bookId: 'book-1', pageId: 'page-1', userId: 'other' }),
    ).rejects.toEqual(new AlreadyInProgressError('Page page-1 already has a visualization in progress', first.id));
  });

  it('leaves a timed-out job failed and retryable', async () => {
    const created = await orchestrator.requestPageVisualization({ bookId: 'book-1', pageId: 'page-1', userId: 'u' });
    const executor = executorWith(async () => {
      throw new TransientProviderError('dalle3', 'Request timed out after 60000ms');
    });

    expect(await executor.execute(await claim())).toBe('failed');

    const status = await orchestrator.getJobStatus(created.id);
    expect(status.status).toBe('failed');
    expect(status.errorMessage).toBe('[dalle3] Request timed out after 60000ms');
    expect(status.canRetry).toBe(true);
  });

  it('creates jobs only for visualization points without one in flight', async () => {
    const busy = [
      await orchestrator.requestPageVisualization({ bookId: 'book-1', pageId: 'page-2', userId: 'u' }),
      await orchestrator.requestPageVisualization({ bookId: 'book-1', pageId: 'page-4', userId: 'u' }),
    ];

    const result = await orchestrator.startAutoNovelGeneration({ bookId: 'book-1', userId: 'u' });

    expect(result.jobs.map((job) => job.pageId)).toEqual(['page-1', 'page-3', 'page-5']);
    expect(result.skipped).toEqual([
      { pageId: 'page-2', reason: 'already_in_progress', jobId: busy[0]?.id },
      { pageId: 'page-4', reason: 'already_in_progress', jobId: busy[1]?.id },
    ]);
    expect(result.alreadyVisualized).toBe(0);
  });

  it('does not let a cancel interrupt a job that is generating', async () => {
    const created = await orchestrator.requestPageVisualization({ bookId: 'book-1', pageId: 'page-1', userId: 'u' });
    let cancelAttempt: Promise<unknown> = Promise.resolve();
    const { gateway } = fakeGateway();
    const executor = executorWith(async (request) => {
      cancelAttempt = orchestrator.cancelJob(created.id, 'u', 'too slow');
      await cancelAttempt.catch(() => undefined);
      return gateway.generate(request);
    });

    expect(await executor.execute(await claim())).toBe('completed');
    await expect(cancelAttempt).rejects.toEqual(
      new InvalidStateError(`Job ${created.id} cannot be cancelled while processing`),
    );
    expect((await orchestrator.getJob(created.id)).status).toBe('completed');
  });
});
