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
import { PipelineExecutor, type PipelineExecutorConfig } from '../services/pipeline-executor';
import { PermanentProviderError, TransientProviderError } from '../ai/errors';
import { normalizeTextSelection } from '../services/visualization-job';
import type { VisualizationJob } from '../types/visualization';
import {
  FakeCatalog,
  MemoryStorage,
  RecordingChannel,
  StubImageProcessor,
  fakeGateway,
  fakeSynthesizer,
  makeNewJob,
  makePage,
  makeSettings,
} from './helpers/fixtures';

const NOW = new Date('2026-01-01T00:10:00Z');

const baseConfig: PipelineExecutorConfig = {
  maxRetries: 3,
  autoRetryTransient: true,
  retryBaseDelayMs: 1000,
  retryMaxDelayMs: 60000,
  retryJitterMs: 0,
  thumbnailWidth: 320,
};

describe('PipelineExecutor', () => {
  let repository: InMemoryJobRepository;
  let catalog: FakeCatalog;
  let storage: MemoryStorage;
  let channel: RecordingChannel;

  beforeEach(() => {
    repository = new InMemoryJobRepository();
    catalog = new FakeCatalog().addPage(makePage());
    storage = new MemoryStorage();
    channel = new RecordingChannel();
  });

  function build(
    overrides: {
      synthesizer?: ReturnType<typeof fakeSynthesizer>;
      gateway?: ReturnType<typeof fakeGateway>;
      config?: Partial<PipelineExecutorConfig>;
      imageProcessor?: StubImageProcessor;
    } = {},
  ) {
    const synthesizer = overrides.synthesizer ?? fakeSynthesizer();
    const gateway = overrides.gateway ?? fakeGateway();
    const executor = new PipelineExecutor(
      {
        repository,
        catalog,
        promptSynthesizer: synthesizer.synthesizer,
        gateway: gateway.gateway,
        storage,
        notifications: channel,
        imageProcessor: overrides.imageProcessor ?? new StubImageProcessor(),
        now: () => NOW,
      },
      { ...baseConfig, ...overrides.config },
    );
    return { executor, synthesizer, gateway };
  }

  async function claimed(overrides: Parameters<typeof makeNewJob>[0] = {}): Promise<VisualizationJob> {
    await repository.create(makeNewJob(overrides));
    const job = await repository.claimNext('worker-1', NOW);
    if (!job) {
      throw new Error('nothing to claim');
    }
    return job;
  }

  it('runs a page job through every stage', async () => {
    const { executor, synthesizer, gateway } = build();
    const job = await claimed();

    expect(await executor.execute(job)).toBe('completed');

    const stored = await repository.findById(job.id);
    expect(stored?.status).toBe('completed');
    expect(stored?.completedAt).toEqual(NOW);
    expect(stored?.processingStartedAt).toEqual(NOW);
    expect(stored?.promptData).toEqual({
      originalText: 'The lighthouse keeper climbed the spiral stairs at dusk.',
      enhancedPrompt: 'Illustration: The lighthouse keeper climbed the spiral stairs at dusk.',
      negativePrompt: null,
      style: null,
      targetModel: 'dalle3',
    });

    const image = stored?.images[0];
    expect(stored?.images).toHaveLength(1);
    expect(stored?.selectedImageId).toBe(image?.id);
    expect(image?.storagePath).toBe(`visualizations/book-1/${job.id}/${image?.id}.png`);
    expect(image?.url).toBe(`https://storage.test/visualizations/book-1/${job.id}/${image?.id}.png`);
    expect(image?.thumbnailUrl).toBe(`https://storage.test/visualizations/book-1/${job.id}/${image?.id}_thumb.jpg`);
    expect(image?.provider).toBe('dalle3');
    expect(storage.files.get(`visualizations/book-1/${job.id}/${image?.id}_thumb.jpg`)?.contentType).toBe('image/jpeg');

    expect(synthesizer.enhance).toHaveBeenCalledWith({
      sourceText: 'The lighthouse keeper climbed the spiral stairs at dusk.',
      style: null,
      targetModel: 'dalle3',
      bookId: 'book-1',
      pageId: 'page-1',
      chapterId: 'chapter-1',
    });
    expect(gateway.generate.mock.calls[0]?.[0].provider).toBe('dalle3');

    expect(channel.statuses()).toEqual(['queued', 'generating_prompt', 'processing', 'uploading', 'completed']);
    expect(channel.events.map((e) => e.progressPercent)).toEqual([5, 10, 30, 80, 100]);
    expect(channel.events[4]?.imageUrl).toBe(image?.url);

    expect(catalog.updates).toEqual([
      {
        bookId: 'book-1',
        chapterId: 'chapter-1',
        pageId: 'page-1',
        imageUrl: image?.url,
        thumbnailUrl: image?.thumbnailUrl,
        jobId: job.id,
      },
    ]);
  });

  it('uses the preferred provider and the book style', async () => {
    catalog.settings.set('book-1', makeSettings({ preferredStyle: 'watercolor' }));
    const { executor, synthesizer, gateway } = build();
    const job = await claimed({ preferredProvider: 'stable-diffusion' });

    await executor.execute(job);

    expect(synthesizer.enhance.mock.calls[0]?.[0]).toMatchObject({
      style: 'watercolor',
      targetModel: 'stable-diffusion',
    });
    expect(gateway.generate.mock.calls[0]?.[0].provider).toBe('stable-diffusion');
  });

  it('builds the prompt from the selection and its context', async () => {
    const { executor, synthesizer } = build();
    const job = await claimed({
      trigger: 'text_selection_request',
      textSelection: normalizeTextSelection({
        pageId: 'page-1',
        selectedText: 'a silver owl on the rail',
        startOffset: 10,
        endOffset: 34,
        contextBefore: 'Above the sea, ',
        contextAfter: ' watched him.',
      }),
    });
    catalog.failPageReads = true;

    expect(await executor.execute(job)).toBe('completed');
    expect(synthesizer.enhance.mock.calls[0]?.[0].sourceText).toBe(
      'Above the sea, a silver owl on the rail watched him.',
    );
    expect(catalog.updates).toEqual([]);
  });

  it('claims a pending job it is handed directly', async () => {
    const { executor } = build();
    const job = await repository.create(makeNewJob());
    expect(await executor.execute(job)).toBe('completed');
  });

  it('skips a job cancelled between claim and start', async () => {
    const { executor, synthesizer } = build();
    const job = await claimed();
    await repository.transition(job.id, 'queued', { status: 'cancelled' });

    expect(await executor.execute(job)).toBe('skipped');
    expect(synthesizer.enhance).not.toHaveBeenCalled();
    expect(channel.events).toEqual([]);
    expect((await repository.findById(job.id))?.status).toBe('cancelled');
  });

  it('schedules an automatic retry after a prompt failure', async () => {
    const synthesizer = fakeSynthesizer(async () => {
      throw new Error('service down');
    });
    const { executor, gateway } = build({ synthesizer });
    const job = await claimed();

    expect(await executor.execute(job)).toBe('retry_scheduled');

    const stored = await repository.findById(job.id);
    expect(stored?.status).toBe('pending');
    expect(stored?.retryCount).toBe(1);
    expect(stored?.availableAt).toEqual(new Date(NOW.getTime() + 1000));
    expect(stored?.errorCategory).toBe('prompt');
    expect(stored?.errorMessage).toBe('Prompt generation failed: service down');
    expect(stored?.claimedBy).toBeNull();
    expect(gateway.generate).not.toHaveBeenCalled();

    expect(channel.statuses()).toEqual(['queued', 'generating_prompt', 'failed', 'pending']);
    expect(channel.events[2]?.progressPercent).toBe(10);
    expect(channel.events[2]?.errorMessage).toBe('Prompt generation failed: service down');
    expect(channel.events[3]?.message).toBe('Retry 1 of 3 scheduled');
  });

  it('backs off exponentially on later attempts', async () => {
    const gateway = fakeGateway(async () => {
      throw new TransientProviderError('dalle3', 'rate limited', 429);
    });
    const { executor } = build({ gateway });
    const job = await claimed({ retryCount: 2 });

    expect(await executor.execute(job)).toBe('retry_scheduled');
    const stored = await repository.findById(job.id);
    expect(stored?.retryCount).toBe(3);
    expect(stored?.availableAt).toEqual(new Date(NOW.getTime() + 4000));
    expect(stored?.errorMessage).toBe('[dalle3] rate limited');
  });

  it('stops retrying at the limit', async () => {
    const gateway = fakeGateway(async () => {
      throw new TransientProviderError('dalle3', 'timeout');
    });
    const { executor } = build({ gateway });
    const job = await claimed({ retryCount: 3 });

    expect(await executor.execute(job)).toBe('failed');
    expect((await repository.findById(job.id))?.status).toBe('failed');
  });

  it('does not retry automatically when disabled', async () => {
    const gateway = fakeGateway(async () => {
      throw new TransientProviderError('dalle3', 'timeout');
    });
    const { executor } = build({ gateway, config: { autoRetryTransient: false } });
    expect(await executor.execute(await claimed())).toBe('failed');
  });

  it('records a permanent provider rejection without retrying', async () => {
    const gateway = fakeGateway(async () => {
      throw new PermanentProviderError('dalle3', 'invalid size', 400);
    });
    const { executor } = build({ gateway });
    const job = await claimed();

    expect(await executor.execute(job)).toBe('failed');

    const stored = await repository.findById(job.id);
    expect(stored?.status).toBe('failed');
    expect(stored?.errorCategory).toBe('permanent');
    expect(stored?.errorMessage).toBe('[dalle3] invalid size');
    expect(stored?.retryCount).toBe(0);
    expect(channel.events.at(-1)?.progressPercent).toBe(30);
  });

  it('treats an unclassified generation error as transient', async () => {
    const gateway = fakeGateway(async () => {
      throw new Error('socket hang up');
    });
    const { executor } = build({ gateway });
    const job = await claimed();

    expect(await executor.execute(job)).toBe('retry_scheduled');
    expect((await repository.findById(job.id))?.errorCategory).toBe('transient');
  });

  it('fails a page without text as an internal error', async () => {
    catalog.pages.set('page-1', makePage({ content: '   ' }));
    const { executor } = build();
    const job = await claimed();

    expect(await executor.execute(job)).toBe('failed');
    const stored = await repository.findById(job.id);
    expect(stored?.errorCategory).toBe('internal');
    expect(stored?.errorMessage).toBe('Page page-1 has no text to visualize');
  });

  it('retries when the catalog cannot be reached', async () => {
    catalog.failPageReads = true;
    const { executor } = build();
    const job = await claimed();

    expect(await executor.execute(job)).toBe('retry_scheduled');
    expect((await repository.findById(job.id))?.errorMessage).toBe('Catalog unavailable: catalog down');
  });

  it('retries a failed upload', async () => {
    storage.failUploads = true;
    const { executor } = build();
    const job = await claimed();

    expect(await executor.execute(job)).toBe('retry_scheduled');
    const stored = await repository.findById(job.id);
    expect(stored?.errorMessage).toBe('Upload failed: bucket unavailable');
    expect(stored?.images).toEqual([]);
  });

  it('completes without a thumbnail when none can be rendered', async () => {
    const { executor } = build({ imageProcessor: new StubImageProcessor(null, null) });
    const job = await claimed();

    expect(await executor.execute(job)).toBe('completed');
    const image = (await repository.findById(job.id))?.images[0];
    expect(image?.thumbnailUrl).toBeNull();
    expect(image?.width).toBe(1024);
    expect(storage.files.size).toBe(1);
  });

  it('keeps the job completed when the catalog write-back fails', async () => {
    jest.spyOn(catalog, 'setPageVisualization').mockRejectedValue(new Error('catalog down'));
    const { executor } = build();
    const job = await claimed();

    expect(await executor.execute(job)).toBe('completed');
    expect((await repository.findById(job.id))?.status).toBe('completed');
  });

  it('applies the retry policy to a job failed elsewhere', async () => {
    const { executor } = build();
    const job = await claimed();
    const [stale] = await repository.failStaleClaims(new Date(NOW.getTime() + 1), 'worker gone');
    if (!stale) {
      throw new Error('expected a stale job');
    }

    expect(await executor.handleFailedJob(stale)).toBe('retry_scheduled');
    const stored = await repository.findById(job.id);
    expect(stored?.status).toBe('pending');
    expect(stored?.retryCount).toBe(1);
  });
});
