import { describe, it, expect, jest } from '@jest/globals';

jest.mock('@/config/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  },
}));

import { PgDialect } from 'drizzle-orm/pg-core';
import { sql, type SQL } from 'drizzle-orm';
import {
  DrizzleVisualizationJobRepository,
  toVisualizationJob,
} from '../adapters/database/visualization-job-repository';
import type { Database } from '../db/connection';
import type { SelectGeneratedImage, SelectVisualizationJob } from '../db/schema';
import { AlreadyInProgressError, InvalidTransitionError } from '../shared/errors';
import { defaultParameters } from '../services/visualization-job';
import { makeNewJob } from './helpers/fixtures';

const created = new Date('2026-01-01T00:00:00Z');

function jobRow(overrides: Partial<SelectVisualizationJob> = {}): SelectVisualizationJob {
  return {
    jobId: 'job-1',
    bookId: 'book-1',
    pageId: 'page-1',
    chapterId: null,
    trigger: 'page_request',
    userId: 'user-1',
    status: 'completed',
    preferredProvider: 'flux',
    priority: 10,
    promptData: null,
    textSelection: null,
    parameters: defaultParameters(),
    errorMessage: null,
    errorCategory: null,
    retryCount: 0,
    retriedAfterRejection: false,
    regeneratedFromJobId: null,
    claimedBy: null,
    claimedAt: null,
    availableAt: created,
    selectedImageId: 'img-b',
    processingStartedAt: null,
    completedAt: null,
    createdAt: created,
    updatedAt: created,
    ...overrides,
  };
}

function imageRow(imageId: string, position: number): SelectGeneratedImage {
  return {
    imageId,
    jobId: 'job-1',
    url: `https://storage.test/${imageId}.png`,
    thumbnailUrl: null,
    storagePath: `visualizations/book-1/job-1/${imageId}.png`,
    width: 512,
    height: 512,
    fileSizeBytes: 100,
    format: 'png',
    mimeType: 'image/png',
    provider: 'flux',
    revisedPrompt: null,
    isSelected: imageId === 'img-b',
    isDeleted: false,
    position,
    generatedAt: created,
  };
}

/**
 * Just enough of the drizzle query builder for the insert and select chains used by `create`.
 */
function fakeDatabase(options: { insertError?: unknown; activeRows?: SelectVisualizationJob[] }) {
  const returning = jest.fn(async () => {
    if (options.insertError) {
      throw options.insertError;
    }
    return [jobRow({ status: 'pending' })];
  });
  const limit = jest.fn(async () => options.activeRows ?? []);
  const db = {
    insert: jest.fn(() => ({ values: jest.fn(() => ({ returning })) })),
    select: jest.fn(() => ({ from: jest.fn(() => ({ where: jest.fn(() => ({ limit })) })) })),
    update: jest.fn(),
  };
  return { db: db as unknown as Database, insert: db.insert, update: db.update };
}

describe('DrizzleVisualizationJobRepository', () => {
  it('maps rows to jobs with images in position order', () => {
    const job = toVisualizationJob(jobRow(), [imageRow('img-b', 1), imageRow('img-a', 0)]);
    expect(job.id).toBe('job-1');
    expect(job.preferredProvider).toBe('flux');
    expect(job.images.map((image) => image.id)).toEqual(['img-a', 'img-b']);
    expect(job.images[1]?.isSelected).toBe(true);
    expect(job.selectedImageId).toBe('img-b');
  });

  it('returns the inserted job', async () => {
    const { db, insert } = fakeDatabase({});
    const repository = new DrizzleVisualizationJobRepository(db);
    const job = await repository.create(makeNewJob());
    expect(insert).toHaveBeenCalledTimes(1);
    expect(job.status).toBe('pending');
    expect(job.images).toEqual([]);
  });

  it('turns a unique violation into AlreadyInProgressError naming the blocking job', async () => {
    const violation = Object.assign(new Error('duplicate key value'), { code: '23505' });
    const { db } = fakeDatabase({
      insertError: new Error('insert failed', { cause: violation }),
      activeRows: [jobRow({ jobId: 'job-active', status: 'processing' })],
    });
    const repository = new DrizzleVisualizationJobRepository(db);

    const attempt = repository.create(makeNewJob());
    await expect(attempt).rejects.toBeInstanceOf(AlreadyInProgressError);
    await expect(attempt).rejects.toMatchObject({ existingJobId: 'job-active' });
  });

  it('rethrows other insert errors', async () => {
    const { db } = fakeDatabase({ insertError: new Error('connection refused') });
    const repository = new DrizzleVisualizationJobRepository(db);
    await expect(repository.create(makeNewJob())).rejects.toThrow('connection refused');
  });

  it('checks the edge before touching the database', async () => {
    const { db, update } = fakeDatabase({});
    const repository = new DrizzleVisualizationJobRepository(db);
    await expect(
      repository.transition('job-1', 'completed', { status: 'pending' }),
    ).rejects.toBeInstanceOf(InvalidTransitionError);
    expect(update).not.toHaveBeenCalled();
  });

  it('fails stale jobs in every in-flight status', async () => {
    const conditions: SQL[] = [];
    const returning = jest.fn(async () => [
      jobRow({ jobId: 'job-stale', status: 'failed', errorCategory: 'transient', errorMessage: 'worker gone' }),
    ]);
    const update = jest.fn(() => ({
      set: jest.fn(() => ({
        where: jest.fn((where: SQL) => {
          conditions.push(where);
          return { returning };
        }),
      })),
    }));
    const repository = new DrizzleVisualizationJobRepository({ update } as unknown as Database);

    const stale = await repository.failStaleClaims(new Date('2026-01-01T00:05:00Z'), 'worker gone');

    expect(stale.map((job) => [job.id, job.status])).toEqual([['job-stale', 'failed']]);
    expect(conditions).toHaveLength(1);
    const query = new PgDialect().sqlToQuery(conditions[0] ?? sql``);
    expect(query.params.slice(0, 4)).toEqual(['queued', 'generating_prompt', 'processing', 'uploading']);
    expect(query.params).toHaveLength(5);
  });
});
