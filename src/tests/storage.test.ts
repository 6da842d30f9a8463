import { describe, it, expect, jest, beforeEach } from '@jest/globals';

jest.mock('@/config/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  },
}));

import type { Storage } from '@google-cloud/storage';
import { StorageService } from '../services/storage';

describe('StorageService', () => {
  const save = jest.fn<(buffer: Buffer, options: object) => Promise<void>>();
  const remove = jest.fn<(options: object) => Promise<void>>();
  const file = jest.fn((name: string) => ({ name, save, delete: remove }));
  const bucket = jest.fn((name: string) => ({ name, file }));
  let service: StorageService;

  beforeEach(() => {
    save.mockResolvedValue(undefined);
    remove.mockResolvedValue(undefined);
    const storage = { bucket } as unknown as Storage;
    service = new StorageService({ bucketName: 'test-bucket', storage });
  });

  it('uploads with a long cache lifetime and returns the public url', async () => {
    const url = await service.uploadFile('visualizations/book-1/job-1/img.png', Buffer.from('png'), 'image/png');

    expect(url).toBe('https://storage.googleapis.com/test-bucket/visualizations/book-1/job-1/img.png');
    expect(bucket).toHaveBeenCalledWith('test-bucket');
    expect(file).toHaveBeenCalledWith('visualizations/book-1/job-1/img.png');
    expect(save).toHaveBeenCalledWith(Buffer.from('png'), {
      metadata: { contentType: 'image/png', cacheControl: 'public, max-age=31536000' },
      resumable: false,
    });
  });

  it('rethrows upload failures', async () => {
    save.mockRejectedValue(new Error('permission denied'));
    await expect(service.uploadFile('a.png', Buffer.from('x'), 'image/png')).rejects.toThrow('permission denied');
  });

  it('deletes ignoring missing files', async () => {
    await service.deleteFile('a.png');
    expect(remove).toHaveBeenCalledWith({ ignoreNotFound: true });
  });

  it('rethrows delete failures', async () => {
    remove.mockRejectedValue(new Error('quota exceeded'));
    await expect(service.deleteFile('a.png')).rejects.toThrow('quota exceeded');
  });
});
