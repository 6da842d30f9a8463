/**
 * Storage Service
 * Handles image uploads to Google Cloud Storage
 */

import { Storage } from '@google-cloud/storage';
import { googleCloudConfig } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { handleGCSError } from '@/utils/errorHandling.js';
import type { IImageStorage } from '@/shared/interfaces.js';

export interface StorageServiceOptions {
  projectId?: string;
  bucketName?: string;
  /** Injected client, used by tests. */
  storage?: Storage;
}

export class StorageService implements IImageStorage {
  private storage: Storage;
  private bucketName: string;

  constructor(options: StorageServiceOptions = {}) {
    const gcs = googleCloudConfig.get();
    const projectId = options.projectId ?? gcs.projectId;
    this.storage = options.storage ?? new Storage(projectId ? { projectId } : {});
    this.bucketName = options.bucketName ?? gcs.storageBucket;

    logger.info('Storage Service initialized', {
      projectId,
      bucketName: this.bucketName,
    });
  }

  /**
   * Upload a file and return its public URL
   */
  async uploadFile(filename: string, buffer: Buffer, contentType: string): Promise<string> {
    try {
      const file = this.storage.bucket(this.bucketName).file(filename);

      logger.debug('Uploading file to GCS', {
        filename,
        size: buffer.length,
        contentType,
      });
      // Public read access is granted at bucket level (uniform bucket-level access)
      await file.save(buffer, {
        metadata: {
          contentType,
          cacheControl: 'public, max-age=31536000',
        },
        resumable: false,
      });

      const publicUrl = this.getPublicUrl(filename);
      logger.info('File uploaded successfully', {
        filename,
        publicUrl,
        size: buffer.length,
      });

      return publicUrl;
    } catch (error) {
      const errorDetails = handleGCSError(error, {
        filename,
        size: buffer.length,
        contentType,
        bucketName: this.bucketName,
        operation: 'uploadFile',
      });

      logger.error('Failed to upload file', errorDetails);
      throw error;
    }
  }

  getPublicUrl(filename: string): string {
    return `https://storage.googleapis.com/${this.bucketName}/${filename}`;
  }

  /**
   * Delete a file; a file that is already gone counts as deleted
   */
  async deleteFile(filename: string): Promise<void> {
    try {
      await this.storage.bucket(this.bucketName).file(filename).delete({ ignoreNotFound: true });
      logger.info('File deleted successfully', { filename });
    } catch (error) {
      const errorDetails = handleGCSError(error, {
        filename,
        bucketName: this.bucketName,
        operation: 'deleteFile',
      });

      logger.error('Failed to delete file', errorDetails);
      throw error;
    }
  }
}
