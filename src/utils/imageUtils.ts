/**
 * Image Utilities
 * Size parsing, format detection and sharp-based inspection / thumbnails
 */

import sharp from 'sharp';
import type { ImageFormat } from '@/types/visualization.js';
import { logger } from '@/config/logger.js';

const DEFAULT_SIZE = { width: 1024, height: 1024 };

const MIME_TYPES: Record<ImageFormat, string> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
};

const EXTENSIONS: Record<ImageFormat, string> = {
  png: 'png',
  jpeg: 'jpg',
  webp: 'webp',
};

/**
 * Parse a "WIDTHxHEIGHT" size string, falling back to 1024x1024
 */
export function parseSize(size: string): { width: number; height: number } {
  const match = /^(\d+)x(\d+)$/.exec(size.trim());
  if (!match?.[1] || !match[2]) {
    return { ...DEFAULT_SIZE };
  }
  const width = parseInt(match[1], 10);
  const height = parseInt(match[2], 10);
  return width > 0 && height > 0 ? { width, height } : { ...DEFAULT_SIZE };
}

/**
 * Detect the image format from its magic bytes
 */
export function sniffFormat(buffer: Buffer): ImageFormat | null {
  if (buffer.length >= 8 && buffer.readUInt32BE(0) === 0x89504e47) {
    return 'png';
  }
  if (buffer.length >= 3 && buffer[0] === 0xff && buffer[1] === 0xd8 && buffer[2] === 0xff) {
    return 'jpeg';
  }
  if (
    buffer.length >= 12 &&
    buffer.toString('ascii', 0, 4) === 'RIFF' &&
    buffer.toString('ascii', 8, 12) === 'WEBP'
  ) {
    return 'webp';
  }
  return null;
}

export function mimeTypeFor(format: ImageFormat): string {
  return MIME_TYPES[format];
}

export function extensionFor(format: ImageFormat): string {
  return EXTENSIONS[format];
}

export interface ImageInfo {
  width: number;
  height: number;
  format: ImageFormat | null;
}

export interface ImageProcessor {
  inspect(buffer: Buffer): Promise<ImageInfo | null>;
  thumbnail(buffer: Buffer, width: number): Promise<Buffer | null>;
}

function toImageFormat(format: string | undefined): ImageFormat | null {
  switch (format) {
    case 'png':
      return 'png';
    case 'jpeg':
    case 'jpg':
      return 'jpeg';
    case 'webp':
      return 'webp';
    default:
      return null;
  }
}

/**
 * sharp-backed processor. Decoding problems are logged and reported as null so the
 * caller can keep the provider-reported values.
 */
export class SharpImageProcessor implements ImageProcessor {
  async inspect(buffer: Buffer): Promise<ImageInfo | null> {
    try {
      const metadata = await sharp(buffer).metadata();
      if (!metadata.width || !metadata.height) {
        return null;
      }
      return {
        width: metadata.width,
        height: metadata.height,
        format: toImageFormat(metadata.format),
      };
    } catch (error) {
      logger.warn('Failed to read image metadata', {
        error: error instanceof Error ? error.message : String(error),
        size: buffer.length,
      });
      return null;
    }
  }

  async thumbnail(buffer: Buffer, width: number): Promise<Buffer | null> {
    try {
      return await sharp(buffer)
        .resize({ width, withoutEnlargement: true })
        .jpeg({ quality: 80 })
        .toBuffer();
    } catch (error) {
      logger.warn('Failed to render thumbnail', {
        error: error instanceof Error ? error.message : String(error),
        size: buffer.length,
      });
      return null;
    }
  }
}
