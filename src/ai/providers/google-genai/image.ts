/**
 * Google Imagen Image Generation Service
 */

import { GoogleGenAI } from '@google/genai';
import type { IImageGenerationService, ImageGenerationOptions, ProviderImage } from '../../interfaces.js';
import { ImageGenerationBlockedError } from '@/ai/errors.js';
import { sniffFormat } from '@/utils/imageUtils.js';
import { logger } from '@/config/logger.js';

export interface GoogleGenAIImageConfig {
  apiKey: string;
  model?: string;
}

const SUPPORTED_ASPECT_RATIOS = ['1:1', '3:4', '4:3', '9:16', '16:9'];

export class GoogleGenAIImageService implements IImageGenerationService {
  private client: GoogleGenAI;
  private model: string;

  constructor(config: GoogleGenAIImageConfig) {
    this.client = new GoogleGenAI({ apiKey: config.apiKey });
    this.model = config.model || 'imagen-3.0-generate-002';
  }

  async generate(prompt: string, options: ImageGenerationOptions): Promise<ProviderImage> {
    const aspectRatio = SUPPORTED_ASPECT_RATIOS.includes(options.parameters.aspectRatio)
      ? options.parameters.aspectRatio
      : '1:1';

    try {
      const response = await this.client.models.generateImages({
        model: this.model,
        prompt,
        config: {
          numberOfImages: 1,
          aspectRatio,
          includeRaiReason: true,
          abortSignal: options.signal,
        },
      });

      const generated = response.generatedImages?.[0];
      if (generated?.raiFilteredReason) {
        throw new ImageGenerationBlockedError({
          provider: 'imagen',
          finishReasons: [generated.raiFilteredReason],
        });
      }

      const imageBytes = generated?.image?.imageBytes;
      if (!imageBytes) {
        throw new Error('No image returned from Google Imagen');
      }

      const buffer = Buffer.from(imageBytes, 'base64');
      logger.info('Google Imagen: image generated', {
        model: this.model,
        promptLength: prompt.length,
        imageSize: buffer.length,
      });

      const format = sniffFormat(buffer);
      return {
        buffer,
        ...(format && { format }),
        ...(generated?.enhancedPrompt ? { revisedPrompt: generated.enhancedPrompt } : {}),
      };
    } catch (error) {
      logger.error('Google Imagen image generation failed', {
        error: error instanceof Error ? error.message : String(error),
        model: this.model,
        promptLength: prompt.length,
      });
      throw error;
    }
  }
}
