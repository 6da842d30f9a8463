/**
 * Stability AI Image Generation Service
 */

import { z } from 'zod';
import type { IImageGenerationService, ImageGenerationOptions, ProviderImage } from '../../interfaces.js';
import { ImageGenerationBlockedError, ProviderHttpError } from '../../errors.js';
import { parseSize } from '@/utils/imageUtils.js';
import { logger } from '@/config/logger.js';

export interface StabilityImageConfig {
  apiKey: string;
  model?: string;
  baseURL?: string;
}

const responseSchema = z.object({
  artifacts: z
    .array(
      z.object({
        base64: z.string().optional(),
        finishReason: z.string().optional(),
        seed: z.number().optional(),
      }),
    )
    .default([]),
});

export class StabilityImageService implements IImageGenerationService {
  private apiKey: string;
  private model: string;
  private baseURL: string;

  constructor(config: StabilityImageConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model || 'stable-diffusion-xl-1024-v1-0';
    this.baseURL = config.baseURL || 'https://api.stability.ai/v1';

    logger.info('Stability AI Image Service initialized', {
      model: this.model,
      baseURL: this.baseURL,
    });
  }

  async generate(prompt: string, options: ImageGenerationOptions): Promise<ProviderImage> {
    const { parameters } = options;
    const { width, height } = parseSize(parameters.size);
    const textPrompts = [{ text: prompt, weight: 1 }];
    if (options.negativePrompt) {
      textPrompts.push({ text: options.negativePrompt, weight: -1 });
    }

    try {
      const response = await fetch(`${this.baseURL}/generation/${this.model}/text-to-image`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify({
          text_prompts: textPrompts,
          width,
          height,
          steps: parameters.steps ?? 30,
          cfg_scale: parameters.cfgScale ?? 7,
          samples: 1,
          ...(parameters.seed !== undefined && { seed: parameters.seed }),
          ...(parameters.sampler && { sampler: parameters.sampler }),
          ...(parameters.style && { style_preset: parameters.style }),
        }),
        signal: options.signal,
      });

      if (!response.ok) {
        throw new ProviderHttpError('Stability AI', response.status, await response.text());
      }

      const data = responseSchema.parse(await response.json());
      const artifact = data.artifacts[0];

      if (artifact?.finishReason === 'CONTENT_FILTERED') {
        throw new ImageGenerationBlockedError({
          provider: 'stable-diffusion',
          finishReasons: ['CONTENT_FILTERED'],
        });
      }
      if (!artifact?.base64) {
        throw new Error('No image generated from Stability AI');
      }

      const buffer = Buffer.from(artifact.base64, 'base64');

      logger.debug('Stability AI image generation completed', {
        promptLength: prompt.length,
        imageSize: buffer.length,
      });

      return { buffer, width, height, format: 'png' };
    } catch (error) {
      logger.error('Stability AI image generation failed', {
        error: error instanceof Error ? error.message : String(error),
        promptLength: prompt.length,
      });
      throw error;
    }
  }
}
