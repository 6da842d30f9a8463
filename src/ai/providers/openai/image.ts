/**
 * OpenAI Image Generation Service (DALL-E 3 through the Images API)
 */

import OpenAI from 'openai';
import type { IImageGenerationService, ImageGenerationOptions, ProviderImage } from '../../interfaces.js';
import { ImageGenerationBlockedError } from '../../errors.js';
import { parseSize } from '@/utils/imageUtils.js';
import { logger } from '@/config/logger.js';

export interface OpenAIConfig {
  apiKey: string;
  model?: string;
  baseURL?: string;
}

type DalleSize = '1024x1024' | '1792x1024' | '1024x1792';

const SIZE_BY_ASPECT: Record<string, DalleSize> = {
  '1:1': '1024x1024',
  '16:9': '1792x1024',
  '3:2': '1792x1024',
  '4:3': '1792x1024',
  '9:16': '1024x1792',
  '2:3': '1024x1792',
  '3:4': '1024x1792',
};

function isDalleSize(size: string): size is DalleSize {
  return size === '1024x1024' || size === '1792x1024' || size === '1024x1792';
}

export class OpenAIImageService implements IImageGenerationService {
  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseURL && { baseURL: config.baseURL }),
      maxRetries: 0,
    });
    this.model = config.model || 'dall-e-3';
  }

  async generate(prompt: string, options: ImageGenerationOptions): Promise<ProviderImage> {
    const { parameters } = options;
    const size = isDalleSize(parameters.size)
      ? parameters.size
      : (SIZE_BY_ASPECT[parameters.aspectRatio] ?? '1024x1024');
    const quality = parameters.quality === 'hd' ? 'hd' : 'standard';
    const style = parameters.style === 'natural' ? 'natural' : 'vivid';

    logger.info('OpenAI: Generating image', {
      model: this.model,
      promptLength: prompt.length,
      size,
      quality,
    });

    try {
      const response = await this.client.images.generate(
        {
          model: this.model,
          prompt,
          n: 1,
          size,
          quality,
          style,
          response_format: 'b64_json',
        },
        { signal: options.signal },
      );

      const image = response.data?.[0];
      if (!image?.b64_json) {
        throw new Error('No image data returned from OpenAI');
      }

      const { width, height } = parseSize(size);
      return {
        buffer: Buffer.from(image.b64_json, 'base64'),
        format: 'png',
        width,
        height,
        ...(image.revised_prompt ? { revisedPrompt: image.revised_prompt } : {}),
      };
    } catch (error) {
      if (error instanceof OpenAI.APIError && error.code === 'content_policy_violation') {
        throw new ImageGenerationBlockedError({
          provider: 'dalle3',
          finishReasons: ['content_policy_violation'],
          message: error.message,
        });
      }
      logger.error('OpenAI image generation failed', {
        error: error instanceof Error ? error.message : String(error),
        promptLength: prompt.length,
      });
      throw error;
    }
  }
}
