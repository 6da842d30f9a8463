/**
 * AI Gateway Interfaces
 * Provider-agnostic interfaces for image generation backends
 */

import type { GenerationParameters, ImageFormat, ImageProviderKey } from '@/types/visualization.js';

export interface ImageGenerationOptions {
  negativePrompt?: string;
  parameters: GenerationParameters;
  /** Aborted by the gateway when the per-call timeout elapses. */
  signal: AbortSignal;
}

/** Raw output of one adapter call. Either bytes or a URL the gateway downloads. */
export interface ProviderImage {
  buffer?: Buffer;
  url?: string;
  width?: number;
  height?: number;
  format?: ImageFormat;
  revisedPrompt?: string;
}

export interface IImageGenerationService {
  /**
   * Generate an image from a text prompt
   * @param prompt The image description prompt, already clipped to the provider's limit
   */
  generate(prompt: string, options: ImageGenerationOptions): Promise<ProviderImage>;
}

export interface ImageGenerationRequest {
  prompt: string;
  negativePrompt?: string | null;
  parameters: GenerationParameters;
  provider: ImageProviderKey;
}

export interface ImageResult {
  buffer: Buffer;
  width: number;
  height: number;
  format: ImageFormat;
  mimeType: string;
  provider: ImageProviderKey;
  revisedPrompt: string | null;
  sourceUrl: string | null;
}

export interface IImageGateway {
  generate(request: ImageGenerationRequest): Promise<ImageResult>;
  getDefaultProvider(): ImageProviderKey;
  isConfigured(provider: ImageProviderKey): boolean;
}

export interface AIProviderConfig {
  defaultProvider: ImageProviderKey;
  timeoutMs: number;
  credentials: {
    openaiApiKey?: string;
    openaiImageModel?: string;
    stabilityApiKey?: string;
    stabilityModel?: string;
    fluxApiKey?: string;
    fluxModel?: string;
    googleGenAIApiKey?: string;
    googleGenAIImageModel?: string;
  };
}
