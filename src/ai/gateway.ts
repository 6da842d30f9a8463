/**
 * AI Gateway
 * One entry point over the registered image providers. Adapters are created lazily from
 * configuration; every failure leaves here as a ProviderError.
 */

import type {
  AIProviderConfig,
  IImageGateway,
  IImageGenerationService,
  ImageGenerationRequest,
  ImageResult,
  ProviderImage,
} from './interfaces.js';
import {
  ImageGenerationBlockedError,
  PermanentProviderError,
  ProviderError,
  ProviderUnavailableError,
  TransientProviderError,
} from './errors.js';
import { OpenAIImageService } from './providers/openai/image.js';
import { StabilityImageService } from './providers/stability/image.js';
import { FluxImageService } from './providers/flux/image.js';
import { GoogleGenAIImageService } from './providers/google-genai/image.js';
import { clipPrompt, PROVIDER_CATALOG, type ProviderDescriptor } from './provider-catalog.js';
import { errorStatus, isSafetyBlockError, isTransientError } from '@/shared/retry-utils.js';
import { mimeTypeFor, parseSize, sniffFormat } from '@/utils/imageUtils.js';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { IMAGE_PROVIDERS, type ImageProviderKey } from '@/types/visualization.js';

type ServiceOverrides = Partial<Record<ImageProviderKey, IImageGenerationService>>;

export class AIGateway implements IImageGateway {
  private services = new Map<ImageProviderKey, IImageGenerationService>();
  private config: AIProviderConfig;

  constructor(config: AIProviderConfig, overrides: ServiceOverrides = {}) {
    this.config = config;
    for (const provider of IMAGE_PROVIDERS) {
      const service = overrides[provider];
      if (service) {
        this.services.set(provider, service);
      }
    }

    logger.info('AI Gateway initialized', {
      defaultProvider: config.defaultProvider,
      timeoutMs: config.timeoutMs,
    });
  }

  getDefaultProvider(): ImageProviderKey {
    return this.config.defaultProvider;
  }

  isConfigured(provider: ImageProviderKey): boolean {
    if (this.services.has(provider)) {
      return true;
    }
    const { credentials } = this.config;
    switch (provider) {
      case 'dalle3':
        return Boolean(credentials.openaiApiKey);
      case 'stable-diffusion':
        return Boolean(credentials.stabilityApiKey);
      case 'flux':
        return Boolean(credentials.fluxApiKey);
      case 'imagen':
        return Boolean(credentials.googleGenAIApiKey);
      default:
        return false;
    }
  }

  listProviders(): Array<ProviderDescriptor & { configured: boolean; isDefault: boolean }> {
    return IMAGE_PROVIDERS.map((provider) => ({
      ...PROVIDER_CATALOG[provider],
      configured: this.isConfigured(provider),
      isDefault: provider === this.config.defaultProvider,
    }));
  }

  async generate(request: ImageGenerationRequest): Promise<ImageResult> {
    const { provider } = request;
    const descriptor = PROVIDER_CATALOG[provider];
    if (!descriptor) {
      throw new ProviderUnavailableError(String(provider), `Unknown image provider: ${provider}`);
    }

    const service = this.getImageService(provider);
    const prompt = clipPrompt(request.prompt, descriptor.maxPromptLength);
    const negativePrompt =
      descriptor.supportsNegativePrompt && request.negativePrompt
        ? clipPrompt(request.negativePrompt, descriptor.maxPromptLength)
        : undefined;

    const controller = new AbortController();
    const timeoutMs = this.config.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TransientProviderError(provider, `${descriptor.displayName} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    const startedAt = Date.now();
    try {
      const raw = await Promise.race([
        (async () => {
          const output = await service.generate(prompt, {
            ...(negativePrompt && { negativePrompt }),
            parameters: request.parameters,
            signal: controller.signal,
          });
          return this.normalize(provider, output, request, controller.signal);
        })(),
        timeout,
      ]);

      logger.info('AI Gateway: image generated', {
        provider,
        durationMs: Date.now() - startedAt,
        width: raw.width,
        height: raw.height,
        bytes: raw.buffer.length,
      });
      return raw;
    } catch (error) {
      const normalized = this.normalizeError(provider, error, controller.signal.aborted, timeoutMs);
      logger.warn('AI Gateway: image generation failed', {
        provider,
        category: normalized.category,
        durationMs: Date.now() - startedAt,
        error: normalized.message,
      });
      throw normalized;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Get (or lazily create) the adapter for a provider
   */
  public getImageService(provider: ImageProviderKey): IImageGenerationService {
    const existing = this.services.get(provider);
    if (existing) {
      return existing;
    }
    const created = this.createImageService(provider);
    this.services.set(provider, created);
    return created;
  }

  private createImageService(provider: ImageProviderKey): IImageGenerationService {
    const { credentials } = this.config;
    switch (provider) {
      case 'dalle3':
        if (!credentials.openaiApiKey) {
          throw new ProviderUnavailableError(provider, 'OPENAI_API_KEY is required for DALL-E 3');
        }
        return new OpenAIImageService({
          apiKey: credentials.openaiApiKey,
          ...(credentials.openaiImageModel && { model: credentials.openaiImageModel }),
        });

      case 'stable-diffusion':
        if (!credentials.stabilityApiKey) {
          throw new ProviderUnavailableError(provider, 'STABILITY_API_KEY is required for Stable Diffusion');
        }
        return new StabilityImageService({
          apiKey: credentials.stabilityApiKey,
          ...(credentials.stabilityModel && { model: credentials.stabilityModel }),
        });

      case 'flux':
        if (!credentials.fluxApiKey) {
          throw new ProviderUnavailableError(provider, 'FLUX_API_KEY is required for FLUX');
        }
        return new FluxImageService({
          apiKey: credentials.fluxApiKey,
          ...(credentials.fluxModel && { model: credentials.fluxModel }),
        });

      case 'imagen':
        if (!credentials.googleGenAIApiKey) {
          throw new ProviderUnavailableError(provider, 'GOOGLE_GENAI_API_KEY is required for Imagen');
        }
        return new GoogleGenAIImageService({
          apiKey: credentials.googleGenAIApiKey,
          ...(credentials.googleGenAIImageModel && { model: credentials.googleGenAIImageModel }),
        });

      default:
        throw new ProviderUnavailableError(String(provider), `Unsupported image provider: ${provider}`);
    }
  }

  private async normalize(
    provider: ImageProviderKey,
    output: ProviderImage,
    request: ImageGenerationRequest,
    signal: AbortSignal,
  ): Promise<ImageResult> {
    const buffer = output.buffer ?? (output.url ? await this.download(provider, output.url, signal) : null);
    if (!buffer || buffer.length === 0) {
      throw new TransientProviderError(provider, 'Provider returned no image data');
    }

    const format = output.format ?? sniffFormat(buffer) ?? 'png';
    const requested = parseSize(request.parameters.size);
    return {
      buffer,
      width: output.width ?? requested.width,
      height: output.height ?? requested.height,
      format,
      mimeType: mimeTypeFor(format),
      provider,
      revisedPrompt: output.revisedPrompt ?? null,
      sourceUrl: output.url ?? null,
    };
  }

  private async download(provider: ImageProviderKey, url: string, signal: AbortSignal): Promise<Buffer> {
    const response = await fetch(url, { signal });
    if (!response.ok) {
      throw new TransientProviderError(
        provider,
        `Failed to download generated image: ${response.status}`,
        response.status,
      );
    }
    return Buffer.from(await response.arrayBuffer());
  }

  private normalizeError(
    provider: ImageProviderKey,
    error: unknown,
    timedOut: boolean,
    timeoutMs: number,
  ): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    if (timedOut) {
      return new TransientProviderError(provider, `Timed out after ${timeoutMs}ms`, undefined, error);
    }
    if (isSafetyBlockError(error)) {
      return new ImageGenerationBlockedError({ provider, finishReasons: ['SAFETY'], message });
    }

    const status = errorStatus(error);
    if (status !== undefined && status >= 400 && status < 500 && status !== 408 && status !== 429) {
      return new PermanentProviderError(provider, message, status, error);
    }
    if (!isTransientError(error)) {
      logger.debug('AI Gateway: unclassified provider error treated as transient', { provider, message });
    }
    return new TransientProviderError(provider, message, status, error);
  }

  /**
   * Create AI Gateway from environment variables
   */
  public static fromEnvironment(): AIGateway {
    const env = getEnvironment();
    return new AIGateway({
      defaultProvider: env.DEFAULT_IMAGE_PROVIDER,
      timeoutMs: env.PROVIDER_TIMEOUT_MS,
      credentials: {
        ...(env.OPENAI_API_KEY && { openaiApiKey: env.OPENAI_API_KEY }),
        openaiImageModel: env.OPENAI_IMAGE_MODEL,
        ...(env.STABILITY_API_KEY && { stabilityApiKey: env.STABILITY_API_KEY }),
        stabilityModel: env.STABILITY_MODEL,
        ...(env.FLUX_API_KEY && { fluxApiKey: env.FLUX_API_KEY }),
        fluxModel: env.FLUX_MODEL,
        ...(env.GOOGLE_GENAI_API_KEY && { googleGenAIApiKey: env.GOOGLE_GENAI_API_KEY }),
        googleGenAIImageModel: env.GOOGLE_GENAI_IMAGE_MODEL,
      },
    });
  }
}
