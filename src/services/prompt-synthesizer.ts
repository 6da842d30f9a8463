/**
 * Prompt Synthesizer Client
 * Turns page or selection text into a provider-tailored image prompt by calling the prompt service.
 */

import { z } from 'zod';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import type {
  IPromptSynthesizer,
  PromptEnhancement,
  PromptEnhancementRequest,
} from '@/shared/interfaces.js';

export class PromptSynthesisError extends Error {
  public readonly retryable = true;
  public readonly status: number | undefined;

  constructor(message: string, status?: number, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PromptSynthesisError';
    this.status = status;
  }
}

const enhancementSchema = z.object({
  enhancedPrompt: z.string(),
  negativePrompt: z.string().nullish(),
  style: z.string().nullish(),
  targetModel: z.string().optional(),
});

const responseSchema = z.union([enhancementSchema, z.object({ data: enhancementSchema })]);

export interface PromptSynthesizerOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

export class HttpPromptSynthesizer implements IPromptSynthesizer {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;

  constructor(options: PromptSynthesizerOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
  }

  async enhance(request: PromptEnhancementRequest): Promise<PromptEnhancement> {
    const url = `${this.baseUrl}/api/v1/prompt/enhance`;
    const startedAt = Date.now();

    logger.debug('Requesting prompt enhancement', {
      bookId: request.bookId,
      pageId: request.pageId,
      targetModel: request.targetModel,
      textLength: request.sourceText.length,
    });

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
      const message = timedOut
        ? `Prompt service timed out after ${this.timeoutMs}ms`
        : `Prompt service unreachable: ${error instanceof Error ? error.message : String(error)}`;
      logger.warn('Prompt enhancement request failed', { bookId: request.bookId, error: message });
      throw new PromptSynthesisError(message, undefined, error);
    }

    if (!response.ok) {
      const body = await response.text();
      logger.warn('Prompt service returned an error', {
        status: response.status,
        body: body.slice(0, 500),
        bookId: request.bookId,
      });
      throw new PromptSynthesisError(`Prompt service error: ${response.status}`, response.status);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new PromptSynthesisError('Prompt service returned invalid JSON', response.status, error);
    }

    const parsed = responseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new PromptSynthesisError(
        `Prompt service returned an unexpected body: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        response.status,
      );
    }

    const data = 'data' in parsed.data ? parsed.data.data : parsed.data;
    const enhancedPrompt = data.enhancedPrompt.trim();
    if (!enhancedPrompt) {
      throw new PromptSynthesisError('Prompt service returned an empty prompt', response.status);
    }

    logger.info('Prompt enhanced', {
      bookId: request.bookId,
      pageId: request.pageId,
      targetModel: request.targetModel,
      promptLength: enhancedPrompt.length,
      durationMs: Date.now() - startedAt,
    });

    return {
      enhancedPrompt,
      negativePrompt: data.negativePrompt?.trim() || null,
      style: data.style ?? request.style,
      targetModel: data.targetModel ?? request.targetModel,
    };
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers['x-api-key'] = this.apiKey;
    }
    return headers;
  }

  static fromEnvironment(): HttpPromptSynthesizer {
    const env = getEnvironment();
    if (!env.PROMPTGEN_API_URL) {
      throw new Error('PROMPTGEN_API_URL is required');
    }
    return new HttpPromptSynthesizer({
      baseUrl: env.PROMPTGEN_API_URL,
      ...(env.PROMPTGEN_API_KEY && { apiKey: env.PROMPTGEN_API_KEY }),
      timeoutMs: env.PROMPT_TIMEOUT_MS,
    });
  }
}
