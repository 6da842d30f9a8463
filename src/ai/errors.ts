/**
 * Provider error taxonomy
 */

export type ProviderErrorCategory = 'transient' | 'permanent' | 'provider_unavailable';

export interface ProviderDiagnostic {
  finishReason?: string;
  status?: number;
  [key: string]: unknown;
}

export class ProviderError extends Error {
  public readonly provider: string;
  public readonly category: ProviderErrorCategory;
  public readonly retryable: boolean;
  public readonly status: number | undefined;

  constructor(params: {
    provider: string;
    category: ProviderErrorCategory;
    message: string;
    status?: number;
    cause?: unknown;
  }) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = 'ProviderError';
    this.provider = params.provider;
    this.category = params.category;
    this.retryable = params.category === 'transient';
    this.status = params.status;
  }
}

/** Network failure, timeout, rate limit or a 5xx answer. */
export class TransientProviderError extends ProviderError {
  constructor(provider: string, message: string, status?: number, cause?: unknown) {
    super({
      provider,
      category: 'transient',
      message,
      ...(status !== undefined && { status }),
      cause,
    });
    this.name = 'TransientProviderError';
  }
}

/** The provider rejected the request itself; resubmitting it unchanged will not help. */
export class PermanentProviderError extends ProviderError {
  constructor(provider: string, message: string, status?: number, cause?: unknown) {
    super({
      provider,
      category: 'permanent',
      message,
      ...(status !== undefined && { status }),
      cause,
    });
    this.name = 'PermanentProviderError';
  }
}

export class ProviderUnavailableError extends ProviderError {
  constructor(provider: string, message?: string) {
    super({
      provider,
      category: 'provider_unavailable',
      message: message || `Image provider ${provider} is not available`,
    });
    this.name = 'ProviderUnavailableError';
  }
}

/**
 * Error thrown when an image generation request is blocked by provider safety / policy filters.
 */
export class ImageGenerationBlockedError extends PermanentProviderError {
  public readonly code = 'IMAGE_SAFETY_BLOCKED';
  public readonly providerFinishReasons: string[];
  public readonly diagnostics: ProviderDiagnostic[] | undefined;

  constructor(params: {
    provider: string;
    finishReasons: string[];
    diagnostics?: ProviderDiagnostic[];
    message?: string;
  }) {
    const reasonStr = params.finishReasons.join(', ');
    super(
      params.provider,
      params.message ||
        `Image generation blocked by ${params.provider} safety filters (reason(s): ${reasonStr}).`,
    );
    this.name = 'ImageGenerationBlockedError';
    this.providerFinishReasons = params.finishReasons;
    this.diagnostics = params.diagnostics;
  }
}

/** Raised by provider adapters for a non-2xx HTTP answer; the gateway classifies it by status. */
export class ProviderHttpError extends Error {
  public readonly status: number;
  public readonly body: string;

  constructor(provider: string, status: number, body: string) {
    super(`${provider} API error: ${status} - ${body.slice(0, 500)}`);
    this.name = 'ProviderHttpError';
    this.status = status;
    this.body = body;
  }
}
