import { describe, it, expect, jest } from '@jest/globals';

jest.mock('@/config/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  },
}));

import { AIGateway } from '../ai/gateway';
import {
  ImageGenerationBlockedError,
  PermanentProviderError,
  ProviderHttpError,
  ProviderUnavailableError,
  TransientProviderError,
} from '../ai/errors';
import type { IImageGenerationService, ImageGenerationOptions, ProviderImage } from '../ai/interfaces';
import { clipPrompt } from '../ai/provider-catalog';
import { defaultParameters } from '../services/visualization-job';
import type { ImageProviderKey } from '../types/visualization';
import { PNG_BYTES } from './helpers/fixtures';

type GenerateFn = (prompt: string, options: ImageGenerationOptions) => Promise<ProviderImage>;

function service(impl: GenerateFn) {
  const generate = jest.fn<GenerateFn>(impl);
  const adapter: IImageGenerationService = { generate };
  return { adapter, generate };
}

function gatewayWith(
  provider: ImageProviderKey,
  adapter: IImageGenerationService,
  timeoutMs = 1000,
): AIGateway {
  return new AIGateway({ defaultProvider: 'dalle3', timeoutMs, credentials: {} }, { [provider]: adapter });
}

const request = (provider: ImageProviderKey, prompt = 'a red fox in snow') => ({
  prompt,
  negativePrompt: 'blurry',
  parameters: defaultParameters(),
  provider,
});

describe('AIGateway', () => {
  it('returns bytes with the sniffed format and requested size', async () => {
    const { adapter } = service(async () => ({ buffer: PNG_BYTES }));
    const gateway = gatewayWith('flux', adapter);

    const result = await gateway.generate(request('flux'));
    expect(result.format).toBe('png');
    expect(result.mimeType).toBe('image/png');
    expect(result.width).toBe(1024);
    expect(result.height).toBe(1024);
    expect(result.provider).toBe('flux');
    expect(result.revisedPrompt).toBeNull();
    expect(result.sourceUrl).toBeNull();
  });

  it('passes the negative prompt only to providers that support it', async () => {
    const sd = service(async () => ({ buffer: PNG_BYTES }));
    await gatewayWith('stable-diffusion', sd.adapter).generate(request('stable-diffusion'));
    expect(sd.generate.mock.calls[0]?.[1].negativePrompt).toBe('blurry');

    const dalle = service(async () => ({ buffer: PNG_BYTES }));
    await gatewayWith('dalle3', dalle.adapter).generate(request('dalle3'));
    expect(dalle.generate.mock.calls[0]?.[1].negativePrompt).toBeUndefined();
  });

  it('clips prompts to the provider limit', async () => {
    const sd = service(async () => ({ buffer: PNG_BYTES }));
    await gatewayWith('stable-diffusion', sd.adapter).generate(request('stable-diffusion', 'x'.repeat(500)));
    expect(sd.generate.mock.calls[0]?.[0]).toHaveLength(380);
  });

  it('downloads URL results', async () => {
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockResolvedValue(new Response(new Uint8Array(PNG_BYTES), { status: 200 }));
    const { adapter } = service(async () => ({ url: 'https://images.test/fox.png', revisedPrompt: 'a fox' }));

    const result = await gatewayWith('dalle3', adapter).generate(request('dalle3'));
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(result.buffer.equals(PNG_BYTES)).toBe(true);
    expect(result.sourceUrl).toBe('https://images.test/fox.png');
    expect(result.revisedPrompt).toBe('a fox');
    fetchSpy.mockRestore();
  });

  it('times out and aborts the adapter call', async () => {
    let signal: AbortSignal | undefined;
    const { adapter } = service(
      (_prompt, options) =>
        new Promise<ProviderImage>(() => {
          signal = options.signal;
        }),
    );

    const attempt = gatewayWith('flux', adapter, 20).generate(request('flux'));
    await expect(attempt).rejects.toBeInstanceOf(TransientProviderError);
    await expect(attempt).rejects.toThrow('FLUX timed out after 20ms');
    expect(signal?.aborted).toBe(true);
  });

  it('classifies client errors as permanent', async () => {
    const { adapter } = service(async () => {
      throw new ProviderHttpError('FLUX', 400, 'invalid size');
    });
    const attempt = gatewayWith('flux', adapter).generate(request('flux'));
    await expect(attempt).rejects.toBeInstanceOf(PermanentProviderError);
    await expect(attempt).rejects.toMatchObject({ category: 'permanent', status: 400, retryable: false });
  });

  it('classifies rate limits and server errors as transient', async () => {
    const { adapter } = service(async () => {
      throw new ProviderHttpError('FLUX', 429, 'slow down');
    });
    await expect(gatewayWith('flux', adapter).generate(request('flux'))).rejects.toMatchObject({
      category: 'transient',
      retryable: true,
    });
  });

  it('classifies safety rejections as blocked', async () => {
    const { adapter } = service(async () => {
      throw Object.assign(new Error('Your request was rejected by our safety system'), { status: 400 });
    });
    await expect(gatewayWith('dalle3', adapter).generate(request('dalle3'))).rejects.toBeInstanceOf(
      ImageGenerationBlockedError,
    );
  });

  it('reports a provider without credentials as unavailable', async () => {
    const gateway = new AIGateway({ defaultProvider: 'dalle3', timeoutMs: 1000, credentials: {} });
    expect(gateway.isConfigured('imagen')).toBe(false);
    await expect(gateway.generate(request('imagen'))).rejects.toBeInstanceOf(ProviderUnavailableError);
  });

  it('rejects an empty image', async () => {
    const { adapter } = service(async () => ({ buffer: Buffer.alloc(0) }));
    await expect(gatewayWith('flux', adapter).generate(request('flux'))).rejects.toThrow(
      'Provider returned no image data',
    );
  });

  it('lists providers with their configuration', () => {
    const gateway = new AIGateway({
      defaultProvider: 'flux',
      timeoutMs: 1000,
      credentials: { fluxApiKey: 'test-secret' },
    });
    const flux = gateway.listProviders().find((p) => p.key === 'flux');
    expect(flux).toMatchObject({ configured: true, isDefault: true, supportsNegativePrompt: false });
    expect(gateway.listProviders().find((p) => p.key === 'dalle3')?.configured).toBe(false);
  });
});

describe('clipPrompt', () => {
  it('cuts on a nearby word boundary', () => {
    expect(clipPrompt('one two three four', 14)).toBe('one two three');
    expect(clipPrompt('  short  ', 10)).toBe('short');
  });

  it('cuts hard when no boundary is close', () => {
    expect(clipPrompt('abcdefghij klm', 8)).toBe('abcdefgh');
  });
});
