import { describe, it, expect, jest, afterEach } from '@jest/globals';

jest.mock('@/config/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  },
}));

import { HttpPromptSynthesizer, PromptSynthesisError } from '../services/prompt-synthesizer';
import type { PromptEnhancementRequest } from '../shared/interfaces';

const request: PromptEnhancementRequest = {
  sourceText: 'The lighthouse keeper climbed the stairs.',
  style: 'watercolor',
  targetModel: 'dalle3',
  bookId: 'book-1',
  pageId: 'page-1',
  chapterId: null,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('HttpPromptSynthesizer', () => {
  const synthesizer = new HttpPromptSynthesizer({
    baseUrl: 'https://prompts.test/',
    apiKey: 'test-secret',
    timeoutMs: 1000,
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('posts the request with the api key and returns the trimmed prompt', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValueOnce(
      jsonResponse({ enhancedPrompt: '  A lighthouse at dusk  ', negativePrompt: '  ', targetModel: 'dalle3' }),
    );

    const result = await synthesizer.enhance(request);

    expect(fetchSpy.mock.calls[0]?.[0]).toBe('https://prompts.test/api/v1/prompt/enhance');
    const init = fetchSpy.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'x-api-key': 'test-secret' });
    expect(result).toEqual({
      enhancedPrompt: 'A lighthouse at dusk',
      negativePrompt: null,
      style: 'watercolor',
      targetModel: 'dalle3',
    });
  });

  it('accepts a data envelope', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValueOnce(
      jsonResponse({ data: { enhancedPrompt: 'A fox', negativePrompt: 'blurry', style: 'ink' } }),
    );
    const result = await synthesizer.enhance(request);
    expect(result).toEqual({ enhancedPrompt: 'A fox', negativePrompt: 'blurry', style: 'ink', targetModel: 'dalle3' });
  });

  it('rejects an error status', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValueOnce(new Response('overloaded', { status: 503 }));
    const attempt = synthesizer.enhance(request);
    await expect(attempt).rejects.toBeInstanceOf(PromptSynthesisError);
    await expect(attempt).rejects.toMatchObject({ message: 'Prompt service error: 503', status: 503 });
  });

  it('rejects an empty prompt', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValueOnce(jsonResponse({ enhancedPrompt: '   ' }));
    await expect(synthesizer.enhance(request)).rejects.toThrow('Prompt service returned an empty prompt');
  });

  it('rejects a body of the wrong shape', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValueOnce(jsonResponse({ prompt: 'nope' }));
    await expect(synthesizer.enhance(request)).rejects.toThrow(/^Prompt service returned an unexpected body/);
  });

  it('reports an unreachable service', async () => {
    jest.spyOn(global, 'fetch').mockRejectedValueOnce(new TypeError('fetch failed'));
    await expect(synthesizer.enhance(request)).rejects.toThrow('Prompt service unreachable: fetch failed');
  });

  it('reports a timeout', async () => {
    jest
      .spyOn(global, 'fetch')
      .mockRejectedValueOnce(
        Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }),
      );
    await expect(synthesizer.enhance(request)).rejects.toThrow('Prompt service timed out after 1000ms');
  });
});
