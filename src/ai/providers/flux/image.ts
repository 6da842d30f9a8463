/**
 * FLUX Image Generation Service (Black Forest Labs REST API)
 * Submits a task, polls for its result, and returns the signed sample URL.
 */

import { z } from 'zod';
import type { IImageGenerationService, ImageGenerationOptions, ProviderImage } from '../../interfaces.js';
import { ImageGenerationBlockedError, ProviderHttpError } from '../../errors.js';
import { parseSize } from '@/utils/imageUtils.js';
import { logger } from '@/config/logger.js';

export interface FluxImageConfig {
  apiKey: string;
  model?: string;
  baseURL?: string;
  pollIntervalMs?: number;
}

const submitSchema = z.object({
  id: z.string(),
  polling_url: z.string().optional(),
});

const resultSchema = z.object({
  status: z.string(),
  result: z
    .object({
      sample: z.string().optional(),
    })
    .nullish(),
});

const MODERATED_STATUSES = ['Request Moderated', 'Content Moderated'];

function waitFor(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error('FLUX polling aborted: timeout'));
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('FLUX polling aborted: timeout'));
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class FluxImageService implements IImageGenerationService {
  private apiKey: string;
  private model: string;
  private baseURL: string;
  private pollIntervalMs: number;

  constructor(config: FluxImageConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model || 'flux-pro-1.1';
    this.baseURL = (config.baseURL || 'https://api.bfl.ml/v1').replace(/\/$/, '');
    this.pollIntervalMs = config.pollIntervalMs ?? 1000;
  }

  async generate(prompt: string, options: ImageGenerationOptions): Promise<ProviderImage> {
    const { parameters, signal } = options;
    const { width, height } = parseSize(parameters.size);

    const submit = await fetch(`${this.baseURL}/${this.model}`, {
      method: 'POST',
      headers: {
        'x-key': this.apiKey,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify({
        prompt,
        width,
        height,
        ...(parameters.seed !== undefined && { seed: parameters.seed }),
        ...(parameters.steps !== undefined && { steps: parameters.steps }),
        ...(parameters.cfgScale !== undefined && { guidance: parameters.cfgScale }),
        ...(parameters.upscale && { prompt_upsampling: true }),
      }),
      signal,
    });

    if (!submit.ok) {
      throw new ProviderHttpError('FLUX', submit.status, await submit.text());
    }

    const task = submitSchema.parse(await submit.json());
    const pollUrl = task.polling_url ?? `${this.baseURL}/get_result?id=${encodeURIComponent(task.id)}`;

    logger.debug('FLUX task submitted', { taskId: task.id, model: this.model });

    for (;;) {
      await waitFor(this.pollIntervalMs, signal);

      const poll = await fetch(pollUrl, {
        headers: { 'x-key': this.apiKey, Accept: 'application/json' },
        signal,
      });
      if (!poll.ok) {
        throw new ProviderHttpError('FLUX', poll.status, await poll.text());
      }

      const state = resultSchema.parse(await poll.json());
      if (state.status === 'Ready') {
        const sample = state.result?.sample;
        if (!sample) {
          throw new Error('FLUX task finished without a sample URL');
        }
        return { url: sample, width, height };
      }
      if (MODERATED_STATUSES.includes(state.status)) {
        throw new ImageGenerationBlockedError({ provider: 'flux', finishReasons: [state.status] });
      }
      if (state.status === 'Error' || state.status === 'Task not found') {
        throw new Error(`FLUX task ${task.id} failed with status ${state.status}`);
      }
    }
  }
}
