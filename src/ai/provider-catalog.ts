import type { ImageProviderKey } from '@/types/visualization.js';

export interface ProviderDescriptor {
  key: ImageProviderKey;
  displayName: string;
  maxPromptLength: number;
  supportsNegativePrompt: boolean;
  averageGenerationSeconds: number;
  /** Model name the prompt service tailors its output to. */
  promptTargetModel: string;
}

export const PROVIDER_CATALOG: Record<ImageProviderKey, ProviderDescriptor> = {
  dalle3: {
    key: 'dalle3',
    displayName: 'DALL-E 3',
    maxPromptLength: 4000,
    supportsNegativePrompt: false,
    averageGenerationSeconds: 15,
    promptTargetModel: 'dalle3',
  },
  'stable-diffusion': {
    key: 'stable-diffusion',
    displayName: 'Stable Diffusion XL',
    maxPromptLength: 380,
    supportsNegativePrompt: true,
    averageGenerationSeconds: 10,
    promptTargetModel: 'stable-diffusion',
  },
  flux: {
    key: 'flux',
    displayName: 'FLUX',
    maxPromptLength: 1000,
    supportsNegativePrompt: false,
    averageGenerationSeconds: 20,
    promptTargetModel: 'flux',
  },
  imagen: {
    key: 'imagen',
    displayName: 'Google Imagen',
    maxPromptLength: 4000,
    supportsNegativePrompt: false,
    averageGenerationSeconds: 12,
    promptTargetModel: 'dalle3',
  },
};

export function describeProvider(provider: ImageProviderKey): ProviderDescriptor {
  return PROVIDER_CATALOG[provider];
}

/** Clips on a word boundary when one is close to the limit. */
export function clipPrompt(prompt: string, maxLength: number): string {
  const trimmed = prompt.trim();
  if (trimmed.length <= maxLength) {
    return trimmed;
  }
  const hard = trimmed.slice(0, maxLength);
  const lastSpace = hard.lastIndexOf(' ');
  return lastSpace >= maxLength * 0.8 ? hard.slice(0, lastSpace) : hard;
}
