/**
 * Visualization job construction and request validation.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  DEFAULT_PRIORITIES,
  IMAGE_PROVIDERS,
  type GenerationParameters,
  type ImageProviderKey,
  type NewVisualizationJob,
  type TextSelection,
  type VisualizationJob,
  type VisualizationTrigger,
} from '@/types/visualization.js';

export const MIN_SELECTION_LENGTH = 10;
export const MAX_SELECTION_LENGTH = 5000;
export const MAX_CONTEXT_LENGTH = 200;

const idSchema = z.string().trim().min(1).max(200);

export const providerSchema = z.enum(IMAGE_PROVIDERS);

export const generationParametersSchema = z
  .object({
    size: z.string().regex(/^\d{2,5}x\d{2,5}$/, 'size must look like 1024x1024').default('1024x1024'),
    quality: z.string().min(1).default('standard'),
    aspectRatio: z.string().regex(/^\d+:\d+$/, 'aspectRatio must look like 16:9').default('1:1'),
    seed: z.number().int().nonnegative().optional(),
    steps: z.number().int().min(1).max(150).optional(),
    cfgScale: z.number().min(0).max(35).optional(),
    sampler: z.string().min(1).optional(),
    style: z.string().min(1).optional(),
    upscale: z.boolean().default(false),
    extra: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
  })
  .strict();

export const textSelectionSchema = z
  .object({
    pageId: idSchema,
    chapterId: idSchema.nullish(),
    selectedText: z
      .string()
      .trim()
      .min(MIN_SELECTION_LENGTH, `selected text must be at least ${MIN_SELECTION_LENGTH} characters`)
      .max(MAX_SELECTION_LENGTH, `selected text must be at most ${MAX_SELECTION_LENGTH} characters`),
    startOffset: z.number().int().nonnegative(),
    endOffset: z.number().int().nonnegative(),
    contextBefore: z.string().optional(),
    contextAfter: z.string().optional(),
  })
  .refine((s) => s.startOffset < s.endOffset, {
    message: 'startOffset must be lower than endOffset',
    path: ['endOffset'],
  });

export const pageRequestSchema = z.object({
  bookId: idSchema,
  pageId: idSchema,
  userId: idSchema,
  preferredProvider: providerSchema.optional(),
  parameters: generationParametersSchema.optional(),
  priority: z.number().int().min(0).max(100).optional(),
});

export const textSelectionRequestSchema = z.object({
  bookId: idSchema,
  userId: idSchema,
  selection: textSelectionSchema,
  preferredProvider: providerSchema.optional(),
  parameters: generationParametersSchema.optional(),
  priority: z.number().int().min(0).max(100).optional(),
});

export const autoNovelRequestSchema = z.object({
  bookId: idSchema,
  userId: idSchema,
  preferredProvider: providerSchema.optional(),
  parameters: generationParametersSchema.optional(),
});

export type PageVisualizationRequest = z.input<typeof pageRequestSchema>;
export type TextSelectionVisualizationRequest = z.input<typeof textSelectionRequestSchema>;
export type AutoNovelRequest = z.input<typeof autoNovelRequestSchema>;

export function defaultParameters(): GenerationParameters {
  return generationParametersSchema.parse({});
}

/** Context before keeps its tail, context after keeps its head. */
export function normalizeTextSelection(selection: z.output<typeof textSelectionSchema>): TextSelection {
  const before = selection.contextBefore ?? '';
  const after = selection.contextAfter ?? '';
  return {
    pageId: selection.pageId,
    chapterId: selection.chapterId ?? null,
    selectedText: selection.selectedText,
    startOffset: selection.startOffset,
    endOffset: selection.endOffset,
    contextBefore: before.length > MAX_CONTEXT_LENGTH ? before.slice(-MAX_CONTEXT_LENGTH) : before,
    contextAfter: after.length > MAX_CONTEXT_LENGTH ? after.slice(0, MAX_CONTEXT_LENGTH) : after,
  };
}

export function selectionFullContext(selection: TextSelection): string {
  return `${selection.contextBefore}${selection.selectedText}${selection.contextAfter}`.trim();
}

export interface NewJobInput {
  bookId: string;
  pageId: string | null;
  chapterId: string | null;
  trigger: VisualizationTrigger;
  userId: string;
  preferredProvider: ImageProviderKey | null;
  parameters: GenerationParameters;
  textSelection?: TextSelection | null;
  priority?: number;
  regeneratedFromJobId?: string | null;
}

export function buildNewJob(input: NewJobInput, now: Date = new Date()): NewVisualizationJob {
  if (!input.pageId && !input.textSelection) {
    throw new Error('A visualization job needs a page or a text selection');
  }
  return {
    id: randomUUID(),
    bookId: input.bookId,
    pageId: input.pageId,
    chapterId: input.chapterId,
    trigger: input.trigger,
    userId: input.userId,
    status: 'pending',
    preferredProvider: input.preferredProvider,
    priority: input.priority ?? DEFAULT_PRIORITIES[input.trigger],
    promptData: null,
    textSelection: input.textSelection ?? null,
    parameters: input.parameters,
    errorMessage: null,
    errorCategory: null,
    retryCount: 0,
    retriedAfterRejection: false,
    regeneratedFromJobId: input.regeneratedFromJobId ?? null,
    claimedBy: null,
    claimedAt: null,
    availableAt: now,
    processingStartedAt: null,
    completedAt: null,
  };
}

export function selectedImage(job: VisualizationJob) {
  return job.images.find((image) => image.id === job.selectedImageId && !image.isDeleted) ?? null;
}
