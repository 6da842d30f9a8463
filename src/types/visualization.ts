/**
 * Visualization domain types shared by the job store, the pipeline and the facade.
 */

export const VISUALIZATION_JOB_STATUSES = [
  'pending',
  'queued',
  'generating_prompt',
  'processing',
  'uploading',
  'completed',
  'failed',
  'cancelled',
] as const;
export type VisualizationJobStatus = (typeof VISUALIZATION_JOB_STATUSES)[number];

export function emptyStatusCounts(): Record<VisualizationJobStatus, number> {
  return {
    pending: 0,
    queued: 0,
    generating_prompt: 0,
    processing: 0,
    uploading: 0,
    completed: 0,
    failed: 0,
    cancelled: 0,
  };
}

export const VISUALIZATION_TRIGGERS = ['page_request', 'text_selection_request', 'auto_novel'] as const;
export type VisualizationTrigger = (typeof VISUALIZATION_TRIGGERS)[number];

export const IMAGE_PROVIDERS = ['dalle3', 'stable-diffusion', 'flux', 'imagen'] as const;
export type ImageProviderKey = (typeof IMAGE_PROVIDERS)[number];

export const FAILURE_CATEGORIES = [
  'transient',
  'permanent',
  'provider_unavailable',
  'prompt',
  'internal',
  'cancelled',
] as const;
export type FailureCategory = (typeof FAILURE_CATEGORIES)[number];

export const VISUALIZATION_MODES = [
  'none',
  'per_page',
  'per_chapter',
  'user_selected',
  'author_defined',
] as const;
export type VisualizationMode = (typeof VISUALIZATION_MODES)[number];

export const IMAGE_FORMATS = ['png', 'jpeg', 'webp'] as const;
export type ImageFormat = (typeof IMAGE_FORMATS)[number];

export const DEFAULT_PRIORITIES: Record<VisualizationTrigger, number> = {
  text_selection_request: 15,
  page_request: 10,
  auto_novel: 5,
};

export interface TextSelection {
  pageId: string;
  chapterId: string | null;
  selectedText: string;
  startOffset: number;
  endOffset: number;
  contextBefore: string;
  contextAfter: string;
}

export interface GenerationParameters {
  size: string;
  quality: string;
  aspectRatio: string;
  seed?: number;
  steps?: number;
  cfgScale?: number;
  sampler?: string;
  style?: string;
  upscale: boolean;
  /** Provider-specific settings passed through untouched. */
  extra: Record<string, string | number | boolean>;
}

export interface PromptData {
  originalText: string;
  enhancedPrompt: string;
  negativePrompt: string | null;
  style: string | null;
  targetModel: string;
}

export interface GeneratedImage {
  id: string;
  jobId: string;
  url: string;
  thumbnailUrl: string | null;
  storagePath: string;
  width: number;
  height: number;
  fileSizeBytes: number;
  format: ImageFormat;
  mimeType: string;
  provider: ImageProviderKey;
  revisedPrompt: string | null;
  generatedAt: Date;
  isSelected: boolean;
  isDeleted: boolean;
}

export interface VisualizationJob {
  id: string;
  bookId: string;
  pageId: string | null;
  chapterId: string | null;
  trigger: VisualizationTrigger;
  userId: string;
  status: VisualizationJobStatus;
  preferredProvider: ImageProviderKey | null;
  priority: number;
  promptData: PromptData | null;
  textSelection: TextSelection | null;
  parameters: GenerationParameters;
  errorMessage: string | null;
  errorCategory: FailureCategory | null;
  retryCount: number;
  retriedAfterRejection: boolean;
  regeneratedFromJobId: string | null;
  claimedBy: string | null;
  claimedAt: Date | null;
  availableAt: Date;
  createdAt: Date;
  updatedAt: Date;
  processingStartedAt: Date | null;
  completedAt: Date | null;
  images: GeneratedImage[];
  selectedImageId: string | null;
}

/** Fields a caller supplies when a job record is first persisted. */
export type NewVisualizationJob = Omit<
  VisualizationJob,
  'createdAt' | 'updatedAt' | 'images' | 'selectedImageId'
>;

/** Mutable columns a status transition may write alongside the new status. */
export type VisualizationJobPatch = Partial<
  Pick<
    VisualizationJob,
    | 'promptData'
    | 'preferredProvider'
    | 'errorMessage'
    | 'errorCategory'
    | 'retryCount'
    | 'retriedAfterRejection'
    | 'claimedBy'
    | 'claimedAt'
    | 'availableAt'
    | 'processingStartedAt'
    | 'completedAt'
  >
> & { status: VisualizationJobStatus };

export interface JobStatusView {
  jobId: string;
  status: VisualizationJobStatus;
  statusLabel: string;
  progressPercent: number;
  errorMessage: string | null;
  retryCount: number;
  canCancel: boolean;
  canRetry: boolean;
  hasImages: boolean;
  isFinal: boolean;
  isProcessing: boolean;
  selectedImageUrl: string | null;
  queuePosition: number | null;
  estimatedWaitSeconds: number | null;
  createdAt: Date;
  processingStartedAt: Date | null;
  completedAt: Date | null;
}

export interface SkippedPage {
  pageId: string;
  reason: 'already_in_progress';
  jobId: string;
}

export interface AutoNovelResult {
  jobs: VisualizationJob[];
  skipped: SkippedPage[];
  alreadyVisualized: number;
}

export interface QueueStatus {
  pending: number;
  queued: number;
  processing: number;
  averageProcessingSeconds: number;
  workerConcurrency: number;
}
