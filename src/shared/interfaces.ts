// -----------------------------------------------------------------------------
// Shared Interfaces - Abstract interfaces for adapters
// -----------------------------------------------------------------------------

import type {
  GeneratedImage,
  ImageProviderKey,
  NewVisualizationJob,
  VisualizationJob,
  VisualizationJobPatch,
  VisualizationJobStatus,
  VisualizationMode,
  VisualizationTrigger,
} from '@/types/visualization.js';

// Job Store
export interface IVisualizationJobRepository {
  /** Throws AlreadyInProgressError when a non-terminal job holds the same (book, page, trigger). */
  create(job: NewVisualizationJob): Promise<VisualizationJob>;
  findById(jobId: string): Promise<VisualizationJob | null>;
  findActiveForPage(
    bookId: string,
    pageId: string,
    triggers: readonly VisualizationTrigger[],
  ): Promise<VisualizationJob | null>;
  listByBook(bookId: string): Promise<VisualizationJob[]>;
  listByUser(userId: string): Promise<VisualizationJob[]>;
  countByStatus(): Promise<Record<VisualizationJobStatus, number>>;
  /** Pending jobs that will be claimed before the given one. */
  countAhead(job: VisualizationJob): Promise<number>;
  /** Average seconds between processingStartedAt and completedAt over recent completed jobs. */
  averageProcessingSeconds(sampleSize: number): Promise<number | null>;

  /**
   * Atomically takes the highest-priority, oldest claimable pending job, records the claim
   * and moves it to queued. Returns null when nothing is eligible.
   */
  claimNext(workerId: string, now: Date): Promise<VisualizationJob | null>;
  /**
   * Compare-and-set on status. Returns null when the stored status is no longer `from`.
   * Throws InvalidTransitionError for an edge the state machine does not define.
   */
  transition(
    jobId: string,
    from: VisualizationJobStatus,
    patch: VisualizationJobPatch,
  ): Promise<VisualizationJob | null>;
  failStaleClaims(olderThan: Date, message: string): Promise<VisualizationJob[]>;

  addImages(jobId: string, images: GeneratedImage[], selectedImageId: string): Promise<VisualizationJob>;
  selectImage(jobId: string, imageId: string): Promise<VisualizationJob>;
  deleteImage(jobId: string, imageId: string): Promise<VisualizationJob>;
  delete(jobId: string): Promise<boolean>;
  ping(): Promise<void>;
}

// Catalog
export interface CatalogPage {
  id: string;
  bookId: string;
  chapterId: string | null;
  pageNumber: number;
  content: string;
  isVisualizationPoint: boolean;
  hasVisualization: boolean;
}

export interface BookVisualizationSettings {
  isEnabled: boolean;
  isPublished: boolean;
  mode: VisualizationMode;
  allowedModes: VisualizationMode[];
  preferredProvider: ImageProviderKey | null;
  preferredStyle: string | null;
}

export interface PageVisualizationUpdate {
  bookId: string;
  chapterId: string | null;
  pageId: string;
  imageUrl: string;
  thumbnailUrl: string | null;
  jobId: string;
}

export interface ICatalogClient {
  getPage(pageId: string): Promise<CatalogPage | null>;
  getBookVisualizationSettings(bookId: string): Promise<BookVisualizationSettings | null>;
  getBookPages(bookId: string): Promise<CatalogPage[]>;
  setPageVisualization(update: PageVisualizationUpdate): Promise<void>;
}

// Prompt synthesis
export interface PromptEnhancementRequest {
  sourceText: string;
  style: string | null;
  targetModel: string;
  bookId: string;
  pageId: string | null;
  chapterId: string | null;
}

export interface PromptEnhancement {
  enhancedPrompt: string;
  negativePrompt: string | null;
  style: string | null;
  targetModel: string;
}

export interface IPromptSynthesizer {
  enhance(request: PromptEnhancementRequest): Promise<PromptEnhancement>;
}

// Object storage
export interface IImageStorage {
  uploadFile(filename: string, buffer: Buffer, contentType: string): Promise<string>;
  deleteFile(filename: string): Promise<void>;
}

// Progress notifications
export interface VisualizationProgressEvent {
  jobId: string;
  userId: string;
  bookId: string;
  pageId: string | null;
  status: VisualizationJobStatus;
  progressPercent: number;
  message: string;
  errorMessage?: string;
  imageUrl?: string;
  timestamp: string;
}

export interface INotificationChannel {
  /** Fire-and-forget; implementations never throw and never make the caller wait on delivery. */
  publish(event: VisualizationProgressEvent): void;
}
