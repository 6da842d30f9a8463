import { jest } from '@jest/globals';
import type { IImageGateway, ImageGenerationRequest, ImageResult } from '../../ai/interfaces';
import type {
  BookVisualizationSettings,
  CatalogPage,
  ICatalogClient,
  IImageStorage,
  INotificationChannel,
  IPromptSynthesizer,
  PageVisualizationUpdate,
  PromptEnhancement,
  PromptEnhancementRequest,
  VisualizationProgressEvent,
} from '../../shared/interfaces';
import type { ImageInfo, ImageProcessor } from '../../utils/imageUtils';
import { buildNewJob, defaultParameters } from '../../services/visualization-job';
import type { ImageProviderKey, NewVisualizationJob } from '../../types/visualization';

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00]);

export function makeNewJob(overrides: Partial<NewVisualizationJob> = {}): NewVisualizationJob {
  return {
    ...buildNewJob(
      {
        bookId: 'book-1',
        pageId: 'page-1',
        chapterId: 'chapter-1',
        trigger: 'page_request',
        userId: 'user-1',
        preferredProvider: null,
        parameters: defaultParameters(),
      },
      new Date('2026-01-01T00:00:00Z'),
    ),
    ...overrides,
  };
}

export function makePage(overrides: Partial<CatalogPage> = {}): CatalogPage {
  return {
    id: 'page-1',
    bookId: 'book-1',
    chapterId: 'chapter-1',
    pageNumber: 1,
    content: 'The lighthouse keeper climbed the spiral stairs at dusk.',
    isVisualizationPoint: false,
    hasVisualization: false,
    ...overrides,
  };
}

export function makeSettings(overrides: Partial<BookVisualizationSettings> = {}): BookVisualizationSettings {
  return {
    isEnabled: true,
    isPublished: true,
    mode: 'per_page',
    allowedModes: ['per_page'],
    preferredProvider: null,
    preferredStyle: null,
    ...overrides,
  };
}

/** Catalog backed by plain maps. */
export class FakeCatalog implements ICatalogClient {
  pages = new Map<string, CatalogPage>();
  settings = new Map<string, BookVisualizationSettings>();
  updates: PageVisualizationUpdate[] = [];
  failPageReads = false;

  addPage(page: CatalogPage): this {
    this.pages.set(page.id, page);
    return this;
  }

  async getPage(pageId: string): Promise<CatalogPage | null> {
    if (this.failPageReads) {
      throw new Error('catalog down');
    }
    return this.pages.get(pageId) ?? null;
  }

  async getBookVisualizationSettings(bookId: string): Promise<BookVisualizationSettings | null> {
    return this.settings.get(bookId) ?? null;
  }

  async getBookPages(bookId: string): Promise<CatalogPage[]> {
    return [...this.pages.values()].filter((page) => page.bookId === bookId);
  }

  async setPageVisualization(update: PageVisualizationUpdate): Promise<void> {
    this.updates.push(update);
  }
}

export class RecordingChannel implements INotificationChannel {
  events: VisualizationProgressEvent[] = [];

  publish(event: VisualizationProgressEvent): void {
    this.events.push(event);
  }

  statuses(): string[] {
    return this.events.map((event) => event.status);
  }
}

export class MemoryStorage implements IImageStorage {
  files = new Map<string, { buffer: Buffer; contentType: string }>();
  deleted: string[] = [];
  failUploads = false;

  async uploadFile(filename: string, buffer: Buffer, contentType: string): Promise<string> {
    if (this.failUploads) {
      throw new Error('bucket unavailable');
    }
    this.files.set(filename, { buffer, contentType });
    return `https://storage.test/${filename}`;
  }

  async deleteFile(filename: string): Promise<void> {
    this.deleted.push(filename);
    this.files.delete(filename);
  }
}

export function fakeSynthesizer(
  impl?: (request: PromptEnhancementRequest) => Promise<PromptEnhancement>,
) {
  const enhance = jest.fn<(request: PromptEnhancementRequest) => Promise<PromptEnhancement>>(
    impl ??
      (async (request: PromptEnhancementRequest) => ({
        enhancedPrompt: `Illustration: ${request.sourceText}`,
        negativePrompt: null,
        style: request.style,
        targetModel: request.targetModel,
      })),
  );
  const synthesizer: IPromptSynthesizer = { enhance };
  return { synthesizer, enhance };
}

export function fakeGateway(
  impl?: (request: ImageGenerationRequest) => Promise<ImageResult>,
  defaultProvider: ImageProviderKey = 'dalle3',
) {
  const generate = jest.fn<(request: ImageGenerationRequest) => Promise<ImageResult>>(
    impl ??
      (async (request: ImageGenerationRequest) => ({
        buffer: PNG_BYTES,
        width: 1024,
        height: 1024,
        format: 'png' as const,
        mimeType: 'image/png',
        provider: request.provider,
        revisedPrompt: null,
        sourceUrl: null,
      })),
  );
  const gateway: IImageGateway = {
    generate,
    getDefaultProvider: () => defaultProvider,
    isConfigured: () => true,
  };
  return { gateway, generate };
}

/** Reports the provider's dimensions back and renders a fixed thumbnail. */
export class StubImageProcessor implements ImageProcessor {
  constructor(
    private readonly info: ImageInfo | null = { width: 1024, height: 1024, format: 'png' },
    private readonly thumb: Buffer | null = Buffer.from('thumb'),
  ) {}

  async inspect(): Promise<ImageInfo | null> {
    return this.info;
  }

  async thumbnail(): Promise<Buffer | null> {
    return this.thumb;
  }
}
