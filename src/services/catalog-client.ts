/**
 * Catalog Client
 * Reads pages and book visualization settings from the catalog service and writes the
 * finished illustration back to the page.
 */

import { z } from 'zod';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { withRetry, type RetryOptions } from '@/shared/retry-utils.js';
import { IMAGE_PROVIDERS, VISUALIZATION_MODES } from '@/types/visualization.js';
import type {
  BookVisualizationSettings,
  CatalogPage,
  ICatalogClient,
  PageVisualizationUpdate,
} from '@/shared/interfaces.js';

export class CatalogRequestError extends Error {
  public readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'CatalogRequestError';
    this.status = status;
  }
}

const envelope = <T extends z.ZodTypeAny>(data: T) =>
  z.object({
    success: z.boolean().optional(),
    message: z.string().nullish(),
    data,
  });

const pageSchema = z.object({
  id: z.string(),
  bookId: z.string(),
  chapterId: z.string().nullish(),
  pageNumber: z.number().int(),
  content: z.string().default(''),
  isVisualizationPoint: z.boolean().default(false),
  hasVisualization: z.boolean().default(false),
});

const settingsSchema = z.object({
  isEnabled: z.boolean(),
  isPublished: z.boolean().default(true),
  mode: z.enum(VISUALIZATION_MODES),
  allowedModes: z.array(z.enum(VISUALIZATION_MODES)).default([]),
  preferredProvider: z.enum(IMAGE_PROVIDERS).nullish(),
  preferredStyle: z.string().nullish(),
});

const bookPagesSchema = z.object({
  pages: z.array(
    z.object({
      pageId: z.string(),
      chapterId: z.string().nullish(),
      pageNumber: z.number().int(),
      content: z.string().default(''),
      isVisualizationPoint: z.boolean().default(false),
      hasVisualization: z.boolean().default(false),
    }),
  ),
});

export interface CatalogClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  writeBackRetry?: RetryOptions;
}

export class HttpCatalogClient implements ICatalogClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly writeBackRetry: RetryOptions;

  constructor(options: CatalogClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.writeBackRetry = options.writeBackRetry ?? { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 5000 };
  }

  async getPage(pageId: string): Promise<CatalogPage | null> {
    const body = await this.getJson(`/api/v1/pages/${encodeURIComponent(pageId)}`);
    if (body === null) {
      return null;
    }
    const page = this.parse(envelope(pageSchema), body, `/api/v1/pages/${pageId}`).data;
    return { ...page, chapterId: page.chapterId ?? null };
  }

  async getBookVisualizationSettings(bookId: string): Promise<BookVisualizationSettings | null> {
    const body = await this.getJson(`/api/v1/books/${encodeURIComponent(bookId)}/visualization-settings`);
    if (body === null) {
      return null;
    }
    const settings = this.parse(envelope(settingsSchema), body, `/api/v1/books/${bookId}/visualization-settings`).data;
    return {
      ...settings,
      preferredProvider: settings.preferredProvider ?? null,
      preferredStyle: settings.preferredStyle ?? null,
    };
  }

  async getBookPages(bookId: string): Promise<CatalogPage[]> {
    const body = await this.getJson(`/api/v1/books/${encodeURIComponent(bookId)}/pages-for-visualization`);
    if (body === null) {
      return [];
    }
    return this.parse(envelope(bookPagesSchema), body, `/api/v1/books/${bookId}/pages-for-visualization`)
      .data.pages.map((page) => ({
        id: page.pageId,
        bookId,
        chapterId: page.chapterId ?? null,
        pageNumber: page.pageNumber,
        content: page.content,
        isVisualizationPoint: page.isVisualizationPoint,
        hasVisualization: page.hasVisualization,
      }));
  }

  async setPageVisualization(update: PageVisualizationUpdate): Promise<void> {
    await withRetry(async () => {
      const response = await fetch(`${this.baseUrl}/api/v1/pages/${encodeURIComponent(update.pageId)}/visualization`, {
        method: 'PUT',
        headers: this.headers(),
        body: JSON.stringify({
          hasVisualization: true,
          visualizationImageUrl: update.imageUrl,
          thumbnailUrl: update.thumbnailUrl,
          visualizationJobId: update.jobId,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        const text = await response.text();
        throw new CatalogRequestError(
          `Failed to update page visualization: ${response.status} ${text.slice(0, 200)}`.trim(),
          response.status,
        );
      }
    }, this.writeBackRetry);

    logger.info('Catalog page visualization updated', {
      bookId: update.bookId,
      pageId: update.pageId,
      jobId: update.jobId,
    });
  }

  private async getJson(path: string): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      headers: this.headers(),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      const text = await response.text();
      logger.warn('Catalog request failed', { path, status: response.status, body: text.slice(0, 500) });
      throw new CatalogRequestError(`Catalog request ${path} failed: ${response.status}`, response.status);
    }
    return response.json();
  }

  /** A body that does not match the contract is reported as a bad gateway answer. */
  private parse<S extends z.ZodTypeAny>(schema: S, body: unknown, path: string): z.output<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      logger.warn('Catalog response did not match the expected shape', { path, issues });
      throw new CatalogRequestError(`Catalog response for ${path} is malformed: ${issues}`, 502);
    }
    return result.data;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.apiKey) {
      headers['x-api-key'] = this.apiKey;
    }
    return headers;
  }

  static fromEnvironment(): HttpCatalogClient {
    const env = getEnvironment();
    if (!env.CATALOG_API_URL) {
      throw new Error('CATALOG_API_URL is required');
    }
    return new HttpCatalogClient({
      baseUrl: env.CATALOG_API_URL,
      ...(env.CATALOG_API_KEY && { apiKey: env.CATALOG_API_KEY }),
      timeoutMs: env.CATALOG_TIMEOUT_MS,
    });
  }
}
