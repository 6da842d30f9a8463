import { EventEmitter } from 'events';
import { logger } from '@/config/logger.js';
import { getEnvironment } from '@/config/environment.js';
import type { INotificationChannel, VisualizationProgressEvent } from '@/shared/interfaces.js';

export interface HttpNotificationChannelOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
}

function buildHeaders(apiKey: string | undefined): Record<string, string> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (apiKey) {
    headers['Authorization'] = `Bearer ${apiKey}`;
    headers['X-API-Key'] = apiKey; // backup for middleware
  }
  return headers;
}

/**
 * Posts progress events to the notification engine. Delivery failures are logged only.
 */
export class HttpNotificationChannel implements INotificationChannel {
  private readonly url: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly inFlight = new Set<Promise<boolean>>();

  constructor(options: HttpNotificationChannelOptions) {
    this.url = `${options.baseUrl.replace(/\/$/, '')}/visualization/progress`;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  publish(event: VisualizationProgressEvent): void {
    const delivery = this.deliver(event);
    this.inFlight.add(delivery);
    void delivery.finally(() => this.inFlight.delete(delivery));
  }

  /** Resolves once every pending delivery has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  async deliver(event: VisualizationProgressEvent): Promise<boolean> {
    try {
      const res = await fetch(this.url, {
        method: 'POST',
        headers: buildHeaders(this.apiKey),
        body: JSON.stringify(event),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!res.ok) {
        const text = await res.text();
        logger.error('Failed to deliver visualization progress event', {
          jobId: event.jobId,
          status: res.status,
          statusText: res.statusText,
          body: text,
        });
        return false;
      }

      logger.debug('Visualization progress event delivered', {
        jobId: event.jobId,
        status: event.status,
      });
      return true;
    } catch (err) {
      logger.error('Error calling notification engine', {
        error: err instanceof Error ? err.message : String(err),
        jobId: event.jobId,
        url: this.url,
      });
      return false;
    }
  }

  static fromEnvironment(): HttpNotificationChannel | null {
    const env = getEnvironment();
    if (!env.NOTIFICATION_ENGINE_URL) {
      logger.warn('Notification Engine URL not configured; progress events stay in process');
      return null;
    }
    return new HttpNotificationChannel({
      baseUrl: env.NOTIFICATION_ENGINE_URL,
      ...(env.NOTIFICATION_ENGINE_API_KEY && { apiKey: env.NOTIFICATION_ENGINE_API_KEY }),
    });
  }
}

type ProgressListener = (event: VisualizationProgressEvent) => void;

/**
 * In-process fan-out. A throwing listener is logged and does not affect the others.
 */
export class InProcessNotificationChannel implements INotificationChannel {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  publish(event: VisualizationProgressEvent): void {
    this.emitter.emit('progress', event);
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: ProgressListener): () => void {
    const guarded = (event: VisualizationProgressEvent) => {
      try {
        listener(event);
      } catch (error) {
        logger.warn('Progress listener threw', {
          jobId: event.jobId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    };
    this.emitter.on('progress', guarded);
    return () => {
      this.emitter.off('progress', guarded);
    };
  }

  listenerCount(): number {
    return this.emitter.listenerCount('progress');
  }
}

export class CompositeNotificationChannel implements INotificationChannel {
  constructor(private readonly channels: INotificationChannel[]) {}

  publish(event: VisualizationProgressEvent): void {
    for (const channel of this.channels) {
      try {
        channel.publish(event);
      } catch (error) {
        logger.warn('Notification channel threw on publish', {
          jobId: event.jobId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
