/**
 * Error utilities for log metadata
 */

export interface ErrorDetails {
  message: string;
  stack?: string;
  name?: string;
  code?: string;
  status?: number;
  details?: unknown;
  timestamp: string;
}

/**
 * Serialize an error object to a plain object with all relevant details
 */
export function serializeError(error: unknown): ErrorDetails {
  const timestamp = new Date().toISOString();

  if (error instanceof Error) {
    const details: ErrorDetails = {
      message: error.message,
      name: error.name,
      timestamp,
    };

    if (error.stack) {
      details.stack = error.stack;
    }

    const code: unknown = Reflect.get(error, 'code');
    if (code !== undefined) {
      details.code = String(code);
    }

    const status: unknown = Reflect.get(error, 'status');
    if (typeof status === 'number' || typeof status === 'string') {
      details.status = Number(status);
    }

    const additionalProps: Record<string, unknown> = {};
    for (const key of Object.getOwnPropertyNames(error)) {
      if (['message', 'name', 'stack', 'code', 'status'].includes(key)) continue;
      const value: unknown = Reflect.get(error, key);
      if (typeof value !== 'function' && typeof value !== 'symbol') {
        additionalProps[key] = value;
      }
    }

    if (Object.keys(additionalProps).length > 0) {
      details.details = additionalProps;
    }

    return details;
  }

  return {
    message: String(error),
    name: 'UnknownError',
    timestamp,
    details: {
      originalType: typeof error,
      originalValue: error,
    },
  };
}

/**
 * Create a Google Cloud Storage specific error handler
 */
export function handleGCSError(error: unknown, context: Record<string, unknown> = {}): ErrorDetails {
  const serialized = serializeError(error);

  return {
    ...serialized,
    details: {
      ...(serialized.details && typeof serialized.details === 'object' ? serialized.details : {}),
      context,
      troubleshooting: getGCSTroubleshootingHints(serialized),
    },
  };
}

function getGCSTroubleshootingHints(error: ErrorDetails): string[] {
  const hints: string[] = [];
  const message = error.message.toLowerCase();

  if (error.code === '403' || message.includes('permission') || message.includes('forbidden')) {
    hints.push('Check Google Cloud Storage bucket permissions');
    hints.push('Verify service account has Storage Object Admin role');
  }

  if (error.code === '404' || message.includes('not found')) {
    hints.push('Verify STORAGE_BUCKET_NAME points at an existing bucket');
  }

  if (message.includes('quota') || message.includes('rate limit')) {
    hints.push('Check Google Cloud Storage quotas and limits');
  }

  if (message.includes('authentication')) {
    hints.push('Verify GOOGLE_APPLICATION_CREDENTIALS or service account key');
  }

  return hints;
}
