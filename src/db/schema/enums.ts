import { pgEnum } from 'drizzle-orm/pg-core';
import {
  FAILURE_CATEGORIES,
  IMAGE_FORMATS,
  IMAGE_PROVIDERS,
  VISUALIZATION_JOB_STATUSES,
  VISUALIZATION_TRIGGERS,
} from '../../types/visualization.js';

// -----------------------------------------------------------------------------
// Enumerated types
// -----------------------------------------------------------------------------

export const visualizationJobStatusEnum = pgEnum('visualization_job_status', VISUALIZATION_JOB_STATUSES);
export const visualizationTriggerEnum = pgEnum('visualization_trigger', VISUALIZATION_TRIGGERS);
export const imageProviderEnum = pgEnum('image_provider', IMAGE_PROVIDERS);
export const failureCategoryEnum = pgEnum('visualization_failure_category', FAILURE_CATEGORIES);
export const imageFormatEnum = pgEnum('image_format', IMAGE_FORMATS);
