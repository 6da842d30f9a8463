import { sql } from 'drizzle-orm';
import {
  pgTable,
  uuid,
  varchar,
  text,
  integer,
  boolean,
  timestamp,
  jsonb,
  index,
  uniqueIndex,
  foreignKey,
} from 'drizzle-orm/pg-core';
import {
  failureCategoryEnum,
  imageFormatEnum,
  imageProviderEnum,
  visualizationJobStatusEnum,
  visualizationTriggerEnum,
} from './enums.js';
import type { GenerationParameters, PromptData, TextSelection } from '../../types/visualization.js';

// -----------------------------------------------------------------------------
// Visualization Jobs Table
// -----------------------------------------------------------------------------

export const visualizationJobs = pgTable(
  'visualization_jobs',
  {
    jobId: uuid('job_id').primaryKey().notNull(),
    bookId: varchar('book_id', { length: 200 }).notNull(), // cross-service reference, no FK
    pageId: varchar('page_id', { length: 200 }),
    chapterId: varchar('chapter_id', { length: 200 }),
    trigger: visualizationTriggerEnum().notNull(),
    userId: varchar('user_id', { length: 200 }).notNull(),
    status: visualizationJobStatusEnum().default('pending').notNull(),
    preferredProvider: imageProviderEnum('preferred_provider'),
    priority: integer('priority').default(0).notNull(),
    promptData: jsonb('prompt_data').$type<PromptData>(),
    textSelection: jsonb('text_selection').$type<TextSelection>(),
    parameters: jsonb('parameters').$type<GenerationParameters>().notNull(),
    errorMessage: text('error_message'),
    errorCategory: failureCategoryEnum('error_category'),
    retryCount: integer('retry_count').default(0).notNull(),
    retriedAfterRejection: boolean('retried_after_rejection').default(false).notNull(),
    regeneratedFromJobId: uuid('regenerated_from_job_id'),
    claimedBy: varchar('claimed_by', { length: 120 }),
    claimedAt: timestamp('claimed_at', { withTimezone: true, mode: 'date' }),
    availableAt: timestamp('available_at', { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
    selectedImageId: uuid('selected_image_id'),
    processingStartedAt: timestamp('processing_started_at', { withTimezone: true, mode: 'date' }),
    completedAt: timestamp('completed_at', { withTimezone: true, mode: 'date' }),
    createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
  },
  (table) => [
    // One non-terminal job per target and trigger
    uniqueIndex('visualization_jobs_active_target_uidx')
      .on(table.bookId, table.pageId, table.trigger)
      .where(sql`${table.status} not in ('completed', 'failed', 'cancelled')`),
    index('visualization_jobs_claim_idx').on(table.status, table.priority.desc(), table.createdAt),
    index('visualization_jobs_book_id_idx').on(table.bookId),
    index('visualization_jobs_user_id_idx').on(table.userId),
  ],
);

// -----------------------------------------------------------------------------
// Generated Images Table
// -----------------------------------------------------------------------------

export const generatedImages = pgTable(
  'generated_images',
  {
    imageId: uuid('image_id').primaryKey().notNull(),
    jobId: uuid('job_id').notNull(),
    url: text('url').notNull(),
    thumbnailUrl: text('thumbnail_url'),
    storagePath: text('storage_path').notNull(),
    width: integer('width').notNull(),
    height: integer('height').notNull(),
    fileSizeBytes: integer('file_size_bytes').notNull(),
    format: imageFormatEnum().notNull(),
    mimeType: varchar('mime_type', { length: 50 }).notNull(),
    provider: imageProviderEnum().notNull(),
    revisedPrompt: text('revised_prompt'),
    isSelected: boolean('is_selected').default(false).notNull(),
    isDeleted: boolean('is_deleted').default(false).notNull(),
    position: integer('position').notNull(),
    generatedAt: timestamp('generated_at', { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
  },
  (table) => [
    foreignKey({
      columns: [table.jobId],
      foreignColumns: [visualizationJobs.jobId],
      name: 'generated_images_job_id_visualization_jobs_job_id_fk',
    }).onDelete('cascade'),
    index('generated_images_job_id_idx').on(table.jobId),
  ],
);

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type InsertVisualizationJob = typeof visualizationJobs.$inferInsert;
export type SelectVisualizationJob = typeof visualizationJobs.$inferSelect;

export type InsertGeneratedImage = typeof generatedImages.$inferInsert;
export type SelectGeneratedImage = typeof generatedImages.$inferSelect;
