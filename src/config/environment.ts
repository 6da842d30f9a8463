import { z } from 'zod';
import { config } from 'dotenv';
import fs from 'fs';

// Load environment variables based on NODE_ENV
const nodeEnv = process.env.NODE_ENV || 'development';

if (nodeEnv === 'production') {
  // Production variables come from the deployment; a local .env.production is optional
  if (fs.existsSync('.env.production')) {
    config({ path: '.env.production' });
  }
} else if (nodeEnv === 'development') {
  if (fs.existsSync('.env.local')) {
    config({ path: '.env.local' });
  }
  if (fs.existsSync('.env')) {
    config({ path: '.env' });
  }
} else {
  if (fs.existsSync(`.env.${nodeEnv}`)) {
    config({ path: `.env.${nodeEnv}` });
  }
  if (fs.existsSync('.env')) {
    config({ path: '.env' });
  }
}

const intVar = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => {
      const n = v ? parseInt(v, 10) : fallback;
      return Number.isNaN(n) ? fallback : n;
    });

const boolVar = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === '' ? fallback : v === 'true' || v === '1'));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']),
  PORT: intVar(8080),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional().default('info'),

  // Database (only required when JOB_STORE=postgres)
  DB_HOST: z.string().optional(),
  DB_PORT: intVar(5432),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_NAME: z.string().optional(),
  DB_SSL: boolVar(false),
  JOB_STORE: z.enum(['postgres', 'memory']).optional().default('postgres'),

  // Google Cloud Storage
  GOOGLE_CLOUD_PROJECT_ID: z.string().optional(),
  STORAGE_BUCKET_NAME: z.string().optional().default('page-visualizations'),

  // Image providers
  DEFAULT_IMAGE_PROVIDER: z
    .enum(['dalle3', 'stable-diffusion', 'flux', 'imagen'])
    .optional()
    .default('dalle3'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_IMAGE_MODEL: z.string().optional().default('dall-e-3'),
  STABILITY_API_KEY: z.string().optional(),
  STABILITY_MODEL: z.string().optional().default('stable-diffusion-xl-1024-v1-0'),
  FLUX_API_KEY: z.string().optional(),
  FLUX_MODEL: z.string().optional().default('flux-pro-1.1'),
  GOOGLE_GENAI_API_KEY: z.string().optional(),
  GOOGLE_GENAI_IMAGE_MODEL: z.string().optional().default('imagen-3.0-generate-002'),

  // Collaborators
  PROMPTGEN_API_URL: z.string().url().optional(),
  PROMPTGEN_API_KEY: z.string().optional(),
  CATALOG_API_URL: z.string().url().optional(),
  CATALOG_API_KEY: z.string().optional(),
  NOTIFICATION_ENGINE_URL: z.string().optional(),
  NOTIFICATION_ENGINE_API_KEY: z.string().optional(),
  VISUALIZATION_API_KEY: z.string().optional(),

  // Orchestrator tunables
  JOB_MAX_RETRIES: intVar(3),
  JOB_AUTO_RETRY_TRANSIENT: boolVar(true),
  JOB_RETRY_BASE_DELAY_MS: intVar(30000),
  JOB_RETRY_MAX_DELAY_MS: intVar(300000),
  PROVIDER_TIMEOUT_MS: intVar(60000),
  PROMPT_TIMEOUT_MS: intVar(30000),
  CATALOG_TIMEOUT_MS: intVar(10000),
  WORKER_CONCURRENCY: intVar(2),
  WORKER_POLL_INTERVAL_MS: intVar(1000),
  WORKER_MAX_POLL_INTERVAL_MS: intVar(15000),
  WORKER_STALE_CLAIM_MS: intVar(600000),
  THUMBNAIL_WIDTH: intVar(320),
});

export type Environment = z.infer<typeof envSchema>;

let cachedEnv: Environment | null = null;

export function getEnvironment(): Environment {
  if (cachedEnv) {
    return cachedEnv;
  }

  try {
    cachedEnv = envSchema.parse({
      ...process.env,
      NODE_ENV: process.env.NODE_ENV || 'development',
    });
    return cachedEnv;
  } catch (error) {
    console.error('Environment validation failed:', error);
    throw error;
  }
}

// Test-only helper so suites can re-read process.env
export function resetEnvironmentForTests(): void {
  cachedEnv = null;
}

export interface OrchestratorConfig {
  maxRetries: number;
  autoRetryTransient: boolean;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  providerTimeoutMs: number;
  promptTimeoutMs: number;
  catalogTimeoutMs: number;
  workerConcurrency: number;
  pollIntervalMs: number;
  maxPollIntervalMs: number;
  staleClaimMs: number;
  thumbnailWidth: number;
}

export function getOrchestratorConfig(env: Environment = getEnvironment()): OrchestratorConfig {
  return {
    maxRetries: env.JOB_MAX_RETRIES,
    autoRetryTransient: env.JOB_AUTO_RETRY_TRANSIENT,
    retryBaseDelayMs: env.JOB_RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: env.JOB_RETRY_MAX_DELAY_MS,
    providerTimeoutMs: env.PROVIDER_TIMEOUT_MS,
    promptTimeoutMs: env.PROMPT_TIMEOUT_MS,
    catalogTimeoutMs: env.CATALOG_TIMEOUT_MS,
    workerConcurrency: Math.max(1, env.WORKER_CONCURRENCY),
    pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
    maxPollIntervalMs: Math.max(env.WORKER_POLL_INTERVAL_MS, env.WORKER_MAX_POLL_INTERVAL_MS),
    staleClaimMs: env.WORKER_STALE_CLAIM_MS,
    thumbnailWidth: env.THUMBNAIL_WIDTH,
  };
}

export const databaseConfig = {
  get: () => {
    const env = getEnvironment();
    if (!env.DB_HOST || !env.DB_USER || !env.DB_NAME) {
      throw new Error('DB_HOST, DB_USER and DB_NAME are required when JOB_STORE=postgres');
    }
    return {
      host: env.DB_HOST,
      port: env.DB_PORT,
      user: env.DB_USER,
      password: env.DB_PASSWORD ?? '',
      database: env.DB_NAME,
      ssl: env.DB_SSL,
    };
  },
};

export const googleCloudConfig = {
  get: () => {
    const env = getEnvironment();
    return {
      projectId: env.GOOGLE_CLOUD_PROJECT_ID,
      storageBucket: env.STORAGE_BUCKET_NAME,
    };
  },
};
