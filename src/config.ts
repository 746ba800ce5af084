import { z } from 'zod';

// Importing the logger also loads .env into process.env.
import { logLevelSchema } from './logger';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  LLM_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  LLM_MODEL: z.string().min(1).default('mistralai/mistral-small-3.2-24b-instruct:free'),
  LLM_SUMMARIZER_MODEL: z.string().min(1).optional(),
  LLM_EXTRACTOR_MODEL: z.string().min(1).optional(),
  LLM_SCORER_MODEL: z.string().min(1).optional(),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),
  WORKER_POLL_INTERVAL_MS: z.coerce.number().int().min(0).default(5000),
  WORKER_BATCH_SIZE: z.coerce.number().int().min(1).default(5),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(1),
  WORKER_ERROR_BACKOFF_MS: z.coerce.number().int().min(0).default(10_000),
  RUN_WORKER_IN_PROCESS: booleanFlag,
  // Consumed by logger.ts.
  LOG_LEVEL: logLevelSchema.optional(),
});

export type WorkerConfig = {
  pollIntervalMs: number;
  batchSize: number;
  concurrency: number;
  errorBackoffMs: number;
};

/** Model per workload; each falls back to LLM_MODEL. */
export type LlmModels = {
  summarizer: string;
  extractor: string;
  scorer: string;
};

export type LlmConfig = {
  apiKey?: string;
  baseUrl: string;
  models: LlmModels;
  maxAttempts: number;
  retryDelayMs: number;
};

export type AppConfig = {
  port: number;
  databaseUrl?: string;
  llm: LlmConfig;
  worker: WorkerConfig;
  runWorkerInProcess: boolean;
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid environment configuration: ${fields}`);
  }

  const values = parsed.data;

  return {
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    llm: {
      apiKey: values.OPENAI_API_KEY,
      baseUrl: values.LLM_BASE_URL,
      models: {
        summarizer: values.LLM_SUMMARIZER_MODEL ?? values.LLM_MODEL,
        extractor: values.LLM_EXTRACTOR_MODEL ?? values.LLM_MODEL,
        scorer: values.LLM_SCORER_MODEL ?? values.LLM_MODEL,
      },
      maxAttempts: values.LLM_MAX_ATTEMPTS,
      retryDelayMs: values.LLM_RETRY_DELAY_MS,
    },
    worker: {
      pollIntervalMs: values.WORKER_POLL_INTERVAL_MS,
      batchSize: values.WORKER_BATCH_SIZE,
      concurrency: values.WORKER_CONCURRENCY,
      errorBackoffMs: values.WORKER_ERROR_BACKOFF_MS,
    },
    runWorkerInProcess: values.RUN_WORKER_IN_PROCESS,
  };
};

export const requireDatabaseUrl = (config: AppConfig): string => {
  if (!config.databaseUrl) {
    throw new Error('Database not configured. Set DATABASE_URL to a PostgreSQL connection string.');
  }

  return config.databaseUrl;
};
