import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Load root .env if present
dotenv.config({ path: path.join(__dirname, '../../../.env') });
// Fallback to local .env
dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  DATA_DIR: z.string().default(path.join(process.cwd(), 'data')),
  SCHEMA_DIR: z.string().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ROW_COERCION_POLICY: z.enum(['skip', 'strict']).default('skip'),
  RESTORE_BATCH_SIZE: z.coerce.number().int().positive().default(500),
  IO_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  IO_RETRIES: z.coerce.number().int().min(0).default(3),
  IO_BACKOFF_MS: z.coerce.number().int().min(0).default(100),
  FUZZY_NAME_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default('gemini-2.5-flash')
});

export type RowPolicy = 'skip' | 'strict';

export type RetryConfig = {
  timeoutMs: number;
  retries: number;
  backoffMs: number;
};

export type AppConfig = {
  port: number;
  dataDir: string;
  /** Directory of schema documents registered at startup. */
  schemaDir?: string;
  logLevel: string;
  rowPolicy: RowPolicy;
  batchSize: number;
  io: RetryConfig;
  fuzzyThreshold: number;
  gemini: { apiKey?: string; model: string };
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    dataDir: e.DATA_DIR,
    schemaDir: e.SCHEMA_DIR || undefined,
    logLevel: e.LOG_LEVEL,
    rowPolicy: e.ROW_COERCION_POLICY,
    batchSize: e.RESTORE_BATCH_SIZE,
    io: { timeoutMs: e.IO_TIMEOUT_MS, retries: e.IO_RETRIES, backoffMs: e.IO_BACKOFF_MS },
    fuzzyThreshold: e.FUZZY_NAME_THRESHOLD,
    gemini: { apiKey: e.GEMINI_API_KEY || undefined, model: e.GEMINI_MODEL }
  });
};

let cached: AppConfig | null = null;

export const getConfig = () => {
  if (!cached) cached = loadConfig();
  return cached;
};
