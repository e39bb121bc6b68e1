import dotenv from 'dotenv';
import { z } from 'zod';
import {
  CHUNKING_CONFIG,
  EMBEDDING_CONFIG,
  GENERATION_CONFIG,
  RAG_DEFAULTS,
} from '@corpus-gate/shared';

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGINS: z.string().default('http://localhost:3001'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  INDEX_DIR: z.string().default('index'),
  DATA_DIR: z.string().default('data'),

  EMBEDDING_SERVICE_URL: z.string().url().default('http://localhost:8000'),
  EMBEDDING_MODEL: z.string().min(1).default(EMBEDDING_CONFIG.MODEL),
  EMBEDDING_CACHE_TTL: z.coerce.number().int().positive().default(EMBEDDING_CONFIG.CACHE_TTL),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(EMBEDDING_CONFIG.TIMEOUT_MS),
  REDIS_URL: optionalString,

  GENERATION_PROVIDER: z.enum(['ollama', 'groq', 'openai']).default('ollama'),
  GENERATION_URL: z.string().url().default(GENERATION_CONFIG.URL),
  GENERATION_MODEL: z.string().min(1).default(GENERATION_CONFIG.MODEL),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(GENERATION_CONFIG.TIMEOUT_MS),
  GROQ_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,

  RAG_TOP_K: z.coerce.number().int().positive().default(RAG_DEFAULTS.TOP_K),
  RAG_MIN_SCORE: z.coerce.number().min(-1).max(1).default(RAG_DEFAULTS.MIN_SCORE),
  RAG_MAX_CONTEXT_CHARS: z.coerce.number().int().positive().default(RAG_DEFAULTS.MAX_CONTEXT_CHARS),

  INGEST_CHUNK_SIZE: z.coerce.number().int().positive().default(CHUNKING_CONFIG.CHUNK_SIZE),
  INGEST_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(CHUNKING_CONFIG.CHUNK_OVERLAP),
});

export type GenerationProvider = z.infer<typeof EnvSchema>['GENERATION_PROVIDER'];

/**
 * Build the service configuration from environment variables.
 * Throws when a variable is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  if (e.INGEST_CHUNK_OVERLAP >= e.INGEST_CHUNK_SIZE) {
    throw new Error('Invalid configuration: INGEST_CHUNK_OVERLAP must be less than INGEST_CHUNK_SIZE');
  }

  return {
    // Server
    env: e.NODE_ENV,
    host: e.HOST,
    port: e.PORT,
    corsOrigins: e.CORS_ORIGINS.split(',').map((origin) => origin.trim()),
    logLevel: e.LOG_LEVEL,

    // Index artifacts
    index: {
      dir: e.INDEX_DIR,
      dataDir: e.DATA_DIR,
    },

    // Embeddings (same model as ingestion)
    embeddings: {
      serviceUrl: e.EMBEDDING_SERVICE_URL,
      model: e.EMBEDDING_MODEL,
      cacheTtl: e.EMBEDDING_CACHE_TTL,
      timeoutMs: e.EMBEDDING_TIMEOUT_MS,
    },

    redis: {
      url: e.REDIS_URL,
    },

    // Generation collaborator
    generation: {
      provider: e.GENERATION_PROVIDER,
      url: e.GENERATION_URL,
      model: e.GENERATION_MODEL,
      timeoutMs: e.GENERATION_TIMEOUT_MS,
      groqApiKey: e.GROQ_API_KEY,
      openaiApiKey: e.OPENAI_API_KEY,
    },

    // RAG gates
    rag: {
      topK: e.RAG_TOP_K,
      minScore: e.RAG_MIN_SCORE,
      maxContextChars: e.RAG_MAX_CONTEXT_CHARS,
    },

    ingestion: {
      chunkSize: e.INGEST_CHUNK_SIZE,
      chunkOverlap: e.INGEST_CHUNK_OVERLAP,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config = loadConfig();
