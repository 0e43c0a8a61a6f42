import { z } from 'zod';

type EnvSource = Record<string, string | undefined>;

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());
const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z
  .object({
    PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(8002)),
    HOST: z.preprocess(blankToUndefined, z.string().trim().default('0.0.0.0')),
    LOG_LEVEL: z.preprocess(
      blankToUndefined,
      z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info')
    ),
    DATABASE_URL: optionalString,
    CATALOG_FILE: z.preprocess(blankToUndefined, z.string().trim().default('data/products.json')),
    EMBEDDING_PROVIDER: z.preprocess(blankToUndefined, z.enum(['local', 'http']).default('local')),
    EMBEDDING_MODEL_PATH: z.preprocess(blankToUndefined, z.string().trim().default('models/catalog-hash-v1.json')),
    EMBEDDING_API_URL: z.preprocess(blankToUndefined, z.string().trim().url().optional()),
    EMBEDDING_API_KEY: optionalString,
    EMBEDDING_MODEL: optionalString,
    EMBEDDING_DIM: positiveInt(384),
    EMBED_TIMEOUT_MS: positiveInt(5000),
    STORE_TIMEOUT_MS: positiveInt(5000),
    INDEX_NLIST: positiveInt(128),
    INDEX_NPROBE: positiveInt(10),
    INGEST_BATCH_SIZE: positiveInt(64),
    SEARCH_SERVER_URL: z.preprocess(blankToUndefined, z.string().trim().url().default('http://127.0.0.1:8002'))
  })
  .superRefine((env, ctx) => {
    if (env.EMBEDDING_PROVIDER !== 'http') {
      return;
    }
    for (const key of ['EMBEDDING_API_URL', 'EMBEDDING_API_KEY', 'EMBEDDING_MODEL'] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: 'required when EMBEDDING_PROVIDER=http'
        });
      }
    }
  });

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export type EmbeddingConfig =
  | { provider: 'local'; modelPath: string; dimension: number; timeoutMs: number }
  | { provider: 'http'; apiUrl: string; apiKey: string; model: string; dimension: number; timeoutMs: number };

export type AppConfig = Readonly<{
  port: number;
  host: string;
  logLevel: LogLevel;
  databaseUrl?: string;
  catalogFile: string;
  embedding: EmbeddingConfig;
  storeTimeoutMs: number;
  index: { nlist: number; nprobe: number };
  ingestBatchSize: number;
  searchServerUrl: string;
}>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Parses and validates the environment. Throws ConfigError naming the first bad variable. */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') || 'environment';
    throw new ConfigError(`Invalid configuration: ${variable}: ${issue?.message ?? 'invalid value'}`);
  }

  const values = parsed.data;
  const embedding: EmbeddingConfig =
    values.EMBEDDING_PROVIDER === 'http'
      ? {
          provider: 'http',
          apiUrl: values.EMBEDDING_API_URL ?? '',
          apiKey: values.EMBEDDING_API_KEY ?? '',
          model: values.EMBEDDING_MODEL ?? '',
          dimension: values.EMBEDDING_DIM,
          timeoutMs: values.EMBED_TIMEOUT_MS
        }
      : {
          provider: 'local',
          modelPath: values.EMBEDDING_MODEL_PATH,
          dimension: values.EMBEDDING_DIM,
          timeoutMs: values.EMBED_TIMEOUT_MS
        };

  return Object.freeze({
    port: values.PORT,
    host: values.HOST,
    logLevel: values.LOG_LEVEL,
    databaseUrl: values.DATABASE_URL,
    catalogFile: values.CATALOG_FILE,
    embedding,
    storeTimeoutMs: values.STORE_TIMEOUT_MS,
    index: { nlist: values.INDEX_NLIST, nprobe: values.INDEX_NPROBE },
    ingestBatchSize: values.INGEST_BATCH_SIZE,
    searchServerUrl: values.SEARCH_SERVER_URL
  });
}
