import { z } from "zod";
import { ConfigurationError } from "./domain/errors.js";

const intFrom = (fallback: number, min: number) =>
  z.coerce
    .number()
    .int()
    .optional()
    .transform((value) => Math.max(min, value ?? fallback));

const envSchema = z.object({
  PORT: intFrom(8787, 1),
  CORS_ORIGIN: z.string().optional(),
  DIRECTORY_URL: z.string().url().default("https://lafrenchtech-lareunion.com/annuaire/"),
  DIRECTORY_MAX_PAGES: intFrom(10, 1),
  DIRECTORY_DEFAULT_LOCATION: z.string().default("La Réunion"),
  DIRECTORY_DEFAULT_DOMAIN: z.string().default("Technologie"),
  CRAWL_FETCH_TIMEOUT_MS: intFrom(15_000, 2000),
  CRAWL_FETCH_RETRIES: intFrom(3, 1),
  CRAWL_DAILY_AT: z
    .string()
    .regex(/^\d{2}:\d{2}$/)
    .default("03:00"),
  CRAWL_SCHEDULER: z.enum(["daily", "interval"]).default("daily"),
  DATA_DIR: z.string().default("server/data"),
  DATABASE_URL: z.string().optional(),
  DATABASE_SSL: z.string().optional(),
  MISTRAL_API_KEY: z.string().trim().optional(),
  MISTRAL_BASE_URL: z.string().url().default("https://api.mistral.ai/v1"),
  LLM_MODEL: z.string().default("mistral-large-latest"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LLM_MAX_TOKENS: intFrom(4000, 100),
  EMBEDDING_MODEL: z.string().default("mistral-embed"),
  EMBEDDING_BATCH_SIZE: intFrom(10, 1),
  RAG_CHUNK_SIZE: intFrom(1000, 100),
  RAG_CHUNK_OVERLAP: intFrom(200, 0),
  MATCH_ZERO_RESULT_POLICY: z.enum(["random_sample", "empty"]).default("random_sample")
});

export type AppEnv = z.infer<typeof envSchema>;

export interface AppConfig {
  port: number;
  corsOrigin?: string[];
  directory: {
    url: string;
    maxPages: number;
    defaultLocation: string;
    defaultDomain: string;
  };
  crawl: {
    fetchTimeoutMs: number;
    fetchRetries: number;
    dailyAt: string;
    scheduler: "daily" | "interval";
  };
  storage: {
    dataDir: string;
    databaseUrl?: string;
    databaseSsl: boolean;
  };
  mistral: {
    apiKey: string;
    baseUrl: string;
    embeddingModel: string;
    embeddingBatchSize: number;
  };
  llm: {
    model: string;
    temperature: number;
    maxTokens: number;
  };
  rag: {
    chunkSize: number;
    chunkOverlap: number;
  };
  zeroMatchPolicy: "random_sample" | "empty";
}

export function parseEnv(env: NodeJS.ProcessEnv): AppEnv {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    console.error("[config] Invalid environment", parsed.error.flatten().fieldErrors);
    throw new ConfigurationError("Invalid environment configuration");
  }
  return parsed.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = parseEnv(env);

  const apiKey = parsed.MISTRAL_API_KEY ?? "";
  if (!apiKey) {
    throw new ConfigurationError("MISTRAL_API_KEY is not configured. Add it to the environment before starting the server.");
  }

  return {
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN ? parsed.CORS_ORIGIN.split(",").map((value) => value.trim()) : undefined,
    directory: {
      url: parsed.DIRECTORY_URL,
      maxPages: parsed.DIRECTORY_MAX_PAGES,
      defaultLocation: parsed.DIRECTORY_DEFAULT_LOCATION,
      defaultDomain: parsed.DIRECTORY_DEFAULT_DOMAIN
    },
    crawl: {
      fetchTimeoutMs: parsed.CRAWL_FETCH_TIMEOUT_MS,
      fetchRetries: parsed.CRAWL_FETCH_RETRIES,
      dailyAt: parsed.CRAWL_DAILY_AT,
      scheduler: parsed.CRAWL_SCHEDULER
    },
    storage: {
      dataDir: parsed.DATA_DIR,
      databaseUrl: parsed.DATABASE_URL || undefined,
      databaseSsl: parsed.DATABASE_SSL !== "disable"
    },
    mistral: {
      apiKey,
      baseUrl: parsed.MISTRAL_BASE_URL,
      embeddingModel: parsed.EMBEDDING_MODEL,
      embeddingBatchSize: parsed.EMBEDDING_BATCH_SIZE
    },
    llm: {
      model: parsed.LLM_MODEL,
      temperature: parsed.LLM_TEMPERATURE,
      maxTokens: parsed.LLM_MAX_TOKENS
    },
    rag: {
      chunkSize: parsed.RAG_CHUNK_SIZE,
      chunkOverlap: parsed.RAG_CHUNK_OVERLAP
    },
    zeroMatchPolicy: parsed.MATCH_ZERO_RESULT_POLICY
  };
}
