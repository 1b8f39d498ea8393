import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().default(8082),
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  AZURE_API_VERSION: z.string().optional(),
  BIG_MODEL: z.string().default("gpt-4o"),
  MIDDLE_MODEL: z.string().optional(),
  SMALL_MODEL: z.string().default("gpt-4o-mini"),
  DEFAULT_MODEL: z.string().optional(),
  DEFAULT_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  MAX_TOKENS_LIMIT: z.coerce.number().int().positive().optional(),
  REQUEST_TIMEOUT: z.coerce.number().positive().default(90),
  CORS_ORIGIN: z.string().default("*"),
  LOG_LEVEL: z.string().default("info"),
  DATABASE_URL: z.string().optional(),
});

export type ApiType = "openai" | "azure";

export interface ModelMappingConfig {
  bigModel: string;
  middleModel: string;
  smallModel: string;
  defaultModel?: string;
}

export interface BackendConfig {
  apiKey: string;
  baseUrl: string;
  apiType: ApiType;
  azureApiVersion?: string;
}

export interface AppConfig {
  env: "development" | "production" | "test";
  host: string;
  port: number;
  backend: BackendConfig;
  models: ModelMappingConfig;
  defaultMaxTokens: number;
  maxTokensLimit?: number;
  requestTimeoutMs: number;
  corsOrigin: string;
  logLevel: string;
  databaseUrl?: string;
}

export class ConfigError extends Error {
  constructor(public fieldErrors: Record<string, string[] | undefined>) {
    super("Invalid environment variables");
    this.name = "ConfigError";
  }
}

/** Builds an AppConfig from an environment map. Throws ConfigError on invalid input. */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }
  const data = parsed.data;

  return {
    env: data.NODE_ENV,
    host: data.HOST,
    port: data.PORT,
    backend: {
      apiKey: data.OPENAI_API_KEY,
      baseUrl: data.OPENAI_BASE_URL,
      apiType: data.AZURE_API_VERSION ? "azure" : "openai",
      azureApiVersion: data.AZURE_API_VERSION,
    },
    models: {
      bigModel: data.BIG_MODEL,
      middleModel: data.MIDDLE_MODEL ?? data.BIG_MODEL,
      smallModel: data.SMALL_MODEL,
      defaultModel: data.DEFAULT_MODEL,
    },
    defaultMaxTokens: data.DEFAULT_MAX_TOKENS,
    maxTokensLimit: data.MAX_TOKENS_LIMIT,
    requestTimeoutMs: data.REQUEST_TIMEOUT * 1000,
    corsOrigin: data.CORS_ORIGIN,
    logLevel: data.LOG_LEVEL,
    databaseUrl: data.DATABASE_URL,
  };
}

function loadProcessConfig(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error("Invalid environment variables:", err.fieldErrors);
      process.exit(1);
    }
    throw err;
  }
}

export const config: AppConfig = loadProcessConfig();
