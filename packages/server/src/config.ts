import { z } from 'zod';

const numericEnv = (value: unknown, defaultValue: number): number => {
  if (value === undefined || value === null || value === "") {
    return defaultValue;
  }

  if (typeof value === "number") {
    return value;
  }

  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed)) {
      throw new Error(`Expected numeric string but received ${value}`);
    }

    return parsed;
  }

  throw new Error(`Unsupported numeric env value: ${String(value)}`);
};

const numeric = (defaultValue: number, schema: z.ZodNumber) =>
  z.preprocess((value) => numericEnv(value, defaultValue), schema);

const configSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: numeric(8000, z.number().int().min(1).max(65535)),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  JWT_SECRET: z
    .string()
    .min(1, "JWT_SECRET is required")
    .default("development-insecure-secret"),
  JWT_ISSUER: z.string().default("tradepost"),
  JWT_AUDIENCE: z.string().default("tradepost.api"),
  CLIENT_ORIGIN: z.string().default("http://localhost:5173"),
  PGHOST: z.string().default("127.0.0.1"),
  PGPORT: numeric(5432, z.number().int().min(1).max(65535)),
  PGDATABASE: z.string().default("tradepost"),
  PGUSER: z.string().default("tradepost"),
  PGPASSWORD: z.string().default("tradepost"),
  PG_POOL_MIN: numeric(0, z.number().int().min(0)),
  PG_POOL_MAX: numeric(10, z.number().int().min(1)),
  CATALOG_SERVICE_URL: z.string().url().default("http://catalog-service:8000"),
  NOTIFICATION_SERVICE_URL: z.string().url().default("http://notifications-service:8000"),
  CHAT_SERVICE_URL: z.string().url().default("http://chat-service:8000"),
  DEPENDENCY_TIMEOUT_MS: numeric(5000, z.number().int().min(1)),
  BREAKER_FAILURE_THRESHOLD: numeric(5, z.number().int().min(1)),
  BREAKER_RESET_TIMEOUT_MS: numeric(60_000, z.number().int().min(1)),
  RETRY_MAX_ATTEMPTS: numeric(3, z.number().int().min(1).max(10)),
  RETRY_BASE_DELAY_MS: numeric(1000, z.number().int().min(0)),
  RETRY_MAX_DELAY_MS: numeric(10_000, z.number().int().min(0)),
});

export type ServerConfig = z.infer<typeof configSchema>;

const LOCALHOST_HOSTNAMES = new Set(["localhost", "127.0.0.1", "[::1]"]);

const buildLocalhostAllowList = (parsed: URL): string[] => {
  const portSuffix = parsed.port ? `:${parsed.port}` : "";
  const protocolPrefix = `${parsed.protocol}//`;

  const origins = new Set<string>();
  for (const hostname of LOCALHOST_HOSTNAMES) {
    origins.add(`${protocolPrefix}${hostname}${portSuffix}`);
  }

  return Array.from(origins);
};

export const resolveCorsOrigins = (origin: string): string | string[] => {
  let parsed: URL;
  try {
    parsed = new URL(origin);
  } catch (error) {
    return origin;
  }

  if (!LOCALHOST_HOSTNAMES.has(parsed.hostname)) {
    return parsed.origin;
  }

  return buildLocalhostAllowList(parsed);
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  const parsed = configSchema.parse({
    NODE_ENV: env.NODE_ENV,
    HOST: env.HOST,
    PORT: env.PORT,
    LOG_LEVEL: env.LOG_LEVEL,
    JWT_SECRET: env.JWT_SECRET,
    JWT_ISSUER: env.JWT_ISSUER,
    JWT_AUDIENCE: env.JWT_AUDIENCE,
    CLIENT_ORIGIN: env.CLIENT_ORIGIN,
    PGHOST: env.PGHOST,
    PGPORT: env.PGPORT,
    PGDATABASE: env.PGDATABASE,
    PGUSER: env.PGUSER,
    PGPASSWORD: env.PGPASSWORD,
    PG_POOL_MIN: env.PG_POOL_MIN,
    PG_POOL_MAX: env.PG_POOL_MAX,
    CATALOG_SERVICE_URL: env.CATALOG_SERVICE_URL,
    NOTIFICATION_SERVICE_URL: env.NOTIFICATION_SERVICE_URL,
    CHAT_SERVICE_URL: env.CHAT_SERVICE_URL,
    DEPENDENCY_TIMEOUT_MS: env.DEPENDENCY_TIMEOUT_MS,
    BREAKER_FAILURE_THRESHOLD: env.BREAKER_FAILURE_THRESHOLD,
    BREAKER_RESET_TIMEOUT_MS: env.BREAKER_RESET_TIMEOUT_MS,
    RETRY_MAX_ATTEMPTS: env.RETRY_MAX_ATTEMPTS,
    RETRY_BASE_DELAY_MS: env.RETRY_BASE_DELAY_MS,
    RETRY_MAX_DELAY_MS: env.RETRY_MAX_DELAY_MS,
  });

  if (parsed.RETRY_MAX_DELAY_MS < parsed.RETRY_BASE_DELAY_MS) {
    throw new Error("RETRY_MAX_DELAY_MS must be greater than or equal to RETRY_BASE_DELAY_MS");
  }

  return parsed;
};
