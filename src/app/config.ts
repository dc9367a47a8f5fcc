/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv.
 * - In prod, platform injects env vars (no file).
 * - buildConfig(env) is pure over its input so tests can pass a plain object.
 *
 * RULES:
 * - The returned AppConfig is frozen. Nothing mutates config after startup.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const LogLevelSchema = z
  .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
  .default('info');

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.length > 0 ? v : null));

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  SERVICE_NAME: z.string().min(1).default('web-scaffold'),

  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),

  DATABASE_HOST: z.string().min(1).default('127.0.0.1'),
  DATABASE_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DATABASE_USER: z.string().min(1),
  DATABASE_PASSWORD: z.string().default(''),
  DATABASE_NAME: z.string().min(1),
  DATABASE_MAX_OPEN_CONNECTIONS: z.coerce.number().int().min(1).default(10),
  DATABASE_MAX_IDLE_CONNECTIONS: z.coerce.number().int().min(0).default(5),

  REDIS_HOST: z.string().min(1).default('127.0.0.1'),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  REDIS_PASSWORD: optionalString,
  REDIS_DB: z.coerce.number().int().min(0).default(0),

  LOG_LEVEL: LogLevelSchema,
  LOG_FILENAME: optionalString,
  LOG_MAX_SIZE_MB: z.coerce.number().int().min(0).default(200),
  LOG_MAX_BACKUPS: z.coerce.number().int().min(0).default(7),
  LOG_MAX_AGE_DAYS: z.coerce.number().int().min(0).default(30),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export type DatabaseConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  databaseName: string;
  maxOpenConnections: number;
  maxIdleConnections: number;
};

export type RedisConfig = {
  host: string;
  port: number;
  password: string | null;
  db: number;
};

export type LogConfig = {
  level: LogLevel;
  /** null = console only */
  filename: string | null;
  maxSizeMB: number;
  maxBackups: number;
  maxAgeDays: number;
};

export type AppConfig = {
  nodeEnv: NodeEnv;
  serviceName: string;

  http: {
    host: string;
    port: number;
  };

  database: DatabaseConfig;
  redis: RedisConfig;
  log: LogConfig;
};

type Env = Record<string, string | undefined>;

export function buildConfig(env: Env = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  const config: AppConfig = {
    nodeEnv: parsed.NODE_ENV,
    serviceName: parsed.SERVICE_NAME,

    http: {
      host: parsed.HOST,
      port: parsed.PORT,
    },

    database: {
      host: parsed.DATABASE_HOST,
      port: parsed.DATABASE_PORT,
      user: parsed.DATABASE_USER,
      password: parsed.DATABASE_PASSWORD,
      databaseName: parsed.DATABASE_NAME,
      maxOpenConnections: parsed.DATABASE_MAX_OPEN_CONNECTIONS,
      maxIdleConnections: parsed.DATABASE_MAX_IDLE_CONNECTIONS,
    },

    redis: {
      host: parsed.REDIS_HOST,
      port: parsed.REDIS_PORT,
      password: parsed.REDIS_PASSWORD,
      db: parsed.REDIS_DB,
    },

    log: {
      level: parsed.LOG_LEVEL,
      filename: parsed.LOG_FILENAME,
      maxSizeMB: parsed.LOG_MAX_SIZE_MB,
      maxBackups: parsed.LOG_MAX_BACKUPS,
      maxAgeDays: parsed.LOG_MAX_AGE_DAYS,
    },
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (value && typeof value === 'object') deepFreeze(value);
  }
  return Object.freeze(obj);
}
