import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug", "silent"]).optional(),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGIN: z.string().optional(),
  REQUEST_BODY_LIMIT: z.coerce.number().default(1_048_576),
  JWT_SECRET: z.string().min(10).default("changeme-secret"),
  DATABASE_URL: z.string().url().optional(),
  POSTGRES_URL: z.string().url().optional(),
  REDIS_URL: z.string().url().default("redis://localhost:6379"),

  NOTIFICATION_BACKEND: z.enum(["postgres", "memory"]).default("postgres"),
  WORKER_POLL_INTERVAL_SECONDS: z.coerce.number().positive().default(10),
  WORKER_BATCH_SIZE: z.coerce.number().int().positive().default(10),
  WORKER_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  IN_APP_MAX_ATTEMPTS: z.coerce.number().int().positive().default(2),
  WORKER_STALE_AFTER_SECONDS: z.coerce.number().positive().default(300),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(4),
  WORKER_ERROR_BACKOFF_SECONDS: z.coerce.number().positive().default(30),
  WORKER_MAX_BACKOFF_SECONDS: z.coerce.number().positive().default(300),
  WORKER_RETRY_DELAY_SECONDS: z.coerce.number().nonnegative().default(60),
  WORKER_PUSH_WAKEUP: booleanFlag.default("true"),

  GATEWAY_HOST: z.string().default("0.0.0.0"),
  GATEWAY_PORT: z.coerce.number().int().nonnegative().default(3100),
  GATEWAY_PATH: z.string().startsWith("/").default("/ws/notifications"),
  GATEWAY_REPLAY_LIMIT: z.coerce.number().int().nonnegative().default(50),

  SMTP_HOST: z.string().default("localhost"),
  SMTP_PORT: z.coerce.number().int().positive().default(465),
  SMTP_SECURE: booleanFlag.default("true"),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  MAIL_FROM: z.string().default("Notifications <no-reply@localhost>"),

  PUBLIC_BASE_URL: z.string().url().default("http://localhost:3000"),
  EMAIL_VERIFICATION_TTL_HOURS: z.coerce.number().positive().default(24),
  ARCHIVE_AFTER_DAYS: z.coerce.number().int().positive().default(30),
});

export type EnvSchema = z.infer<typeof envSchema>;

export function validateEnv(): EnvSchema {
  return envSchema.parse(process.env);
}
