import "dotenv/config";
import { z } from "zod";

const booleanFlag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((v) => v === "true");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  HTTP_ENABLED: booleanFlag("true"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  CONFIG_PATH: z.string().min(1).default("config.json"),
  SEEN_STORE: z.enum(["file", "redis"]).default("file"),
  SEEN_STORE_PATH: z.string().min(1).default("data/seen-items.jsonl"),
  SEEN_RETENTION_DAYS: z.coerce.number().int().min(0).default(0),
  REDIS_URL: z.string().default(""),
  REDIS_PREFIX: z.string().default("resale-radar"),
  MONITOR_INTERVAL_MINUTES: z.coerce.number().int().min(1).default(30),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(500).default(10000),
  REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  LINE_CHANNEL_ACCESS_TOKEN: z.string().default(""),
  LINE_USER_ID: z.string().default(""),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
