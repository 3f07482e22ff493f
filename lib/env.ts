import { z } from "zod";

const platformListSchema = z
  .string()
  .default("shopee")
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim().toLowerCase())
      .filter((item) => item.length > 0)
  )
  .pipe(z.array(z.enum(["shopee", "lazada", "tiki"])));

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DATABASE_SSL_MODE: z.enum(["require", "disable"]).default("require"),
  DATABASE_PREPARE: z.enum(["true", "false"]).default("false"),
  LLM_PROVIDER: z.enum(["openai", "gemini"]).default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4.1-mini"),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default("gemini-2.5-flash"),
  GEMINI_BASE_URL: z.string().url().default("https://generativelanguage.googleapis.com"),
  LLM_MAX_RETRIES: z.coerce.number().int().positive().max(6).default(3),
  LLM_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  GLOBAL_CRAWL_CAP: z.coerce.number().int().positive().max(100).default(20),
  CRAWL_CONCURRENCY: z.coerce.number().int().positive().max(4).default(2),
  CRAWL_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  DISABLED_PLATFORMS: platformListSchema,
  SCRAPER_USER_AGENT: z
    .string()
    .default("Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36"),
  RESEND_API_KEY: z.string().optional(),
  ALERT_FROM_EMAIL: z.string().email().optional(),
  ALERT_TO_EMAIL: z.string().email().optional()
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse({
  DATABASE_URL: process.env.DATABASE_URL,
  DATABASE_SSL_MODE: process.env.DATABASE_SSL_MODE,
  DATABASE_PREPARE: process.env.DATABASE_PREPARE,
  LLM_PROVIDER: process.env.LLM_PROVIDER,
  OPENAI_API_KEY: process.env.OPENAI_API_KEY,
  OPENAI_MODEL: process.env.OPENAI_MODEL,
  OPENAI_BASE_URL: process.env.OPENAI_BASE_URL,
  GEMINI_API_KEY: process.env.GEMINI_API_KEY,
  GEMINI_MODEL: process.env.GEMINI_MODEL,
  GEMINI_BASE_URL: process.env.GEMINI_BASE_URL,
  LLM_MAX_RETRIES: process.env.LLM_MAX_RETRIES,
  LLM_RETRY_BASE_DELAY_MS: process.env.LLM_RETRY_BASE_DELAY_MS,
  GLOBAL_CRAWL_CAP: process.env.GLOBAL_CRAWL_CAP,
  CRAWL_CONCURRENCY: process.env.CRAWL_CONCURRENCY,
  CRAWL_TIMEOUT_MS: process.env.CRAWL_TIMEOUT_MS,
  DISABLED_PLATFORMS: process.env.DISABLED_PLATFORMS,
  SCRAPER_USER_AGENT: process.env.SCRAPER_USER_AGENT,
  RESEND_API_KEY: process.env.RESEND_API_KEY,
  ALERT_FROM_EMAIL: process.env.ALERT_FROM_EMAIL,
  ALERT_TO_EMAIL: process.env.ALERT_TO_EMAIL
});
