import { z } from "zod";
import { ConfigError } from "./errors";

const DEFAULT_PROXY_DIRECTORY_URL =
  "https://proxy.webshare.io/api/v2/proxy/list/?mode=direct&page=1&valid=true&page_size=25";

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(5000),

  DATABASE_URL: z.string().optional(),

  MARKETPLACE_BASE_URL: z.string().url().default("https://www.bizbuysell.com/businesses-for-sale/"),
  DISCOVERY_MAX_PAGES: z.coerce.number().int().min(1).default(1),

  PROXY_DIRECTORY_URL: z.string().url().default(DEFAULT_PROXY_DIRECTORY_URL),
  PROXY_DIRECTORY_TOKEN: z.string().optional(),

  SCRAPER_CONCURRENCY: z.coerce.number().int().min(1).default(1),
  SCRAPER_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(2),
  SCRAPER_NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SCRAPER_CONTENT_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  SCRAPER_TASK_DEADLINE_MS: z.coerce.number().int().positive().default(120000),
  SCRAPER_QUEUE_SIZE: z.coerce.number().int().min(1).default(16),
  CHROMIUM_EXECUTABLE_PATH: z.string().optional(),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),

  MAILCHIMP_API_KEY: z.string().optional(),
  MAILCHIMP_LIST_ID: z.string().optional(),
  MAILCHIMP_TEMPLATE_ID: z.coerce.number().int().optional(),
  NOTIFY_SUBJECT: z.string().default("New Business Listings"),
  NOTIFY_FROM_NAME: z.string().default("Business Listing Alerts"),
  NOTIFY_REPLY_TO: z.string().email().default("alerts@example.com"),
  NOTIFY_CLEANUP_SEGMENTS: flag,

  PIPELINE_INTERVAL_HOURS: z.coerce.number().positive().default(12),
  PIPELINE_RETRY_MINUTES: z.coerce.number().positive().default(15),
});

export type Env = z.infer<typeof envSchema>;

export interface ScraperConfig {
  concurrency: number;
  maxAttempts: number;
  navigationTimeoutMs: number;
  contentTimeoutMs: number;
  taskDeadlineMs: number;
  queueSize: number;
  executablePath?: string;
}

export interface NotifyConfig {
  subject: string;
  fromName: string;
  replyTo: string;
  cleanupSegments: boolean;
}

export interface AppConfig {
  env: string;
  port: number;
  databaseUrl?: string;
  discovery: { baseUrl: string; maxPages: number };
  proxyDirectory: { url: string; token?: string };
  scraper: ScraperConfig;
  openai: { apiKey?: string; model: string };
  mailchimp: { apiKey?: string; listId?: string; templateId?: number };
  notify: NotifyConfig;
  schedule: { intervalMs: number; retryDelayMs: number };
}

export function parseConfig(source: Record<string, string | undefined>): AppConfig {
  // Treat empty strings in .env files as unset
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigError(keys);
  }

  const env = parsed.data;
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    databaseUrl: env.DATABASE_URL,
    discovery: { baseUrl: env.MARKETPLACE_BASE_URL, maxPages: env.DISCOVERY_MAX_PAGES },
    proxyDirectory: { url: env.PROXY_DIRECTORY_URL, token: env.PROXY_DIRECTORY_TOKEN },
    scraper: {
      concurrency: env.SCRAPER_CONCURRENCY,
      maxAttempts: env.SCRAPER_MAX_ATTEMPTS,
      navigationTimeoutMs: env.SCRAPER_NAVIGATION_TIMEOUT_MS,
      contentTimeoutMs: env.SCRAPER_CONTENT_TIMEOUT_MS,
      taskDeadlineMs: env.SCRAPER_TASK_DEADLINE_MS,
      queueSize: env.SCRAPER_QUEUE_SIZE,
      executablePath: env.CHROMIUM_EXECUTABLE_PATH,
    },
    openai: { apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL },
    mailchimp: {
      apiKey: env.MAILCHIMP_API_KEY,
      listId: env.MAILCHIMP_LIST_ID,
      templateId: env.MAILCHIMP_TEMPLATE_ID,
    },
    notify: {
      subject: env.NOTIFY_SUBJECT,
      fromName: env.NOTIFY_FROM_NAME,
      replyTo: env.NOTIFY_REPLY_TO,
      cleanupSegments: env.NOTIFY_CLEANUP_SEGMENTS,
    },
    schedule: {
      intervalMs: env.PIPELINE_INTERVAL_HOURS * 60 * 60 * 1000,
      retryDelayMs: env.PIPELINE_RETRY_MINUTES * 60 * 1000,
    },
  };
}

/**
 * Returns the value or throws a ConfigError naming the env key.
 */
export function requireSetting<T>(value: T | undefined, key: string): T {
  if (value === undefined) {
    throw new ConfigError([key]);
  }
  return value;
}

let cached: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (!cached) {
    cached = parseConfig(process.env);
  }
  return cached;
}
