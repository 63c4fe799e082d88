import { z } from "zod";

/**
 * Tunables of a pipeline instance. Every field has a default.
 */
export const pipelineSettingsSchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  /** Multiplied by the attempt number after a 429/403. */
  rateLimitBaseDelayMs: z.number().int().min(0).default(2000),
  /** Fixed delay after any other failed attempt. */
  retryDelayMs: z.number().int().min(0).default(1000),
  requestTimeoutMs: z.number().int().min(1).default(30_000),
  /** Hard cap on listing pages, first page included. */
  maxPages: z.number().int().min(1).default(20),
  pageConcurrency: z.number().int().min(1).default(1),
  interPageDelayMs: z.number().int().min(0).default(1000),
  correlationHeader: z.string().min(1).default("x-transaction-id"),
  /** Refuse to contact the backend when the template carries no cookie. */
  requireCredential: z.boolean().default(false),
});

export type PipelineSettings = z.infer<typeof pipelineSettingsSchema>;
export type PipelineSettingsInput = z.input<typeof pipelineSettingsSchema>;

export function resolveSettings(input: PipelineSettingsInput = {}): PipelineSettings {
  return pipelineSettingsSchema.parse(input);
}

const envSettingsSchema = z.object({
  CRAWL_MAX_ATTEMPTS: z.coerce.number().int().min(1).optional(),
  CRAWL_RATE_LIMIT_BASE_DELAY_MS: z.coerce.number().int().min(0).optional(),
  CRAWL_RETRY_DELAY_MS: z.coerce.number().int().min(0).optional(),
  CRAWL_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1).optional(),
  CRAWL_MAX_PAGES: z.coerce.number().int().min(1).optional(),
  CRAWL_PAGE_CONCURRENCY: z.coerce.number().int().min(1).optional(),
  CRAWL_INTER_PAGE_DELAY_MS: z.coerce.number().int().min(0).optional(),
  CRAWL_CORRELATION_HEADER: z.string().min(1).optional(),
  CRAWL_REQUIRE_CREDENTIAL: z.enum(["true", "false"]).optional(),
});

/**
 * Reads `CRAWL_*` variables. Unset variables fall back to the schema defaults.
 *
 * @throws {z.ZodError} If a variable is set to an invalid value
 */
export function loadSettingsFromEnv(
  env: Record<string, string | undefined> = process.env
): PipelineSettings {
  const parsed = envSettingsSchema.parse(env);
  return resolveSettings({
    maxAttempts: parsed.CRAWL_MAX_ATTEMPTS,
    rateLimitBaseDelayMs: parsed.CRAWL_RATE_LIMIT_BASE_DELAY_MS,
    retryDelayMs: parsed.CRAWL_RETRY_DELAY_MS,
    requestTimeoutMs: parsed.CRAWL_REQUEST_TIMEOUT_MS,
    maxPages: parsed.CRAWL_MAX_PAGES,
    pageConcurrency: parsed.CRAWL_PAGE_CONCURRENCY,
    interPageDelayMs: parsed.CRAWL_INTER_PAGE_DELAY_MS,
    correlationHeader: parsed.CRAWL_CORRELATION_HEADER,
    requireCredential:
      parsed.CRAWL_REQUIRE_CREDENTIAL === undefined
        ? undefined
        : parsed.CRAWL_REQUIRE_CREDENTIAL === "true",
  });
}

export const runInputSchema = z.object({
  template: z.string().trim().min(1, "Request template is required"),
  targetCount: z.number().int().min(1, "targetCount must be at least 1"),
  concurrencyLimit: z.number().int().min(1, "concurrencyLimit must be at least 1").default(5),
  proxyUrl: z.string().url().optional(),
});

export type ValidatedRunInput = z.infer<typeof runInputSchema>;
