/**
 * @packageDocumentation
 * @module @crawl-relay/core
 *
 * Replays a captured search request against a paginated listing API and
 * fetches every listed record through a bounded, retrying pool with a
 * quota circuit breaker.
 */

// Main exports
export { CrawlPipeline, assembleEnvelope } from "./crawl-pipeline";
export type { CrawlPipelineOptions } from "./crawl-pipeline";
export { default as Transport, toHeaderRecord, isSuccessStatus } from "./transport";
export type { HttpMethod, TransportRequest, TransportResponse } from "./transport";

// Stages
export {
  parseTemplate,
  normalizeTemplate,
  extractBodyFallback,
  readSearchIdentity,
  withHeaders,
  DEFAULT_HEADERS,
  DEFAULT_SKIPPED_HEADERS,
} from "./descriptor-parser";
export type { ParseOptions } from "./descriptor-parser";
export { establishSession, toStubs } from "./session-controller";
export type { SessionEstablishment, EstablishOptions } from "./session-controller";
export {
  collectStubs,
  planPages,
  derivePaginationUrl,
  buildPagePayload,
} from "./pagination-controller";
export type { PaginationOptions, StubCollection } from "./pagination-controller";
export {
  DetailFetchScheduler,
  buildDetailUrl,
  buildDetailPayload,
} from "./detail-fetch-scheduler";
export type {
  DetailFetchOptions,
  DetailFetchReport,
  SchedulerState,
} from "./detail-fetch-scheduler";
export { normalize } from "./normalizer";

// Types
export type * from "./models/crawl-types";
export type { CallContext } from "./models/call-context";
export type {
  ErrorHandler,
  FinishHandler,
  OutcomeHandler,
  ResultHandler,
} from "./models/handlers";

// Errors
export {
  PipelineError,
  InvalidInputError,
  MalformedTemplateError,
  SessionEstablishError,
  TransportError,
  RateLimitedError,
  UnauthorizedError,
  QuotaOrChallengeError,
  UnreadableResponseError,
  toStructuredError,
} from "./errors";
export type { PipelineErrorCode, TransportErrorKind } from "./errors";

// Configuration and logging
export {
  pipelineSettingsSchema,
  resolveSettings,
  loadSettingsFromEnv,
  runInputSchema,
} from "./config";
export type { PipelineSettings, PipelineSettingsInput, ValidatedRunInput } from "./config";
export { createLogger, getLogger } from "./logger";
export type { Logger, LogLevel, LoggerConfig } from "./logger";

// Retry and concurrency utilities
export {
  isNetworkError,
  isTimeoutError,
  classifyStatus,
  rateLimitBackoff,
  detectBlockSignal,
  detectBlockSignalInError,
  DEFAULT_BLOCK_MARKERS,
} from "./utils/retry-utils";
export type { StatusClass } from "./utils/retry-utils";
export { executeWithRetry, sleep } from "./utils/retry-executor";
export type { AttemptResult, RetryOptions, RetryResult, Sleep } from "./utils/retry-executor";
export { runWithConcurrencyLimit } from "./utils/concurrency-pool";
export { createTransactionId } from "./utils/transaction-id";
export type { CorrelationIdFactory } from "./utils/transaction-id";
