// Re-export from core package
export {
  CrawlPipeline,
  Transport,
  parseTemplate,
  establishSession,
  collectStubs,
  DetailFetchScheduler,
  normalize,
  createLogger,
  resolveSettings,
  loadSettingsFromEnv,
  PipelineError,
  toStructuredError,
} from "@crawl-relay/core";

// Re-export types from core package
export type {
  CrawlPipelineOptions,
  RunInput,
  RunResult,
  ResultEnvelope,
  NormalizedRecord,
  FetchOutcome,
  StructuredError,
  PipelineSettings,
  TransportRequest,
  TransportResponse,
  ErrorHandler,
  OutcomeHandler,
  ResultHandler,
  FinishHandler,
} from "@crawl-relay/core";

// Re-export transports
export { default as AxiosTransport } from "@crawl-relay/adapter-axios";
export { default as NodeFetchTransport } from "@crawl-relay/adapter-node-fetch";
export type { NodeFetchTransportOptions } from "@crawl-relay/adapter-node-fetch";
