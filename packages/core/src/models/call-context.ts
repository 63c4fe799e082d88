import type { Logger } from "pino";
import type { CorrelationIdFactory } from "../utils/transaction-id";
import type { Sleep } from "../utils/retry-executor";

/**
 * Per-run settings every stage needs to issue a call.
 */
export interface CallContext {
  timeoutMs: number;
  /** Header that carries the fresh per-call correlation id. */
  correlationHeader: string;
  correlationId: CorrelationIdFactory;
  /** Proxy endpoint handed to the transport untouched. */
  proxy?: string;
  sleep: Sleep;
  logger: Logger;
}
