import pino from "pino";
import type { CallContext } from "../../models/call-context";
import type { Sleep } from "../../utils/retry-executor";

export const silentLogger = pino({ level: "silent" });

export interface RecordingSleep {
  sleep: Sleep;
  delays: number[];
}

/**
 * Sleep that resolves at once and remembers every requested delay.
 */
export function recordingSleep(): RecordingSleep {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

/**
 * Correlation ids `tx-1`, `tx-2`, ... in call order.
 */
export function sequentialIds(): () => string {
  let next = 0;
  return () => `tx-${++next}`;
}

export function createCallContext(overrides: Partial<CallContext> = {}): CallContext {
  return {
    timeoutMs: 5000,
    correlationHeader: "x-transaction-id",
    correlationId: sequentialIds(),
    sleep: recordingSleep().sleep,
    logger: silentLogger,
    ...overrides,
  };
}
