import { randomBytes } from "node:crypto";

export type CorrelationIdFactory = () => string;

/**
 * Builds a fresh per-call correlation id in the backend's `rlsrp<epoch ms>~~<suffix>` shape.
 */
export const createTransactionId: CorrelationIdFactory = () =>
  `rlsrp${Date.now()}~~${randomBytes(3).toString("hex")}`;
