import type { StructuredError, StructuredErrorCode } from "./models/crawl-types";

export type PipelineErrorCode =
  | "INVALID_INPUT"
  | "MALFORMED_TEMPLATE"
  | "SESSION_ESTABLISH"
  | "TRANSPORT"
  | "RATE_LIMITED"
  | "UNAUTHORIZED"
  | "QUOTA_OR_CHALLENGE"
  | "UNREADABLE_RESPONSE";

/**
 * Base class for every error the pipeline raises on purpose.
 */
export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

export class InvalidInputError extends PipelineError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

/** No target URL could be located in the template. Raised before any network call. */
export class MalformedTemplateError extends PipelineError {
  constructor(message: string) {
    super("MALFORMED_TEMPLATE", message);
    this.name = "MalformedTemplateError";
  }
}

export class SessionEstablishError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super("SESSION_ESTABLISH", message, options);
    this.name = "SessionEstablishError";
  }
}

export type TransportErrorKind = "timeout" | "network" | "status" | "config" | "unknown";

export class TransportError extends PipelineError {
  public readonly kind: TransportErrorKind;
  public readonly status?: number;

  constructor(
    message: string,
    details: { kind: TransportErrorKind; status?: number; cause?: unknown }
  ) {
    super("TRANSPORT", message, { cause: details.cause });
    this.name = "TransportError";
    this.kind = details.kind;
    this.status = details.status;
  }
}

export class RateLimitedError extends PipelineError {
  public readonly status: number;

  constructor(status: number) {
    super("RATE_LIMITED", `Rate limited (status ${status})`);
    this.name = "RateLimitedError";
    this.status = status;
  }
}

export class UnauthorizedError extends PipelineError {
  constructor() {
    super("UNAUTHORIZED", "Unauthorized (status 401)");
    this.name = "UnauthorizedError";
  }
}

/** Quota exhaustion or an anti-automation challenge. Trips the circuit breaker. */
export class QuotaOrChallengeError extends PipelineError {
  public readonly marker: string;

  constructor(marker: string) {
    super("QUOTA_OR_CHALLENGE", `Quota exhausted or challenge detected: ${marker}`);
    this.name = "QuotaOrChallengeError";
    this.marker = marker;
  }
}

export class UnreadableResponseError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super("UNREADABLE_RESPONSE", message, options);
    this.name = "UnreadableResponseError";
  }
}

const RUN_LEVEL_CODES: ReadonlySet<string> = new Set<StructuredErrorCode>([
  "INVALID_INPUT",
  "MALFORMED_TEMPLATE",
  "SESSION_ESTABLISH",
  "TRANSPORT",
]);

function isStructuredErrorCode(code: string): code is StructuredErrorCode {
  return RUN_LEVEL_CODES.has(code);
}

/**
 * Converts anything thrown at run level into the error shape returned to callers.
 */
export function toStructuredError(error: unknown): StructuredError {
  if (error instanceof PipelineError) {
    const structured: StructuredError = {
      code: isStructuredErrorCode(error.code) ? error.code : "INTERNAL",
      message: error.message,
    };
    if (error instanceof TransportError && error.status !== undefined) {
      structured.status = error.status;
    }
    return structured;
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: "INTERNAL", message };
}
