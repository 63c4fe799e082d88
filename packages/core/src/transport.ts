import type { HttpHeaders, JsonValue } from "./models/crawl-types";
import { TransportError } from "./errors";
import { isNetworkError, isTimeoutError } from "./utils/retry-utils";

export type HttpMethod = "GET" | "POST";

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Readonly<HttpHeaders>;
  /** JSON body; serialized by the transport. */
  data?: JsonValue;
  timeoutMs: number;
  /** Proxy endpoint, handed over exactly as the caller supplied it. */
  proxy?: string;
}

export interface TransportResponse {
  status: number;
  /** Lower-cased header names. */
  headers: HttpHeaders;
  /** Raw response text. Callers decide how to decode it. */
  body: string;
}

/**
 * HTTP capability the pipeline runs on.
 * Implementations return every status as a response and only throw when no
 * response arrived (timeout, connection or DNS failure).
 *
 * @example
 * ```typescript
 * class MyTransport extends Transport {
 *   protected async createRequest(request: TransportRequest) {
 *     return { status: 200, headers: {}, body: "{}" };
 *   }
 * }
 * ```
 */
export default abstract class Transport {
  protected abstract createRequest(
    request: TransportRequest
  ): Promise<TransportResponse>;

  /**
   * Sends a request. Anything the implementation throws reaches the caller as a `TransportError`.
   */
  public async send(request: TransportRequest): Promise<TransportResponse> {
    try {
      return await this.createRequest(request);
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      const kind = isTimeoutError(cause)
        ? "timeout"
        : isNetworkError(cause)
          ? "network"
          : "unknown";
      throw new TransportError(
        `${request.method} ${request.url} failed: ${cause.message}`,
        { kind, cause }
      );
    }
  }
}

/**
 * Copies a header bag into a plain record with lower-cased names,
 * dropping values that are not strings or numbers and joining lists.
 */
export function toHeaderRecord(headers: object): HttpHeaders {
  const result: HttpHeaders = {};
  for (const [key, raw] of Object.entries(headers)) {
    const value: unknown = raw;
    if (typeof value === "string") {
      result[key.toLowerCase()] = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      result[key.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      result[key.toLowerCase()] = value.map(String).join(", ");
    }
  }
  return result;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
