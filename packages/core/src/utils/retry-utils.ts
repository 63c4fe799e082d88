/**
 * Classification helpers shared by the transports and the detail scheduler.
 */

const NETWORK_ERROR_CODES = [
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "EPIPE",
];

const TIMEOUT_ERROR_CODES = ["ETIMEDOUT", "ECONNABORTED", "ESOCKETTIMEDOUT"];

function errorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Checks if an error is a timeout raised by a transport (abort signal, socket timeout, axios timeout).
 */
export function isTimeoutError(error: Error): boolean {
  if (error.name === "TimeoutError" || error.name === "AbortError") {
    return true;
  }
  const code = errorCode(error);
  if (code !== undefined && TIMEOUT_ERROR_CODES.includes(code)) {
    return true;
  }
  return /timed? ?out/i.test(error.message ?? "");
}

/**
 * Checks if an error is a network error (connection refused or reset, DNS failure).
 *
 * @param error - The error object
 * @returns True if the error appears to be a network error
 */
export function isNetworkError(error: Error): boolean {
  const code = errorCode(error);
  if (code !== undefined && NETWORK_ERROR_CODES.includes(code)) {
    return true;
  }
  if (error.name === "FetchError" || error.name === "NetworkError") {
    return true;
  }

  const message = error.message?.toLowerCase() ?? "";
  return (
    NETWORK_ERROR_CODES.some((keyword) => message.includes(keyword.toLowerCase())) ||
    ["network", "socket hang up", "connection"].some((keyword) =>
      message.includes(keyword)
    )
  );
}

export type StatusClass = "success" | "unauthorized" | "rate-limited" | "retryable";

/**
 * Maps a detail response status onto the retry policy.
 * 429 and 403 are rate-limit signals; 401 is terminal for the item.
 */
export function classifyStatus(status: number): StatusClass {
  if (status >= 200 && status < 300) {
    return "success";
  }
  if (status === 401) {
    return "unauthorized";
  }
  if (status === 429 || status === 403) {
    return "rate-limited";
  }
  return "retryable";
}

/**
 * Delay before retrying after a rate-limit signal: base delay times the attempt number (1-based).
 */
export function rateLimitBackoff(baseDelayMs: number, attempt: number): number {
  return Math.max(0, baseDelayMs * attempt);
}

export const DEFAULT_BLOCK_MARKERS: readonly RegExp[] = [
  /quota/i,
  /captcha/i,
  /challenge/i,
  /unusual traffic/i,
  /are you a robot/i,
];

/** Top-level fields of a JSON error body that may carry a block signal. */
const SIGNAL_FIELDS = [
  "error",
  "errors",
  "errorCode",
  "errorMessage",
  "message",
  "code",
  "status",
  "reason",
];

/**
 * Looks for a quota-exhaustion or anti-automation marker.
 *
 * JSON bodies are only inspected through their error-like fields, so record
 * content mentioning the same words does not trip anything. Everything below
 * such a field is searched, nested objects and arrays included. Bodies that
 * are not JSON (challenge pages, plain-text errors) are searched in full.
 *
 * @returns The matching text, or null when the body carries no signal
 */
export function detectBlockSignal(
  body: string,
  markers: readonly RegExp[] = DEFAULT_BLOCK_MARKERS
): string | null {
  const trimmed = body.trim();
  if (trimmed === "") {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return matchMarker(trimmed, markers);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return typeof parsed === "string" ? matchMarker(parsed, markers) : null;
  }

  for (const field of SIGNAL_FIELDS) {
    const hit = searchSubtree(Reflect.get(parsed, field), markers);
    if (hit !== null) {
      return hit;
    }
  }
  return null;
}

/**
 * Looks for a marker in an error message (transport failures can carry the signal too).
 */
export function detectBlockSignalInError(
  error: Error,
  markers: readonly RegExp[] = DEFAULT_BLOCK_MARKERS
): string | null {
  return matchMarker(error.message ?? "", markers);
}

function matchMarker(text: string, markers: readonly RegExp[]): string | null {
  for (const marker of markers) {
    if (marker.test(text)) {
      return text.length > 200 ? `${text.slice(0, 200)}…` : text;
    }
  }
  return null;
}

function searchSubtree(value: unknown, markers: readonly RegExp[]): string | null {
  if (typeof value === "string") {
    return matchMarker(value, markers);
  }
  if (typeof value !== "object" || value === null) {
    return null;
  }
  // arrays and objects alike: first matching leaf in document order
  for (const nested of Object.values(value)) {
    const hit = searchSubtree(nested, markers);
    if (hit !== null) {
      return hit;
    }
  }
  return null;
}
