import type {
  HttpHeaders,
  JsonObject,
  JsonValue,
  RequestDescriptor,
  SearchIdentity,
} from "./models/crawl-types";
import { MalformedTemplateError } from "./errors";

export const DEFAULT_HEADERS: Readonly<HttpHeaders> = {
  accept: "application/json",
  "accept-language": "en-US,en;q=0.9",
  appid: "112",
  "content-type": "application/json",
  systemid: "naukriIndia",
  "user-agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/143.0.0.0 Safari/537.36",
};

/**
 * Headers never copied from a template: computed by the transport, tied to the
 * original connection, or handled separately (cookie, correlation id).
 */
export const DEFAULT_SKIPPED_HEADERS: readonly string[] = [
  "content-length",
  "accept-encoding",
  "connection",
  "host",
  "transfer-encoding",
  "cookie",
  "x-transaction-id",
];

export interface ParseOptions {
  skipHeaders?: readonly string[];
  defaultHeaders?: Readonly<HttpHeaders>;
}

// A quoted shell token: group 1 is the quote, group 2 the content (backslash escapes kept).
const QUOTED = String.raw`\$?(['"])((?:\\.|(?!\1)[^\\])*)\1`;

const URL_PATTERN = new RegExp(
  String.raw`\bcurl\s+(?:(?:-X|--request)\s+[A-Za-z]+\s+|(?:-L|--location|--compressed|-s|--silent)\s+)*` +
    QUOTED,
  "i"
);
const COOKIE_FLAG_PATTERN = new RegExp(String.raw`(?:^|\s)(?:-b|--cookie)\s+` + QUOTED);
const HEADER_PATTERN = new RegExp(String.raw`(?:^|\s)(?:-H|--header)\s+` + QUOTED, "g");
const DATA_PATTERN = new RegExp(
  String.raw`(?:^|\s)(?:--data-raw|--data-binary|--data-ascii|--data|-d)\s+` + QUOTED
);

/**
 * Folds line continuations and collapses whitespace so tokens never straddle a line break.
 */
export function normalizeTemplate(raw: string): string {
  return raw
    .replace(/[\\^]\r?\n/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function unescapeQuotes(value: string): string {
  return value.replace(/\\(["'])/g, "$1");
}

/**
 * Inside double quotes the shell unescapes `\"`; inside single quotes backslashes are literal.
 */
function tokenValue(quote: string, content: string): string {
  return quote === '"' ? unescapeQuotes(content) : content;
}

/**
 * Parses a captured cURL command into a replayable request.
 *
 * @param rawTemplate - The command as copied from the browser
 * @param options - Header deny-list and defaults overrides
 * @throws {MalformedTemplateError} If no http(s) URL follows the `curl` verb
 */
export function parseTemplate(
  rawTemplate: string,
  options: ParseOptions = {}
): RequestDescriptor {
  const skipHeaders = new Set(
    (options.skipHeaders ?? DEFAULT_SKIPPED_HEADERS).map((name) => name.toLowerCase())
  );
  const defaults = options.defaultHeaders ?? DEFAULT_HEADERS;
  const normalized = normalizeTemplate(rawTemplate);

  const url = extractUrl(normalized);
  const credential = extractCredential(normalized);

  const headers: HttpHeaders = {};
  if (credential !== null) {
    headers.cookie = credential;
  }
  for (const [key, value] of extractHeaders(normalized)) {
    if (skipHeaders.has(key) || Object.hasOwn(headers, key)) {
      continue;
    }
    headers[key] = value;
  }

  const payload = extractPayload(normalized);
  const parsedBody = payload === null ? null : parseJsonObject(payload);
  const body = parsedBody ?? extractBodyFallback(normalized);

  for (const [key, value] of Object.entries(defaults)) {
    const name = key.toLowerCase();
    if (!Object.hasOwn(headers, name)) {
      headers[name] = value;
    }
  }
  const origin = originOf(url);
  if (origin !== null && !Object.hasOwn(headers, "origin")) {
    headers.origin = origin;
  }

  deepFreeze(body);
  return Object.freeze({
    url,
    headers: Object.freeze(headers),
    body,
    credential,
    bodySource: parsedBody === null ? "fallback" : "payload",
  });
}

function extractUrl(normalized: string): string {
  const match = URL_PATTERN.exec(normalized);
  if (!match) {
    throw new MalformedTemplateError(
      "Could not find a quoted target URL after the curl command"
    );
  }
  const url = tokenValue(match[1], match[2]).trim();
  if (!/^https?:\/\//i.test(url)) {
    throw new MalformedTemplateError(
      `Target token is not an http(s) URL: ${url.slice(0, 80)}`
    );
  }
  return url;
}

/**
 * Cookie from the dedicated flag, else from a cookie header. Escaped quotes are always unescaped.
 */
function extractCredential(normalized: string): string | null {
  const flag = COOKIE_FLAG_PATTERN.exec(normalized);
  if (flag) {
    const value = unescapeQuotes(flag[2]).trim();
    if (value !== "") {
      return value;
    }
  }

  for (const [key, value] of extractHeaders(normalized, true)) {
    if (key === "cookie" && value !== "") {
      return unescapeQuotes(value);
    }
  }
  return null;
}

/**
 * All `-H` tokens as lower-cased name/value pairs, in template order.
 */
function extractHeaders(normalized: string, raw = false): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const match of normalized.matchAll(HEADER_PATTERN)) {
    const token = raw ? match[2] : tokenValue(match[1], match[2]);
    const separator = token.indexOf(":");
    if (separator <= 0) {
      continue;
    }
    const key = token.slice(0, separator).trim().toLowerCase();
    if (key === "") {
      continue;
    }
    pairs.push([key, token.slice(separator + 1).trim()]);
  }
  return pairs;
}

function extractPayload(normalized: string): string | null {
  const match = DATA_PATTERN.exec(normalized);
  if (!match) {
    return null;
  }
  const payload = tokenValue(match[1], match[2]).trim();
  return payload.startsWith("{") ? payload : `{${payload}}`;
}

function parseJsonObject(text: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fieldPattern(name: string, value: string): RegExp {
  // Tolerates quoted or bare keys and backslash-escaped quotes from shell payloads.
  return new RegExp(`${name}\\\\?["']?\\s*:\\s*\\\\?["']?(${value})`);
}

const FALLBACK_PATTERNS = {
  requirementId: fieldPattern("requirementId", String.raw`\d+`),
  companyId: fieldPattern("companyId", String.raw`\d+`),
  rdxUserId: fieldPattern("rdxUserId", String.raw`[^"'\\,}\s]+`),
  rdxUserName: fieldPattern("rdxUserName", String.raw`[^"'\\,}\s]+`),
};

/**
 * Rebuilds the search body from whatever identifiers can be found in free text.
 * Fields that cannot be found are null. Never throws.
 */
export function extractBodyFallback(text: string): JsonObject {
  const find = (pattern: RegExp): string | null => pattern.exec(text)?.[1] ?? null;

  const requirementId = find(FALLBACK_PATTERNS.requirementId);
  const companyId = find(FALLBACK_PATTERNS.companyId);

  return {
    requirementId,
    requirementGroupId: requirementId,
    newCandidatesSearch: false,
    saveSession: true,
    miscellaneousInfo: {
      companyId: companyId === null ? null : Number(companyId),
      rdxUserId: find(FALLBACK_PATTERNS.rdxUserId),
      rdxUserName: find(FALLBACK_PATTERNS.rdxUserName),
    },
  };
}

/**
 * Reads the identifiers follow-up calls need from a descriptor body, whatever its exact shape.
 */
export function readSearchIdentity(body: Readonly<JsonObject>): SearchIdentity {
  const misc = body.miscellaneousInfo;
  const info: Readonly<JsonObject> = isJsonObject(misc) ? misc : {};
  return {
    requirementId: asIdentifier(body.requirementId),
    companyId: asNumber(info.companyId ?? body.companyId),
    rdxUserId: asIdentifier(info.rdxUserId ?? body.rdxUserId),
    rdxUserName: asIdentifier(info.rdxUserName ?? body.rdxUserName),
  };
}

function asIdentifier(value: JsonValue | undefined): string | null {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return null;
}

function asNumber(value: JsonValue | undefined): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && /^\d+$/.test(value)) {
    return Number(value);
  }
  return null;
}

/**
 * Returns a copy of the descriptor's headers with the overrides applied (names lower-cased, last write wins).
 */
export function withHeaders(
  descriptor: RequestDescriptor,
  overrides: Readonly<HttpHeaders>
): HttpHeaders {
  const headers: HttpHeaders = { ...descriptor.headers };
  for (const [key, value] of Object.entries(overrides)) {
    headers[key.toLowerCase()] = value;
  }
  return headers;
}

function originOf(url: string): string | null {
  try {
    return new URL(url).origin;
  } catch {
    return null;
  }
}

function deepFreeze(value: JsonValue): void {
  if (Array.isArray(value)) {
    value.forEach(deepFreeze);
    Object.freeze(value);
  } else if (isJsonObject(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
}
