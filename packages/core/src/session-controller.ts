import type Transport from "./transport";
import { isSuccessStatus } from "./transport";
import type { CallContext } from "./models/call-context";
import type {
  ItemStub,
  JsonObject,
  JsonValue,
  RequestDescriptor,
  SessionContext,
} from "./models/crawl-types";
import { SessionEstablishError, TransportError } from "./errors";
import { isJsonObject, withHeaders } from "./descriptor-parser";

export interface SessionEstablishment {
  session: SessionContext;
  /** Stubs of the first page, ordinals 0..n-1. */
  stubs: ItemStub[];
  /** Total the backend reports as available for this search. */
  totalAvailable: number;
}

export interface EstablishOptions extends CallContext {
  requireCredential?: boolean;
}

/**
 * Issues the initial search and extracts the session identifiers from its response.
 *
 * @throws {TransportError} If the call fails or returns a non-success status
 * @throws {SessionEstablishError} If the response carries no session id
 */
export async function establishSession(
  transport: Transport,
  descriptor: RequestDescriptor,
  options: EstablishOptions
): Promise<SessionEstablishment> {
  const logger = options.logger.child({ component: "SessionController" });

  if (options.requireCredential && descriptor.credential === null) {
    throw new SessionEstablishError(
      "The request template carries no cookie; a fresh capture is required"
    );
  }

  logger.info({ url: descriptor.url }, "Performing initial search");
  const response = await transport.send({
    method: "POST",
    url: descriptor.url,
    headers: withHeaders(descriptor, {
      [options.correlationHeader]: options.correlationId(),
    }),
    data: descriptor.body,
    timeoutMs: options.timeoutMs,
    proxy: options.proxy,
  });

  if (!isSuccessStatus(response.status)) {
    throw new TransportError(
      `Initial search failed with status ${response.status}: ${response.body.slice(0, 200)}`,
      { kind: "status", status: response.status }
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(response.body);
  } catch (error) {
    throw new SessionEstablishError("Initial search response is not JSON", {
      cause: error,
    });
  }
  if (!isJsonObject(data)) {
    throw new SessionEstablishError("Initial search response is not a JSON object");
  }

  const searchParams: JsonObject = isJsonObject(data.searchParams) ? data.searchParams : {};
  const sessionId = asOpaqueId(data.sid) ?? asOpaqueId(searchParams.sid);
  if (sessionId === null) {
    throw new SessionEstablishError("Could not find 'sid' in search response");
  }
  const session: SessionContext = Object.freeze({
    sessionId,
    sessionGroupId: asOpaqueId(searchParams.sidGroupId) ?? asOpaqueId(data.sidGroupId),
  });

  const stubs = toStubs(data.tuples);
  const totalAvailable =
    asCount(data.totalResumes) ?? asCount(data.totalCount) ?? stubs.length;

  logger.info(
    { totalAvailable, loaded: stubs.length, sessionGroupId: session.sessionGroupId },
    "Session established"
  );
  return { session, stubs, totalAvailable };
}

/**
 * Turns listing tuples into stubs, numbering them from `firstOrdinal`. Non-object entries are dropped.
 */
export function toStubs(tuples: JsonValue | undefined, firstOrdinal = 0): ItemStub[] {
  if (!Array.isArray(tuples)) {
    return [];
  }
  return tuples.filter(isJsonObject).map((tuple: JsonObject, index) => ({
    ordinal: firstOrdinal + index,
    uniqueId:
      asOpaqueId(tuple.dynamicEncryptedUniqueId) ??
      asOpaqueId(tuple.uniqId) ??
      asOpaqueId(tuple.id),
    jsKey: asOpaqueId(tuple.dynamicEncryptedJsKey) ?? asOpaqueId(tuple.jsKey),
    label: asOpaqueId(tuple.jsUserName) ?? asOpaqueId(tuple.name),
  }));
}

function asOpaqueId(value: JsonValue | undefined): string | null {
  if (typeof value === "string" && value !== "") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function asCount(value: JsonValue | undefined): number | null {
  if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
    return Math.floor(value);
  }
  if (typeof value === "string" && /^\d+$/.test(value)) {
    return Number(value);
  }
  return null;
}
