import type Transport from "./transport";
import { isSuccessStatus } from "./transport";
import type { CallContext } from "./models/call-context";
import type {
  ItemStub,
  JsonObject,
  RequestDescriptor,
  SessionContext,
} from "./models/crawl-types";
import { TransportError, UnreadableResponseError } from "./errors";
import { isJsonObject, readSearchIdentity, withHeaders } from "./descriptor-parser";
import { toStubs } from "./session-controller";
import { runWithConcurrencyLimit } from "./utils/concurrency-pool";

export interface PaginationOptions extends CallContext {
  maxPages: number;
  pageConcurrency: number;
  interPageDelayMs: number;
}

export interface StubCollection {
  /** At most `targetCount` stubs, ordinals renumbered from 0. */
  stubs: ItemStub[];
  /** Page numbers that were requested but contributed nothing, ascending. */
  failedPages: number[];
}

/**
 * Page numbers still to request, starting at 2.
 * The first page's size is taken as the page size for the whole search.
 */
export function planPages(
  pageSize: number,
  haveCount: number,
  targetCount: number,
  totalAvailable: number,
  maxPages: number
): number[] {
  if (pageSize <= 0) {
    return [];
  }
  const wanted = Math.min(targetCount, totalAvailable);
  const pages: number[] = [];
  let covered = haveCount;
  let pageNo = 2;
  while (covered < wanted && pageNo <= maxPages) {
    pages.push(pageNo);
    covered += pageSize;
    pageNo++;
  }
  return pages;
}

/**
 * The listing endpoint's `/search` segment becomes `/pageChange`.
 */
export function derivePaginationUrl(url: string): string {
  return url.replace(/\/search(?=[/?#]|$)/, "/pageChange");
}

export function buildPagePayload(
  descriptor: RequestDescriptor,
  session: SessionContext,
  pageNo: number
): JsonObject {
  const identity = readSearchIdentity(descriptor.body);
  return {
    pageNo,
    miscellaneousInfo: {
      companyId: identity.companyId,
      rdxUserId: identity.rdxUserId,
      rdxUserName: identity.rdxUserName,
      sid: session.sessionId,
      sidGroupId: session.sessionGroupId,
    },
  };
}

/**
 * Pulls further listing pages until `targetCount` stubs are held or the
 * listing is exhausted. A page that fails contributes nothing and is
 * listed in `failedPages`.
 *
 * @param alreadyHave - Stubs from the first page
 */
export async function collectStubs(
  transport: Transport,
  descriptor: RequestDescriptor,
  session: SessionContext,
  alreadyHave: readonly ItemStub[],
  targetCount: number,
  totalAvailable: number,
  options: PaginationOptions
): Promise<StubCollection> {
  const logger = options.logger.child({ component: "PaginationController" });
  const pages = planPages(
    alreadyHave.length,
    alreadyHave.length,
    targetCount,
    totalAvailable,
    options.maxPages
  );
  const pageUrl = derivePaginationUrl(descriptor.url);

  // null marks a failed page
  const fetchPage = async (pageNo: number, index: number): Promise<ItemStub[] | null> => {
    if (index > 0 && options.interPageDelayMs > 0) {
      await options.sleep(options.interPageDelayMs);
    }
    try {
      const response = await transport.send({
        method: "POST",
        url: pageUrl,
        headers: withHeaders(descriptor, {
          [options.correlationHeader]: options.correlationId(),
        }),
        data: buildPagePayload(descriptor, session, pageNo),
        timeoutMs: options.timeoutMs,
        proxy: options.proxy,
      });
      if (!isSuccessStatus(response.status)) {
        throw new TransportError(`Page ${pageNo} returned status ${response.status}`, {
          kind: "status",
          status: response.status,
        });
      }
      const stubs = readPageStubs(response.body, pageNo);
      logger.debug({ pageNo, loaded: stubs.length }, "Page loaded");
      return stubs;
    } catch (error) {
      if (!(error instanceof TransportError || error instanceof UnreadableResponseError)) {
        throw error;
      }
      logger.warn({ pageNo, err: error }, "Page fetch failed; continuing without it");
      return null;
    }
  };

  const pageResults = await runWithConcurrencyLimit(
    pages.map((pageNo, index) => () => fetchPage(pageNo, index)),
    options.pageConcurrency
  );

  const failedPages = pages.filter((_, index) => pageResults[index] === null);
  const loaded = pageResults.flatMap((stubs) => stubs ?? []);
  const combined = [...alreadyHave, ...loaded].slice(0, targetCount);
  logger.info(
    { pagesRequested: pages.length, failedPages, collected: combined.length, targetCount },
    "Stub collection finished"
  );
  return {
    stubs: combined.map((stub, ordinal) => ({ ...stub, ordinal })),
    failedPages,
  };
}

function readPageStubs(body: string, pageNo: number): ItemStub[] {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw new UnreadableResponseError(`Page ${pageNo} response is not JSON`, {
      cause: error,
    });
  }
  if (!isJsonObject(data)) {
    throw new UnreadableResponseError(`Page ${pageNo} response is not a JSON object`);
  }
  return toStubs(data.tuples);
}
