import type { Logger } from "pino";
import type Transport from "./transport";
import type { TransportResponse } from "./transport";
import type { CallContext } from "./models/call-context";
import type { OutcomeHandler } from "./models/handlers";
import type {
  FailureCode,
  FetchOutcome,
  ItemStub,
  JsonObject,
  RequestDescriptor,
  SearchIdentity,
  SessionContext,
} from "./models/crawl-types";
import {
  PipelineError,
  QuotaOrChallengeError,
  RateLimitedError,
  TransportError,
  UnauthorizedError,
  UnreadableResponseError,
} from "./errors";
import { isJsonObject, readSearchIdentity, withHeaders } from "./descriptor-parser";
import { normalize } from "./normalizer";
import { runWithConcurrencyLimit } from "./utils/concurrency-pool";
import { executeWithRetry, type AttemptResult } from "./utils/retry-executor";
import {
  DEFAULT_BLOCK_MARKERS,
  classifyStatus,
  detectBlockSignal,
  detectBlockSignalInError,
  rateLimitBackoff,
} from "./utils/retry-utils";

/**
 * `idle → running → completed`, or `running → draining → stopped` once the breaker trips.
 */
export type SchedulerState = "idle" | "running" | "draining" | "stopped" | "completed";

export interface DetailFetchOptions extends CallContext {
  maxAttempts: number;
  rateLimitBaseDelayMs: number;
  retryDelayMs: number;
  blockMarkers?: readonly RegExp[];
  onOutcome?: OutcomeHandler;
}

export interface DetailFetchReport {
  /** One outcome per stub, in stub order. */
  outcomes: FetchOutcome[];
  abortReason: string | null;
}

const DETAIL_PATH = "/cloudgateway-resdex/recruiter-js-profile-services/v0";

function isLiteListing(listingUrl: string): boolean {
  return listingUrl.includes("/rdxLite/");
}

/**
 * Profile endpoint on the listing's origin. Missing identifiers render as `null`.
 */
export function buildDetailUrl(listingUrl: string, identity: SearchIdentity): string {
  const origin = /^https?:\/\/[^/?#]*/i.exec(listingUrl)?.[0] ?? "";
  const variant = isLiteListing(listingUrl) ? "rdxlite" : "rdx";
  return (
    `${origin}${DETAIL_PATH}/companies/${String(identity.companyId)}` +
    `/recruiters/${String(identity.rdxUserId)}/${variant}/jsprofile`
  );
}

export function buildDetailPayload(
  descriptor: RequestDescriptor,
  session: SessionContext,
  stub: ItemStub
): JsonObject {
  const identity = readSearchIdentity(descriptor.body);
  const lite = isLiteListing(descriptor.url);
  return {
    uniqId: stub.uniqueId,
    pageName: lite ? "rdxLitePreview" : "rdxPreview",
    uname: null,
    sid: session.sessionId,
    requirementId: identity.requirementId,
    requirementGroupId: identity.requirementId,
    jsKey: stub.jsKey,
    miscellaneousInfo: {
      companyId: identity.companyId,
      rdxUserId: identity.rdxUserId,
      resendOtp: false,
      flowName: lite ? "rdxLiteSrp" : "rdxSrp",
    },
  };
}

function toFailureCode(error: PipelineError): FailureCode {
  switch (error.code) {
    case "RATE_LIMITED":
    case "UNAUTHORIZED":
    case "QUOTA_OR_CHALLENGE":
    case "UNREADABLE_RESPONSE":
      return error.code;
    default:
      return "TRANSPORT";
  }
}

/**
 * Fetches full records for a list of stubs through a bounded pool.
 *
 * A quota or anti-automation signal trips a one-way breaker: calls already in
 * flight finish, nothing new is issued, and every stub that has not started
 * (or is waiting for a retry) is reported as aborted.
 *
 * One instance serves a single `fetchAll` call.
 *
 * @example
 * ```typescript
 * const scheduler = new DetailFetchScheduler(transport, { ...context, maxAttempts: 3, rateLimitBaseDelayMs: 2000, retryDelayMs: 1000 });
 * const { outcomes, abortReason } = await scheduler.fetchAll(descriptor, session, stubs, 5);
 * ```
 */
export class DetailFetchScheduler {
  private state: SchedulerState = "idle";
  private abortReason: string | null = null;
  private readonly logger: Logger;
  private readonly blockMarkers: readonly RegExp[];

  constructor(
    private readonly transport: Transport,
    private readonly options: DetailFetchOptions
  ) {
    this.logger = options.logger.child({ component: "DetailFetchScheduler" });
    this.blockMarkers = options.blockMarkers ?? DEFAULT_BLOCK_MARKERS;
  }

  public getState(): SchedulerState {
    return this.state;
  }

  /**
   * @throws {Error} If the scheduler has already been used
   */
  public async fetchAll(
    descriptor: RequestDescriptor,
    session: SessionContext,
    stubs: readonly ItemStub[],
    concurrencyLimit: number
  ): Promise<DetailFetchReport> {
    if (this.state !== "idle") {
      throw new Error(`DetailFetchScheduler can only run once (state: ${this.state})`);
    }
    this.state = "running";

    const url = buildDetailUrl(descriptor.url, readSearchIdentity(descriptor.body));
    this.logger.info({ stubs: stubs.length, concurrencyLimit }, "Fetching details");

    const outcomes = await runWithConcurrencyLimit(
      stubs.map((stub) => async () => {
        const outcome = await this.fetchOne(url, descriptor, session, stub);
        this.report(outcome, stub);
        return outcome;
      }),
      concurrencyLimit
    );

    // In-flight calls have settled by now
    this.state = this.getState() === "draining" ? "stopped" : "completed";
    this.logger.info(
      { state: this.state, abortReason: this.abortReason },
      "Detail fetching finished"
    );
    return { outcomes, abortReason: this.abortReason };
  }

  private async fetchOne(
    url: string,
    descriptor: RequestDescriptor,
    session: SessionContext,
    stub: ItemStub
  ): Promise<FetchOutcome> {
    // Breaker already open: this stub never gets a call
    if (this.state !== "running") {
      return { kind: "aborted", ordinal: stub.ordinal, reason: this.describeAbort() };
    }

    const data = buildDetailPayload(descriptor, session, stub);
    const result = await executeWithRetry(
      async (attempt): Promise<AttemptResult<JsonObject>> => {
        let response: TransportResponse;
        try {
          response = await this.transport.send({
            method: "POST",
            url,
            headers: withHeaders(descriptor, {
              [this.options.correlationHeader]: this.options.correlationId(),
            }),
            data,
            timeoutMs: this.options.timeoutMs,
            proxy: this.options.proxy,
          });
        } catch (error) {
          const failure =
            error instanceof PipelineError
              ? error
              : new TransportError(String(error), { kind: "unknown", cause: error });
          // Transport failures can carry the block signal in their message
          const marker = detectBlockSignalInError(failure, this.blockMarkers);
          if (marker !== null) {
            return { type: "stop", error: this.trip(marker, stub) };
          }
          this.logger.warn({ ordinal: stub.ordinal, attempt, err: failure }, "Detail call failed");
          return { type: "retry", error: failure, delayMs: this.options.retryDelayMs };
        }
        return this.judge(response, attempt, stub);
      },
      {
        maxAttempts: this.options.maxAttempts,
        sleep: this.options.sleep,
        // A pending retry is dropped once the breaker opens
        canProceed: () => this.state === "running",
      }
    );

    switch (result.type) {
      case "done":
        return {
          kind: "success",
          ordinal: stub.ordinal,
          record: normalize(result.value),
          attempts: result.attempts,
        };
      case "failed":
        return {
          kind: "failure",
          ordinal: stub.ordinal,
          code: toFailureCode(result.error),
          reason: result.error.message,
          attempts: result.attempts,
        };
      case "halted":
        // Stopped between attempts by the breaker
        return { kind: "aborted", ordinal: stub.ordinal, reason: this.describeAbort() };
    }
  }

  private judge(
    response: TransportResponse,
    attempt: number,
    stub: ItemStub
  ): AttemptResult<JsonObject> {
    // Block signals win over the status code
    const marker = detectBlockSignal(response.body, this.blockMarkers);
    if (marker !== null) {
      return { type: "stop", error: this.trip(marker, stub) };
    }

    switch (classifyStatus(response.status)) {
      case "unauthorized":
        return { type: "stop", error: new UnauthorizedError() };
      case "rate-limited":
        this.logger.warn(
          { ordinal: stub.ordinal, attempt, status: response.status },
          "Rate limited; backing off"
        );
        return {
          type: "retry",
          error: new RateLimitedError(response.status),
          delayMs: rateLimitBackoff(this.options.rateLimitBaseDelayMs, attempt),
        };
      case "retryable":
        this.logger.warn(
          { ordinal: stub.ordinal, attempt, status: response.status },
          "Detail call returned an error status"
        );
        return {
          type: "retry",
          error: new TransportError(`Detail call returned status ${response.status}`, {
            kind: "status",
            status: response.status,
          }),
          delayMs: this.options.retryDelayMs,
        };
      case "success":
        return this.decode(response.body);
    }
  }

  private decode(body: string): AttemptResult<JsonObject> {
    try {
      const parsed: unknown = JSON.parse(body);
      if (isJsonObject(parsed)) {
        return { type: "done", value: parsed };
      }
      return {
        type: "retry",
        error: new UnreadableResponseError("Detail response is not a JSON object"),
        delayMs: this.options.retryDelayMs,
      };
    } catch (error) {
      return {
        type: "retry",
        error: new UnreadableResponseError("Detail response is not JSON", { cause: error }),
        delayMs: this.options.retryDelayMs,
      };
    }
  }

  private trip(marker: string, stub: ItemStub): QuotaOrChallengeError {
    const error = new QuotaOrChallengeError(marker);
    // Only the first signal opens the breaker and sets the reason
    if (this.state === "running") {
      this.state = "draining";
      this.abortReason = error.message;
      this.logger.error(
        { ordinal: stub.ordinal, marker },
        "Quota or challenge detected; no further calls will be issued"
      );
    }
    return error;
  }

  private describeAbort(): string {
    return this.abortReason ?? "Run stopped before this item was fetched";
  }

  private report(outcome: FetchOutcome, stub: ItemStub): void {
    if (!this.options.onOutcome) {
      return;
    }
    try {
      this.options.onOutcome(outcome, stub);
    } catch (error) {
      this.logger.error({ ordinal: stub.ordinal, err: error }, "Outcome handler threw");
    }
  }
}
