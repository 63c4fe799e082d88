import type { Logger } from "pino";
import type Transport from "./transport";
import type {
  FailureSummary,
  FetchOutcome,
  NormalizedRecord,
  ResultEnvelope,
  RunInput,
  RunResult,
} from "./models/crawl-types";
import type { CallContext } from "./models/call-context";
import type {
  ErrorHandler,
  FinishHandler,
  OutcomeHandler,
  ResultHandler,
} from "./models/handlers";
import {
  resolveSettings,
  runInputSchema,
  type PipelineSettings,
  type PipelineSettingsInput,
} from "./config";
import { InvalidInputError, toStructuredError } from "./errors";
import { getLogger } from "./logger";
import { DEFAULT_SKIPPED_HEADERS, parseTemplate, type ParseOptions } from "./descriptor-parser";
import { establishSession } from "./session-controller";
import { collectStubs } from "./pagination-controller";
import { DetailFetchScheduler } from "./detail-fetch-scheduler";
import { sleep as realSleep, type Sleep } from "./utils/retry-executor";
import { createTransactionId, type CorrelationIdFactory } from "./utils/transaction-id";

export interface CrawlPipelineOptions {
  settings?: PipelineSettingsInput;
  logger?: Logger;
  sleep?: Sleep;
  correlationId?: CorrelationIdFactory;
  /** Clock used for `elapsedMs` and `scrapedAt`. */
  now?: () => number;
  parseOptions?: ParseOptions;
  blockMarkers?: readonly RegExp[];
}

/**
 * Runs a whole crawl: parse the captured template, open a session, collect
 * listing stubs and fetch their details.
 *
 * Runs never throw. Failures before any stub is collected come back as
 * `{ ok: false, error }`; later failures degrade to partial results.
 * The transport is shared between runs; everything else is per run.
 *
 * @example
 * ```typescript
 * const result = await new CrawlPipeline(new AxiosTransport())
 *   .withOutcomeHandler((outcome) => console.log(outcome.kind, outcome.ordinal))
 *   .withErrorHandler((error) => console.error(error.code, error.message))
 *   .run({ template, targetCount: 50, concurrencyLimit: 5 });
 * ```
 */
export class CrawlPipeline {
  private readonly settings: PipelineSettings;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly correlationId: CorrelationIdFactory;
  private readonly now: () => number;
  private readonly parseOptions: ParseOptions;
  private readonly blockMarkers?: readonly RegExp[];

  protected outcomeHandler?: OutcomeHandler;
  protected resultHandler?: ResultHandler;
  protected errorHandler?: ErrorHandler;
  protected finishHandler?: FinishHandler;

  constructor(
    private readonly transport: Transport,
    options: CrawlPipelineOptions = {}
  ) {
    this.settings = resolveSettings(options.settings);
    this.logger = (options.logger ?? getLogger()).child({ component: "CrawlPipeline" });
    this.sleep = options.sleep ?? realSleep;
    this.correlationId = options.correlationId ?? createTransactionId;
    this.now = options.now ?? Date.now;
    this.parseOptions = options.parseOptions ?? {
      skipHeaders: [...DEFAULT_SKIPPED_HEADERS, this.settings.correlationHeader],
    };
    this.blockMarkers = options.blockMarkers;
  }

  public withOutcomeHandler(handler: OutcomeHandler): CrawlPipeline {
    this.outcomeHandler = handler;
    return this;
  }

  public withResultHandler(handler: ResultHandler): CrawlPipeline {
    this.resultHandler = handler;
    return this;
  }

  public withErrorHandler(handler: ErrorHandler): CrawlPipeline {
    this.errorHandler = handler;
    return this;
  }

  public withFinishHandler(handler: FinishHandler): CrawlPipeline {
    this.finishHandler = handler;
    return this;
  }

  public async run(input: RunInput): Promise<RunResult> {
    try {
      return await this.execute(input);
    } finally {
      this.notify("finish", () => this.finishHandler?.());
    }
  }

  private async execute(input: RunInput): Promise<RunResult> {
    const startedAt = this.now();

    const validated = runInputSchema.safeParse(input);
    if (!validated.success) {
      const message = validated.error.issues
        .map((issue) =>
          issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
        )
        .join("; ");
      return this.fail(new InvalidInputError(message));
    }
    const { template, targetCount, concurrencyLimit, proxyUrl } = validated.data;

    const context: CallContext = {
      timeoutMs: this.settings.requestTimeoutMs,
      correlationHeader: this.settings.correlationHeader,
      correlationId: this.correlationId,
      proxy: proxyUrl,
      sleep: this.sleep,
      logger: this.logger,
    };

    let envelope: ResultEnvelope;
    try {
      const descriptor = parseTemplate(template, this.parseOptions);
      this.logger.info(
        { url: descriptor.url, bodySource: descriptor.bodySource, hasCredential: descriptor.credential !== null },
        "Template parsed"
      );

      const { session, stubs: firstPage, totalAvailable } = await establishSession(
        this.transport,
        descriptor,
        { ...context, requireCredential: this.settings.requireCredential }
      );

      const { stubs, failedPages } = await collectStubs(
        this.transport,
        descriptor,
        session,
        firstPage,
        targetCount,
        totalAvailable,
        {
          ...context,
          maxPages: this.settings.maxPages,
          pageConcurrency: this.settings.pageConcurrency,
          interPageDelayMs: this.settings.interPageDelayMs,
        }
      );

      const scheduler = new DetailFetchScheduler(this.transport, {
        ...context,
        maxAttempts: this.settings.maxAttempts,
        rateLimitBaseDelayMs: this.settings.rateLimitBaseDelayMs,
        retryDelayMs: this.settings.retryDelayMs,
        blockMarkers: this.blockMarkers,
        onOutcome: this.outcomeHandler,
      });
      const report = await scheduler.fetchAll(descriptor, session, stubs, concurrencyLimit);

      const finishedAt = this.now();
      envelope = assembleEnvelope(report.outcomes, {
        requestedCount: targetCount,
        totalAvailable,
        failedPages,
        abortReason: report.abortReason,
        elapsedMs: finishedAt - startedAt,
        scrapedAt: new Date(finishedAt).toISOString(),
      });
      this.logger.info(
        {
          fetched: envelope.fetchedCount,
          failed: envelope.failedCount,
          aborted: envelope.abortedCount,
          failedPages: envelope.failedPages,
          elapsedMs: envelope.elapsedMs,
        },
        "Run completed"
      );
    } catch (error) {
      return this.fail(error);
    }
    // handler failures stay out of the run result
    this.notify("result", () => this.resultHandler?.(envelope));
    return { ok: true, envelope };
  }

  private fail(error: unknown): RunResult {
    const structured = toStructuredError(error);
    this.logger.error({ err: error, code: structured.code }, "Run failed");
    this.notify("error", () => this.errorHandler?.(structured));
    return { ok: false, error: structured };
  }

  /**
   * Calls a caller-supplied handler; whatever it throws is logged and goes no further.
   */
  private notify(handler: "result" | "error" | "finish", call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.error({ err: error, handler }, "Handler threw");
    }
  }
}

/**
 * Builds the envelope from outcomes that are already in ordinal order.
 */
export function assembleEnvelope(
  outcomes: readonly FetchOutcome[],
  meta: Pick<
    ResultEnvelope,
    "requestedCount" | "totalAvailable" | "failedPages" | "abortReason" | "elapsedMs" | "scrapedAt"
  >
): ResultEnvelope {
  const records: NormalizedRecord[] = [];
  const failures: FailureSummary[] = [];
  let abortedCount = 0;

  for (const outcome of outcomes) {
    if (outcome.kind === "success") {
      records.push(outcome.record);
      continue;
    }
    if (outcome.kind === "aborted") {
      abortedCount++;
    }
    failures.push({ ordinal: outcome.ordinal, kind: outcome.kind, reason: outcome.reason });
  }

  return {
    requestedCount: meta.requestedCount,
    totalAvailable: meta.totalAvailable,
    collectedCount: outcomes.length,
    records,
    fetchedCount: records.length,
    failedCount: failures.length,
    abortedCount,
    failures,
    failedPages: meta.failedPages,
    abortReason: meta.abortReason,
    elapsedMs: meta.elapsedMs,
    scrapedAt: meta.scrapedAt,
  };
}
