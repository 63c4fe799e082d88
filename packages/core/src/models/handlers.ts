import type {
  FetchOutcome,
  ItemStub,
  ResultEnvelope,
  StructuredError,
} from "./crawl-types";

/**
 * Handler called with the structured error of a run that could not start
 * (bad input, malformed template, session failure).
 *
 * @param error - The error returned to the caller
 */
export interface ErrorHandler {
  (error: StructuredError): void;
}

/**
 * Handler called as each detail fetch settles, in completion order.
 *
 * @param outcome - The settled outcome
 * @param stub - The stub the outcome belongs to
 */
export interface OutcomeHandler {
  (outcome: FetchOutcome, stub: ItemStub): void;
}

/**
 * Handler called once per run, after success or failure.
 */
export interface FinishHandler {
  (): void;
}

/**
 * Handler called with the envelope of a run that produced results, partial ones included.
 */
export interface ResultHandler {
  (envelope: ResultEnvelope): void;
}
