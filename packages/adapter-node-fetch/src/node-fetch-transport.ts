import type { Agent } from "node:http";
import { Transport, TransportError } from "@crawl-relay/core";
import type { HttpHeaders, TransportRequest, TransportResponse } from "@crawl-relay/core";
import fetch from "node-fetch";
import type { RequestInit } from "node-fetch";

export interface NodeFetchTransportOptions {
  /** Fetch implementation to call. Defaults to node-fetch. */
  fetchImpl?: typeof fetch;
  /**
   * Agent for outgoing connections. node-fetch has no proxy support of its
   * own, so a run with a proxy URL needs a proxy-aware agent here.
   */
  agent?: Agent;
}

/**
 * Transport backed by node-fetch.
 *
 * @example
 * ```typescript
 * const pipeline = new CrawlPipeline(new NodeFetchTransport());
 * ```
 */
export default class NodeFetchTransport extends Transport {
  private readonly fetchImpl: typeof fetch;
  private readonly agent?: Agent;

  constructor(options: NodeFetchTransportOptions = {}) {
    super();
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.agent = options.agent;
  }

  protected async createRequest(request: TransportRequest): Promise<TransportResponse> {
    if (request.proxy !== undefined && this.agent === undefined) {
      throw new TransportError(
        "A proxy URL was given but no agent is configured; pass a proxy agent to NodeFetchTransport",
        { kind: "config" }
      );
    }

    const init: RequestInit = {
      method: request.method,
      headers: { ...request.headers },
      signal: AbortSignal.timeout(request.timeoutMs),
    };
    if (request.data !== undefined) {
      init.body = JSON.stringify(request.data);
    }
    if (this.agent !== undefined) {
      init.agent = this.agent;
    }

    const response = await this.fetchImpl(request.url, init);
    const headers: HttpHeaders = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });
    return { status: response.status, headers, body: await response.text() };
  }
}
