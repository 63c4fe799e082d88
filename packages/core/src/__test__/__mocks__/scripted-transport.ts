import Transport, { type TransportRequest, type TransportResponse } from "../../transport";
import type { JsonValue } from "../../models/crawl-types";

export type Responder = (
  request: TransportRequest
) => TransportResponse | Promise<TransportResponse>;

export type ScriptedReply = TransportResponse | Error | Responder;

interface Route {
  match: string | RegExp;
  replies: ScriptedReply[];
}

export function jsonResponse(status: number, body: JsonValue): TransportResponse {
  return {
    status,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  };
}

export function textResponse(status: number, body: string): TransportResponse {
  return { status, headers: { "content-type": "text/html" }, body };
}

/**
 * In-process transport answering from per-URL scripts.
 * Routes are matched in registration order; the last reply of a route repeats once the others are used up.
 */
export default class ScriptedTransport extends Transport {
  public readonly calls: TransportRequest[] = [];
  private readonly routes: Route[] = [];

  public on(match: string | RegExp, ...replies: ScriptedReply[]): ScriptedTransport {
    if (replies.length === 0) {
      throw new Error("A route needs at least one reply");
    }
    this.routes.push({ match, replies });
    return this;
  }

  public callsTo(match: string | RegExp): TransportRequest[] {
    return this.calls.filter((call) => matches(match, call.url));
  }

  protected async createRequest(request: TransportRequest): Promise<TransportResponse> {
    this.calls.push(request);
    const route = this.routes.find((candidate) => matches(candidate.match, request.url));
    if (!route) {
      throw new Error(`No scripted reply for ${request.url}`);
    }
    const reply = route.replies.length > 1 ? route.replies.shift() : route.replies[0];
    if (reply === undefined) {
      throw new Error(`Script for ${request.url} is empty`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    if (typeof reply === "function") {
      return reply(request);
    }
    return reply;
  }
}

function matches(match: string | RegExp, url: string): boolean {
  return typeof match === "string" ? url.includes(match) : match.test(url);
}
