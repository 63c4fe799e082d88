import { describe, test } from "node:test";
import * as assert from "node:assert";
import { Agent } from "node:http";
import { Response } from "node-fetch";
import type { RequestInit } from "node-fetch";
import type fetch from "node-fetch";
import { TransportError } from "@crawl-relay/core";
import NodeFetchTransport from "../node-fetch-transport";

interface SeenCall {
  url: string;
  init?: RequestInit;
}

function fakeFetch(reply: () => Response) {
  const seen: SeenCall[] = [];
  const fetchImpl: typeof fetch = async (url, init) => {
    seen.push({ url: String(url), init });
    return reply();
  };
  return { fetchImpl, seen };
}

function failingFetch(error: Error): typeof fetch {
  return async () => {
    throw error;
  };
}

const request = {
  method: "POST" as const,
  url: "https://api.example.test/search",
  headers: { "x-transaction-id": "tx-1" },
  data: { a: 1 },
  timeoutMs: 1000,
};

describe("NodeFetchTransport", () => {
  test("should send a JSON POST and return the raw body", async () => {
    const { fetchImpl, seen } = fakeFetch(
      () =>
        new Response('{"ok":true}', {
          status: 200,
          headers: { "Content-Type": "application/json" },
        })
    );

    const response = await new NodeFetchTransport({ fetchImpl }).send(request);

    assert.deepStrictEqual(response, {
      status: 200,
      headers: { "content-type": "application/json" },
      body: '{"ok":true}',
    });
    assert.strictEqual(seen.length, 1);
    assert.strictEqual(seen[0].url, "https://api.example.test/search");
    assert.strictEqual(seen[0].init?.method, "POST");
    assert.strictEqual(seen[0].init?.body, '{"a":1}');
    assert.deepStrictEqual(seen[0].init?.headers, { "x-transaction-id": "tx-1" });
    assert.ok(seen[0].init?.signal);
  });

  test("should return error statuses and omit the body of a bodiless request", async () => {
    const { fetchImpl, seen } = fakeFetch(() => new Response("unavailable", { status: 503 }));

    const response = await new NodeFetchTransport({ fetchImpl }).send({
      method: "GET",
      url: "https://api.example.test/health",
      headers: {},
      timeoutMs: 1000,
    });

    assert.strictEqual(response.status, 503);
    assert.strictEqual(response.body, "unavailable");
    assert.strictEqual(seen[0].init?.body, undefined);
  });

  test("should refuse a proxy without an agent", async () => {
    const { fetchImpl, seen } = fakeFetch(() => new Response("{}"));

    await assert.rejects(
      new NodeFetchTransport({ fetchImpl }).send({
        ...request,
        proxy: "http://proxy.example.test:8080",
      }),
      (error: unknown) => error instanceof TransportError && error.kind === "config"
    );
    assert.strictEqual(seen.length, 0);
  });

  test("should hand the agent to fetch", async () => {
    const agent = new Agent();
    const { fetchImpl, seen } = fakeFetch(() => new Response("{}"));

    await new NodeFetchTransport({ fetchImpl, agent }).send({
      ...request,
      proxy: "http://proxy.example.test:8080",
    });

    assert.strictEqual(seen[0].init?.agent, agent);
  });

  test("should classify fetch errors as network failures", async () => {
    const error = new Error("request to https://api.example.test/search failed, reason: getaddrinfo ENOTFOUND");
    error.name = "FetchError";

    await assert.rejects(
      new NodeFetchTransport({ fetchImpl: failingFetch(error) }).send(request),
      (thrown: unknown) => thrown instanceof TransportError && thrown.kind === "network"
    );
  });

  test("should classify aborts as timeouts", async () => {
    const error = new Error("The operation was aborted.");
    error.name = "AbortError";

    await assert.rejects(
      new NodeFetchTransport({ fetchImpl: failingFetch(error) }).send(request),
      (thrown: unknown) => thrown instanceof TransportError && thrown.kind === "timeout"
    );
  });
});
