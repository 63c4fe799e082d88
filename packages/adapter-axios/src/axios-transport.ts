import { Transport, TransportError, toHeaderRecord } from "@crawl-relay/core";
import type { TransportRequest, TransportResponse } from "@crawl-relay/core";
import axios, {
  AxiosHeaders,
  type AxiosInstance,
  type AxiosProxyConfig,
  type AxiosRequestConfig,
} from "axios";

/**
 * Turns a proxy URL into the shape axios expects.
 *
 * @throws {TransportError} If the URL cannot be parsed
 */
export function toAxiosProxy(proxyUrl: string): AxiosProxyConfig {
  let parsed: URL;
  try {
    parsed = new URL(proxyUrl);
  } catch (error) {
    throw new TransportError(`Invalid proxy URL: ${proxyUrl}`, { kind: "config", cause: error });
  }
  const protocol = parsed.protocol.replace(/:$/, "");
  const proxy: AxiosProxyConfig = {
    protocol,
    host: parsed.hostname,
    port: parsed.port !== "" ? Number(parsed.port) : protocol === "https" ? 443 : 80,
  };
  if (parsed.username !== "") {
    proxy.auth = {
      username: decodeURIComponent(parsed.username),
      password: decodeURIComponent(parsed.password),
    };
  }
  return proxy;
}

/**
 * Transport backed by axios.
 * Every status is returned as a response; the body is always read as text.
 *
 * @example
 * ```typescript
 * const pipeline = new CrawlPipeline(new AxiosTransport());
 * ```
 */
export default class AxiosTransport extends Transport {
  private readonly client: AxiosInstance;

  /**
   * @param client - Instance to send through, e.g. one with interceptors. Defaults to a fresh instance.
   */
  constructor(client?: AxiosInstance) {
    super();
    this.client = client ?? axios.create();
  }

  protected async createRequest(request: TransportRequest): Promise<TransportResponse> {
    const config: AxiosRequestConfig<string> = {
      url: request.url,
      method: request.method,
      headers: { ...request.headers },
      data: request.data === undefined ? undefined : JSON.stringify(request.data),
      timeout: request.timeoutMs,
      responseType: "text",
      transformResponse: (body: unknown) => body,
      validateStatus: () => true,
    };
    if (request.proxy !== undefined) {
      config.proxy = toAxiosProxy(request.proxy);
    }

    const response = await this.client.request<unknown>(config);
    const headers =
      response.headers instanceof AxiosHeaders
        ? toHeaderRecord(response.headers.toJSON())
        : toHeaderRecord(response.headers);
    return {
      status: response.status,
      headers,
      body: typeof response.data === "string" ? response.data : JSON.stringify(response.data ?? ""),
    };
  }
}
