/**
 * In-process stand-in for the Geo Engine server.
 *
 * Plugs into `ClientConfig.adapter` so clients can be exercised without a
 * network. Every request is recorded; the handler decides the response.
 */

import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from "axios";

export interface StubRequest {
  /** Upper-case HTTP method */
  method: string;
  /** Path relative to the base URL, e.g. "/workflow/abc" */
  url: string;
  params: Record<string, unknown>;
  /** Header names are lower-cased */
  headers: Record<string, string>;
  /** Parsed JSON body, or the raw body (e.g. FormData) */
  body: unknown;
}

export interface StubResponse {
  status?: number;
  statusText?: string;
  data?: unknown;
}

export type StubHandler = (request: StubRequest) => StubResponse | Promise<StubResponse>;

export interface StubServer {
  adapter: AxiosAdapter;
  requests: StubRequest[];
}

export function createStubServer(handler: StubHandler): StubServer {
  const requests: StubRequest[] = [];

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const request = toStubRequest(config);
    requests.push(request);
    const stub = await handler(request);
    const response: AxiosResponse<unknown> = {
      data: stub.data ?? "",
      status: stub.status ?? 200,
      statusText: stub.statusText ?? "OK",
      headers: {},
      config,
    };
    return response;
  };

  return { adapter, requests };
}

function toStubRequest(config: InternalAxiosRequestConfig): StubRequest {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(config.headers.toJSON())) {
    if (value !== null && value !== undefined) {
      headers[name.toLowerCase()] = String(value);
    }
  }

  const params: unknown = config.params;
  const data: unknown = config.data;

  return {
    method: (config.method ?? "get").toUpperCase(),
    url: config.url ?? "",
    params: isRecord(params) ? params : {},
    headers,
    body: typeof data === "string" && data.length > 0 ? parseJson(data) : data,
  };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
