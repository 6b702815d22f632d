import axios, {
  type AxiosAdapter,
  type AxiosRequestConfig,
  type AxiosResponse,
  type Method,
} from "axios";
import { GeoEngineError, checkResponseForError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { DEFAULT_USER_AGENT } from "./version.js";

export interface ClientConfig {
  /** Base URL of the Geo Engine API (e.g., "http://localhost:3030/api") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Session token for authenticated requests */
  token?: string;
  /** Where request and error lines go (default: silent) */
  logger?: Logger;
  /** Replaces axios' network adapter, e.g. with an in-process stand-in */
  adapter?: AxiosAdapter;
}

export interface RequestParams {
  path?: string;
  body?: unknown;
  query?: Record<string, unknown>;
  /** Extra headers, overriding the defaults */
  headers?: Record<string, string>;
  /** "arraybuffer" for binary payloads such as images (default: "json") */
  responseType?: "json" | "arraybuffer";
}

export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;
  protected token?: string;
  protected logger: Logger;
  protected adapter?: AxiosAdapter;

  constructor(resource: string, config: ClientConfig) {
    this.resource = resource ? "/" + resource : "";
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 30000;
    this.token = config.token;
    this.logger = config.logger ?? silentLogger;
    this.adapter = config.adapter;
  }

  /** Update the auth token (e.g., after login) */
  public setToken(token: string | undefined): void {
    this.token = token;
  }

  protected buildPath(params: RequestParams): string {
    if (params.path) return this.resource + "/" + params.path;
    return this.resource || "/";
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        "User-Agent": DEFAULT_USER_AGENT,
      },
      // Status codes are checked in request() to surface the server's error body
      validateStatus: () => true,
    };

    if (this.token) {
      config.headers = {
        ...config.headers,
        Authorization: "Bearer " + this.token,
      };
    }

    if (params.headers) {
      config.headers = { ...config.headers, ...params.headers };
    }

    if (params.query) {
      config.params = params.query;
    }

    if (params.responseType) {
      config.responseType = params.responseType;
    }

    if (this.adapter) {
      config.adapter = this.adapter;
    }

    return config;
  }

  protected async request<T>(method: Method, params: RequestParams): Promise<T> {
    const path = this.buildPath(params);
    const config: AxiosRequestConfig = {
      ...this.buildConfig(params),
      method,
      url: path,
      data: params.body,
    };

    this.logger.debug(`[http] ${method.toUpperCase()} ${path}`);
    const response = await axios.request<T>(config);

    if (response.status < 200 || response.status >= 300) {
      const error = GeoEngineError.fromBody(
        decodeBody(response),
        response.status,
        response.statusText,
      );
      this.logger.warn(`[http] ${method.toUpperCase()} ${path} failed: ${error.message}`);
      throw error;
    }

    if (params.responseType !== "arraybuffer") {
      checkResponseForError(response.data);
    }

    return response.data;
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    return this.request<T>("get", params);
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    return this.request<T>("post", params);
  }

  public async put<T>(params: RequestParams = {}): Promise<T> {
    return this.request<T>("put", params);
  }

  public async patch<T>(params: RequestParams = {}): Promise<T> {
    return this.request<T>("patch", params);
  }

  public async delete<T>(params: RequestParams = {}): Promise<T> {
    return this.request<T>("delete", params);
  }
}

/** Error bodies of binary requests arrive as bytes; read them back as JSON */
function decodeBody(response: AxiosResponse<unknown>): unknown {
  const data = response.data;
  let text: string | undefined;
  if (typeof data === "string") {
    text = data;
  } else if (data instanceof ArrayBuffer || ArrayBuffer.isView(data)) {
    const bytes =
      data instanceof ArrayBuffer
        ? Buffer.from(data)
        : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    text = bytes.toString("utf-8");
  }
  if (text === undefined) return data;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
