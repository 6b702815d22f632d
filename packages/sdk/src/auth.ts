/**
 * Geo Engine sessions.
 *
 * One session is shared by the whole process: `initialize()` opens it,
 * everything else picks it up through `getSession()`, `reset()` drops it.
 */

import {
  SessionClient,
  createConsoleLogger,
  type ClientConfig,
  type Logger,
} from "@geoengine-ts/clients-core";
import type { SessionResponse } from "@geoengine-ts/types";
import type { AxiosAdapter } from "axios";
import { loadDotenv, readSettings } from "./config.js";
import { InputError, UninitializedError } from "./errors.js";

export interface Credentials {
  email: string;
  password: string;
}

export interface InitializeOptions {
  /** Log in with email and password */
  credentials?: Credentials;
  /** Resume the session behind an existing token */
  token?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  logger?: Logger;
  /** Replaces the network, e.g. with `createStubServer().adapter` from `@geoengine-ts/clients-core/testing` */
  adapter?: AxiosAdapter;
  /** Load a `.env` file first, from the working directory or a given path (default: true) */
  dotenv?: boolean | string;
}

/** Client settings every session-bound client is built from */
type ConnectionConfig = Omit<ClientConfig, "token">;

export class Session {
  private readonly sessionId: string;
  private readonly connection: ConnectionConfig;
  readonly validUntil?: string;

  constructor(response: SessionResponse, connection: ConnectionConfig) {
    this.sessionId = response.id;
    this.validUntil = response.validUntil;
    this.connection = connection;
  }

  /**
   * Open a session against a server.
   *
   * Credentials win over a token; each falls back to its environment
   * variables (GEOENGINE_EMAIL + GEOENGINE_PASSWORD, GEOENGINE_TOKEN).
   * Without either, the session is anonymous.
   */
  static async create(serverUrl: string, options: InitializeOptions = {}): Promise<Session> {
    if (options.credentials && options.token !== undefined) {
      throw new InputError("Cannot provide both credentials and token");
    }

    const settings = readSettings();
    const connection: ConnectionConfig = {
      baseUrl: serverUrl,
      timeout: options.timeout ?? settings.timeout,
      logger: options.logger ?? createConsoleLogger({ debug: settings.debug }),
      adapter: options.adapter,
    };
    const client = new SessionClient(connection);

    let response: SessionResponse;
    if (options.credentials) {
      response = await client.login(options.credentials.email, options.credentials.password);
    } else if (settings.email && settings.password) {
      response = await client.login(settings.email, settings.password);
    } else if (options.token !== undefined) {
      response = await client.getSession(options.token);
    } else if (settings.token) {
      response = await client.getSession(settings.token);
    } else {
      response = await client.anonymous();
    }

    return new Session(response, connection);
  }

  get id(): string {
    return this.sessionId;
  }

  get serverUrl(): string {
    return this.connection.baseUrl;
  }

  get authHeader(): Record<string, string> {
    return { Authorization: "Bearer " + this.sessionId };
  }

  get logger(): Logger | undefined {
    return this.connection.logger;
  }

  /** Config for a client acting on behalf of this session */
  clientConfig(): ClientConfig {
    return { ...this.connection, token: this.sessionId };
  }

  async logout(): Promise<void> {
    await new SessionClient(this.connection).logout(this.sessionId);
  }

  toString(): string {
    let r = "";
    r += `Server:              ${this.serverUrl}\n`;
    r += `Session Id:          ${this.sessionId}\n`;
    if (this.validUntil !== undefined) {
      r += `Session valid until: ${this.validUntil}\n`;
    }
    return r;
  }
}

let currentSession: Session | undefined;

/**
 * Connect this process to a Geo Engine instance.
 *
 * Replaces any previous session without logging it out.
 */
export async function initialize(
  serverUrl: string,
  options: InitializeOptions = {},
): Promise<Session> {
  const dotenvPath = options.dotenv ?? true;
  if (dotenvPath !== false) {
    loadDotenv(typeof dotenvPath === "string" ? dotenvPath : undefined);
  }
  const session = await Session.create(serverUrl, options);
  currentSession = session;
  session.logger?.debug(`[session] Connected to ${serverUrl}`);
  return session;
}

/** The session opened by `initialize()` */
export function getSession(): Session {
  if (!currentSession) {
    throw new UninitializedError();
  }
  return currentSession;
}

/** Drop the current session, logging it out first unless told otherwise */
export async function reset(logout: boolean = true): Promise<void> {
  const session = currentSession;
  currentSession = undefined;
  if (session && logout) {
    await session.logout();
  }
}
