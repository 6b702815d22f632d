import type { SessionResponse } from "@geoengine-ts/types";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import { parseResponse, sessionSchema } from "./schemas.js";

export class SessionClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("", config);
  }

  /** Log in with email and password */
  public async login(email: string, password: string): Promise<SessionResponse> {
    const body = await this.client.post<unknown>({
      path: "login",
      body: { email, password },
    });
    return parseResponse(sessionSchema, body, "login");
  }

  /** Open an anonymous session */
  public async anonymous(): Promise<SessionResponse> {
    const body = await this.client.post<unknown>({ path: "anonymous" });
    return parseResponse(sessionSchema, body, "anonymous session");
  }

  /** Look up the session behind an existing token */
  public async getSession(token: string): Promise<SessionResponse> {
    const body = await this.client.get<unknown>({
      path: "session",
      headers: { Authorization: "Bearer " + token },
    });
    return parseResponse(sessionSchema, body, "session");
  }

  public async logout(token: string): Promise<void> {
    await this.client.post<unknown>({
      path: "logout",
      headers: { Authorization: "Bearer " + token },
    });
  }
}
