import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { silentLogger } from "@geoengine-ts/clients-core";
import { createStubServer, type StubRequest } from "@geoengine-ts/clients-core/testing";
import { getSession, initialize, reset } from "./auth.js";
import { InputError, UninitializedError } from "./errors.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const SERVER_URL = "http://localhost:3030/api";

function sessionServer() {
  return createStubServer((request: StubRequest) => {
    switch (`${request.method} ${request.url}`) {
      case "POST /login":
        return { data: { id: "login-session", validUntil: "2030-01-01T00:00:00Z" } };
      case "GET /session":
        return { data: { id: "token-session" } };
      case "POST /anonymous":
        return { data: { id: "anonymous-session" } };
      case "POST /logout":
        return { data: "" };
      default:
        return { status: 404, statusText: "Not Found" };
    }
  });
}

beforeEach(() => {
  vi.stubEnv("GEOENGINE_EMAIL", "");
  vi.stubEnv("GEOENGINE_PASSWORD", "");
  vi.stubEnv("GEOENGINE_TOKEN", "");
});

afterEach(async () => {
  await reset(false);
  vi.unstubAllEnvs();
});

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("initialize", () => {
  it("opens an anonymous session by default", async () => {
    const server = sessionServer();

    const session = await initialize(SERVER_URL, {
      adapter: server.adapter,
      logger: silentLogger,
      dotenv: false,
    });

    expect(session.id).toBe("anonymous-session");
    expect(session.serverUrl).toBe(SERVER_URL);
    expect(getSession()).toBe(session);
    expect(server.requests.map((r) => r.url)).toEqual(["/anonymous"]);
  });

  it("logs in with explicit credentials", async () => {
    const server = sessionServer();

    const session = await initialize(SERVER_URL, {
      credentials: { email: "user@example.com", password: "test-password" },
      adapter: server.adapter,
      logger: silentLogger,
      dotenv: false,
    });

    expect(session.id).toBe("login-session");
    expect(session.validUntil).toBe("2030-01-01T00:00:00Z");
    expect(server.requests[0]?.body).toEqual({
      email: "user@example.com",
      password: "test-password",
    });
  });

  it("logs in with credentials from the environment", async () => {
    vi.stubEnv("GEOENGINE_EMAIL", "env@example.com");
    vi.stubEnv("GEOENGINE_PASSWORD", "env-password");
    const server = sessionServer();

    await initialize(SERVER_URL, { adapter: server.adapter, logger: silentLogger, dotenv: false });

    expect(server.requests[0]?.url).toBe("/login");
    expect(server.requests[0]?.body).toEqual({ email: "env@example.com", password: "env-password" });
  });

  it("resumes a session from an explicit token", async () => {
    const server = sessionServer();

    const session = await initialize(SERVER_URL, {
      token: "test-token",
      adapter: server.adapter,
      logger: silentLogger,
      dotenv: false,
    });

    expect(session.id).toBe("token-session");
    expect(server.requests[0]?.headers["authorization"]).toBe("Bearer test-token");
  });

  it("resumes a session from GEOENGINE_TOKEN", async () => {
    vi.stubEnv("GEOENGINE_TOKEN", "env-token");
    const server = sessionServer();

    await initialize(SERVER_URL, { adapter: server.adapter, logger: silentLogger, dotenv: false });

    expect(server.requests[0]?.url).toBe("/session");
    expect(server.requests[0]?.headers["authorization"]).toBe("Bearer env-token");
  });

  it("prefers credentials from the environment over an explicit token", async () => {
    vi.stubEnv("GEOENGINE_EMAIL", "env@example.com");
    vi.stubEnv("GEOENGINE_PASSWORD", "env-password");
    const server = sessionServer();

    await initialize(SERVER_URL, {
      token: "test-token",
      adapter: server.adapter,
      logger: silentLogger,
      dotenv: false,
    });

    expect(server.requests[0]?.url).toBe("/login");
  });

  it("rejects credentials and token together", async () => {
    const server = sessionServer();

    await expect(
      initialize(SERVER_URL, {
        credentials: { email: "user@example.com", password: "test-password" },
        token: "test-token",
        adapter: server.adapter,
        dotenv: false,
      }),
    ).rejects.toThrow(new InputError("Cannot provide both credentials and token"));
    expect(server.requests).toHaveLength(0);
  });

  it("surfaces login failures", async () => {
    const server = createStubServer(() => ({
      status: 400,
      statusText: "Bad Request",
      data: { error: "LoginFailed", message: "Invalid credentials" },
    }));

    await expect(
      initialize(SERVER_URL, {
        credentials: { email: "user@example.com", password: "wrong" },
        adapter: server.adapter,
        logger: silentLogger,
        dotenv: false,
      }),
    ).rejects.toMatchObject({ error: "LoginFailed" });
  });
});

describe("Session", () => {
  it("builds the auth header and client config from its id", async () => {
    const server = sessionServer();
    const session = await initialize(SERVER_URL, {
      adapter: server.adapter,
      logger: silentLogger,
      timeout: 1000,
      dotenv: false,
    });

    expect(session.authHeader).toEqual({ Authorization: "Bearer anonymous-session" });
    expect(session.clientConfig()).toMatchObject({
      baseUrl: SERVER_URL,
      token: "anonymous-session",
      timeout: 1000,
    });
  });

  it("renders server, id and expiry", async () => {
    const server = sessionServer();
    const session = await initialize(SERVER_URL, {
      credentials: { email: "user@example.com", password: "test-password" },
      adapter: server.adapter,
      logger: silentLogger,
      dotenv: false,
    });

    expect(session.toString()).toBe(
      "Server:              http://localhost:3030/api\n" +
        "Session Id:          login-session\n" +
        "Session valid until: 2030-01-01T00:00:00Z\n",
    );
  });
});

describe("getSession / reset", () => {
  it("throws before initialize", () => {
    expect(() => getSession()).toThrow(UninitializedError);
  });

  it("logs out and clears the session", async () => {
    const server = sessionServer();
    await initialize(SERVER_URL, { adapter: server.adapter, logger: silentLogger, dotenv: false });

    await reset();

    expect(() => getSession()).toThrow(UninitializedError);
    const logout = server.requests[1];
    expect(logout?.url).toBe("/logout");
    expect(logout?.headers["authorization"]).toBe("Bearer anonymous-session");
  });

  it("clears without logging out when asked", async () => {
    const server = sessionServer();
    await initialize(SERVER_URL, { adapter: server.adapter, logger: silentLogger, dotenv: false });

    await reset(false);

    expect(() => getSession()).toThrow(UninitializedError);
    expect(server.requests).toHaveLength(1);
  });
});
