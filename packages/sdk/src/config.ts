/**
 * Settings read from the environment.
 *
 * A `.env` file in the working directory is loaded first; variables
 * already set in the process take precedence over it.
 */

import dotenv from "dotenv";

export interface Settings {
  email?: string;
  password?: string;
  token?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Emit `[http]` debug lines */
  debug: boolean;
}

/** Load `.env` into `process.env` */
export function loadDotenv(path?: string): void {
  const result = dotenv.config({ path, quiet: true });
  // A missing file is fine; anything else is not
  if (result.error && !isMissingFile(result.error)) {
    throw result.error;
  }
}

export function readSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    email: nonEmpty(env["GEOENGINE_EMAIL"]),
    password: nonEmpty(env["GEOENGINE_PASSWORD"]),
    token: nonEmpty(env["GEOENGINE_TOKEN"]),
    timeout: parseTimeout(env["GEOENGINE_TIMEOUT_MS"]),
    debug: isTruthy(env["GEOENGINE_DEBUG"]),
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

function parseTimeout(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const timeout = parseInt(value, 10);
  return Number.isFinite(timeout) && timeout > 0 ? timeout : undefined;
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

function isMissingFile(error: Error): boolean {
  return Reflect.get(error, "code") === "ENOENT";
}
