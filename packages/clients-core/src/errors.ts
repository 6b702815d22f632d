import type { ErrorResponse } from "@geoengine-ts/types";

/**
 * An error reported by the Geo Engine server, or a response the client
 * could not make sense of.
 */
export class GeoEngineError extends Error {
  /** Server error kind, e.g. "LoginFailed" */
  readonly error: string;
  /** HTTP status, when the error came with one */
  readonly status?: number;

  constructor(response: ErrorResponse, status?: number) {
    super(`${response.error}: ${response.message}`);
    this.name = "GeoEngineError";
    this.error = response.error;
    this.status = status;
  }

  /** Build from an arbitrary response body, falling back to the HTTP status text */
  static fromBody(body: unknown, status: number, statusText: string): GeoEngineError {
    if (isErrorResponse(body)) {
      return new GeoEngineError(body, status);
    }
    return new GeoEngineError(
      { error: "HttpError", message: `${status} ${statusText}`.trim() },
      status,
    );
  }
}

export function isErrorResponse(body: unknown): body is ErrorResponse {
  if (typeof body !== "object" || body === null) return false;
  const error: unknown = Reflect.get(body, "error");
  const message: unknown = Reflect.get(body, "message");
  return typeof error === "string" && typeof message === "string";
}

/**
 * Throw if a successful response still carries an error body.
 *
 * The server reports some failures in-band as `{ error, message }`.
 */
export function checkResponseForError(body: unknown): void {
  if (typeof body !== "object" || body === null) return;
  const error: unknown = Reflect.get(body, "error");
  if (typeof error !== "string") return;
  const message: unknown = Reflect.get(body, "message");
  throw new GeoEngineError({
    error,
    message: typeof message === "string" ? message : "",
  });
}
