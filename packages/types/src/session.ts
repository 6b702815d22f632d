/**
 * Session responses of `/login`, `/anonymous` and `/session`.
 */

export interface SessionResponse {
  /** Session token, sent as bearer token on every request */
  id: string;
  created?: string;
  validUntil?: string;
  user?: {
    id: string;
    email?: string;
    realName?: string;
  } | null;
}

export interface LoginRequest {
  email: string;
  password: string;
}

/** Error body the server sends with non-2xx responses */
export interface ErrorResponse {
  error: string;
  message: string;
}
