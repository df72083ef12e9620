/**
 * Session Types for Notehub Authentication
 *
 * Notehub issues a session token on username/password login. The token is
 * valid for 30 minutes on the server; the cache treats it as valid for a
 * shorter window so a token checked as fresh is still accepted when the
 * request carrying it arrives.
 */

/**
 * Account credentials supplied with every tool call. Never persisted or logged.
 */
export interface Credential {
  /** Notehub account email */
  identity: string;
  /** Notehub account password */
  secret: string;
}

/**
 * Cached session for one credential
 */
export interface Session {
  /** Opaque X-Session-Token value */
  token: string;
  /** Issuance time, milliseconds since epoch, from the cache's clock */
  issuedAt: number;
}

/** Gateway login as seen by the cache. */
export type LoginFn = (credential: Credential, signal: AbortSignal) => Promise<string>;

/** Milliseconds since epoch. */
export type Clock = () => number;

/** Server-side session lifetime: 30 minutes */
export const SERVER_SESSION_TTL_MS = 30 * 60 * 1000;

/** Client-side reuse window: 29 minutes */
export const SESSION_TTL_MS = SERVER_SESSION_TTL_MS - 60 * 1000;

/** Upper bound on a single login call */
export const LOGIN_TIMEOUT_MS = 10 * 1000;
