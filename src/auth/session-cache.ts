/**
 * Session Cache
 *
 * Maps a credential to a Notehub session token and decides, per tool call,
 * whether the cached token can be reused or a fresh login is needed.
 *
 * - Entries are keyed by a digest of the full credential (email + password)
 * - A token is reused only while `now - issuedAt < ttlMs`; expiry is computed on read
 * - Concurrent callers for the same key share one in-flight login
 * - A failed login leaves the existing entry untouched
 * - Storing a new session drops every other entry that has expired
 */

import { AuthenticationError, NotehubError, TransientError, errorMessage } from "../shared/errors.js";
import { logger as defaultLogger, startTimer, type Logger } from "../shared/logger.js";
import { assertCredential, credentialKey, keyFingerprint } from "./credentials.js";
import {
  LOGIN_TIMEOUT_MS,
  SERVER_SESSION_TTL_MS,
  SESSION_TTL_MS,
  type Clock,
  type Credential,
  type LoginFn,
  type Session,
} from "./session-types.js";

export interface SessionCacheOptions {
  login: LoginFn;
  clock?: Clock;
  /** Reuse window, must stay below the server's 30 minute session lifetime */
  ttlMs?: number;
  loginTimeoutMs?: number;
  logger?: Logger;
}

export interface GetTokenOptions {
  /**
   * A token the remote side just refused. If the cache still holds exactly
   * this token it is treated as stale and a new login is made.
   */
  rejectedToken?: string;
}

export class SessionCache {
  private readonly sessions = new Map<string, Session>();
  private readonly inflight = new Map<string, Promise<string>>();
  private readonly login: LoginFn;
  private readonly clock: Clock;
  private readonly ttlMs: number;
  private readonly loginTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: SessionCacheOptions) {
    this.login = options.login;
    this.clock = options.clock ?? Date.now;
    this.ttlMs = options.ttlMs ?? SESSION_TTL_MS;
    this.loginTimeoutMs = options.loginTimeoutMs ?? LOGIN_TIMEOUT_MS;
    this.logger = options.logger ?? defaultLogger;

    if (!(this.ttlMs > 0 && this.ttlMs < SERVER_SESSION_TTL_MS)) {
      throw new RangeError(
        `Session TTL must be between 0 and ${SERVER_SESSION_TTL_MS}ms (exclusive), got ${this.ttlMs}`
      );
    }
    if (!(this.loginTimeoutMs > 0)) {
      throw new RangeError(`Login timeout must be positive, got ${this.loginTimeoutMs}`);
    }
  }

  /**
   * Return a session token for the credential, logging in when no fresh one is cached.
   */
  async getToken(credential: Credential, options: GetTokenOptions = {}): Promise<string> {
    assertCredential(credential);

    const key = credentialKey(credential);
    const sessionKey = keyFingerprint(key);
    const cached = this.sessions.get(key);
    const rejected = cached !== undefined && cached.token === options.rejectedToken;

    if (cached && !rejected) {
      const age = this.clock() - cached.issuedAt;
      if (age < this.ttlMs) {
        this.logger.debug({ event: "session_reused", session_key: sessionKey, age_ms: age });
        return cached.token;
      }
    }

    const pending = this.inflight.get(key);
    if (pending) {
      this.logger.debug({ event: "session_login_joined", session_key: sessionKey });
      return pending;
    }

    this.logger.info({
      event: "session_login",
      session_key: sessionKey,
      reason: rejected ? "rejected" : cached ? "stale" : "missing",
    });

    const flight: Promise<string> = this.performLogin(credential, key).finally(() => {
      if (this.inflight.get(key) === flight) {
        this.inflight.delete(key);
      }
    });
    this.inflight.set(key, flight);
    return flight;
  }

  /** Number of cached sessions, fresh or stale. */
  get size(): number {
    return this.sessions.size;
  }

  /** Number of logins currently in flight. */
  get inflightCount(): number {
    return this.inflight.size;
  }

  private async performLogin(credential: Credential, key: string): Promise<string> {
    const sessionKey = keyFingerprint(key);
    const timer = startTimer();

    let token: unknown;
    try {
      token = await this.loginWithTimeout(credential);
    } catch (error) {
      const failure = toLoginError(error);
      this.logger.warn({
        event: "session_login_failed",
        session_key: sessionKey,
        error: failure.message,
        error_code: failure.code,
        duration_ms: timer(),
      });
      throw failure;
    }

    if (typeof token !== "string" || token.trim() === "") {
      const failure = new AuthenticationError("Notehub login returned an empty session token");
      this.logger.warn({
        event: "session_login_failed",
        session_key: sessionKey,
        error: failure.message,
        error_code: failure.code,
        duration_ms: timer(),
      });
      throw failure;
    }

    const issuedAt = this.clock();
    this.evictExpired(issuedAt);
    this.sessions.set(key, { token, issuedAt });
    this.logger.info({ event: "session_created", session_key: sessionKey, duration_ms: timer() });
    return token;
  }

  private evictExpired(now: number): void {
    for (const [key, session] of this.sessions) {
      const age = now - session.issuedAt;
      if (age >= this.ttlMs) {
        this.sessions.delete(key);
        this.logger.debug({ event: "session_expired", session_key: keyFingerprint(key), age_ms: age });
      }
    }
  }

  private async loginWithTimeout(credential: Credential): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        // Settle first so the race reports the timeout, not the abort it causes
        reject(new TransientError(`Notehub login timed out after ${this.loginTimeoutMs}ms`));
        controller.abort();
      }, this.loginTimeoutMs);
    });

    try {
      return await Promise.race([this.login(credential, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function toLoginError(error: unknown): NotehubError {
  if (error instanceof AuthenticationError || error instanceof TransientError) {
    return error;
  }
  return new AuthenticationError(`Notehub login failed: ${errorMessage(error)}`, { cause: error });
}
