import type { GetTokenOptions } from "./auth/session-cache.js";
import type { Credential } from "./auth/session-types.js";
import type { NotehubGateway } from "./notehub/types.js";
import type { Logger } from "./shared/logger.js";

/**
 * Anything that can hand out a session token for a credential.
 * SessionCache is the production implementation.
 */
export interface TokenSource {
  getToken(credential: Credential, options?: GetTokenOptions): Promise<string>;
}

/**
 * Dependencies every tool handler receives.
 */
export interface ToolContext {
  gateway: NotehubGateway;
  sessions: TokenSource;
  /** Re-login once and retry when Notehub refuses a cached token */
  retryOnRejectedToken: boolean;
  logger: Logger;
}
