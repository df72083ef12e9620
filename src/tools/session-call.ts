import * as z from "zod/v4";
import { credentialKey, keyFingerprint } from "../auth/credentials.js";
import type { Credential } from "../auth/session-types.js";
import { AuthenticationError, ValidationError } from "../shared/errors.js";
import type { ToolContext } from "../types.js";

// --- Credential fields shared by every tool ---

export const CredentialInput = {
  username: z.string().min(1).meta({ description: "Notehub account email" }),
  password: z.string().min(1).meta({ description: "Notehub account password" }),
};

export interface CredentialParams {
  username: string;
  password: string;
}

export function toCredential(params: CredentialParams): Credential {
  return { identity: params.username, secret: params.password };
}

export function sessionKeyOf(params: CredentialParams): string {
  return keyFingerprint(credentialKey(toCredential(params)));
}

/**
 * Throw a ValidationError naming every required field that is missing or blank.
 */
export function requireFields(fields: Record<string, string | undefined>): void {
  const missing = Object.entries(fields)
    .filter(([, value]) => value === undefined || value.trim() === "")
    .map(([name]) => name);
  if (missing.length > 0) {
    throw new ValidationError(`Missing required parameter: ${missing.join(", ")}`);
  }
}

/**
 * Run a Notehub call with a session token for the caller's credential.
 *
 * When Notehub refuses the token (revoked or expired early) and retries are
 * enabled, force exactly one re-login and repeat the call once.
 */
export async function withSession<T>(
  ctx: ToolContext,
  tool: string,
  params: CredentialParams,
  call: (token: string) => Promise<T>
): Promise<T> {
  const credential = toCredential(params);
  const token = await ctx.sessions.getToken(credential);
  try {
    return await call(token);
  } catch (error) {
    if (!(error instanceof AuthenticationError) || !ctx.retryOnRejectedToken) {
      throw error;
    }
    ctx.logger.warn({ event: "session_rejected", session_key: sessionKeyOf(params), tool });
    const fresh = await ctx.sessions.getToken(credential, { rejectedToken: token });
    return call(fresh);
  }
}
