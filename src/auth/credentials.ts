import { createHash } from "node:crypto";
import { ValidationError } from "../shared/errors.js";
import type { Credential } from "./session-types.js";

/**
 * Reject a credential with a missing or blank identity or secret.
 */
export function assertCredential(credential: Credential): void {
  const missing: string[] = [];
  if (typeof credential.identity !== "string" || credential.identity.trim() === "") {
    missing.push("username");
  }
  if (typeof credential.secret !== "string" || credential.secret.trim() === "") {
    missing.push("password");
  }
  if (missing.length > 0) {
    throw new ValidationError(`Missing required credential: ${missing.join(", ")}`);
  }
}

/**
 * Cache key covering both halves of the credential, so a different password
 * for the same account never maps to the same session. The pair is
 * JSON-encoded so no split of one string into identity and secret can
 * produce another credential's key.
 */
export function credentialKey(credential: Credential): string {
  return createHash("sha256")
    .update(JSON.stringify([credential.identity, credential.secret]))
    .digest("hex");
}

/**
 * Short form of a cache key for log lines.
 */
export function keyFingerprint(key: string): string {
  return key.slice(0, 12);
}
