import { SESSION_TTL_MS } from "./auth/session-types.js";

/**
 * Markdown instructions sent in the initialize result. The session lifetime
 * line follows the configured reuse window.
 */
export function buildServerInstructions(sessionTtlMs: number = SESSION_TTL_MS): string {
  return `
# Notehub MCP Server

## Capabilities
- List the Notehub projects an account can access
- List a project's devices, filtered by device, tag, serial number or fleet
- Read a project's events (device notes and system events) with paging and filters
- Send a note to a device's notefile

## Tools Overview
- **get-projects**: start here to find a projectUid
- **get-project-devices**: device inventory and last activity
- **get-project-events**: sensor data, health and session events
- **send-note**: push a JSON body or base64 payload to a device

## Usage Guidelines
- Every tool takes the Notehub account email (username) and password
- The server logs in once and reuses the session for up to ${formatDuration(sessionTtlMs)}
- Project UIDs look like app:xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx; device UIDs look like dev:xxxxxxxxxxxxxxx
- Use files (e.g. "data.qo") and selectFields to keep event listings small

## Errors
- AUTHENTICATION_ERROR: wrong email/password, or the session was refused twice
- VALIDATION_ERROR: a required parameter is missing
- TRANSIENT_ERROR: Notehub could not be reached in time, retrying later may help
- REMOTE_API_ERROR: Notehub refused the request, e.g. an unknown project UID

## Constraints
- Credentials are held in memory only, never written to disk
- send-note writes to a real device queue; confirm the target with the user first
`.trim();
}

export function formatDuration(ms: number): string {
  if (ms % 60_000 === 0) {
    const minutes = ms / 60_000;
    return minutes === 1 ? "1 minute" : `${minutes} minutes`;
  }
  const seconds = Math.round(ms / 1000);
  return seconds === 1 ? "1 second" : `${seconds} seconds`;
}

export default buildServerInstructions;
