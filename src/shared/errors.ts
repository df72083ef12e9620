/**
 * Error taxonomy for the Notehub MCP server.
 *
 * Every failure a tool can report is a NotehubError with a stable code, so a
 * caller can tell bad credentials from bad parameters from an unreachable
 * service. toToolErrorResult() turns any thrown value into an MCP tool result.
 */

export type NotehubErrorCode =
  | 'AUTHENTICATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'TRANSIENT_ERROR'
  | 'REMOTE_API_ERROR';

export type ErrorCode = NotehubErrorCode | 'UNKNOWN';

export abstract class NotehubError extends Error {
  abstract readonly code: NotehubErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid credentials, or a session token the remote side rejected. */
export class AuthenticationError extends NotehubError {
  readonly code = 'AUTHENTICATION_ERROR';
  readonly retryable = false;
}

/** Missing or malformed input, caught before any network call. */
export class ValidationError extends NotehubError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;
}

/** Network failure, timeout, or a status the service may recover from. */
export class TransientError extends NotehubError {
  readonly code = 'TRANSIENT_ERROR';
  readonly retryable = true;
}

/** Any other non-2xx answer, or a body that does not have the expected shape. */
export class RemoteApiError extends NotehubError {
  readonly code = 'REMOTE_API_ERROR';
  readonly retryable = false;
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export interface StructuredError {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  recoveryHints: string[];
}

const RECOVERY_HINTS: Record<ErrorCode, string[]> = {
  AUTHENTICATION_ERROR: [
    'Check the Notehub account email and password',
    'Accounts that sign in through SSO need a Notehub password set',
  ],
  VALIDATION_ERROR: ['Provide every required parameter as a non-empty value'],
  TRANSIENT_ERROR: ['Notehub could not be reached in time, try again shortly'],
  REMOTE_API_ERROR: [
    'Check that the project and device UIDs exist and are visible to this account',
  ],
  UNKNOWN: ['An unexpected error occurred, check the server logs'],
};

/** Extract a human-readable message from any thrown value. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function errorCode(error: unknown): ErrorCode {
  return error instanceof NotehubError ? error.code : 'UNKNOWN';
}

export function toStructuredError(error: unknown): StructuredError {
  const code = errorCode(error);
  return {
    code,
    message: errorMessage(error),
    retryable: error instanceof NotehubError ? error.retryable : false,
    recoveryHints: RECOVERY_HINTS[code],
  };
}

export interface ToolErrorResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError: true;
}

export function toToolErrorResult(error: unknown): ToolErrorResult {
  const structured = toStructuredError(error);
  const hints = structured.recoveryHints.map((hint) => `- ${hint}`).join('\n');
  return {
    content: [
      {
        type: 'text',
        text: `Error (${structured.code}): ${structured.message}\n${hints}`,
      },
    ],
    isError: true,
  };
}
