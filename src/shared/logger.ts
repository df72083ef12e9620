/**
 * Structured Logger for the Notehub MCP Server
 *
 * Emits one JSON object per line. stdout belongs to the MCP stdio transport,
 * so every entry is written to stderr where MCP hosts collect server logs.
 *
 * Level names follow the MCP LoggingLevel values (RFC-5424).
 */

/**
 * MCP-compliant log levels (RFC-5424), least to most severe
 */
export const LOG_LEVELS = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Base metadata included in all log events
 */
interface BaseLogEvent {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  /** Event type for categorization */
  event: string;
}

/**
 * Tool execution events. `args` never carries credentials.
 */
export type ToolEvent =
  | {
      event: 'tool_started';
      tool: string;
      session_key: string;
      args: Record<string, unknown>;
    }
  | {
      event: 'tool_completed';
      tool: string;
      session_key: string;
      duration_ms: number;
    }
  | {
      event: 'tool_failed';
      tool: string;
      session_key?: string;
      error: string;
      error_code: string;
      duration_ms?: number;
    };

/**
 * Session cache events. Sessions are identified by a key fingerprint only.
 */
export type SessionEvent =
  | {
      event: 'session_reused';
      session_key: string;
      age_ms: number;
    }
  | {
      event: 'session_login';
      session_key: string;
      reason: 'missing' | 'stale' | 'rejected';
    }
  | {
      event: 'session_login_joined';
      session_key: string;
    }
  | {
      event: 'session_created';
      session_key: string;
      duration_ms: number;
    }
  | {
      event: 'session_login_failed';
      session_key: string;
      error: string;
      error_code: string;
      duration_ms: number;
    }
  | {
      event: 'session_expired';
      session_key: string;
      age_ms: number;
    }
  | {
      event: 'session_rejected';
      session_key: string;
      tool: string;
    };

/**
 * Notehub API call events
 */
export type APIEvent = {
  event: 'api_call';
  service: 'notehub';
  /** SDK operation, e.g. getProjectEvents */
  operation: string;
  status: number;
  duration_ms: number;
  success: boolean;
  error?: string;
};

/**
 * Transport events
 */
export type TransportEvent =
  | {
      event: 'transport_connected';
      transport: 'stdio';
    }
  | {
      event: 'transport_closed';
      transport: 'stdio';
      signal?: string;
    };

/**
 * System events
 */
export type SystemEvent =
  | {
      event: 'server_started';
      name: string;
      version: string;
      api_base: string;
      session_ttl_ms: number;
    }
  | {
      event: 'server_error';
      error: string;
      context?: string;
    };

/**
 * Union of all possible log events
 */
export type LogEvent =
  | ToolEvent
  | SessionEvent
  | APIEvent
  | TransportEvent
  | SystemEvent;

/**
 * Complete log entry structure
 */
export type LogEntry = BaseLogEvent & LogEvent;

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Structured logger class
 */
export class Logger {
  private minLevel: LogLevel;
  private sink: LogSink;

  constructor(options: { level?: LogLevel; sink?: LogSink } = {}) {
    this.minLevel = options.level ?? 'info';
    this.sink = options.sink ?? stderrSink;
  }

  /**
   * Drop entries below `level` from now on
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  /**
   * Redirect output, mainly for tests
   */
  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  debug(event: LogEvent): void {
    this.log('debug', event);
  }

  info(event: LogEvent): void {
    this.log('info', event);
  }

  notice(event: LogEvent): void {
    this.log('notice', event);
  }

  warn(event: LogEvent): void {
    this.log('warning', event);
  }

  error(event: LogEvent): void {
    this.log('error', event);
  }

  /**
   * Log at critical level (the process is about to exit)
   */
  critical(event: LogEvent): void {
    this.log('critical', event);
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  private log(level: LogLevel, event: LogEvent): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      ...event,
    };

    this.sink(JSON.stringify(entry));
  }
}

/**
 * Performance timing helper for measuring operation duration
 *
 * Usage:
 * ```typescript
 * const timer = startTimer();
 * await client.listProjects(token);
 * const duration_ms = timer();
 * ```
 */
export function startTimer(): () => number {
  const start = Date.now();
  return () => Date.now() - start;
}

/**
 * Singleton logger instance
 */
export const logger = new Logger();

export default logger;
