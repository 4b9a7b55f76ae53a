/**
 * Structured JSON Logger
 *
 * One JSON line per event, carrying session_id / trace_id context so a whole
 * conversation can be followed across reasoning steps and tool executions.
 */

import type { Logger } from '../core/types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  trace_id?: string;
  session_id?: string;
  dataset_id?: string;
  tool?: string;
  duration_ms?: number;
  error?: {
    code: string;
    message: string;
    stack?: string;
  };
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  traceId?: string;
  sessionId?: string;
  pretty?: boolean;
  /** Where formatted lines go; defaults to the console */
  sink?: (level: LogLevel, line: string) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function consoleSink(level: LogLevel, line: string): void {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export class StructuredLogger implements Logger {
  private readonly levelName: LogLevel;
  private readonly pretty: boolean;
  private readonly sink: (level: LogLevel, line: string) => void;
  private context: Partial<LogEntry>;

  constructor(options: LoggerOptions = {}) {
    this.levelName = options.level ?? 'info';
    this.pretty = options.pretty ?? process.env.NODE_ENV === 'development';
    this.sink = options.sink ?? consoleSink;
    this.context = {
      trace_id: options.traceId,
      session_id: options.sessionId,
    };
  }

  child(additionalContext: Partial<LogEntry>): StructuredLogger {
    const logger = new StructuredLogger({
      level: this.levelName,
      pretty: this.pretty,
      sink: this.sink,
    });
    logger.context = { ...this.context, ...additionalContext };
    return logger;
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.levelName]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...meta,
    };

    // Clean undefined values
    for (const key of Object.keys(entry)) {
      if (entry[key] === undefined) {
        delete entry[key];
      }
    }

    this.sink(level, this.pretty ? JSON.stringify(entry, null, 2) : JSON.stringify(entry));
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  // Convenience methods for common events
  sessionStarted(sessionId: string, turnBudget: number): void {
    this.info('session_started', { session_id: sessionId, turn_budget: turnBudget });
  }

  sessionEnded(sessionId: string, reason: 'ended' | 'cancelled' | 'expired', messageCount: number): void {
    this.info('session_ended', { session_id: sessionId, reason, message_count: messageCount });
  }

  reasoningCompleted(outcome: string, durationMs: number, toolCalls: number): void {
    this.debug('reasoning_completed', {
      outcome,
      duration_ms: durationMs,
      tool_calls: toolCalls,
    });
  }

  toolExecuted(toolName: string, durationMs: number, success: boolean, errorCode?: string): void {
    this.debug('tool_executed', {
      tool: toolName,
      duration_ms: durationMs,
      success,
      error_code: errorCode,
    });
  }

  turnAborted(reason: string, turns: number, error?: Error & { code?: string }): void {
    this.warn('turn_aborted', {
      reason,
      turns,
      error: error
        ? {
            code: error.code ?? 'UNKNOWN',
            message: error.message,
            stack: process.env.NODE_ENV === 'development' ? error.stack : undefined,
          }
        : undefined,
    });
  }
}

// Global logger instance
let globalLogger: StructuredLogger | null = null;

export function getLogger(): StructuredLogger {
  if (!globalLogger) {
    const envLevel = process.env.LOG_LEVEL ?? 'info';
    globalLogger = new StructuredLogger({
      level: isLogLevel(envLevel) ? envLevel : 'info',
      pretty: process.env.NODE_ENV === 'development',
    });
  }
  return globalLogger;
}

export function createLogger(options: LoggerOptions): StructuredLogger {
  return new StructuredLogger(options);
}
