/**
 * Structured JSON logger for the address harvester
 *
 * IMPORTANT: All logs go to stderr because stdout carries MCP protocol traffic
 * in `serve` mode and command output (reports, status tables) otherwise
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

class Logger {
  private minLevel: LogLevel;
  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  /**
   * Set the minimum log level
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levelPriority[level] >= this.levelPriority[this.minLevel];
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };

    console.error(JSON.stringify(entry));
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  /**
   * Log an error object with stack trace
   */
  logError(error: Error, context?: LogContext): void {
    this.error(error.message, {
      ...context,
      errorName: error.name,
      stack: error.stack,
    });
  }

  logToolStart(toolName: string, input: unknown, requestId?: string): void {
    const inputSummary = this.summarizeInput(input);

    this.info('Tool call started', {
      requestId,
      toolName,
      inputSummary,
    });
  }

  logToolEnd(
    toolName: string,
    latencyMs: number,
    outcome: 'success' | 'error',
    requestId?: string,
    errorCode?: string
  ): void {
    this.info('Tool call completed', {
      requestId,
      toolName,
      latencyMs,
      outcome,
      ...(errorCode && { errorCode }),
    });
  }

  /**
   * Log a geocoder round trip. The batch id comes from the ambient request context.
   */
  logGeocoderCall(
    upstreamUrl: string,
    upstreamStatus: number,
    latencyMs: number,
    requestId?: string,
    batchId?: number
  ): void {
    this.debug('Geocoder call', {
      requestId,
      batchId,
      upstreamUrl,
      upstreamStatus,
      latencyMs,
    });
  }

  /**
   * Keep tool input logs short: address lists can hold hundreds of entries
   */
  private summarizeInput(input: unknown): Record<string, unknown> {
    if (typeof input !== 'object' || input === null) {
      return { type: typeof input };
    }

    const summary: Record<string, unknown> = {};
    for (const [field, value] of Object.entries(input)) {
      if (Array.isArray(value)) {
        summary[field] = { length: value.length };
      } else if (typeof value === 'string') {
        summary[field] = value.length > 80 ? `${value.slice(0, 80)}...` : value;
      } else if (typeof value === 'number' || typeof value === 'boolean') {
        summary[field] = value;
      }
    }

    return summary;
  }
}

// Singleton logger instance
const logger = new Logger();

export { logger };
