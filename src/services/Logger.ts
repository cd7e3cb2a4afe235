/**
 * Structured stderr logging with RFC 5424 levels.
 *
 * Everything the archiver reports to the user goes to stdout; log lines go to
 * stderr so they can be redirected separately.
 */

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  NOTICE = "notice",
  WARNING = "warning",
  ERROR = "error",
  CRITICAL = "critical",
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.NOTICE]: 2,
  [LogLevel.WARNING]: 3,
  [LogLevel.ERROR]: 4,
  [LogLevel.CRITICAL]: 5,
};

export interface LogContext {
  operation?: string;
  service?: string;
  folder?: string;
  uid?: number;
  duration?: number;
  metadata?: Record<string, unknown>;
  timestamp?: Date;
}

export interface PerformanceMetrics {
  operation: string;
  duration: number;
  startTime: Date;
  endTime: Date;
  success: boolean;
  errorType?: string;
  metadata?: Record<string, unknown>;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  logger?: string;
  context: LogContext;
  timestamp: Date;
  data?: Record<string, unknown>;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  enableStderr: boolean;
  includeTimestamp: boolean;
  includeContext: boolean;
  maxContextDepth: number;
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: LogLevel.INFO,
  enableStderr: true,
  includeTimestamp: true,
  includeContext: true,
  maxContextDepth: 3,
};

export class Logger {
  private config: LoggerConfig;
  private performanceMetrics: PerformanceMetrics[] = [];
  private readonly maxMetricsHistory = 1000;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.minLevel];
  }

  /**
   * `[time] [LEVEL] [logger] message {op=…, svc=…} data=…`
   */
  formatEntry(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.includeTimestamp) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);

    if (entry.logger) {
      parts.push(`[${entry.logger}]`);
    }

    parts.push(entry.message);

    if (this.config.includeContext) {
      const contextParts: string[] = [];

      if (entry.context.operation) {
        contextParts.push(`op=${entry.context.operation}`);
      }
      if (entry.context.service) {
        contextParts.push(`svc=${entry.context.service}`);
      }
      if (entry.context.folder) {
        contextParts.push(`folder=${entry.context.folder}`);
      }
      if (entry.context.uid !== undefined) {
        contextParts.push(`uid=${entry.context.uid}`);
      }
      if (entry.context.duration !== undefined) {
        contextParts.push(`dur=${entry.context.duration}ms`);
      }

      if (contextParts.length > 0) {
        parts.push(`{${contextParts.join(", ")}}`);
      }
    }

    if (entry.data) {
      const serializedData = this.serializeData(entry.data);
      if (serializedData) {
        parts.push(`data=${serializedData}`);
      }
    }

    return parts.join(" ");
  }

  private serializeData(data: unknown, depth = 0): string {
    if (depth >= this.config.maxContextDepth) {
      return "[max depth reached]";
    }

    if (data === null || data === undefined) {
      return String(data);
    }

    if (
      typeof data === "string" ||
      typeof data === "number" ||
      typeof data === "boolean"
    ) {
      return String(data);
    }

    if (data instanceof Error) {
      return `Error: ${data.message}`;
    }

    if (data instanceof Date) {
      return data.toISOString();
    }

    if (Array.isArray(data)) {
      if (data.length === 0) return "[]";
      if (data.length > 5) return `[Array(${data.length})]`;
      return `[${data.map((item) => this.serializeData(item, depth + 1)).join(", ")}]`;
    }

    if (typeof data === "object") {
      const entries = Object.entries(data);
      if (entries.length === 0) return "{}";
      if (entries.length > 10) return `{Object(${entries.length} keys)}`;

      const pairs = entries.map(
        ([key, value]) => `${key}: ${this.serializeData(value, depth + 1)}`,
      );
      return `{${pairs.join(", ")}}`;
    }

    return String(data);
  }

  private log(
    level: LogLevel,
    message: string,
    context: LogContext = {},
    loggerName?: string,
    data?: Record<string, unknown>,
  ): void {
    if (!this.shouldLog(level) || !this.config.enableStderr) return;

    const entry: LogEntry = {
      level,
      message,
      logger: loggerName,
      context: {
        ...context,
        timestamp: context.timestamp || new Date(),
      },
      timestamp: new Date(),
      data,
    };

    console.error(this.formatEntry(entry));
  }

  debug(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context, undefined, data);
  }

  info(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context, undefined, data);
  }

  notice(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.NOTICE, message, context, undefined, data);
  }

  warning(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARNING, message, context, undefined, data);
  }

  error(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, undefined, data);
  }

  critical(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.CRITICAL, message, context, undefined, data);
  }

  recordPerformance(metrics: PerformanceMetrics): void {
    this.performanceMetrics.push(metrics);

    if (this.performanceMetrics.length > this.maxMetricsHistory) {
      this.performanceMetrics = this.performanceMetrics.slice(-this.maxMetricsHistory);
    }

    // Timings are only interesting when debugging; failures always show
    const level = metrics.success ? LogLevel.DEBUG : LogLevel.WARNING;
    this.log(
      level,
      `Performance: ${metrics.operation} ${metrics.success ? "completed" : "failed"} in ${metrics.duration}ms`,
      {
        operation: metrics.operation,
        duration: metrics.duration,
      },
      "performance",
      metrics.errorType ? { errorType: metrics.errorType } : undefined,
    );
  }

  getPerformanceMetrics(): {
    total: number;
    successful: number;
    failed: number;
    averageDuration: number;
  } {
    const successful = this.performanceMetrics.filter((m) => m.success).length;
    const total = this.performanceMetrics.length;
    const averageDuration =
      total > 0
        ? this.performanceMetrics.reduce((sum, m) => sum + m.duration, 0) / total
        : 0;

    return {
      total,
      successful,
      failed: total - successful,
      averageDuration: Math.round(averageDuration * 100) / 100,
    };
  }

  /**
   * @internal used by child loggers
   */
  _logInternal(
    level: LogLevel,
    message: string,
    context?: LogContext,
    loggerName?: string,
    data?: Record<string, unknown>,
  ): void {
    this.log(level, message, context, loggerName, data);
  }

  child(loggerName: string): ChildLogger {
    return new ChildLogger(this, loggerName);
  }

  startTimer(operation: string, metadata?: Record<string, unknown>): PerformanceTimer {
    return new PerformanceTimer(this, operation, metadata);
  }
}

export class ChildLogger {
  constructor(
    private parent: Logger,
    private loggerName: string,
  ) {}

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.parent._logInternal(level, message, context, this.loggerName, data);
  }

  debug(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  info(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context, data);
  }

  notice(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.NOTICE, message, context, data);
  }

  warning(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARNING, message, context, data);
  }

  error(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, data);
  }

  critical(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.CRITICAL, message, context, data);
  }

  startTimer(operation: string, metadata?: Record<string, unknown>): PerformanceTimer {
    return this.parent.startTimer(operation, metadata);
  }
}

export class PerformanceTimer {
  private startTime: Date;

  constructor(
    private logger: Logger,
    private operation: string,
    private metadata?: Record<string, unknown>,
  ) {
    this.startTime = new Date();
  }

  end(success = true, errorType?: string): PerformanceMetrics {
    const endTime = new Date();
    const metrics: PerformanceMetrics = {
      operation: this.operation,
      duration: endTime.getTime() - this.startTime.getTime(),
      startTime: this.startTime,
      endTime,
      success,
      errorType,
      metadata: this.metadata,
    };

    this.logger.recordPerformance(metrics);
    return metrics;
  }
}

/**
 * Process-wide logger
 */
export const logger = new Logger();

export function createLogger(loggerName: string): ChildLogger {
  return logger.child(loggerName);
}
