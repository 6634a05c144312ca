/**
 * Logger console à niveaux, préfixé par source ("[tactics-tools] ...")
 * LOG_FORMAT=json pour une ligne JSON par entrée.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "pretty" | "json";
export type LogContext = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export interface LoggerOptions {
  /** "silent" coupe toute sortie (tests) */
  level?: LogLevel | "silent";
  format?: LogFormat;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return value.message;
  return typeof value === "object" && value !== null ? JSON.stringify(value) : String(value);
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly source: string,
    private readonly minLevel: number,
    private readonly format: LogFormat,
    private readonly context: LogContext = {}
  ) {}

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS[level] < this.minLevel) return;
    const merged = { ...this.context, ...context };

    let line: string;
    if (this.format === "json") {
      line = JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        source: this.source,
        message,
        ...merged,
      });
    } else {
      const ctx = Object.entries(merged)
        .filter(([, v]) => v !== undefined)
        .map(([k, v]) => `${k}=${formatValue(v)}`)
        .join(" ");
      line = `[${this.source}] ${message}${ctx ? " " + ctx : ""}`;
    }

    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger(this.source, this.minLevel, this.format, { ...this.context, ...context });
  }
}

export function createLogger(source: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? (isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info");
  const format = options.format ?? (process.env.LOG_FORMAT === "json" ? "json" : "pretty");
  const minLevel = level === "silent" ? Number.POSITIVE_INFINITY : LOG_LEVELS[level];
  return new ConsoleLogger(source, minLevel, format);
}
