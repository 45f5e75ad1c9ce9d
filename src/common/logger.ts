import EventEmitter from "events";

export enum LogLevel {
  TRACE = "trace",
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

type LogContextValues = Record<string, unknown>;

type LogFormatter = (message: LogMessage) => string;

export interface Logger {
  log: (message: string) => void;

  trace: (message: string) => void;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;

  getLevel: () => LogLevel;
  with: () => LoggerContext;

  isTraceEnabled: () => boolean;
  isDebugEnabled: () => boolean;
}

export interface LogMessage extends LogContextValues {
  level: LogLevel;
  message: string;
  ts?: string;
  error?: unknown;
}

export interface LoggerContext {
  str: (key: string, value?: string | null) => LoggerContext;
  num: (key: string, value?: number) => LoggerContext;
  bool: (key: string, value?: boolean) => LoggerContext;
  any: (key: string, value?: unknown, stringify?: boolean) => LoggerContext;
  array: (key: string, value?: readonly unknown[]) => LoggerContext;
  error: (e: unknown) => LoggerContext;
  logger: () => Logger;
}

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.TRACE,
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

function resolveContextLevels(): string[] {
  const contextLevelsEnv = process.env.GLOBAL_LOG_CONTEXT_FOR_LEVELS;
  if (contextLevelsEnv) {
    return contextLevelsEnv.split(",").map((l) => l.trim().toLowerCase());
  }
  return [...LEVEL_ORDER];
}

const contextLevels = new Set(resolveContextLevels());

const logTimestamp = Boolean(process.env.GLOBAL_LOG_TIMESTAMP);

export const LoggerEvents = new EventEmitter();

export class ConsoleLogger implements Logger {
  protected _loglevel: LogLevel;
  protected _ctx: LogContextValues;
  private formatter: LogFormatter;

  private emptyMethod(_message: string): void {}

  public log: (message: string) => void;
  public trace: (message: string) => void;
  public debug: (message: string) => void;
  public info: (message: string) => void;
  public warn: (message: string) => void;
  public error: (message: string) => void;

  constructor(level?: LogLevel, ctx?: LogContextValues) {
    this.formatter = (m) => this.formatJson(m);

    switch (process.env.GLOBAL_LOG_FORMAT) {
      case "simple":
        this.formatter = (m) => this.formatSimple(m);
        break;
      case "json":
      default:
        break;
    }

    this._loglevel = level ?? LogLevel.INFO;
    this._ctx = ctx ?? {};

    this.log = (message) => this._write(LogLevel.INFO, message, console.log);
    this.trace = (message) =>
      // console.trace would print a stack for every line
      this._write(LogLevel.TRACE, message, console.log);
    this.debug = (message) =>
      this._write(LogLevel.DEBUG, message, console.debug);
    this.info = (message) => this._write(LogLevel.INFO, message, console.info);
    this.warn = (message) => this._write(LogLevel.WARN, message, console.warn);
    this.error = (message) =>
      this._write(LogLevel.ERROR, message, console.error);

    const threshold = LEVEL_ORDER.indexOf(this._loglevel);
    if (threshold > LEVEL_ORDER.indexOf(LogLevel.TRACE)) {
      this.trace = this.emptyMethod;
    }
    if (threshold > LEVEL_ORDER.indexOf(LogLevel.DEBUG)) {
      this.debug = this.emptyMethod;
    }
    if (threshold > LEVEL_ORDER.indexOf(LogLevel.INFO)) {
      this.info = this.log = this.emptyMethod;
    }
    if (threshold > LEVEL_ORDER.indexOf(LogLevel.WARN)) {
      this.warn = this.emptyMethod;
    }
  }

  isTraceEnabled() {
    return this._loglevel === LogLevel.TRACE;
  }

  isDebugEnabled() {
    return this._loglevel === LogLevel.DEBUG || this.isTraceEnabled();
  }

  getLevel() {
    return this._loglevel;
  }

  private _write(
    level: LogLevel,
    message: string,
    sink: (line: string) => void
  ) {
    if (contextLevels.has(level)) {
      sink(this.formatter({ message, ...this._ctx, level }));
    } else {
      sink(this.formatter({ message, level }));
    }
  }

  setCtx(key: string, value?: unknown) {
    this._ctx[key] = value;
  }

  newLogger(level: LogLevel, ctx: LogContextValues) {
    return new ConsoleLogger(level, ctx);
  }

  with(): LoggerContext {
    return new LogContext(this.newLogger(this._loglevel, { ...this._ctx }));
  }

  formatJson(message: LogMessage): string {
    if (logTimestamp) {
      message.ts = new Date().toISOString();
    }
    const json = safeStringify(message);
    LoggerEvents.emit("log", json);
    return json;
  }

  formatSimple(message: LogMessage): string {
    LoggerEvents.emit("log", safeStringify(message));

    const { message: text, level, ...rest } = message;
    let errorStack = "";
    if (isErrorRecord(rest.error) && typeof rest.error.stack === "string") {
      errorStack = rest.error.stack;
      delete rest.error;
    }

    const ts = logTimestamp ? ` [${new Date().toISOString()}] ` : "";
    const context =
      Object.keys(rest).length > 0 ? "\n" + safeStringify(rest) + "\n" : "";

    switch (level) {
      case LogLevel.TRACE:
        return `\x1b[37m ${level.toUpperCase()} \x1b[0m ${ts} ${text}${context}`;
      case LogLevel.DEBUG:
        return `\x1b[36m ${level.toUpperCase()} \x1b[0m ${ts} ${text}${context}`;
      case LogLevel.INFO:
        return `\x1b[32m ${level.toUpperCase()} \x1b[0m  ${ts} ${text}${context}`;
      case LogLevel.WARN:
        return `\x1b[33m ${level.toUpperCase()} \x1b[0m  ${ts} ${text}${context}`;
      case LogLevel.ERROR:
        return `\x1b[31m ${level.toUpperCase()} \x1b[0m ${ts} ${text}${context}${
          errorStack ? "\n" + prettyFormatStack(errorStack) : ""
        }`;
    }
  }
}

export class LogContext implements LoggerContext {
  private _logger: ConsoleLogger;

  constructor(logger: ConsoleLogger) {
    this._logger = logger;
  }

  str(key: string, value?: string | null) {
    return this.any(key, value);
  }

  num(key: string, value?: number) {
    return this.any(key, value);
  }

  bool(key: string, value?: boolean) {
    return this.any(key, value);
  }

  array(key: string, value?: readonly unknown[]) {
    return this.any(key, value);
  }

  error(e: unknown) {
    if (e instanceof Error) {
      return this.any("error", {
        name: e.name,
        message: e.message,
        stack: e.stack,
      });
    } else if (typeof e === "string") {
      return this.str("error", e);
    } else {
      return this.any("error", e);
    }
  }

  any(key: string, value?: unknown, stringify?: boolean) {
    if (stringify) {
      this._logger.setCtx(key, JSON.stringify(value));
    } else {
      this._logger.setCtx(key, value);
    }
    return this;
  }

  logger() {
    return this._logger;
  }
}

function parseLevel(raw: string | undefined): LogLevel {
  const wanted = raw?.trim().toLowerCase();
  return LEVEL_ORDER.find((l) => l === wanted) ?? LogLevel.INFO;
}

export function getLogger(): ConsoleLogger {
  return new ConsoleLogger(parseLevel(process.env.GLOBAL_LOG_LEVEL));
}

function isErrorRecord(v: unknown): v is { stack?: unknown } {
  return typeof v === "object" && v !== null;
}

function prettyFormatStack(stack: string) {
  return stack
    .split("\n")
    .map((line) => line.replace(/^\s+at\s+/, "  at "))
    .join("\n");
}

function safeStringify(obj: unknown) {
  return JSON.stringify(obj, (_k, v: unknown) =>
    typeof v === "bigint" ? Number(v) : v
  );
}
