import { Logger, LoggerContext, LogLevel } from "../src/common/logger";

export interface LoggedLine {
  level: string;
  message: string;
  ctx: Record<string, unknown>;
}

/**
 * Logger that keeps lines in memory instead of printing them.
 */
export class MemoryLogger implements Logger {
  constructor(
    readonly lines: LoggedLine[] = [],
    private readonly ctx: Record<string, unknown> = {}
  ) {}

  private push(level: string, message: string) {
    this.lines.push({ level, message, ctx: { ...this.ctx } });
  }

  log = (m: string) => this.push("info", m);
  trace = (m: string) => this.push("trace", m);
  debug = (m: string) => this.push("debug", m);
  info = (m: string) => this.push("info", m);
  warn = (m: string) => this.push("warn", m);
  error = (m: string) => this.push("error", m);

  getLevel = () => LogLevel.TRACE;
  isTraceEnabled = () => false;
  isDebugEnabled = () => false;

  with(): LoggerContext {
    const ctx: Record<string, unknown> = { ...this.ctx };
    const child = new MemoryLogger(this.lines, ctx);
    const context: LoggerContext = {
      str: (k, v) => set(k, v),
      num: (k, v) => set(k, v),
      bool: (k, v) => set(k, v),
      any: (k, v) => set(k, v),
      array: (k, v) => set(k, v),
      error: (e) => set("error", e instanceof Error ? e.message : e),
      logger: () => child,
    };
    function set(key: string, value: unknown): LoggerContext {
      ctx[key] = value;
      return context;
    }
    return context;
  }

  at(level: string): LoggedLine[] {
    return this.lines.filter((l) => l.level === level);
  }
}
