/**
 * Console Logger
 *
 * Default Logger adapter: `[Component] message` lines through console,
 * with structured context passed as a second argument.
 */

import type { LogContext, Logger } from "../../core/ports/logger.port.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class ConsoleLogger implements Logger {
  constructor(
    private readonly component: string,
    private readonly level: LogLevel = "info",
  ) {}

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

  /** Same level, different component prefix. */
  child(component: string): ConsoleLogger {
    return new ConsoleLogger(component, this.level);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;

    const line = `[${this.component}] ${message}`;
    if (context) {
      console[level](line, context);
    } else {
      console[level](line);
    }
  }
}
