import type { LogLevel, Logger } from "../ports/logger";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export class ConsoleLogger implements Logger {
  constructor(private readonly minLevel: LogLevel = "info") {}

  private enabled(level: LogLevel) {
    return RANK[level] >= RANK[this.minLevel];
  }

  debug(message: string): void {
    if (this.enabled("debug")) console.debug(message);
  }

  info(message: string): void {
    if (this.enabled("info")) console.log(message);
  }

  warn(message: string): void {
    if (this.enabled("warn")) console.warn(message);
  }

  error(message: string): void {
    if (this.enabled("error")) console.error(message);
  }
}
