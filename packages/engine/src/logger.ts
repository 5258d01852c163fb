import type { LogLevel } from "./config";

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  private readonly minLevel: LogLevel;
  private readonly scope?: string;

  constructor(level: LogLevel = "info", scope?: string) {
    this.minLevel = level;
    this.scope = scope;
  }

  child(scope: string): Logger {
    return new Logger(this.minLevel, this.scope ? `${this.scope}.${scope}` : scope);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write("error", message, meta);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (levelWeight[level] < levelWeight[this.minLevel]) {
      return;
    }
    const fields = this.scope ? { scope: this.scope, ...meta } : meta;
    const line = fields ? `${message} ${JSON.stringify(fields)}` : message;
    switch (level) {
      case "debug":
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
      default:
        console.log(line);
    }
  }
}
