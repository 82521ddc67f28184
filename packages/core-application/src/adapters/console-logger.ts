import { LOG_LEVELS, type LogLevel, type LogMeta, type Logger } from "../ports/logger";

type ConsoleLike = Pick<Console, "debug" | "log" | "warn" | "error">;

export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(
    level: LogLevel = "info",
    private readonly out: ConsoleLike = console
  ) {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.enabled("debug")) this.out.debug(this.format(message, meta));
  }

  info(message: string, meta?: LogMeta): void {
    if (this.enabled("info")) this.out.log(this.format(message, meta));
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.enabled("warn")) this.out.warn(this.format(message, meta));
  }

  error(message: string, meta?: LogMeta): void {
    if (this.enabled("error")) this.out.error(this.format(message, meta));
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  private format(message: string, meta?: LogMeta): string {
    if (!meta || Object.keys(meta).length === 0) return message;
    return `${message} ${JSON.stringify(meta)}`;
  }
}
