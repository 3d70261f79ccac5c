import chalk, { type ChalkInstance } from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const STYLE: Record<LogLevel, ChalkInstance> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Console logger with a minimum level. Warnings and errors go to stderr.
 * `success` lines are always printed.
 */
class Logger {
  private threshold: LogLevel = "info";

  setLevel(level: LogLevel): void {
    this.threshold = level;
  }

  debug(message: string, ...args: unknown[]): void {
    this.write("debug", message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write("info", message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write("warn", message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write("error", message, args);
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(`[SUCCESS] ${message}`), ...args);
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (SEVERITY[level] < SEVERITY[this.threshold]) return;

    const line = STYLE[level](`[${level.toUpperCase()}] ${message}`);
    switch (level) {
      case "error":
        console.error(line, ...args);
        break;
      case "warn":
        console.warn(line, ...args);
        break;
      default:
        console.log(line, ...args);
    }
  }
}

export const logger = new Logger();
