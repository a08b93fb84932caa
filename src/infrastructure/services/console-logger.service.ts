import type { ILogger, LogLevel } from "../../core/domain/services/logger.service.js";

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  stdout?: OutputStream;
  stderr?: OutputStream;
}

/**
 * Plain console output: info to stdout, warnings and errors to stderr,
 * debug only when verbose.
 */
export class ConsoleLogger implements ILogger {
  private verbose: boolean;
  private stdout: OutputStream;
  private stderr: OutputStream;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  debug(message: string): void {
    if (this.verbose) this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string): void {
    this.write("error", message);
  }

  private write(level: LogLevel, message: string): void {
    switch (level) {
      case "info":
        this.stdout.write(`${message}\n`);
        break;
      case "debug":
        this.stdout.write(`[debug] ${message}\n`);
        break;
      case "warn":
        this.stderr.write(`WARNING: ${message}\n`);
        break;
      case "error":
        this.stderr.write(`ERROR: ${message}\n`);
        break;
    }
  }
}
