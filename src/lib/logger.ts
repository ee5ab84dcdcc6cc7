/**
 * Run logging for TruthScan
 *
 * Every line goes to the console and, when a log file is configured, is
 * appended to that file as well. Messages carry a bracketed component tag
 * ("[Social] ...") by convention.
 *
 * @module logger
 */

import * as fs from "fs";
import * as path from "path";

// ============================================================================
// TYPES
// ============================================================================

export type LogLevel = "INFO" | "WARN" | "ERROR";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface RunLoggerOptions {
  /** Null disables the file sink. */
  logFile: string | null;
  /** Mirror lines to stdout. Defaults to true. */
  console?: boolean;
}

const MAX_ERROR_DETAIL_CHARS = 2000;

// ============================================================================
// FORMATTING
// ============================================================================

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatLogLine(level: LogLevel, message: string, at: Date = new Date()): string {
  return `[${at.toISOString()}] [${level}] ${message}`;
}

// ============================================================================
// RUN LOGGER
// ============================================================================

export class RunLogger implements Logger {
  private pending: Promise<void> = Promise.resolve();
  private fileFailureReported = false;
  private readonly logFile: string | null;
  private readonly toConsole: boolean;

  constructor(options: RunLoggerOptions) {
    this.logFile = options.logFile;
    this.toConsole = options.console ?? true;
    if (this.logFile) {
      fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
    }
  }

  info(message: string): void {
    this.write("INFO", message);
  }

  warn(message: string): void {
    this.write("WARN", message);
  }

  error(message: string, error?: unknown): void {
    let line = message;
    if (error !== undefined) {
      const detail = describeError(error);
      line += ` | ${detail.length > MAX_ERROR_DETAIL_CHARS ? detail.slice(0, MAX_ERROR_DETAIL_CHARS) + "...[truncated]" : detail}`;
    }
    this.write("ERROR", line);
  }

  /** Wait for every queued file append. */
  async close(): Promise<void> {
    await this.pending;
  }

  private write(level: LogLevel, message: string): void {
    const line = formatLogLine(level, message);

    if (this.logFile) {
      const target = this.logFile;
      // Appends are chained so lines land in the order they were logged
      this.pending = this.pending
        .then(() => fs.promises.appendFile(target, line + "\n", "utf8"))
        .catch((err: unknown) => {
          if (this.fileFailureReported) return;
          this.fileFailureReported = true;
          console.error(`[Logger] Cannot append to ${target}: ${describeError(err)}`);
        });
    }

    // All levels go to stdout
    if (this.toConsole) console.log(line);
  }
}

export function createRunLogger(options: RunLoggerOptions): RunLogger {
  return new RunLogger(options);
}
