"use strict";

import colors from "colors";

type LogFn = (message: string) => void;

export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

export class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export interface ConsoleLoggerOptions {
  verbose: boolean;
  color: boolean;
  write?: LogFn;
}

/** Diagnostics go to stderr so the report on stdout stays parseable. */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;
  private readonly color: boolean;
  private readonly write: LogFn;

  constructor(options: ConsoleLoggerOptions) {
    this.verbose = options.verbose;
    this.color = options.color;
    this.write = options.write ?? (message => console.error(message));
  }

  debug(message: string): void {
    if (this.verbose) this.write(this.paint(colors.gray, message));
  }

  info(message: string): void {
    if (this.verbose) this.write(message);
  }

  warn(message: string): void {
    this.write(this.paint(colors.yellow, message));
  }

  error(message: string): void {
    this.write(this.paint(colors.red, message));
  }

  private paint(style: (text: string) => string, message: string): string {
    return this.color ? style(message) : message;
  }
}
