import type { AgentLogger } from "@grue/schemas";

export type LogLevel = keyof AgentLogger;

export interface ConsoleLoggerOptions {
  /** Print debug lines. Default: false */
  verbose?: boolean;
}

const CONSOLE_METHOD = {
  debug: "debug",
  info: "log",
  warn: "warn",
  error: "error",
} as const satisfies Record<LogLevel, keyof Console>;

/** Logs to the console under a `[name]` prefix. */
export class ConsoleLogger implements AgentLogger {
  private readonly prefix: string;
  private readonly verbose: boolean;

  constructor(name: string, options?: ConsoleLoggerOptions) {
    // A game id or agent id with a newline must not start a fake log line
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    this.prefix = `[${name.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 128)}]`;
    this.verbose = options?.verbose ?? false;
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write("error", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) this.write("debug", message, data);
  }

  private write(level: LogLevel, message: string, data: Record<string, unknown> | undefined): void {
    console[CONSOLE_METHOD[level]](`${this.prefix} ${message}`, data ?? "");
  }
}

export const silentLogger: AgentLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
