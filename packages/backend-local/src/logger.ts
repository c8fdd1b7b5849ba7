/* eslint-disable no-console */
import type { Logger } from "./core.js";

export interface ConsoleLoggerOptions {
  /** Print debug lines; defaults to whether DEBUG is set */
  readonly debug?: boolean;
}

export function createConsoleLogger(
  namespace: string,
  { debug = Boolean(process.env["DEBUG"]) }: ConsoleLoggerOptions = {},
): Logger {
  const prefix = `[${namespace}]`;
  const stamp = (): string => new Date().toISOString();

  return {
    info(message: string, meta?: unknown): void {
      console.info(stamp(), prefix, message, meta ?? "");
    },
    warn(message: string, meta?: unknown): void {
      console.warn(stamp(), prefix, message, meta ?? "");
    },
    error(message: string, meta?: unknown): void {
      console.error(stamp(), prefix, message, meta ?? "");
    },
    debug(message: string, meta?: unknown): void {
      if (debug) {
        console.debug(stamp(), prefix, message, meta ?? "");
      }
    },
  } satisfies Logger;
}
