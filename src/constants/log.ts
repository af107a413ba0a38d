import type { OutputStream } from "../types/types";

export const c = {
  dim: (s: string) => `\x1b[2m${s}\x1b[0m`,
  gray: (s: string) => `\x1b[90m${s}\x1b[0m`,
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
};

export const sym = {
  ok: c.green("✔"),
  warn: c.yellow("⚠"),
  fail: c.red("✖"),
  info: c.cyan("ℹ"),
  dot: c.gray("•"),
};

export interface Logger {
  info(message: string): void;
  ok(message: string): void;
  warn(message: string): void;
  fail(message: string): void;
}

/**
 * Progress logger for the CLI. Everything goes to `stream` (stderr in
 * practice) so stdout stays pure JSON; nothing is written unless `verbose`.
 */
export function createLogger(stream: OutputStream, verbose: boolean): Logger {
  const line = (symbol: string) => (message: string) => {
    if (verbose) {
      stream.write(`${symbol} ${message}\n`);
    }
  };

  return {
    info: line(sym.info),
    ok: line(sym.ok),
    warn: line(sym.warn),
    fail: line(sym.fail),
  };
}
