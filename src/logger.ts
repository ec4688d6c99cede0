export interface LogSink {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const PREFIX = "[strata-memory]";

let sink: LogSink = console;
let debugEnabled = false;

/**
 * Route all module logging through `next`. Debug output stays off unless
 * `debug` is true.
 */
export function initLogger(next: LogSink, debug: boolean): void {
  sink = next;
  debugEnabled = debug;
}

export const log = {
  debug(message: string, ...rest: unknown[]): void {
    if (!debugEnabled) return;
    sink.debug(`${PREFIX} ${message}`, ...rest);
  },
  info(message: string, ...rest: unknown[]): void {
    sink.info(`${PREFIX} ${message}`, ...rest);
  },
  warn(message: string, ...rest: unknown[]): void {
    sink.warn(`${PREFIX} ${message}`, ...rest);
  },
  error(message: string, ...rest: unknown[]): void {
    sink.error(`${PREFIX} ${message}`, ...rest);
  },
};
