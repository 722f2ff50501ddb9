/**
 * Logger seam.
 *
 * Core packages log through this structural subset of a pino logger so
 * they carry no logging dependency. The host passes its pino instance.
 */

export interface LedgerLogger {
  info(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
  error(obj: object, msg: string): void;
  debug(obj: object, msg: string): void;
}

const noop = (): void => {};

export const silentLogger: LedgerLogger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
};
