/**
 * Structural logger accepted by library code. A pino logger satisfies it;
 * tests pass objects of `vi.fn()`.
 */
export type LoggerLike = {
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
  debug?(obj: unknown, msg?: string): void;
};

export const silentLogger: LoggerLike = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
