/**
 * Minimal logger surface accepted across the codebase. A pino logger satisfies it;
 * tests pass an object of `vi.fn()`s.
 */
export type LoggerLike = {
  debug(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
};
