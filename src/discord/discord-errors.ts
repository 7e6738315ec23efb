/**
 * Failure classification for outbound Discord calls.
 *
 * Callers declare which kinds they expect (e.g. best-effort cleanup suppresses
 * `not-found`), so the kinds are a closed union rather than error classes.
 */
export type FailureKind = 'not-found' | 'transport' | 'cancelled';

// Unknown Channel, Unknown Message, Unknown Emoji.
const NOT_FOUND_CODES = new Set<number>([10003, 10008, 10014]);

export const MISSING_ACCESS = 50001;
export const MISSING_PERMISSIONS = 50013;

/** The protocol was started on a message that cannot carry reactions (e.g. a DM). */
export class InvalidContextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidContextError';
  }
}

export function errorCode(err: unknown): number | null {
  if (!err || typeof err !== 'object' || !('code' in err)) return null;
  const code = err.code;
  return typeof code === 'number' ? code : null;
}

function httpStatus(err: unknown): number | null {
  if (!err || typeof err !== 'object' || !('status' in err)) return null;
  const status = err.status;
  return typeof status === 'number' ? status : null;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

export function classifyFailure(err: unknown): FailureKind {
  if (isAbortError(err)) return 'cancelled';
  const code = errorCode(err);
  if (code !== null && NOT_FOUND_CODES.has(code)) return 'not-found';
  if (httpStatus(err) === 404) return 'not-found';
  return 'transport';
}

export function isNotFound(err: unknown): boolean {
  return classifyFailure(err) === 'not-found';
}

export function isForbidden(err: unknown): boolean {
  const code = errorCode(err);
  return code === MISSING_ACCESS || code === MISSING_PERMISSIONS;
}
