import { ErrorCode } from '../types/enums.js';
import { ListDiffError } from '../types/error.js';

let assertionsEnabled = process.env.NODE_ENV !== 'production';

/** Turns debug-only invariant checks on or off. Preconditions are always checked. */
export function configureAssertions(enabled: boolean): void {
  assertionsEnabled = enabled;
}

export function assertionsActive(): boolean {
  return assertionsEnabled;
}

/** Best-effort invariant check; a no-op while assertions are disabled. */
export function invariant(condition: boolean, code: ErrorCode, message: () => string): void {
  if (!assertionsEnabled || condition) return;
  throw new ListDiffError(code, message());
}

export function precondition(condition: boolean, code: ErrorCode, message: () => string): asserts condition {
  if (condition) return;
  throw new ListDiffError(code, message());
}
