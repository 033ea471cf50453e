import { ErrorCode } from './enums.js';

export class ListDiffError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'ListDiffError';
    this.code = code;
  }
}

export function isListDiffError(err: unknown, code?: ErrorCode): err is ListDiffError {
  return err instanceof ListDiffError && (code === undefined || err.code === code);
}
