import { ConflictError } from '../conflicts/conflict-error.js';
import { AppForgeError, CancelledError, ValidationError, WriteError } from '../../utils/errors.js';

export const ExitCodes = {
  SUCCESS: 0,
  ABORTED: 1,
  UNRESOLVED_CONFLICT: 2,
  INVALID_CONFIG: 3,
  WRITE_FAILED: 4,
  /** Scan, lookup, render, capability, store and config failures */
  FATAL: 5,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export function exitCodeFor(error: AppForgeError): ExitCode {
  if (error instanceof CancelledError) return ExitCodes.ABORTED;
  if (error instanceof ConflictError) return ExitCodes.UNRESOLVED_CONFLICT;
  if (error instanceof ValidationError) return ExitCodes.INVALID_CONFIG;
  if (error instanceof WriteError) return ExitCodes.WRITE_FAILED;
  return ExitCodes.FATAL;
}
