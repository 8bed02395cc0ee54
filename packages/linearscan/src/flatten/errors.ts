import { LinearScanError, type GraphLocation } from "#errors";
import type { BlockId } from "#graph";
import { Severity } from "#result";

export enum ErrorCode {
  UNREACHABLE_BLOCK = "FLATTEN_UNREACHABLE_BLOCK",
}

export const ErrorMessages = {
  [ErrorCode.UNREACHABLE_BLOCK]: "Block is not reachable from the entry",
};

export class FlattenError extends LinearScanError {
  constructor(
    code: ErrorCode,
    message?: string,
    /** Every block the error concerns */
    public readonly blocks: readonly BlockId[] = [],
    location?: GraphLocation,
  ) {
    const baseMessage = ErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code, location, Severity.Error);
  }
}
