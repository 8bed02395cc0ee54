import { LinearScanError, type GraphLocation } from "#errors";
import type { VirtualRegister } from "#graph";
import { Severity } from "#result";

export enum ErrorCode {
  USE_BEFORE_DEF = "ALLOCATOR_USE_BEFORE_DEF",
  INVALID_CONFIGURATION = "ALLOCATOR_INVALID_CONFIGURATION",
  UNUSED_REGISTER = "ALLOCATOR_UNUSED_REGISTER",
}

export const ErrorMessages = {
  [ErrorCode.USE_BEFORE_DEF]: "Virtual register may be used before it is defined",
  [ErrorCode.INVALID_CONFIGURATION]: "Invalid allocator configuration",
  [ErrorCode.UNUSED_REGISTER]: "Virtual register is declared but never used",
};

export class AllocatorError extends LinearScanError {
  constructor(
    code: ErrorCode,
    message?: string,
    location?: GraphLocation,
    severity: Severity = Severity.Error,
    /** Virtual register the message concerns, if any */
    public readonly register?: VirtualRegister,
  ) {
    const baseMessage = ErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code, location, severity);
  }
}
