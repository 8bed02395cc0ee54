import { LinearScanError, type GraphLocation } from "#errors";
import { Severity } from "#result";

export enum ErrorCode {
  INVALID_REFERENCE = "GRAPH_INVALID_REFERENCE",
  GRAPH_FROZEN = "GRAPH_FROZEN",
}

export const ErrorMessages = {
  [ErrorCode.INVALID_REFERENCE]: "Reference to a block or register that does not exist",
  [ErrorCode.GRAPH_FROZEN]: "Graph cannot be modified after it has been flattened",
};

export class GraphError extends LinearScanError {
  constructor(code: ErrorCode, message?: string, location?: GraphLocation) {
    const baseMessage = ErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code, location, Severity.Error);
  }
}
