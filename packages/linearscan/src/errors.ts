/**
 * Error handling shared by every part of the allocator
 */

import { Severity } from "#result";

/**
 * Where in the program an error refers to. Blocks and instructions use
 * their graph identities; positions use the linear-order coordinates.
 */
export interface GraphLocation {
  block?: number;
  instruction?: number;
  position?: number;
}

/**
 * Base class for every reportable error or warning
 */
export class LinearScanError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly location?: GraphLocation,
    public readonly severity: Severity = Severity.Error,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A broken internal invariant. These indicate a defect in the allocator,
 * never bad input, and are thrown rather than reported.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(`Allocator invariant violated: ${message}`);
    this.name = "InvariantViolation";
  }
}

export function invariant(
  condition: unknown,
  message: string | (() => string),
): asserts condition {
  if (!condition) {
    throw new InvariantViolation(
      typeof message === "string" ? message : message(),
    );
  }
}

