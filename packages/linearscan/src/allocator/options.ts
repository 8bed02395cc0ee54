import { Result } from "#result";
import { AllocatorError, ErrorCode } from "./errors.js";

export interface Options {
  /** Physical registers in order of preference */
  registers: readonly string[];
  /** Allocate only virtual registers of this class */
  registerClass?: string;
  /** Check the finished allocation (default true) */
  verify?: boolean;
}

export interface ResolvedOptions {
  registers: readonly string[];
  registerClass?: string;
  verify: boolean;
}

export function resolveOptions(
  options: Options,
): Result<ResolvedOptions, AllocatorError> {
  const errors: AllocatorError[] = [];

  if (options.registers.length === 0) {
    errors.push(
      new AllocatorError(
        ErrorCode.INVALID_CONFIGURATION,
        "the register pool is empty",
      ),
    );
  }

  const seen = new Set<string>();
  options.registers.forEach((register, index) => {
    if (register.trim() === "") {
      errors.push(
        new AllocatorError(
          ErrorCode.INVALID_CONFIGURATION,
          `register ${index} has an empty name`,
        ),
      );
    } else if (seen.has(register)) {
      errors.push(
        new AllocatorError(
          ErrorCode.INVALID_CONFIGURATION,
          `register ${register} appears more than once`,
        ),
      );
    }
    seen.add(register);
  });

  if (errors.length > 0) {
    return Result.err(errors);
  }

  return Result.ok({
    registers: [...options.registers],
    registerClass: options.registerClass,
    verify: options.verify ?? true,
  });
}
