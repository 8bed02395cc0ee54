/**
 * Live intervals, the linear-scan sweep and move resolution
 */

export { Allocation, allocateOrder } from "./allocation.js";
export { analyzeLiveness, type Liveness } from "./liveness.js";
export {
  Interval,
  type Origin,
  type Range,
  type UsePosition,
} from "./interval.js";
export { Location } from "./location.js";
export { sequentialize, type Move } from "./moves.js";
export { resolveOptions, type Options, type ResolvedOptions } from "./options.js";
export {
  resolve,
  type EdgeResolution,
  type Placement,
  type Resolution,
  type SplitResolution,
} from "./resolve.js";
export { sweep, type SweepResult } from "./sweep.js";
export { verify, type VerifyInput } from "./verify.js";
export { AllocatorError, ErrorCode, ErrorMessages } from "./errors.js";
export { pass } from "./pass.js";
