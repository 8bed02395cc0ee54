/**
 * Linear ordering and position numbering
 */

export {
  flatten,
  POSITION_STRIDE,
  LinearOrder,
  type Slot,
  type BlockRange,
  type LoopEdge,
} from "./flatten.js";

export { FlattenError, ErrorCode, ErrorMessages } from "./errors.js";
export { pass } from "./pass.js";
