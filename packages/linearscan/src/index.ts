export const VERSION = "0.1.0";

// Graph construction
export {
  Graph,
  DEFAULT_REGISTER_CLASS,
  GraphError,
  type Block,
  type BlockId,
  type Instruction,
  type Policy,
  type Register,
  type VirtualRegister,
} from "#graph";

// Linear order
export {
  flatten,
  FlattenError,
  LinearOrder,
  POSITION_STRIDE,
  type BlockRange,
  type LoopEdge,
  type Slot,
} from "#flatten";

// Allocation
export {
  Allocation,
  AllocatorError,
  Interval,
  Location,
  type EdgeResolution,
  type Liveness,
  type Move,
  type Options,
  type Placement,
  type SplitResolution,
} from "#allocator";

// Re-export error handling utilities
export * from "#errors";

// Re-export result type
export * from "#result";

// Pipeline
export { allocate, allocateByClass } from "#compiler";

// Debug output
export { Formatter } from "#analysis";
