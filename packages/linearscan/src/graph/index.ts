/**
 * Graph construction
 */

export {
  Graph,
  DEFAULT_REGISTER_CLASS,
  type Block,
  type BlockId,
  type Instruction,
  type Policy,
  type Register,
  type VirtualRegister,
} from "./graph.js";

export { GraphError, ErrorCode, ErrorMessages } from "./errors.js";
