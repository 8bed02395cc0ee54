/**
 * Control-flow graph over virtual registers
 *
 * Blocks live in a dense array owned by the graph and refer to each other
 * by index, so the (possibly cyclic) edge structure never forms reference
 * cycles. The graph is built incrementally and frozen once flattened.
 */

import { GraphError, ErrorCode } from "./errors.js";

export type BlockId = number;
export type VirtualRegister = number;

export const DEFAULT_REGISTER_CLASS = "general";

/**
 * How an operand may be served at the position it appears
 */
export type Policy = "register" | "any";

export interface Register {
  id: VirtualRegister;
  /** Display name (for debugging and formatting) */
  name: string;
  /** Register class; each class is allocated from its own pool */
  class: string;
}

export interface Instruction {
  /** Index within the owning block */
  index: number;
  block: BlockId;
  opcode: string;
  uses: readonly Instruction.Use[];
  defs: readonly Instruction.Def[];
}

export namespace Instruction {
  export interface Use {
    register: VirtualRegister;
    policy: Policy;
    /** Last use of the value along this instruction stream */
    kill: boolean;
  }

  export interface Def {
    register: VirtualRegister;
    policy: Policy;
  }

  /**
   * Operands may be given as a bare register for the common case of a
   * register-required, non-killing operand
   */
  export type UseOperand =
    | VirtualRegister
    | { register: VirtualRegister; policy?: Policy; kill?: boolean };

  export type DefOperand =
    | VirtualRegister
    | { register: VirtualRegister; policy?: Policy };

  /**
   * Instruction as accepted by {@link Graph.addInstruction}
   */
  export interface Spec {
    opcode: string;
    uses?: readonly UseOperand[];
    defs?: readonly DefOperand[];
  }
}

export interface Block {
  id: BlockId;
  /** Instructions in execution order */
  instructions: readonly Instruction[];
  predecessors: readonly BlockId[];
  successors: readonly BlockId[];
}

interface MutableBlock {
  id: BlockId;
  instructions: Instruction[];
  predecessors: BlockId[];
  successors: BlockId[];
}

export class Graph {
  private readonly blockList: MutableBlock[] = [];
  private readonly registerList: Register[] = [];
  private entryBlock: BlockId | undefined;
  private frozen = false;

  /**
   * Declare a new virtual register
   */
  createRegister(options: { name?: string; class?: string } = {}): VirtualRegister {
    this.assertMutable("createRegister");
    const id = this.registerList.length;
    this.registerList.push({
      id,
      name: options.name ?? `v${id}`,
      class: options.class ?? DEFAULT_REGISTER_CLASS,
    });
    return id;
  }

  /**
   * Create an empty block. The first block created is the entry unless
   * {@link setEntry} says otherwise.
   */
  addBlock(): BlockId {
    this.assertMutable("addBlock");
    const id = this.blockList.length;
    this.blockList.push({
      id,
      instructions: [],
      predecessors: [],
      successors: [],
    });
    return id;
  }

  /**
   * Append an instruction to the end of a block
   */
  addInstruction(blockId: BlockId, spec: Instruction.Spec): Instruction {
    this.assertMutable("addInstruction");
    const block = this.mutableBlock(blockId);
    const index = block.instructions.length;

    const uses = (spec.uses ?? []).map((operand): Instruction.Use => {
      const use =
        typeof operand === "number" ? { register: operand } : operand;
      this.assertRegister(use.register, { block: blockId, instruction: index });
      return {
        register: use.register,
        policy: use.policy ?? "register",
        kill: use.kill ?? false,
      };
    });

    const defs = (spec.defs ?? []).map((operand): Instruction.Def => {
      const def =
        typeof operand === "number" ? { register: operand } : operand;
      this.assertRegister(def.register, { block: blockId, instruction: index });
      return {
        register: def.register,
        policy: def.policy ?? "register",
      };
    });

    const instruction: Instruction = {
      index,
      block: blockId,
      opcode: spec.opcode,
      uses,
      defs,
    };
    block.instructions.push(instruction);
    return instruction;
  }

  /**
   * Declare control flow from one block to another. Declaring the same
   * edge again has no effect.
   */
  addEdge(from: BlockId, to: BlockId): void {
    this.assertMutable("addEdge");
    const source = this.mutableBlock(from);
    const target = this.mutableBlock(to);

    if (source.successors.includes(to)) {
      return;
    }
    source.successors.push(to);
    target.predecessors.push(from);
  }

  setEntry(blockId: BlockId): void {
    this.assertMutable("setEntry");
    this.mutableBlock(blockId);
    this.entryBlock = blockId;
  }

  /**
   * Make the graph read-only. Freezing twice is allowed.
   */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get entry(): BlockId | undefined {
    if (this.entryBlock !== undefined) {
      return this.entryBlock;
    }
    return this.blockList.length > 0 ? 0 : undefined;
  }

  get blocks(): readonly Block[] {
    return this.blockList;
  }

  get registers(): readonly Register[] {
    return this.registerList;
  }

  block(id: BlockId): Block {
    return this.mutableBlock(id);
  }

  register(id: VirtualRegister): Register {
    const register = this.registerList[id];
    if (!Number.isInteger(id) || !register) {
      throw new GraphError(
        ErrorCode.INVALID_REFERENCE,
        `virtual register ${id} is not declared`,
      );
    }
    return register;
  }

  private mutableBlock(id: BlockId): MutableBlock {
    const block = this.blockList[id];
    if (!Number.isInteger(id) || !block) {
      throw new GraphError(
        ErrorCode.INVALID_REFERENCE,
        `block ${id} does not exist`,
        { block: id },
      );
    }
    return block;
  }

  private assertRegister(
    id: VirtualRegister,
    location: { block: BlockId; instruction: number },
  ): void {
    if (!Number.isInteger(id) || !this.registerList[id]) {
      throw new GraphError(
        ErrorCode.INVALID_REFERENCE,
        `virtual register ${id} is not declared`,
        location,
      );
    }
  }

  private assertMutable(operation: string): void {
    if (this.frozen) {
      throw new GraphError(
        ErrorCode.GRAPH_FROZEN,
        `cannot ${operation} on a frozen graph`,
      );
    }
  }
}
