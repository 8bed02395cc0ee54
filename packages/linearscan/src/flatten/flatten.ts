/**
 * Linear ordering of a control-flow graph
 *
 * Assigns every instruction a position in a single total order over all
 * blocks. A block is placed only after all of its forward predecessors;
 * back edges found by a depth-first walk from the entry are recorded as
 * loop edges and ignored for ordering.
 */

import { invariant } from "#errors";
import type { BlockId, Graph, Instruction } from "#graph";
import { Result } from "#result";
import { FlattenError, ErrorCode } from "./errors.js";

/**
 * Distance between the positions of two consecutive instructions. The odd
 * position in between is a gap where moves can be placed.
 */
export const POSITION_STRIDE = 2;

/**
 * One entry of the linear order. Blocks without instructions receive a
 * single placeholder slot so every block owns at least one position.
 */
export interface Slot {
  position: number;
  block: BlockId;
  instruction?: Instruction;
}

/**
 * Inclusive range of instruction positions owned by a block
 */
export interface BlockRange {
  first: number;
  last: number;
}

export interface LoopEdge {
  from: BlockId;
  to: BlockId;
}

export interface LinearOrder {
  graph: Graph;
  /** Blocks in linear order */
  blocks: readonly BlockId[];
  slots: readonly Slot[];
  ranges: ReadonlyMap<BlockId, BlockRange>;
  loopEdges: readonly LoopEdge[];
}

export namespace LinearOrder {
  export function range(order: LinearOrder, block: BlockId): BlockRange {
    const range = order.ranges.get(block);
    invariant(range, () => `block ${block} has no position range`);
    return range;
  }

  /**
   * Position of the instruction at `index` within `block`
   */
  export function positionOf(
    order: LinearOrder,
    block: BlockId,
    index: number,
  ): number {
    const { first, last } = range(order, block);
    const position = first + index * POSITION_STRIDE;
    invariant(
      position <= last,
      () => `block ${block} has no instruction ${index}`,
    );
    return position;
  }

  /**
   * Slot at a position; a gap belongs to the slot before it
   */
  export function slotAt(
    order: LinearOrder,
    position: number,
  ): Slot | undefined {
    if (position < 0) {
      return undefined;
    }
    return order.slots[Math.floor(position / POSITION_STRIDE)];
  }

  export function blockAt(
    order: LinearOrder,
    position: number,
  ): BlockId | undefined {
    return slotAt(order, position)?.block;
  }

  export function isLoopEdge(
    order: LinearOrder,
    from: BlockId,
    to: BlockId,
  ): boolean {
    return order.loopEdges.some((edge) => edge.from === from && edge.to === to);
  }

  /**
   * Whether `position` is the first instruction position of some block
   */
  export function isBlockStart(order: LinearOrder, position: number): boolean {
    const slot = slotAt(order, position);
    return (
      slot !== undefined &&
      slot.position === position &&
      range(order, slot.block).first === position
    );
  }

  /**
   * Number of loops whose body contains `block`. A loop spans the
   * positions from its header to its latest latch.
   */
  export function loopDepth(order: LinearOrder, block: BlockId): number {
    const { first } = range(order, block);
    const loopEnds = new Map<BlockId, number>();
    for (const { from, to } of order.loopEdges) {
      loopEnds.set(
        to,
        Math.max(loopEnds.get(to) ?? 0, range(order, from).last),
      );
    }

    let depth = 0;
    for (const [header, end] of loopEnds) {
      if (range(order, header).first <= first && first <= end) {
        depth++;
      }
    }
    return depth;
  }

  /**
   * One past the greatest position in the order
   */
  export function end(order: LinearOrder): number {
    return order.slots.length * POSITION_STRIDE;
  }
}

/**
 * Depth-first walk from the entry, successors in declaration order.
 * Returns the reached blocks and the back edges among their edges.
 */
function findBackEdges(
  graph: Graph,
  entry: BlockId,
): { reached: Set<BlockId>; backEdges: LoopEdge[] } {
  const reached = new Set<BlockId>([entry]);
  const onStack = new Set<BlockId>([entry]);
  const backEdges: LoopEdge[] = [];
  const stack: { block: BlockId; next: number }[] = [{ block: entry, next: 0 }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    const successors = graph.block(frame.block).successors;

    if (frame.next >= successors.length) {
      stack.pop();
      onStack.delete(frame.block);
      continue;
    }

    const successor = successors[frame.next];
    frame.next++;

    if (onStack.has(successor)) {
      backEdges.push({ from: frame.block, to: successor });
    } else if (!reached.has(successor)) {
      reached.add(successor);
      onStack.add(successor);
      stack.push({ block: successor, next: 0 });
    }
  }

  return { reached, backEdges };
}

/**
 * Order blocks so each follows all of its forward predecessors, picking
 * the lowest block id among those ready
 */
function orderBlocks(
  graph: Graph,
  entry: BlockId,
  backEdges: readonly LoopEdge[],
): BlockId[] {
  const isBack = (from: BlockId, to: BlockId) =>
    backEdges.some((edge) => edge.from === from && edge.to === to);

  const pending = new Map<BlockId, number>();
  for (const block of graph.blocks) {
    pending.set(
      block.id,
      block.predecessors.filter((pred) => !isBack(pred, block.id)).length,
    );
  }

  const order: BlockId[] = [];
  const ready: BlockId[] = [entry];

  while (ready.length > 0) {
    ready.sort((a, b) => a - b);
    const block = ready.shift();
    if (block === undefined) {
      break;
    }
    order.push(block);

    for (const successor of graph.block(block).successors) {
      if (isBack(block, successor)) {
        continue;
      }
      const remaining = (pending.get(successor) ?? 0) - 1;
      pending.set(successor, remaining);
      if (remaining === 0) {
        ready.push(successor);
      }
    }
  }

  invariant(
    order.length === graph.blocks.length,
    () =>
      `linear order covers ${order.length} of ${graph.blocks.length} blocks`,
  );
  return order;
}

/**
 * Compute the linear order of a graph. The graph is frozen: positions
 * would be invalidated by any later change.
 */
export function flatten(graph: Graph): Result<LinearOrder, FlattenError> {
  graph.freeze();

  const entry = graph.entry;
  if (entry === undefined) {
    return Result.err(
      new FlattenError(ErrorCode.UNREACHABLE_BLOCK, "graph has no blocks"),
    );
  }

  const { reached, backEdges } = findBackEdges(graph, entry);

  const unreachable = graph.blocks
    .map((block) => block.id)
    .filter((id) => !reached.has(id));
  if (unreachable.length > 0) {
    return Result.err(
      new FlattenError(
        ErrorCode.UNREACHABLE_BLOCK,
        `${unreachable.map((id) => `block ${id}`).join(", ")} cannot be reached from block ${entry}`,
        unreachable,
        { block: unreachable[0] },
      ),
    );
  }

  const blocks = orderBlocks(graph, entry, backEdges);

  const slots: Slot[] = [];
  const ranges = new Map<BlockId, BlockRange>();
  for (const id of blocks) {
    const first = slots.length * POSITION_STRIDE;
    const { instructions } = graph.block(id);
    if (instructions.length === 0) {
      slots.push({ position: first, block: id });
    }
    for (const instruction of instructions) {
      slots.push({
        position: slots.length * POSITION_STRIDE,
        block: id,
        instruction,
      });
    }
    ranges.set(id, {
      first,
      last: (slots.length - 1) * POSITION_STRIDE,
    });
  }

  return Result.ok({
    graph,
    blocks,
    slots,
    ranges,
    loopEdges: backEdges,
  });
}
