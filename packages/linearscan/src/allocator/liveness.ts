/**
 * Live interval construction
 *
 * One backward pass over the linear order. Live-in sets flow from each
 * block to its forward predecessors only; values live at a loop header are
 * instead kept alive over the whole loop body, which stands in for a
 * fixed-point dataflow solution.
 */

import { invariant } from "#errors";
import type { BlockId, Graph, VirtualRegister } from "#graph";
import { LinearOrder, POSITION_STRIDE } from "#flatten";
import { Result, Severity } from "#result";
import { AllocatorError, ErrorCode } from "./errors.js";
import { Interval } from "./interval.js";

export interface Liveness {
  /** One interval per virtual register that occurs, in declaration order */
  intervals: Map<VirtualRegister, Interval>;
  liveIn: Map<BlockId, Set<VirtualRegister>>;
  liveOut: Map<BlockId, Set<VirtualRegister>>;
  /** Registers whose value dies at each position, by ascending position */
  kills: Map<number, VirtualRegister[]>;
}

interface Loop {
  header: BlockId;
  start: number;
  end: number;
  liveIn: Set<VirtualRegister>;
}

const inClass = (graph: Graph, registerClass: string | undefined) =>
  (register: VirtualRegister) =>
    registerClass === undefined ||
    graph.register(register).class === registerClass;

/**
 * Build the root intervals up front so interval ids follow declaration
 * order
 */
function createIntervals(
  order: LinearOrder,
  accepts: (register: VirtualRegister) => boolean,
): Map<VirtualRegister, Interval> {
  const occurring = new Set<VirtualRegister>();
  for (const block of order.graph.blocks) {
    for (const instruction of block.instructions) {
      for (const operand of [...instruction.uses, ...instruction.defs]) {
        if (accepts(operand.register)) {
          occurring.add(operand.register);
        }
      }
    }
  }

  const intervals = new Map<VirtualRegister, Interval>();
  for (const register of [...occurring].sort((a, b) => a - b)) {
    intervals.set(register, new Interval(intervals.size, register));
  }
  return intervals;
}

export function analyzeLiveness(
  order: LinearOrder,
  options: { registerClass?: string } = {},
): Result<Liveness, AllocatorError> {
  const { graph } = order;
  const accepts = inClass(graph, options.registerClass);
  const intervals = createIntervals(order, accepts);
  const interval = (register: VirtualRegister): Interval => {
    const found = intervals.get(register);
    invariant(found, () => `no interval for virtual register ${register}`);
    return found;
  };

  const liveIn = new Map<BlockId, Set<VirtualRegister>>();
  const kills: [number, VirtualRegister][] = [];
  const loops: Loop[] = [];
  const errors: AllocatorError[] = [];

  for (const blockId of [...order.blocks].reverse()) {
    const block = graph.block(blockId);
    const { first, last } = LinearOrder.range(order, blockId);

    const live = new Set<VirtualRegister>();
    for (const successor of block.successors) {
      if (LinearOrder.isLoopEdge(order, blockId, successor)) {
        continue;
      }
      for (const register of liveIn.get(successor) ?? []) {
        live.add(register);
      }
    }
    for (const register of live) {
      interval(register).addRange(first, last + POSITION_STRIDE);
    }

    for (const instruction of [...block.instructions].reverse()) {
      const position = LinearOrder.positionOf(order, blockId, instruction.index);

      // Outputs are written in the gap after the instruction, so an input
      // that dies here can hand its register to an output.
      const written = position + 1;
      for (const def of instruction.defs) {
        if (!accepts(def.register)) {
          continue;
        }
        const target = interval(def.register);
        if (live.has(def.register)) {
          target.setFrom(written);
        } else {
          target.addRange(written, written + 1);
          kills.push([position, def.register]);
        }
        target.addUse({ position: written, policy: def.policy, kind: "def" });
        live.delete(def.register);
      }

      const liveAfter = new Set(live);
      for (const use of instruction.uses) {
        if (!accepts(use.register)) {
          continue;
        }
        const { name } = graph.register(use.register);
        if (use.kill && liveAfter.has(use.register)) {
          errors.push(
            new AllocatorError(
              ErrorCode.USE_BEFORE_DEF,
              `${name} is read again after its last use`,
              { block: blockId, instruction: instruction.index, position },
              Severity.Error,
              use.register,
            ),
          );
        }
        if (!live.has(use.register)) {
          kills.push([position, use.register]);
        }

        const target = interval(use.register);
        target.addRange(first, position + 1);
        target.addUse({ position, policy: use.policy, kind: "use" });
        live.add(use.register);
      }
    }

    const latches = order.loopEdges.filter((edge) => edge.to === blockId);
    if (latches.length > 0) {
      const end =
        Math.max(
          ...latches.map((edge) => LinearOrder.range(order, edge.from).last),
        ) + POSITION_STRIDE;
      for (const register of live) {
        interval(register).addRange(first, end);
      }
      loops.push({ header: blockId, start: first, end, liveIn: new Set(live) });
    }

    liveIn.set(blockId, live);
  }

  for (const loop of loops) {
    for (const [blockId, { first }] of order.ranges) {
      if (first < loop.start || first >= loop.end) {
        continue;
      }
      const set = liveIn.get(blockId);
      for (const register of loop.liveIn) {
        set?.add(register);
      }
    }
  }

  const entry = order.blocks[0];
  const liveAtEntry = [...(liveIn.get(entry) ?? [])].sort((a, b) => a - b);
  for (const register of liveAtEntry) {
    errors.push(
      new AllocatorError(
        ErrorCode.USE_BEFORE_DEF,
        `${graph.register(register).name} is live at the entry of block ${entry}`,
        { block: entry },
        Severity.Error,
        register,
      ),
    );
  }

  if (errors.length > 0) {
    return Result.err(errors);
  }

  const liveOut = new Map<BlockId, Set<VirtualRegister>>();
  for (const blockId of order.blocks) {
    const out = new Set<VirtualRegister>();
    for (const successor of graph.block(blockId).successors) {
      for (const register of liveIn.get(successor) ?? []) {
        out.add(register);
      }
    }
    liveOut.set(blockId, out);
  }

  const warnings = graph.registers
    .filter((register) => accepts(register.id) && !intervals.has(register.id))
    .map(
      (register) =>
        new AllocatorError(
          ErrorCode.UNUSED_REGISTER,
          register.name,
          undefined,
          Severity.Warning,
          register.id,
        ),
    );

  const liveness: Liveness = {
    intervals,
    liveIn,
    liveOut,
    kills: groupKills(kills),
  };

  return warnings.length > 0
    ? Result.okWith(liveness, { [Severity.Warning]: warnings })
    : Result.ok(liveness);
}

function groupKills(
  kills: readonly [number, VirtualRegister][],
): Map<number, VirtualRegister[]> {
  const sorted = [...kills].sort(
    ([p1, r1], [p2, r2]) => p1 - p2 || r1 - r2,
  );
  const grouped = new Map<number, VirtualRegister[]>();
  for (const [position, register] of sorted) {
    const list = grouped.get(position) ?? [];
    if (!list.includes(register)) {
      list.push(register);
    }
    grouped.set(position, list);
  }
  return grouped;
}
