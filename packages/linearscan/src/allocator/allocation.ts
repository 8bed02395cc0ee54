/**
 * Allocation of one linear order: liveness, sweep, resolution and
 * verification
 */

import type { VirtualRegister } from "#graph";
import type { LinearOrder } from "#flatten";
import { Result } from "#result";
import type { AllocatorError } from "./errors.js";
import type { Interval } from "./interval.js";
import { analyzeLiveness, type Liveness } from "./liveness.js";
import { Location } from "./location.js";
import { resolveOptions, type Options } from "./options.js";
import {
  pieceAt,
  resolve,
  type EdgeResolution,
  type SplitResolution,
} from "./resolve.js";
import { sweep } from "./sweep.js";
import { verify } from "./verify.js";

export interface Allocation {
  order: LinearOrder;
  liveness: Liveness;
  /** Every interval with its location, by id */
  intervals: readonly Interval[];
  /** The register pool allocated from */
  registers: readonly string[];
  edges: EdgeResolution[];
  splits: SplitResolution[];
  /** Spill slots used by intervals; the scratch slot comes after them */
  slotCount: number;
  scratch: Location;
}

export namespace Allocation {
  /**
   * Location of a virtual register's value at a position, if it is live
   */
  export function locate(
    allocation: Allocation,
    register: VirtualRegister,
    position: number,
  ): Location | undefined {
    const root = allocation.liveness.intervals.get(register);
    return root && pieceAt(root, position)?.location;
  }

  /**
   * Pieces of a virtual register in order, empty if it never occurs
   */
  export function pieces(
    allocation: Allocation,
    register: VirtualRegister,
  ): readonly Interval[] {
    return allocation.liveness.intervals.get(register)?.pieces ?? [];
  }
}

export function allocateOrder(
  order: LinearOrder,
  options: Options,
): Result<Allocation, AllocatorError> {
  const resolved = resolveOptions(options);
  if (!resolved.success) {
    return resolved;
  }
  const { registers, registerClass } = resolved.value;

  const analyzed = analyzeLiveness(order, { registerClass });
  if (!analyzed.success) {
    return analyzed;
  }
  const liveness = analyzed.value;

  const { intervals, slotCount } = sweep(order, liveness, registers);
  const scratch = Location.slot(slotCount);
  const { edges, splits } = resolve(order, liveness, scratch);

  if (resolved.value.verify) {
    verify({
      order,
      liveness,
      intervals,
      registers,
      resolution: { edges, splits },
    });
  }

  return Result.okWith(
    {
      order,
      liveness,
      intervals,
      registers,
      edges,
      splits,
      slotCount,
      scratch,
    },
    analyzed.messages,
  );
}
