/**
 * Post-allocation consistency checks. Any failure is a defect in the
 * allocator and is thrown as an InvariantViolation.
 */

import { invariant } from "#errors";
import type { VirtualRegister } from "#graph";
import { LinearOrder } from "#flatten";
import type { Interval } from "./interval.js";
import type { Liveness } from "./liveness.js";
import { Location } from "./location.js";
import type { Move } from "./moves.js";
import {
  pieceAt,
  pieceBefore,
  sortedLiveIn,
  splitGap,
  type Resolution,
} from "./resolve.js";

export interface VerifyInput {
  order: LinearOrder;
  liveness: Liveness;
  intervals: readonly Interval[];
  registers: readonly string[];
  resolution: Resolution;
}

function checkLocations(
  intervals: readonly Interval[],
  registers: readonly string[],
): void {
  for (const interval of intervals) {
    const { location } = interval;
    invariant(location, () => `interval ${interval.id} has no location`);

    if (location.kind === "register") {
      invariant(
        registers.includes(location.register),
        () => `interval ${interval.id} holds unknown register ${location.register}`,
      );
      continue;
    }

    const use = interval.uses.find(
      (candidate) => candidate.policy === "register",
    );
    invariant(
      use === undefined,
      () =>
        `v${interval.register} needs a register at ${use?.position} but is in ${Location.format(location)}`,
    );
  }
}

function checkOverlaps(intervals: readonly Interval[]): void {
  const byLocation = new Map<string, Interval[]>();
  for (const interval of intervals) {
    if (!interval.location) {
      continue;
    }
    const key = Location.format(interval.location);
    byLocation.set(key, [...(byLocation.get(key) ?? []), interval]);
  }

  for (const [key, sharing] of byLocation) {
    for (let i = 0; i < sharing.length; i++) {
      for (let j = i + 1; j < sharing.length; j++) {
        const overlap = sharing[i].firstIntersection(sharing[j]);
        invariant(
          overlap === undefined,
          () =>
            `intervals ${sharing[i].id} and ${sharing[j].id} both occupy ${key} at ${overlap}`,
        );
      }
    }
  }
}

/**
 * Contents of every location after running `moves` on `before`
 */
function replay(
  before: ReadonlyMap<string, VirtualRegister>,
  moves: readonly Move[],
): Map<string, VirtualRegister> {
  const state = new Map(before);
  for (const move of moves) {
    const value = state.get(Location.format(move.from));
    invariant(
      value === move.register,
      () =>
        `move of v${move.register} reads ${Location.format(move.from)}, which holds ${value === undefined ? "nothing" : `v${value}`}`,
    );
    state.set(Location.format(move.to), move.register);
  }
  return state;
}

/**
 * Contents of every location as the moves of `gap` start
 */
function contentsBefore(
  liveness: Liveness,
  gap: number,
): Map<string, VirtualRegister> {
  const state = new Map<string, VirtualRegister>();
  for (const root of liveness.intervals.values()) {
    const piece = pieceBefore(root, gap);
    if (piece?.location) {
      state.set(Location.format(piece.location), root.register);
    }
  }
  return state;
}

function checkEdges({ order, liveness, resolution }: VerifyInput): void {
  for (const from of order.blocks) {
    const exit = LinearOrder.range(order, from).last + 1;
    for (const to of order.graph.block(from).successors) {
      const entry = LinearOrder.range(order, to).first;
      const moves =
        resolution.edges.find((edge) => edge.from === from && edge.to === to)
          ?.moves ?? [];
      const state = replay(contentsBefore(liveness, exit), moves);

      for (const register of sortedLiveIn(liveness, to)) {
        const root = liveness.intervals.get(register);
        invariant(root, () => `no interval for virtual register ${register}`);
        if (!pieceBefore(root, exit)) {
          continue;
        }
        const target = pieceAt(root, entry)?.location;
        invariant(target, () => `v${register} has no location at ${entry}`);
        invariant(
          state.get(Location.format(target)) === register,
          () =>
            `v${register} does not reach ${Location.format(target)} on edge ${from} -> ${to}`,
        );
      }
    }
  }
}

/**
 * Every pair of touching pieces inside a block must be joined by the moves
 * of the gap before the second one
 */
function checkSplits({ order, liveness, resolution }: VerifyInput): void {
  for (const root of liveness.intervals.values()) {
    const { pieces } = root;
    for (let i = 1; i < pieces.length; i++) {
      const after = pieces[i];
      if (pieces[i - 1].end !== after.start) {
        continue;
      }
      const gap = splitGap(order, after.start);
      if (gap === undefined) {
        continue;
      }

      const moves =
        resolution.splits.find((split) => split.position === gap)?.moves ?? [];
      const state = replay(contentsBefore(liveness, gap), moves);
      const target = after.location;
      invariant(target, () => `interval ${after.id} has no location`);
      invariant(
        state.get(Location.format(target)) === root.register,
        () =>
          `v${root.register} is not in ${Location.format(target)} after gap ${gap}`,
      );
    }
  }
}

export function verify(input: VerifyInput): void {
  checkLocations(input.intervals, input.registers);
  checkOverlaps(input.intervals);
  checkEdges(input);
  checkSplits(input);
}
