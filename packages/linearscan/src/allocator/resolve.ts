/**
 * Resolution of location changes
 *
 * The sweep may leave a virtual register in different places on either
 * side of a split or of a control-flow edge. Resolution produces the moves
 * that reconnect them: split moves inside a block and edge moves between
 * blocks, each group sequentialized as one parallel move.
 */

import { invariant } from "#errors";
import type { BlockId, VirtualRegister } from "#graph";
import { LinearOrder } from "#flatten";
import type { Interval } from "./interval.js";
import type { Liveness } from "./liveness.js";
import { Location } from "./location.js";
import { sequentialize, type Move } from "./moves.js";

/**
 * Where an edge's moves can go: at the end of the predecessor, at the
 * start of the successor, or on a new block splitting a critical edge
 */
export type Placement = "predecessor" | "successor" | "split";

export interface EdgeResolution {
  from: BlockId;
  to: BlockId;
  placement: Placement;
  moves: Move[];
}

export interface SplitResolution {
  /** Odd position of the gap the moves occupy */
  position: number;
  block: BlockId;
  moves: Move[];
}

export interface Resolution {
  edges: EdgeResolution[];
  splits: SplitResolution[];
}

/**
 * The piece of `root`'s virtual register covering `position`
 */
export function pieceAt(root: Interval, position: number): Interval | undefined {
  return root.pieces.find((piece) => piece.covers(position));
}

/**
 * The piece holding `root`'s virtual register as the moves of `gap` begin:
 * the earliest piece covering the gap or the instruction before it. A
 * value that is dead in the gap has none.
 */
export function pieceBefore(root: Interval, gap: number): Interval | undefined {
  if (!pieceAt(root, gap)) {
    return undefined;
  }
  return root.pieces.find(
    (piece) => piece.covers(gap - 1) || piece.covers(gap),
  );
}

function locationOf(interval: Interval): Location {
  const { location } = interval;
  invariant(location, () => `interval ${interval.id} has no location`);
  return location;
}

/**
 * Gap holding the moves for a split at `position`, or nothing when the
 * split falls on a block boundary and edge moves take care of it
 */
export function splitGap(
  order: LinearOrder,
  position: number,
): number | undefined {
  const instruction = position % 2 === 0 ? position : position + 1;
  if (LinearOrder.isBlockStart(order, instruction)) {
    return undefined;
  }
  return position % 2 === 0 ? position - 1 : position;
}

function resolveSplits(
  order: LinearOrder,
  liveness: Liveness,
  scratch: Location,
): SplitResolution[] {
  const gaps = new Map<number, Move[]>();

  for (const root of liveness.intervals.values()) {
    const { pieces } = root;
    for (let i = 1; i < pieces.length; i++) {
      const before = pieces[i - 1];
      const after = pieces[i];
      if (before.end !== after.start) {
        continue;
      }
      const from = locationOf(before);
      const to = locationOf(after);
      if (Location.equals(from, to)) {
        continue;
      }
      const gap = splitGap(order, after.start);
      if (gap === undefined) {
        continue;
      }
      gaps.set(gap, [
        ...(gaps.get(gap) ?? []),
        { register: root.register, from, to },
      ]);
    }
  }

  return [...gaps.entries()]
    .sort(([a], [b]) => a - b)
    .map(([position, moves]) => {
      const block = LinearOrder.blockAt(order, position + 1);
      invariant(block !== undefined, () => `gap ${position} is outside the order`);
      return { position, block, moves: sequentialize(moves, scratch) };
    });
}

function placementOf(
  order: LinearOrder,
  from: BlockId,
  to: BlockId,
): Placement {
  if (order.graph.block(from).successors.length === 1) {
    return "predecessor";
  }
  if (order.graph.block(to).predecessors.length === 1) {
    return "successor";
  }
  return "split";
}

function resolveEdges(
  order: LinearOrder,
  liveness: Liveness,
  scratch: Location,
): EdgeResolution[] {
  const edges: EdgeResolution[] = [];

  for (const from of order.blocks) {
    const exit = LinearOrder.range(order, from).last + 1;
    for (const to of order.graph.block(from).successors) {
      const entry = LinearOrder.range(order, to).first;
      const moves: Move[] = [];

      for (const register of sortedLiveIn(liveness, to)) {
        const root = liveness.intervals.get(register);
        invariant(root, () => `no interval for virtual register ${register}`);

        const source = pieceBefore(root, exit);
        if (!source) {
          continue;
        }
        const target = pieceAt(root, entry);
        invariant(
          target,
          () => `${register} is live into block ${to} but not covered at ${entry}`,
        );

        const fromLocation = locationOf(source);
        const toLocation = locationOf(target);
        if (!Location.equals(fromLocation, toLocation)) {
          moves.push({ register, from: fromLocation, to: toLocation });
        }
      }

      if (moves.length > 0) {
        edges.push({
          from,
          to,
          placement: placementOf(order, from, to),
          moves: sequentialize(moves, scratch),
        });
      }
    }
  }

  return edges;
}

export function sortedLiveIn(
  liveness: Liveness,
  block: BlockId,
): VirtualRegister[] {
  return [...(liveness.liveIn.get(block) ?? [])].sort((a, b) => a - b);
}

/**
 * Compute split and edge moves for an allocated set of intervals
 */
export function resolve(
  order: LinearOrder,
  liveness: Liveness,
  scratch: Location,
): Resolution {
  return {
    edges: resolveEdges(order, liveness, scratch),
    splits: resolveSplits(order, liveness, scratch),
  };
}
