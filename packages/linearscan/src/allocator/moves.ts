import { invariant } from "#errors";
import type { VirtualRegister } from "#graph";
import { Location } from "./location.js";

/**
 * Copy of a virtual register's value between two locations
 */
export interface Move {
  register: VirtualRegister;
  from: Location;
  to: Location;
}

/**
 * Order a set of moves that are meant to happen simultaneously so that no
 * location is overwritten before every move reading it has run. Cycles
 * are broken by parking one value in `scratch`.
 */
export function sequentialize(
  moves: readonly Move[],
  scratch: Location,
): Move[] {
  let pending = moves.filter((move) => !Location.equals(move.from, move.to));
  const sequence: Move[] = [];

  while (pending.length > 0) {
    const ready = pending.find(
      (move) =>
        !pending.some(
          (other) => other !== move && Location.equals(other.from, move.to),
        ),
    );

    if (ready) {
      sequence.push(ready);
      pending = pending.filter((move) => move !== ready);
      continue;
    }

    // every destination is still to be read: save one and redirect its reader
    const blocked = pending[0].to;
    const reader = pending.find((move) => Location.equals(move.from, blocked));
    invariant(reader, "parallel move cycle without a reader");
    sequence.push({ register: reader.register, from: blocked, to: scratch });
    pending = pending.map((move) =>
      move === reader ? { ...move, from: scratch } : move,
    );
  }

  return sequence;
}
