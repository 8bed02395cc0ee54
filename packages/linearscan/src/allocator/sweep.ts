/**
 * Linear-scan sweep
 *
 * Walks intervals in order of their start, keeping the physical registers
 * of the intervals that are live (active) or in a lifetime hole
 * (inactive). When the pool is exhausted the interval whose next
 * register-required use lies furthest away is moved to a spill slot, and
 * split again before that use so the tail can be reloaded.
 *
 * Splits land inside a window of legal positions. Within it a block
 * boundary in the shallowest loop is preferred, so moves leave loops and
 * fall on edges where possible.
 */

import { invariant } from "#errors";
import type { VirtualRegister } from "#graph";
import { LinearOrder } from "#flatten";
import { Interval } from "./interval.js";
import type { Liveness } from "./liveness.js";
import { Location } from "./location.js";

export interface SweepResult {
  /** Every interval produced, roots and split pieces, by id */
  intervals: Interval[];
  /** Number of spill slots used */
  slotCount: number;
}

const byStart = (a: Interval, b: Interval): number =>
  a.start - b.start || a.register - b.register || a.id - b.id;

function registerOf(interval: Interval): string {
  const { location } = interval;
  invariant(
    location?.kind === "register",
    () => `interval ${interval.id} does not hold a register`,
  );
  return location.register;
}

/**
 * Register held by the nearest earlier piece of the same virtual register
 */
function hintOf(interval: Interval): string | undefined {
  const { pieces } = interval;
  for (let i = pieces.indexOf(interval) - 1; i >= 0; i--) {
    const { location } = pieces[i];
    if (location?.kind === "register") {
      return location.register;
    }
  }
  return undefined;
}

/**
 * Latest position before `position` at which `interval` is read or
 * written, or its start when there is none
 */
function lastUseBefore(interval: Interval, position: number): number {
  return interval.uses.reduce(
    (latest, use) => (use.position < position ? use.position : latest),
    interval.start,
  );
}

class SweepState {
  private readonly unhandled: Interval[];
  private active: Interval[] = [];
  private inactive: Interval[] = [];
  private readonly free: Set<string>;

  private readonly slots = new Map<VirtualRegister, number>();
  private readonly slotOwners: (VirtualRegister | undefined)[] = [];
  private slotCount = 0;

  private readonly all: Interval[];
  private readonly lifetimeEnd = new Map<VirtualRegister, number>();

  constructor(
    private readonly order: LinearOrder,
    liveness: Liveness,
    private readonly pool: readonly string[],
  ) {
    const roots = [...liveness.intervals.values()];
    this.all = [...roots];
    this.unhandled = [...roots].sort(byStart);
    this.free = new Set(pool);
    for (const root of roots) {
      this.lifetimeEnd.set(root.register, root.end);
    }
  }

  run(): SweepResult {
    let current = this.unhandled.shift();
    while (current) {
      const position = current.start;
      this.advance(position);
      this.releaseSlots(position);
      if (!this.allocateFree(current, position)) {
        this.allocateBlocked(current, position);
      }
      current = this.unhandled.shift();
    }

    return {
      intervals: [...this.all].sort((a, b) => a.id - b.id),
      slotCount: this.slotCount,
    };
  }

  /**
   * Retire intervals that ended, park those in a hole and wake those
   * that resume at `position`
   */
  private advance(position: number): void {
    for (const interval of [...this.active]) {
      if (interval.end <= position) {
        this.active = this.active.filter((other) => other !== interval);
        this.free.add(registerOf(interval));
      } else if (!interval.covers(position)) {
        this.active = this.active.filter((other) => other !== interval);
        this.inactive.push(interval);
        this.free.add(registerOf(interval));
      }
    }

    for (const interval of [...this.inactive]) {
      if (interval.end <= position) {
        this.inactive = this.inactive.filter((other) => other !== interval);
      } else if (interval.covers(position)) {
        const register = registerOf(interval);
        invariant(
          this.free.has(register),
          () =>
            `interval ${interval.id} resumes at ${position} but ${register} is taken`,
        );
        this.inactive = this.inactive.filter((other) => other !== interval);
        this.active.push(interval);
        this.free.delete(register);
      }
    }
  }

  private releaseSlots(position: number): void {
    for (const [register, slot] of this.slots) {
      if ((this.lifetimeEnd.get(register) ?? 0) <= position) {
        this.slots.delete(register);
        this.slotOwners[slot] = undefined;
      }
    }
  }

  private allocateFree(current: Interval, position: number): boolean {
    const candidates = this.pool.filter((register) => this.free.has(register));
    if (candidates.length === 0) {
      return false;
    }

    const clear = (register: string) =>
      !this.inactive.some(
        (interval) =>
          registerOf(interval) === register &&
          interval.firstIntersection(current) !== undefined,
      );
    const hint = hintOf(current);
    const preferred =
      hint !== undefined && candidates.includes(hint) && clear(hint)
        ? hint
        : candidates.find(clear);
    this.assignRegister(current, preferred ?? candidates[0], position);
    return true;
  }

  private allocateBlocked(current: Interval, position: number): void {
    // An interval starting with a def is written by the instruction just
    // before `position`; its register must be vacated ahead of it.
    const [first] = current.uses;
    const evictBy =
      first?.kind === "def" && first.position === position
        ? position - 1
        : position;
    const nextUse = (interval: Interval) =>
      interval.nextRegisterUse(interval === current ? position : evictBy) ??
      Number.POSITIVE_INFINITY;

    let victim = current;
    for (const candidate of this.active) {
      const difference =
        nextUse(candidate) - nextUse(victim) ||
        candidate.end - victim.end ||
        victim.register - candidate.register;
      if (difference > 0) {
        victim = candidate;
      }
    }

    const use = nextUse(victim);
    const spillFrom =
      victim === current ? position : Math.max(evictBy, victim.start);
    invariant(
      use - 1 > spillFrom,
      () =>
        `more values need a register at position ${use} than there are registers`,
    );

    if (victim === current) {
      this.spill(current, use, position);
      return;
    }

    const register = registerOf(victim);
    this.active = this.active.filter((interval) => interval !== victim);
    const suffix =
      victim.start >= evictBy
        ? victim
        : this.split(
            victim,
            this.splitPosition(lastUseBefore(victim, evictBy), evictBy),
          );
    this.spill(suffix, use, position);
    this.assignRegister(current, register, position);
  }

  /**
   * Give `interval` its register's spill slot, splitting off the part from
   * before its next register-required use. The reloaded part starts no
   * earlier than `position` so the sweep never goes back.
   */
  private spill(interval: Interval, nextUse: number, position: number): void {
    interval.location = Location.slot(this.slotFor(interval.register));
    if (Number.isFinite(nextUse)) {
      const after = Math.max(interval.start, position - 1);
      this.enqueue(
        this.split(interval, this.splitPosition(after, nextUse - 1)),
      );
    }
  }

  /**
   * Position in `(after, latest]` to split at: the start of the block with
   * the lowest loop depth, the later one on ties, or `latest` when no block
   * starts in the window
   */
  private splitPosition(after: number, latest: number): number {
    let best = latest;
    let bestDepth = Number.POSITIVE_INFINITY;
    for (const block of this.order.blocks) {
      const { first } = LinearOrder.range(this.order, block);
      if (first <= after || first > latest) {
        continue;
      }
      const depth = LinearOrder.loopDepth(this.order, block);
      if (depth <= bestDepth) {
        best = first;
        bestDepth = depth;
      }
    }
    return best;
  }

  private assignRegister(
    current: Interval,
    register: string,
    position: number,
  ): void {
    for (const interval of [...this.inactive]) {
      if (
        registerOf(interval) !== register ||
        interval.firstIntersection(current) === undefined
      ) {
        continue;
      }
      const resume = interval.nextRangeStart(position);
      invariant(
        resume !== undefined,
        () => `inactive interval ${interval.id} never resumes`,
      );
      this.inactive = this.inactive.filter((other) => other !== interval);
      this.enqueue(this.split(interval, resume));
    }

    current.location = Location.register(register);
    this.active.push(current);
    this.free.delete(register);
  }

  private slotFor(register: VirtualRegister): number {
    const existing = this.slots.get(register);
    if (existing !== undefined) {
      return existing;
    }

    let slot = this.slotOwners.findIndex((owner) => owner === undefined);
    if (slot === -1) {
      slot = this.slotOwners.length;
    }
    this.slotOwners[slot] = register;
    this.slots.set(register, slot);
    this.slotCount = Math.max(this.slotCount, slot + 1);
    return slot;
  }

  private split(interval: Interval, position: number): Interval {
    const child = interval.split(position, this.all.length);
    this.all.push(child);
    return child;
  }

  private enqueue(interval: Interval): void {
    const index = this.unhandled.findIndex(
      (other) => byStart(other, interval) > 0,
    );
    if (index === -1) {
      this.unhandled.push(interval);
    } else {
      this.unhandled.splice(index, 0, interval);
    }
  }
}

/**
 * Assign every interval of `liveness` a register from `pool` or a spill
 * slot, splitting intervals as needed. Intervals are updated in place.
 */
export function sweep(
  order: LinearOrder,
  liveness: Liveness,
  pool: readonly string[],
): SweepResult {
  return new SweepState(order, liveness, pool).run();
}
