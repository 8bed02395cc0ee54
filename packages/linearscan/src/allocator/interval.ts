/**
 * Live intervals
 *
 * An interval is a set of disjoint half-open ranges `[start, end)` over
 * linear-order positions plus the positions where the value is read or
 * written. Splitting an interval produces a child that owns everything
 * from the split position on; the root keeps every descendant so the
 * pieces of one virtual register can be stitched back together.
 */

import { invariant } from "#errors";
import type { Policy, VirtualRegister } from "#graph";
import type { Location } from "./location.js";

export interface Range {
  start: number;
  end: number;
}

export interface UsePosition {
  position: number;
  policy: Policy;
  kind: "use" | "def";
}

export type Origin =
  | { kind: "original" }
  | {
      kind: "split";
      root: Interval;
      parent: Interval;
      /** Position the parent was split at */
      position: number;
    };

export class Interval {
  private rangeList: Range[] = [];
  private useList: UsePosition[] = [];
  private childList: Interval[] = [];

  /** Assigned by the sweep */
  location?: Location;

  constructor(
    readonly id: number,
    readonly register: VirtualRegister,
    readonly origin: Origin = { kind: "original" },
  ) {}

  get ranges(): readonly Range[] {
    return this.rangeList;
  }

  get uses(): readonly UsePosition[] {
    return this.useList;
  }

  /**
   * Split descendants ordered by start. Only the root has any.
   */
  get children(): readonly Interval[] {
    return this.childList;
  }

  get root(): Interval {
    return this.origin.kind === "split" ? this.origin.root : this;
  }

  /**
   * The root followed by every split piece, ordered by start
   */
  get pieces(): readonly Interval[] {
    return [this.root, ...this.root.children];
  }

  get isEmpty(): boolean {
    return this.rangeList.length === 0;
  }

  get start(): number {
    invariant(!this.isEmpty, () => `interval ${this.id} has no ranges`);
    return this.rangeList[0].start;
  }

  get end(): number {
    invariant(!this.isEmpty, () => `interval ${this.id} has no ranges`);
    return this.rangeList[this.rangeList.length - 1].end;
  }

  covers(position: number): boolean {
    return this.rangeList.some(
      ({ start, end }) => start <= position && position < end,
    );
  }

  /**
   * Add `[start, end)`, merging with every range it overlaps or touches
   */
  addRange(start: number, end: number): void {
    invariant(start < end, () => `empty range [${start}, ${end})`);

    let merged: Range = { start, end };
    const kept: Range[] = [];
    for (const range of this.rangeList) {
      if (range.end < merged.start || range.start > merged.end) {
        kept.push(range);
      } else {
        merged = {
          start: Math.min(range.start, merged.start),
          end: Math.max(range.end, merged.end),
        };
      }
    }

    const index = kept.findIndex((range) => range.start > merged.start);
    if (index === -1) {
      kept.push(merged);
    } else {
      kept.splice(index, 0, merged);
    }
    this.rangeList = kept;
  }

  /**
   * Move the start of the range containing `position` up to it. A value
   * that is not live there gets the single position instead.
   */
  setFrom(position: number): void {
    const range = this.rangeList.find(
      ({ start, end }) => start <= position && position < end,
    );
    if (!range) {
      this.addRange(position, position + 1);
      return;
    }
    range.start = position;
  }

  addUse(use: UsePosition): void {
    const index = this.useList.findIndex(
      (existing) => existing.position > use.position,
    );
    if (index === -1) {
      this.useList.push(use);
    } else {
      this.useList.splice(index, 0, use);
    }
  }

  /**
   * First position at or after `from` that needs the value in a register
   */
  nextRegisterUse(from: number): number | undefined {
    return this.useList.find(
      (use) => use.position >= from && use.policy === "register",
    )?.position;
  }

  /**
   * Start of the first range beginning after `position`
   */
  nextRangeStart(position: number): number | undefined {
    return this.rangeList.find((range) => range.start > position)?.start;
  }

  /**
   * Lowest position covered by both intervals
   */
  firstIntersection(other: Interval): number | undefined {
    let i = 0;
    let j = 0;
    while (i < this.rangeList.length && j < other.rangeList.length) {
      const a = this.rangeList[i];
      const b = other.rangeList[j];
      const start = Math.max(a.start, b.start);
      if (start < Math.min(a.end, b.end)) {
        return start;
      }
      if (a.end <= b.end) {
        i++;
      } else {
        j++;
      }
    }
    return undefined;
  }

  /**
   * Split at `position`, which must lie strictly inside the interval.
   * This interval keeps everything before it; the returned child owns the
   * rest and starts at the first position it covers.
   */
  split(position: number, id: number): Interval {
    invariant(
      this.start < position && position < this.end,
      () =>
        `cannot split interval ${this.id} [${this.start}, ${this.end}) at ${position}`,
    );

    const child = new Interval(id, this.register, {
      kind: "split",
      root: this.root,
      parent: this,
      position,
    });

    const before: Range[] = [];
    for (const range of this.rangeList) {
      if (range.end <= position) {
        before.push(range);
      } else if (range.start >= position) {
        child.rangeList.push(range);
      } else {
        before.push({ start: range.start, end: position });
        child.rangeList.push({ start: position, end: range.end });
      }
    }
    this.rangeList = before;

    child.useList = this.useList.filter((use) => use.position >= position);
    this.useList = this.useList.filter((use) => use.position < position);

    const siblings = this.root.childList;
    const index = siblings.findIndex((sibling) => sibling.start > child.start);
    if (index === -1) {
      siblings.push(child);
    } else {
      siblings.splice(index, 0, child);
    }

    return child;
  }
}
