import { describe, it, expect } from "vitest";

import { InvariantViolation } from "#errors";
import { Interval } from "./interval.js";

function intervalWith(ranges: [number, number][]): Interval {
  const interval = new Interval(0, 0);
  for (const [start, end] of ranges) {
    interval.addRange(start, end);
  }
  return interval;
}

describe("Interval", () => {
  describe("ranges", () => {
    it("should merge ranges that overlap or touch", () => {
      const interval = intervalWith([
        [10, 12],
        [0, 2],
        [4, 6],
        [2, 4],
      ]);

      expect(interval.ranges).toEqual([
        { start: 0, end: 6 },
        { start: 10, end: 12 },
      ]);
      expect(interval.start).toBe(0);
      expect(interval.end).toBe(12);
    });

    it("should cover half-open ranges", () => {
      const interval = intervalWith([
        [0, 6],
        [10, 12],
      ]);

      expect(interval.covers(5)).toBe(true);
      expect(interval.covers(6)).toBe(false);
      expect(interval.covers(10)).toBe(true);
      expect(interval.covers(12)).toBe(false);
    });

    it("should move the start of a live range up to a definition", () => {
      const interval = intervalWith([[0, 9]]);
      interval.setFrom(4);
      expect(interval.ranges).toEqual([{ start: 4, end: 9 }]);
    });

    it("should give a dead definition a single position", () => {
      const interval = new Interval(0, 0);
      interval.setFrom(3);
      expect(interval.ranges).toEqual([{ start: 3, end: 4 }]);
    });

    it("should reject empty ranges", () => {
      expect(() => new Interval(0, 0).addRange(3, 3)).toThrow(
        InvariantViolation,
      );
    });
  });

  describe("uses", () => {
    const interval = intervalWith([[0, 12]]);
    interval.addUse({ position: 8, policy: "register", kind: "use" });
    interval.addUse({ position: 2, policy: "register", kind: "def" });
    interval.addUse({ position: 5, policy: "any", kind: "use" });

    it("should keep uses in position order", () => {
      expect(interval.uses.map((use) => use.position)).toEqual([2, 5, 8]);
    });

    it("should find the next use that needs a register", () => {
      expect(interval.nextRegisterUse(0)).toBe(2);
      expect(interval.nextRegisterUse(3)).toBe(8);
      expect(interval.nextRegisterUse(8)).toBe(8);
      expect(interval.nextRegisterUse(9)).toBeUndefined();
    });
  });

  describe("intersection", () => {
    it("should find where a lifetime resumes", () => {
      const interval = intervalWith([
        [0, 6],
        [10, 12],
      ]);
      expect(interval.nextRangeStart(6)).toBe(10);
      expect(interval.nextRangeStart(10)).toBeUndefined();
    });

    it("should find the first common position", () => {
      const a = intervalWith([
        [0, 4],
        [8, 12],
      ]);
      expect(a.firstIntersection(intervalWith([[4, 9]]))).toBe(8);
      expect(intervalWith([[4, 9]]).firstIntersection(a)).toBe(8);
      expect(a.firstIntersection(intervalWith([[4, 8]]))).toBeUndefined();
    });
  });

  describe("split", () => {
    it("should partition ranges and uses at the split position", () => {
      const root = intervalWith([
        [0, 4],
        [6, 12],
      ]);
      root.addUse({ position: 2, policy: "register", kind: "def" });
      root.addUse({ position: 7, policy: "register", kind: "use" });
      root.addUse({ position: 10, policy: "any", kind: "use" });

      const child = root.split(8, 1);

      expect(root.ranges).toEqual([
        { start: 0, end: 4 },
        { start: 6, end: 8 },
      ]);
      expect(root.uses.map((use) => use.position)).toEqual([2, 7]);
      expect(child.ranges).toEqual([{ start: 8, end: 12 }]);
      expect(child.uses.map((use) => use.position)).toEqual([10]);
      expect(child.id).toBe(1);
      expect(child.register).toBe(0);
      expect(child.origin.kind).toBe("split");
      if (child.origin.kind === "split") {
        expect(child.origin.root).toBe(root);
        expect(child.origin.parent).toBe(root);
        expect(child.origin.position).toBe(8);
      }
    });

    it("should keep every piece on the root in start order", () => {
      const root = intervalWith([[0, 12]]);
      const child = root.split(4, 1);
      const grandchild = child.split(8, 2);

      expect(root.children).toEqual([child, grandchild]);
      expect(grandchild.root).toBe(root);
      if (grandchild.origin.kind === "split") {
        expect(grandchild.origin.parent).toBe(child);
      }
      expect(child.pieces).toEqual([root, child, grandchild]);
      expect(child.ranges).toEqual([{ start: 4, end: 8 }]);
    });

    it("should start a child split inside a hole at its next range", () => {
      const root = intervalWith([
        [0, 4],
        [8, 12],
      ]);
      const child = root.split(6, 1);

      expect(root.ranges).toEqual([{ start: 0, end: 4 }]);
      expect(child.start).toBe(8);
    });

    it("should only split strictly inside the interval", () => {
      const root = intervalWith([[0, 12]]);
      expect(() => root.split(0, 1)).toThrow(InvariantViolation);
      expect(() => root.split(12, 1)).toThrow(
        "Allocator invariant violated: cannot split interval 0 [0, 12) at 12",
      );
    });
  });
});
