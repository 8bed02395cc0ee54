import { describe, it, expect } from "vitest";

import { allocate } from "#compiler";
import type { Allocation } from "#allocator";
import { Graph } from "#graph";
import { Formatter } from "./formatter.js";
import { branchMerge, straightLine } from "../../test/graphs.js";

function allocated(graph: Graph, registers: string[]): Allocation {
  const result = allocate(graph, { registers });
  if (!result.success) {
    throw new Error("allocation failed");
  }
  return result.value;
}

describe("Formatter", () => {
  it("should print split moves in the gap before the instruction", () => {
    const output = new Formatter().format(allocated(straightLine(), ["r0"]));

    expect(output).toBe(
      [
        "allocation registers=[r0] slots=2 {",
        "  b0 [0, 10]:",
        "    0: v0:r0 = const",
        "    1: move v0 r0 -> [slot 0]",
        "    2: v1:r0 = const",
        "    3: move v1 r0 -> [slot 1]",
        "    4: v2:r0 = const",
        "    6: use v2:r0",
        "    7: move v1 [slot 1] -> r0",
        "    8: use v1:r0",
        "    9: move v0 [slot 0] -> r0",
        "    10: use v0:r0",
        "}",
      ].join("\n"),
    );
  });

  it("should print live-in locations and edge moves", () => {
    const output = new Formatter().format(allocated(branchMerge(), ["r0"]));

    expect(output).toBe(
      [
        "allocation registers=[r0] slots=1 {",
        "  b0 [0, 0] -> b1, b2:",
        "    0: v0:r0 = const",
        "    -> b1 (successor): v0 r0 -> [slot 0]",
        "  b1 [2, 4] -> b3:",
        "    live-in: v0:[slot 0]",
        "    2: v1:r0 = const",
        "    4: use v1:r0",
        "    -> b3 (predecessor): v0 [slot 0] -> r0",
        "  b2 [6, 6] -> b3:",
        "    live-in: v0:r0",
        "    6: use v0:r0",
        "  b3 [8, 8]:",
        "    live-in: v0:r0",
        "    8: use v0:r0",
        "}",
      ].join("\n"),
    );
  });

  it("should use register names and mark empty blocks", () => {
    const graph = new Graph();
    const counter = graph.createRegister({ name: "counter" });
    const [b0, b1] = [graph.addBlock(), graph.addBlock()];
    graph.addInstruction(b0, { opcode: "const", defs: [counter] });
    graph.addInstruction(b0, { opcode: "emit", uses: [counter] });
    graph.addEdge(b0, b1);

    const output = new Formatter().format(allocated(graph, ["r0", "r1"]));

    expect(output.split("\n")).toEqual([
      "allocation registers=[r0, r1] slots=0 {",
      "  b0 [0, 2] -> b1:",
      "    0: counter:r0 = const",
      "    2: emit counter:r0",
      "  b1 [4, 4]:",
      "    4: (empty)",
      "}",
    ]);
  });

  it("should be reusable", () => {
    const formatter = new Formatter();
    const allocation = allocated(straightLine(), ["r0", "r1", "r2"]);

    expect(formatter.format(allocation)).toBe(formatter.format(allocation));
  });
});
