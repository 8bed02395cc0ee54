/**
 * Allocation formatter for human-readable text output
 */

import { Allocation, Location, type Move } from "#allocator";
import { LinearOrder, type Slot } from "#flatten";
import type { BlockId, Instruction, VirtualRegister } from "#graph";

export class Formatter {
  private indent = 0;
  private output: string[] = [];

  format(allocation: Allocation): string {
    this.output = [];
    this.indent = 0;

    this.line(
      `allocation registers=[${allocation.registers.join(", ")}] slots=${allocation.slotCount} {`,
    );
    this.indent++;
    for (const block of allocation.order.blocks) {
      this.formatBlock(allocation, block);
    }
    this.indent--;
    this.line("}");

    return this.output.join("\n");
  }

  private formatBlock(allocation: Allocation, id: BlockId): void {
    const { order } = allocation;
    const { first, last } = LinearOrder.range(order, id);
    const { successors } = order.graph.block(id);
    const targets =
      successors.length > 0
        ? ` -> ${successors.map((successor) => `b${successor}`).join(", ")}`
        : "";
    this.line(`b${id} [${first}, ${last}]${targets}:`);
    this.indent++;

    const liveIn = [...(allocation.liveness.liveIn.get(id) ?? [])].sort(
      (a, b) => a - b,
    );
    if (liveIn.length > 0) {
      const entries = liveIn.map((register) =>
        this.formatOperand(allocation, register, first),
      );
      this.line(`live-in: ${entries.join(", ")}`);
    }

    for (const slot of order.slots.filter((slot) => slot.block === id)) {
      const split = allocation.splits.find(
        (split) => split.position === slot.position - 1 && split.block === id,
      );
      if (split) {
        const moves = this.formatMoves(allocation, split.moves);
        this.line(`${split.position}: move ${moves}`);
      }
      this.line(`${slot.position}: ${this.formatSlot(allocation, slot)}`);
    }

    for (const edge of allocation.edges.filter((edge) => edge.from === id)) {
      this.line(
        `-> b${edge.to} (${edge.placement}): ${this.formatMoves(allocation, edge.moves)}`,
      );
    }

    this.indent--;
  }

  private formatSlot(allocation: Allocation, slot: Slot): string {
    if (!slot.instruction) {
      return "(empty)";
    }
    return this.formatInstruction(allocation, slot.instruction, slot.position);
  }

  private formatInstruction(
    allocation: Allocation,
    instruction: Instruction,
    position: number,
  ): string {
    const operands = (
      list: readonly { register: VirtualRegister }[],
      at: number,
    ) => list.map(({ register }) => this.formatOperand(allocation, register, at));

    // results are located in the gap they are written to
    const uses = operands(instruction.uses, position);
    const defs = operands(instruction.defs, position + 1);
    const call =
      uses.length > 0
        ? `${instruction.opcode} ${uses.join(", ")}`
        : instruction.opcode;
    return defs.length > 0 ? `${defs.join(", ")} = ${call}` : call;
  }

  private formatOperand(
    allocation: Allocation,
    register: VirtualRegister,
    position: number,
  ): string {
    const { name } = allocation.order.graph.register(register);
    const location = Allocation.locate(allocation, register, position);
    return location ? `${name}:${Location.format(location)}` : name;
  }

  private formatMoves(allocation: Allocation, moves: readonly Move[]): string {
    return moves
      .map(
        (move) =>
          `${allocation.order.graph.register(move.register).name} ${Location.format(move.from)} -> ${Location.format(move.to)}`,
      )
      .join(", ");
  }

  private line(text: string): void {
    this.output.push(text === "" ? "" : "  ".repeat(this.indent) + text);
  }
}
