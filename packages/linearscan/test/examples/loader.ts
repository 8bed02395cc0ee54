/**
 * Example files describe a graph, a register pool and the allocation
 * expected for them:
 *
 *   pool: [r0, r1]
 *   values: [a, b, { name: f, class: float }]
 *   blocks:
 *     - name: entry
 *       to: [exit]
 *       code:
 *         - { op: const, defs: [a] }
 *         - { op: use, uses: [{ value: a, policy: any, kill: true }] }
 *   expect:
 *     slots: 0
 *     at: [[a, 2, r0]]
 */

import YAML from "yaml";
import { Graph, type Instruction, type Policy } from "#graph";

export interface ExampleOperand {
  value: string;
  policy?: Policy;
  kill?: boolean;
}

export interface ExampleInstruction {
  op: string;
  uses: ExampleOperand[];
  defs: ExampleOperand[];
}

export interface ExampleBlock {
  name: string;
  to: string[];
  code: ExampleInstruction[];
}

export interface ExampleMoves {
  moves: string[];
}

export interface ExampleEdge extends ExampleMoves {
  from: string;
  to: string;
  placement: string;
}

export interface ExampleSplit extends ExampleMoves {
  at: number;
}

export interface ExampleExpectation {
  /** Code of the first error, if allocation must fail */
  error?: string;
  slots?: number;
  warnings?: string[];
  /** [value, position, location] */
  at: [string, number, string | null][];
  edges?: ExampleEdge[];
  splits?: ExampleSplit[];
}

export interface Example {
  description?: string;
  pool: string[];
  values: { name: string; class?: string }[];
  entry?: string;
  blocks: ExampleBlock[];
  expect: ExampleExpectation;
}

export class ExampleFormatError extends Error {
  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "ExampleFormatError";
  }
}

type Fields = Record<string, unknown>;

function isPolicy(value: unknown): value is Policy {
  return value === "register" || value === "any";
}

function isFields(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads typed fields out of untrusted YAML, reporting the path of the
 * first field that does not match
 */
class Reader {
  constructor(private readonly file: string) {}

  fail(path: string, message: string): never {
    throw new ExampleFormatError(this.file, `${path} ${message}`);
  }

  fields(value: unknown, path: string): Fields {
    return isFields(value) ? value : this.fail(path, "must be a mapping");
  }

  list(value: unknown, path: string): unknown[] {
    return Array.isArray(value) ? value : this.fail(path, "must be a list");
  }

  optionalList(value: unknown, path: string): unknown[] {
    return value === undefined ? [] : this.list(value, path);
  }

  string(value: unknown, path: string): string {
    return typeof value === "string" ? value : this.fail(path, "must be a string");
  }

  optionalString(value: unknown, path: string): string | undefined {
    return value === undefined ? undefined : this.string(value, path);
  }

  number(value: unknown, path: string): number {
    return typeof value === "number" ? value : this.fail(path, "must be a number");
  }

  strings(value: unknown, path: string): string[] {
    return this.optionalList(value, path).map((item, index) =>
      this.string(item, `${path}[${index}]`),
    );
  }
}

function readOperand(
  reader: Reader,
  value: unknown,
  path: string,
): ExampleOperand {
  if (typeof value === "string") {
    return { value };
  }
  const fields = reader.fields(value, path);
  const { policy, kill } = fields;
  return {
    value: reader.string(fields.value, `${path}.value`),
    policy:
      policy === undefined || isPolicy(policy)
        ? policy
        : reader.fail(`${path}.policy`, "must be register or any"),
    kill:
      kill === undefined || typeof kill === "boolean"
        ? kill
        : reader.fail(`${path}.kill`, "must be a boolean"),
  };
}

function readBlock(reader: Reader, value: unknown, path: string): ExampleBlock {
  const fields = reader.fields(value, path);
  return {
    name: reader.string(fields.name, `${path}.name`),
    to: reader.strings(fields.to, `${path}.to`),
    code: reader.optionalList(fields.code, `${path}.code`).map((item, index) => {
      const itemPath = `${path}.code[${index}]`;
      const instruction = reader.fields(item, itemPath);
      const operands = (key: "uses" | "defs") =>
        reader
          .optionalList(instruction[key], `${itemPath}.${key}`)
          .map((operand, position) =>
            readOperand(reader, operand, `${itemPath}.${key}[${position}]`),
          );
      return {
        op: reader.string(instruction.op, `${itemPath}.op`),
        uses: operands("uses"),
        defs: operands("defs"),
      };
    }),
  };
}

function readExpectation(
  reader: Reader,
  value: unknown,
): ExampleExpectation {
  const fields = reader.fields(value ?? {}, "expect");
  const moves = (item: Fields, path: string) =>
    reader.strings(item.moves, `${path}.moves`);

  return {
    error: reader.optionalString(fields.error, "expect.error"),
    slots:
      fields.slots === undefined
        ? undefined
        : reader.number(fields.slots, "expect.slots"),
    warnings:
      fields.warnings === undefined
        ? undefined
        : reader.strings(fields.warnings, "expect.warnings"),
    at: reader
      .optionalList(fields.at, "expect.at")
      .map((item, index): [string, number, string | null] => {
        const path = `expect.at[${index}]`;
        const [name, position, location] = reader.list(item, path);
        return [
          reader.string(name, `${path}[0]`),
          reader.number(position, `${path}[1]`),
          location === null ? null : reader.string(location, `${path}[2]`),
        ];
      }),
    edges:
      fields.edges === undefined
        ? undefined
        : reader.list(fields.edges, "expect.edges").map((item, index) => {
            const path = `expect.edges[${index}]`;
            const edge = reader.fields(item, path);
            return {
              from: reader.string(edge.from, `${path}.from`),
              to: reader.string(edge.to, `${path}.to`),
              placement: reader.string(edge.placement, `${path}.placement`),
              moves: moves(edge, path),
            };
          }),
    splits:
      fields.splits === undefined
        ? undefined
        : reader.list(fields.splits, "expect.splits").map((item, index) => {
            const path = `expect.splits[${index}]`;
            const split = reader.fields(item, path);
            return {
              at: reader.number(split.at, `${path}.at`),
              moves: moves(split, path),
            };
          }),
  };
}

export function parseExample(file: string, source: string): Example {
  const reader = new Reader(file);
  const document = reader.fields(YAML.parse(source), "document");

  return {
    description: reader.optionalString(document.description, "description"),
    pool: reader.strings(document.pool, "pool"),
    values: reader.list(document.values, "values").map((item, index) => {
      if (typeof item === "string") {
        return { name: item };
      }
      const fields = reader.fields(item, `values[${index}]`);
      return {
        name: reader.string(fields.name, `values[${index}].name`),
        class: reader.optionalString(fields.class, `values[${index}].class`),
      };
    }),
    entry: reader.optionalString(document.entry, "entry"),
    blocks: reader
      .list(document.blocks, "blocks")
      .map((item, index) => readBlock(reader, item, `blocks[${index}]`)),
    expect: readExpectation(reader, document.expect),
  };
}

export interface BuiltExample {
  graph: Graph;
  registers: Map<string, number>;
  blocks: Map<string, number>;
}

/**
 * Build the graph of an example. Blocks and values get ids in the order
 * they are listed.
 */
export function buildExample(file: string, example: Example): BuiltExample {
  const graph = new Graph();
  const registers = new Map<string, number>();
  const blocks = new Map<string, number>();

  for (const value of example.values) {
    registers.set(
      value.name,
      graph.createRegister({ name: value.name, class: value.class }),
    );
  }
  for (const block of example.blocks) {
    blocks.set(block.name, graph.addBlock());
  }

  const lookup = (names: Map<string, number>, kind: string, name: string) => {
    const id = names.get(name);
    if (id === undefined) {
      throw new ExampleFormatError(file, `unknown ${kind} ${name}`);
    }
    return id;
  };

  for (const block of example.blocks) {
    const id = lookup(blocks, "block", block.name);
    for (const { op, uses, defs } of block.code) {
      const spec: Instruction.Spec = {
        opcode: op,
        uses: uses.map(({ value, policy, kill }) => ({
          register: lookup(registers, "value", value),
          policy,
          kill,
        })),
        defs: defs.map(({ value, policy }) => ({
          register: lookup(registers, "value", value),
          policy,
        })),
      };
      graph.addInstruction(id, spec);
    }
    for (const target of block.to) {
      graph.addEdge(id, lookup(blocks, "block", target));
    }
  }

  if (example.entry !== undefined) {
    graph.setEntry(lookup(blocks, "block", example.entry));
  }

  return { graph, registers, blocks };
}
