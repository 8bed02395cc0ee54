/**
 * Allocation pipeline: flattening followed by register allocation
 */

import type { LinearScanError } from "#errors";
import type { Graph } from "#graph";
import { pass as flattenPass } from "#flatten";
import {
  pass as allocatorPass,
  resolveOptions,
  AllocatorError,
  ErrorCode,
  type Allocation,
  type Options,
} from "#allocator";
import { Result } from "#result";

/**
 * Allocate registers for every virtual register of `graph` (or of
 * `options.registerClass`). Flattening freezes the graph.
 */
export function allocate(
  graph: Graph,
  options: Options,
): Result<Allocation, LinearScanError> {
  const resolved = resolveOptions(options);
  if (!resolved.success) {
    return resolved;
  }

  const flattened = flattenPass.run({ graph });
  if (!flattened.success) {
    return flattened;
  }

  const allocated = allocatorPass.run({
    order: flattened.value.order,
    options: resolved.value,
  });
  const messages = Result.mergeMessages<LinearScanError>(
    flattened.messages,
    allocated.messages,
  );
  if (!allocated.success) {
    return { success: false, messages };
  }
  return Result.okWith(allocated.value.allocation, messages);
}

/**
 * Run the pipeline once per register class, each against its own pool.
 * Fails if any class fails, or if a class that occurs in the graph has
 * no pool.
 */
export function allocateByClass(
  graph: Graph,
  pools: Readonly<Record<string, readonly string[]>>,
  options: { verify?: boolean } = {},
): Result<Map<string, Allocation>, LinearScanError> {
  const missing = [...new Set(graph.registers.map((register) => register.class))]
    .filter((registerClass) => !(registerClass in pools))
    .map(
      (registerClass) =>
        new AllocatorError(
          ErrorCode.INVALID_CONFIGURATION,
          `no register pool for class ${registerClass}`,
        ),
    );
  if (missing.length > 0) {
    return Result.err(missing);
  }

  const allocations = new Map<string, Allocation>();
  const results = Object.entries(pools).map(([registerClass, registers]) => {
    const result = allocate(graph, {
      registers,
      registerClass,
      verify: options.verify,
    });
    if (result.success) {
      allocations.set(registerClass, result.value);
    }
    return result;
  });

  const messages = Result.mergeMessages(
    ...results.map((result) => result.messages),
  );
  if (results.some((result) => !result.success)) {
    return { success: false, messages };
  }
  return Result.okWith(allocations, messages);
}
