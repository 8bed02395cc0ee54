import type { Pass } from "#compiler";
import type { LinearOrder } from "#flatten";
import { Result } from "#result";
import { allocateOrder, type Allocation } from "./allocation.js";
import type { AllocatorError } from "./errors.js";
import type { Options } from "./options.js";

/**
 * Register allocation pass - assigns every live interval a register or a
 * spill slot and resolves the moves between them
 */
export const pass: Pass<{
  needs: {
    order: LinearOrder;
    options: Options;
  };
  adds: {
    allocation: Allocation;
  };
  error: AllocatorError;
}> = {
  run({ order, options }) {
    return Result.map(allocateOrder(order, options), (allocation) => ({
      allocation,
    }));
  },
};
