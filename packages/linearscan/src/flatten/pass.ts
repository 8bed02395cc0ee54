import type { Graph } from "#graph";
import type { Pass } from "#compiler";
import { Result } from "#result";
import { flatten, type LinearOrder } from "./flatten.js";
import type { FlattenError } from "./errors.js";

/**
 * Flattening pass - orders blocks and numbers instruction positions
 */
export const pass: Pass<{
  needs: {
    graph: Graph;
  };
  adds: {
    order: LinearOrder;
  };
  error: FlattenError;
}> = {
  run({ graph }) {
    return Result.map(flatten(graph), (order) => ({ order }));
  },
};
