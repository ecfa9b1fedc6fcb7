import { ok, Result } from "@graphform/core/result";
import type { GraphError } from "@graphform/core/errors";
import type { Container, Entity } from "@graphform/core/entity";
import { fingerprint } from "@graphform/core/hash";
import { serializeGraph } from "./serializeGraph.js";
import type { TraversalContext } from "./types.js";

/**
 * Two graphs are structurally equal when their serialized forms match,
 * ignoring key order.
 */
export function structurallyEqual(
  a: Entity | Container,
  b: Entity | Container,
  ctx: TraversalContext
): Result<boolean, GraphError> {
  const left = serializeGraph(a, ctx);
  if (!left.success) return left;
  const right = serializeGraph(b, ctx);
  if (!right.success) return right;

  return ok(fingerprint(left.data) === fingerprint(right.data));
}
