import type { Result } from "../result/result.js";

// Every error carries a JSON pointer `path` into the graph or the form
// where it was raised, when one exists.

export type TypeMismatchError = {
  type: "typeMismatch";
  path: string;
  attribute: string;
  expected: string;
  actual: string;
  message: string;
};

export type UnknownTypeError = {
  type: "unknownType";
  path: string;
  discriminator: string;
  message: string;
};

export type CyclicReferenceError = {
  type: "cyclicReference";
  path: string;
  /** Where the object was first entered on the current path */
  target: string;
  message: string;
};

export type DanglingReferenceError = {
  type: "danglingReference";
  path: string;
  ref: string;
  message: string;
};

export type DuplicateNameError = {
  type: "duplicateName";
  name: string;
  container: string;
  message: string;
};

export type OwnershipConflictError = {
  type: "ownershipConflict";
  name: string;
  message: string;
};

export type ImmutableAttributeError = {
  type: "immutableAttribute";
  attribute: string;
  message: string;
};

export type NodeLimitExceededError = {
  type: "nodeLimitExceeded";
  path: string;
  limit: number;
  message: string;
};

export type InvalidDocumentError = {
  type: "invalidDocument";
  message: string;
};

/** Errors raised while building or updating a single entity */
export type AttributeError = TypeMismatchError | ImmutableAttributeError;

/** Errors raised by container membership operations */
export type ContainerError =
  | TypeMismatchError
  | DuplicateNameError
  | OwnershipConflictError;

export type GraphError =
  | TypeMismatchError
  | UnknownTypeError
  | CyclicReferenceError
  | DanglingReferenceError
  | DuplicateNameError
  | OwnershipConflictError
  | ImmutableAttributeError
  | NodeLimitExceededError
  | InvalidDocumentError;

export type GraphErrorType = GraphError["type"];

export const typeMismatch = (
  path: string,
  attribute: string,
  expected: string,
  actual: string
): TypeMismatchError => ({
  type: "typeMismatch",
  path,
  attribute,
  expected,
  actual,
  message: `Attribute "${attribute}" at ${path} expected ${expected}, got ${actual}`,
});

export const unknownType = (
  path: string,
  discriminator: string
): UnknownTypeError => ({
  type: "unknownType",
  path,
  discriminator,
  message: `Unknown type "${discriminator}" at ${path}`,
});

export const cyclicReference = (
  path: string,
  target: string
): CyclicReferenceError => ({
  type: "cyclicReference",
  path,
  target,
  message: `Cyclic reference at ${path} back to ${target}`,
});

export const danglingReference = (
  path: string,
  ref: string,
  reason = "does not resolve to a reconstructed object"
): DanglingReferenceError => ({
  type: "danglingReference",
  path,
  ref,
  message: `Reference "${ref}" at ${path} ${reason}`,
});

export const duplicateName = (
  name: string,
  container: string
): DuplicateNameError => ({
  type: "duplicateName",
  name,
  container,
  message: `Container<${container}> already holds an entity named "${name}"`,
});

export const ownershipConflict = (name: string): OwnershipConflictError => ({
  type: "ownershipConflict",
  name,
  message: `Entity "${name}" already belongs to another container`,
});

export const immutableAttribute = (
  attribute: string
): ImmutableAttributeError => ({
  type: "immutableAttribute",
  attribute,
  message: `Attribute "${attribute}" cannot be changed after construction`,
});

export const nodeLimitExceeded = (
  path: string,
  limit: number
): NodeLimitExceededError => ({
  type: "nodeLimitExceeded",
  path,
  limit,
  message: `Graph exceeds ${limit} nodes at ${path}`,
});

export const invalidDocument = (message: string): InvalidDocumentError => ({
  type: "invalidDocument",
  message,
});

/**
 * Exception form of a GraphError, for callers that prefer throwing.
 */
export class GraphformError extends Error {
  constructor(public readonly detail: GraphError) {
    super(detail.message);
    this.name = "GraphformError";
  }
}

export const unwrap = <T>(result: Result<T, GraphError>): T => {
  if (result.success) {
    return result.data;
  }
  throw new GraphformError(result.error);
};
