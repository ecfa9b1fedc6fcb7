import { err, ok, Result } from "@graphform/core/result";
import { formatJsonPointer, parseJsonPointer } from "@graphform/core/json-pointer";
import {
  danglingReference,
  DanglingReferenceError,
  typeMismatch,
  TypeMismatchError,
} from "@graphform/core/errors";
import { Container, Entity } from "@graphform/core/entity";
import {
  ContainerField,
  describeFieldType,
  describeValue,
  EntityField,
} from "@graphform/core/schema";
import type { Logger } from "@graphform/core/logging";

/** A marker met while rebuilding, to be patched once everything exists */
export interface PendingReference {
  ref: string;
  /** Pointer of the marker itself */
  path: string;
  attribute: string;
  expected: EntityField | ContainerField;
  put: (target: Entity | Container) => void;
}

/** Rebuilt objects by the canonical pointer of where their form sits */
export type LocatedObjects = Map<string, Entity | Container>;

const accepts = (
  expected: EntityField | ContainerField,
  target: Entity | Container
): boolean => {
  if (expected.kind === "entity") {
    return target instanceof Entity && target.isKindOf(expected.of);
  }
  return target instanceof Container && target.kind === expected.of;
};

/**
 * Second pass of deserialization: point every marker at the object
 * rebuilt at the location it names.
 */
export function resolveReferences(
  pending: readonly PendingReference[],
  located: LocatedObjects,
  logger: Logger
): Result<void, DanglingReferenceError | TypeMismatchError> {
  for (const reference of pending) {
    const pointer = parseJsonPointer(reference.ref);
    if (!pointer.success) {
      return err(
        danglingReference(reference.path, reference.ref, `is malformed: ${pointer.error.message}`)
      );
    }

    const target = located.get(formatJsonPointer(pointer.data));
    if (!target) {
      return err(danglingReference(reference.path, reference.ref));
    }
    if (!accepts(reference.expected, target)) {
      return err(
        typeMismatch(
          reference.path,
          reference.attribute,
          describeFieldType(reference.expected),
          describeValue(target)
        )
      );
    }

    logger.debug(`resolved ${reference.path} -> ${reference.ref}`);
    reference.put(target);
  }
  return ok(undefined);
}
