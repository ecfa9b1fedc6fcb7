import { z } from "zod";
import { err, ok, Result } from "../result/result.js";
import { formatJsonPointer, JsonPointer } from "../json-pointer/index.js";
import { typeMismatch, TypeMismatchError } from "../errors/index.js";
import { isPlainObject, setEntry } from "../plain/index.js";
import { Entity } from "../entity/Entity.js";
import { Container } from "../entity/Container.js";
import type { FieldType, FieldValue, PrimName, PrimValue } from "./types.js";

type PrimSchemas = { [P in PrimName]: z.ZodType<PrimValue<P>> };

const strictPrims: PrimSchemas = {
  string: z.string(),
  integer: z.number().int(),
  number: z.number(),
  boolean: z.boolean(),
};

const INTEGER_TEXT = /^[-+]?\d+$/;
const NUMBER_TEXT = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

// Only used when reading serialized forms with `coerce` enabled
const lenientPrims: PrimSchemas = {
  string: z.string(),
  integer: z.union([
    z.number().int(),
    z.string().trim().regex(INTEGER_TEXT).transform(Number).pipe(z.number().int()),
  ]),
  number: z.union([
    z.number(),
    z.string().trim().regex(NUMBER_TEXT).transform(Number).pipe(z.number()),
  ]),
  boolean: z.union([
    z.boolean(),
    z.enum(["true", "false"]).transform((text) => text === "true"),
  ]),
};

export function describeFieldType(field: FieldType): string {
  switch (field.kind) {
    case "prim":
      return field.prim;
    case "list":
      return `list<${describeFieldType(field.items)}>`;
    case "record":
      return `record<${describeFieldType(field.values)}>`;
    case "optional":
      return `optional<${describeFieldType(field.inner)}>`;
    case "nullable":
      return `nullable<${describeFieldType(field.inner)}>`;
    case "entity":
      return `entity<${field.of}>`;
    case "container":
      return `container<${field.of}>`;
  }
}

export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (Array.isArray(value)) return "array";
  if (value instanceof Entity) return `entity<${value.type}>`;
  if (value instanceof Container) return `container<${value.kind}>`;
  if (typeof value === "number") {
    if (Number.isNaN(value)) return "NaN";
    if (!Number.isFinite(value)) return "non-finite number";
    return Number.isInteger(value) ? "integer" : "number";
  }
  return typeof value;
}

export function isPrimValue<P extends PrimName>(
  prim: P,
  value: unknown
): value is PrimValue<P> {
  return strictPrims[prim].safeParse(value).success;
}

/**
 * Reads a primitive from a serialized form, coercing text when `coerce` is
 * set. Returns the described actual value on failure.
 */
export function parsePrim<P extends PrimName>(
  prim: P,
  value: unknown,
  coerce: boolean
): Result<PrimValue<P>, string> {
  const schemas = coerce ? lenientPrims : strictPrims;
  const schema: z.ZodType<PrimValue<P>> = schemas[prim];
  const parsed = schema.safeParse(value);
  if (parsed.success) return ok(parsed.data);
  return err(describeValue(value));
}

/**
 * Copy of an attribute value: lists and records are copied all the way
 * down, entities and containers stay shared.
 */
export function copyFieldValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(copyFieldValue);
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      setEntry(copy, key, copyFieldValue(item));
    }
    return copy;
  }
  return value;
}

export function isFieldValue<F extends FieldType>(
  field: F,
  value: unknown
): value is FieldValue<F> {
  return findMismatch(field, value, []) === undefined;
}

type Mismatch = { at: JsonPointer; expected: FieldType; actual: unknown };

function findMismatch(
  field: FieldType,
  value: unknown,
  at: JsonPointer
): Mismatch | undefined {
  switch (field.kind) {
    case "prim":
      return isPrimValue(field.prim, value)
        ? undefined
        : { at, expected: field, actual: value };
    case "optional":
      return value === undefined ? undefined : findMismatch(field.inner, value, at);
    case "nullable":
      return value === null ? undefined : findMismatch(field.inner, value, at);
    case "entity":
      return value instanceof Entity && value.isKindOf(field.of)
        ? undefined
        : { at, expected: field, actual: value };
    case "container":
      return value instanceof Container && value.kind === field.of
        ? undefined
        : { at, expected: field, actual: value };
    case "list": {
      if (!Array.isArray(value)) return { at, expected: field, actual: value };
      for (let i = 0; i < value.length; i++) {
        const found = findMismatch(field.items, value[i], [...at, String(i)]);
        if (found) return found;
      }
      return undefined;
    }
    case "record": {
      if (!isPlainObject(value)) return { at, expected: field, actual: value };
      for (const [key, item] of Object.entries(value)) {
        const found = findMismatch(field.values, item, [...at, key]);
        if (found) return found;
      }
      return undefined;
    }
  }
}

/**
 * Validates an attribute value against its declared type, reporting the
 * innermost offending element.
 */
export function checkFieldValue(
  field: FieldType,
  value: unknown,
  path: JsonPointer,
  attribute: string
): Result<void, TypeMismatchError> {
  const found = findMismatch(field, value, path);
  if (!found) return ok(undefined);
  return err(
    typeMismatch(
      formatJsonPointer(found.at),
      attribute,
      describeFieldType(found.expected),
      describeValue(found.actual)
    )
  );
}
