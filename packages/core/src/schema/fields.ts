import type {
  ContainerField,
  DuplicatePolicy,
  EntityField,
  FieldType,
  FieldValue,
  ListField,
  NullableField,
  OptionalField,
  PrimField,
  PrimName,
  PrimValue,
  RecordField,
} from "./types.js";

// ---------------------------------------------------------------------------
// Field type builders
//
// Builders given a default return a type with a required `default`, which
// makes the attribute omittable in EntityInput.
// ---------------------------------------------------------------------------

type Defaulted<F, V> = F & { readonly default: V };

function prim<P extends PrimName>(prim: P): PrimField<P>;
function prim<P extends PrimName>(
  prim: P,
  options: { default: PrimValue<P> }
): Defaulted<PrimField<P>, PrimValue<P>>;
function prim<P extends PrimName>(
  prim: P,
  options?: { default: PrimValue<P> }
): PrimField<P> {
  return options ? { kind: "prim", prim, default: options.default } : { kind: "prim", prim };
}

function string(): PrimField<"string">;
function string(options: { default: string }): Defaulted<PrimField<"string">, string>;
function string(options?: { default: string }): PrimField<"string"> {
  return options ? prim("string", options) : prim("string");
}

function integer(): PrimField<"integer">;
function integer(options: { default: number }): Defaulted<PrimField<"integer">, number>;
function integer(options?: { default: number }): PrimField<"integer"> {
  return options ? prim("integer", options) : prim("integer");
}

function number(): PrimField<"number">;
function number(options: { default: number }): Defaulted<PrimField<"number">, number>;
function number(options?: { default: number }): PrimField<"number"> {
  return options ? prim("number", options) : prim("number");
}

function boolean(): PrimField<"boolean">;
function boolean(options: { default: boolean }): Defaulted<PrimField<"boolean">, boolean>;
function boolean(options?: { default: boolean }): PrimField<"boolean"> {
  return options ? prim("boolean", options) : prim("boolean");
}

function list<I extends FieldType>(items: I): ListField<I>;
function list<I extends FieldType>(
  items: I,
  options: { default: FieldValue<I>[] }
): Defaulted<ListField<I>, FieldValue<I>[]>;
function list<I extends FieldType>(
  items: I,
  options?: { default: FieldValue<I>[] }
): ListField<I> {
  return options ? { kind: "list", items, default: options.default } : { kind: "list", items };
}

function record<I extends FieldType>(values: I): RecordField<I>;
function record<I extends FieldType>(
  values: I,
  options: { default: Record<string, FieldValue<I>> }
): Defaulted<RecordField<I>, Record<string, FieldValue<I>>>;
function record<I extends FieldType>(
  values: I,
  options?: { default: Record<string, FieldValue<I>> }
): RecordField<I> {
  return options
    ? { kind: "record", values, default: options.default }
    : { kind: "record", values };
}

const optional = <I extends FieldType>(inner: I): OptionalField<I> => ({
  kind: "optional",
  inner,
});

function nullable<I extends FieldType>(inner: I): NullableField<I>;
function nullable<I extends FieldType>(
  inner: I,
  options: { default: null }
): Defaulted<NullableField<I>, null>;
function nullable<I extends FieldType>(
  inner: I,
  options?: { default: null }
): NullableField<I> {
  return options ? { kind: "nullable", inner, default: null } : { kind: "nullable", inner };
}

const entity = <K extends string>(of: K): EntityField<K> => ({
  kind: "entity",
  of,
});

const container = <K extends string>(
  of: K,
  options: { duplicates?: DuplicatePolicy } = {}
): ContainerField<K> => ({
  kind: "container",
  of,
  duplicates: options.duplicates ?? "reject",
});

export const t = {
  string,
  integer,
  number,
  boolean,
  list,
  record,
  optional,
  nullable,
  entity,
  container,
};
