/**
 * Field type descriptors for entity kinds.
 *
 * A kind's schema is plain data: an ordered map from attribute name to a
 * descriptor. Entity and container fields name their target kind instead
 * of holding it, so kinds may refer to themselves or to each other.
 */

import type { Entity } from "../entity/Entity.js";
import type { Container } from "../entity/Container.js";

export type PrimName = "string" | "integer" | "number" | "boolean";

export type DuplicatePolicy = "reject" | "overwrite";

export interface PrimField<P extends PrimName = PrimName> {
  readonly kind: "prim";
  readonly prim: P;
  readonly default?: PrimValue<P>;
}

export interface ListField<I extends FieldType = FieldType> {
  readonly kind: "list";
  readonly items: I;
  readonly default?: FieldValue<I>[];
}

export interface RecordField<I extends FieldType = FieldType> {
  readonly kind: "record";
  readonly values: I;
  readonly default?: Record<string, FieldValue<I>>;
}

/** Attribute may be absent; absent attributes are not serialized */
export interface OptionalField<I extends FieldType = FieldType> {
  readonly kind: "optional";
  readonly inner: I;
}

export interface NullableField<I extends FieldType = FieldType> {
  readonly kind: "nullable";
  readonly inner: I;
  readonly default?: null;
}

/** Non-owning reference to an entity of kind `of` (or a subkind) */
export interface EntityField<K extends string = string> {
  readonly kind: "entity";
  readonly of: K;
}

/**
 * Owned container of entities of kind `of`. Absent container attributes
 * start out as an empty container.
 */
export interface ContainerField<K extends string = string> {
  readonly kind: "container";
  readonly of: K;
  readonly duplicates: DuplicatePolicy;
}

export type FieldType =
  | PrimField
  | ListField
  | RecordField
  | OptionalField
  | NullableField
  | EntityField
  | ContainerField;

export type FieldShape = { readonly [attribute: string]: FieldType };

export type PrimValue<P extends PrimName> = P extends "string"
  ? string
  : P extends "boolean"
    ? boolean
    : number;

export type FieldValue<F extends FieldType> =
  F extends PrimField<infer P extends PrimName>
    ? PrimValue<P>
    : F extends ListField<infer I extends FieldType>
      ? FieldValue<I>[]
      : F extends RecordField<infer I extends FieldType>
        ? Record<string, FieldValue<I>>
        : F extends OptionalField<infer I extends FieldType>
          ? FieldValue<I> | undefined
          : F extends NullableField<infer I extends FieldType>
            ? FieldValue<I> | null
            : F extends EntityField
              ? Entity
              : F extends ContainerField
                ? Container
                : never;

/** Fields that may be left out when creating an entity */
type OmittableField = OptionalField | ContainerField | { readonly default: unknown };

type RequiredKeys<S extends FieldShape> = {
  [K in keyof S]: S[K] extends OmittableField ? never : K;
}[keyof S];

type OmittableKeys<S extends FieldShape> = Exclude<keyof S, RequiredKeys<S>>;

export type EntityInput<S extends FieldShape> = {
  name: string;
  isactive?: boolean;
} & { [K in RequiredKeys<S>]: FieldValue<S[K]> } & {
  [K in OmittableKeys<S>]?: FieldValue<S[K]>;
};

export type EntityPatch<S extends FieldShape> = {
  isactive?: boolean;
} & { [K in keyof S]?: FieldValue<S[K]> };

export interface KindSchema<S extends FieldShape = FieldShape> {
  /** The `type` discriminator */
  readonly name: string;
  readonly parent: KindSchema | undefined;
  /** Inherited fields first, then own fields, in declaration order */
  readonly fields: S;
}

export const BUILTIN_ATTRIBUTES = ["name", "isactive"] as const;
export const TYPE_KEY = "type";
export const REF_KEY = "$ref";
/** Discriminator of a top-level container form; not usable as a kind name */
export const CONTAINER_TYPE = "Container";
export const RESERVED_ATTRIBUTES: readonly string[] = [
  ...BUILTIN_ATTRIBUTES,
  TYPE_KEY,
  REF_KEY,
];
