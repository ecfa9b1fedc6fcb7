import { err, ok, Result } from "../result/result.js";
import { formatJsonPointer, JsonPointer } from "../json-pointer/index.js";
import {
  AttributeError,
  immutableAttribute,
  typeMismatch,
  TypeMismatchError,
} from "../errors/index.js";
import { checkNonEmptyString } from "../validation/index.js";
import { isKindOf } from "../schema/defineKind.js";
import {
  checkFieldValue,
  copyFieldValue,
  describeValue,
  isFieldValue,
} from "../schema/validate.js";
import type {
  EntityInput,
  EntityPatch,
  FieldShape,
  FieldType,
  FieldValue,
  KindSchema,
} from "../schema/types.js";
import { Container } from "./Container.js";

/**
 * Value an attribute takes when it is left out at construction.
 */
const initialValue = (field: FieldType): unknown => {
  if (field.kind === "container") {
    return new Container(field.of, { duplicates: field.duplicates });
  }
  if ("default" in field && field.default !== undefined) {
    return copyFieldValue(field.default);
  }
  return undefined;
};

/**
 * A named record of a declared kind. Every attribute it holds satisfies
 * the type its kind declares.
 */
export class Entity<S extends FieldShape = FieldShape> {
  private readonly values = new Map<string, unknown>();
  private active: boolean;
  private owner: Container | undefined;

  private constructor(
    public readonly kind: KindSchema<S>,
    public readonly name: string,
    active: boolean
  ) {
    this.active = active;
  }

  static create<S extends FieldShape>(
    kind: KindSchema<S>,
    input: EntityInput<S>
  ): Result<Entity<S>, AttributeError> {
    return Entity.fromRecord(kind, new Map<string, unknown>(Object.entries(input)));
  }

  /**
   * Untyped construction from attribute entries.
   */
  static fromRecord<S extends FieldShape>(
    kind: KindSchema<S>,
    input: ReadonlyMap<string, unknown>
  ): Result<Entity<S>, AttributeError> {
    const name = checkNonEmptyString(input.get("name"), "name", "#/name");
    if (!name.success) return name;

    const active = input.get("isactive") ?? true;
    if (typeof active !== "boolean") {
      return err(typeMismatch("#/isactive", "isactive", "boolean", describeValue(active)));
    }

    for (const key of input.keys()) {
      if (key !== "name" && key !== "isactive" && !Object.hasOwn(kind.fields, key)) {
        return err(
          typeMismatch(formatJsonPointer([key]), key, "undeclared", describeValue(input.get(key)))
        );
      }
    }

    const entity = new Entity(kind, name.data, active);
    for (const [key, field] of Object.entries(kind.fields)) {
      const value = input.has(key) ? input.get(key) : initialValue(field);
      const checked = checkFieldValue(field, value, [key], key);
      if (!checked.success) return checked;
      if (value !== undefined) {
        // the caller keeps no handle on stored lists and records
        entity.values.set(key, copyFieldValue(value));
      }
    }
    return ok(entity);
  }

  /**
   * Allocate an entity whose attributes are filled in afterwards through
   * `assign`, then checked with `validate`.
   * @internal
   */
  static allocate(kind: KindSchema, name: string, active: boolean): Entity {
    return new Entity(kind, name, active);
  }

  get type(): string {
    return this.kind.name;
  }

  get isActive(): boolean {
    return this.active;
  }

  /**
   * The container that owns this entity, if any.
   */
  get container(): Container | undefined {
    return this.owner;
  }

  isKindOf(name: string): boolean {
    return isKindOf(this.kind, name);
  }

  /**
   * Lists and records come back as copies; changing them does not change
   * the entity.
   */
  get<K extends keyof S & string>(attribute: K): FieldValue<S[K]> {
    if (Object.hasOwn(this.kind.fields, attribute)) {
      const value = copyFieldValue(this.values.get(attribute));
      if (isFieldValue(this.kind.fields[attribute], value)) {
        return value;
      }
    }
    throw new Error(`Entity "${this.name}" holds no valid "${attribute}"`);
  }

  /**
   * Untyped read of a declared attribute.
   */
  read(attribute: string): unknown {
    return copyFieldValue(this.values.get(attribute));
  }

  /**
   * Present declared attributes, in schema order.
   */
  attributes(): [string, unknown][] {
    const entries: [string, unknown][] = [];
    for (const key of Object.keys(this.kind.fields)) {
      if (this.values.has(key)) {
        entries.push([key, copyFieldValue(this.values.get(key))]);
      }
    }
    return entries;
  }

  /**
   * Validate the whole patch, then apply it. On failure nothing changes.
   */
  update(patch: EntityPatch<S>): Result<void, AttributeError> {
    const staged = new Map<string, unknown>();
    let active = this.active;

    for (const [key, value] of Object.entries(patch)) {
      if (key === "name") {
        return err(immutableAttribute(key));
      }
      if (key === "isactive") {
        if (typeof value !== "boolean") {
          return err(typeMismatch("#/isactive", key, "boolean", describeValue(value)));
        }
        active = value;
        continue;
      }
      if (!Object.hasOwn(this.kind.fields, key)) {
        return err(
          typeMismatch(formatJsonPointer([key]), key, "undeclared", describeValue(value))
        );
      }
      const field = this.kind.fields[key];
      const checked = checkFieldValue(field, value, [key], key);
      if (!checked.success) return checked;
      staged.set(key, copyFieldValue(value));
    }

    this.active = active;
    for (const [key, value] of staged) {
      if (value === undefined) {
        this.values.delete(key);
      } else {
        this.values.set(key, value);
      }
    }
    return ok(undefined);
  }

  activate(): void {
    this.active = true;
  }

  deactivate(): void {
    this.active = false;
  }

  /**
   * Set an attribute without checking it.
   * @internal
   */
  assign(attribute: string, value: unknown): void {
    this.values.set(attribute, value);
  }

  /**
   * Check every declared attribute against its type.
   */
  validate(path: JsonPointer = []): Result<void, TypeMismatchError> {
    for (const [key, field] of Object.entries(this.kind.fields)) {
      const checked = checkFieldValue(field, this.values.get(key), [...path, key], key);
      if (!checked.success) return checked;
    }
    return ok(undefined);
  }

  /** @internal */
  attach(container: Container): void {
    this.owner = container;
  }

  /** @internal */
  detach(): void {
    this.owner = undefined;
  }
}

export const isEntityOf = <S extends FieldShape>(
  entity: Entity,
  kind: KindSchema<S>
): entity is Entity<S> => entity.isKindOf(kind.name);
