import { checkNonEmptyString } from "../validation/index.js";
import { PlainValue } from "../plain/index.js";
import { checkFieldValue } from "./validate.js";
import {
  CONTAINER_TYPE,
  FieldShape,
  FieldType,
  KindSchema,
  RESERVED_ATTRIBUTES,
} from "./types.js";

const checkDefault = (kind: string, attribute: string, field: FieldType) => {
  if (!("default" in field) || field.default === undefined) return;

  if (!PlainValue.safeParse(field.default).success) {
    throw new Error(
      `Default of ${kind}.${attribute} must be a plain JSON-compatible value`
    );
  }
  const checked = checkFieldValue(field, field.default, [attribute], attribute);
  if (!checked.success) {
    throw new Error(`Invalid default for ${kind}.${attribute}: ${checked.error.message}`);
  }
};

/**
 * Declare an entity kind. Definition mistakes (reserved or shadowed
 * attribute names, ill-typed defaults) throw, since they are programming
 * errors rather than data errors.
 */
export function defineKind<S extends FieldShape>(
  name: string,
  fields: S
): KindSchema<S>;
export function defineKind<P extends FieldShape, S extends FieldShape>(
  name: string,
  fields: S,
  parent: KindSchema<P>
): KindSchema<P & S>;
export function defineKind(
  name: string,
  fields: FieldShape,
  parent?: KindSchema
): KindSchema {
  const checkedName = checkNonEmptyString(name, "kind name");
  if (!checkedName.success) {
    throw new Error(checkedName.error.message);
  }
  if (name === CONTAINER_TYPE) {
    throw new Error(`"${CONTAINER_TYPE}" is reserved and cannot name a kind`);
  }

  for (const [attribute, field] of Object.entries(fields)) {
    if (RESERVED_ATTRIBUTES.includes(attribute)) {
      throw new Error(`Attribute "${attribute}" of kind ${name} is reserved`);
    }
    if (parent && Object.hasOwn(parent.fields, attribute)) {
      throw new Error(
        `Attribute "${attribute}" of kind ${name} shadows an attribute of ${parent.name}`
      );
    }
    checkDefault(name, attribute, field);
  }

  return Object.freeze({
    name,
    parent,
    fields: Object.freeze({ ...parent?.fields, ...fields }),
  });
}

/**
 * Whether `kind` is `name` or inherits from it.
 */
export const isKindOf = (kind: KindSchema, name: string): boolean => {
  for (let current: KindSchema | undefined = kind; current; current = current.parent) {
    if (current.name === name) return true;
  }
  return false;
};
