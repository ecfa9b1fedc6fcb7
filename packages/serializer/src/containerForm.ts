import { err, ok, Result } from "@graphform/core/result";
import { formatJsonPointer, JsonPointer } from "@graphform/core/json-pointer";
import { typeMismatch, TypeMismatchError } from "@graphform/core/errors";
import { isPlainObject } from "@graphform/core/plain";
import { describeValue } from "@graphform/core/schema";

/** Key of a wrapped container form listing item names in container order */
export const ORDER_KEY = "order";

/**
 * Whether a mapping built from `names` lists its keys in the same order.
 * Integer-like names ("2", "10") are always enumerated first, ascending.
 */
export function keepsKeyOrder(names: readonly string[]): boolean {
  const keys = Object.keys(Object.fromEntries(names.map((name) => [name, null])));
  return keys.every((key, i) => key === names[i]);
}

export interface ContainerLayout {
  items: Record<string, unknown>;
  /** Item names in the order they are added */
  names: string[];
}

const isOrderOf = (value: unknown, keys: readonly string[]): value is string[] => {
  if (!Array.isArray(value) || value.length !== keys.length) return false;
  const expected = new Set(keys);
  const seen = new Set<string>();
  for (const name of value) {
    if (typeof name !== "string" || !expected.has(name) || seen.has(name)) {
      return false;
    }
    seen.add(name);
  }
  return true;
};

/**
 * Items and item order of a wrapped container form sitting at `path`.
 */
export function readContainerLayout(
  form: Record<string, unknown>,
  path: JsonPointer,
  kind: string
): Result<ContainerLayout, TypeMismatchError> {
  const items = form.items ?? {};
  if (!isPlainObject(items)) {
    return err(
      typeMismatch(
        formatJsonPointer([...path, "items"]),
        "items",
        `container<${kind}>`,
        describeValue(items)
      )
    );
  }

  const keys = Object.keys(items);
  const order = form[ORDER_KEY];
  if (order === undefined) {
    return ok({ items, names: keys });
  }
  if (!isOrderOf(order, keys)) {
    return err(
      typeMismatch(
        formatJsonPointer([...path, ORDER_KEY]),
        ORDER_KEY,
        "list of the item names",
        describeValue(order)
      )
    );
  }
  return ok({ items, names: order });
}
