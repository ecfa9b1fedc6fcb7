import { z } from "zod";

/**
 * A value that survives JSON/YAML interchange unchanged.
 */
export type PlainValue =
  | string
  | number
  | boolean
  | null
  | PlainValue[]
  | { [key: string]: PlainValue };

export type PlainObject = { [key: string]: PlainValue };

export const PlainValue: z.ZodType<PlainValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(PlainValue),
    z.record(z.string(), PlainValue),
  ])
);

export const isPlainValue = (value: unknown): value is PlainValue =>
  PlainValue.safeParse(value).success;

/** Object literals, JSON/YAML mappings and null-prototype objects */
export const isPlainObject = (
  value: unknown
): value is Record<string, unknown> => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * Add an own key. Plain assignment would treat "__proto__" as the
 * prototype setter and drop the entry.
 */
export const setEntry = <V>(target: Record<string, V>, key: string, value: V): void => {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
};
