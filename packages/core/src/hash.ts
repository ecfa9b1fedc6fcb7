import { md5 } from "js-md5";
import { setEntry, type PlainValue } from "./plain/index.js";

const isPrimitive = (value: PlainValue): value is string | number | boolean | null =>
  typeof value === "string" ||
  typeof value === "number" ||
  typeof value === "boolean" ||
  value === null;

/**
 * Recursively sort object keys for canonical serialization.
 * This ensures {a:1, b:2} and {b:2, a:1} produce the same hash.
 * Sequences keep their order.
 */
export const canonicalize = (value: PlainValue): PlainValue => {
  if (isPrimitive(value)) return value;
  if (Array.isArray(value)) return value.map(canonicalize);
  const sorted: Record<string, PlainValue> = {};
  for (const key of Object.keys(value).sort()) {
    setEntry(sorted, key, canonicalize(value[key]));
  }
  return sorted;
};

export type Fingerprint = string & { __fingerprint?: true };

export const fingerprint = (value: PlainValue): Fingerprint => {
  return md5(JSON.stringify(canonicalize(value)));
};
