import { isPlainObject } from "@graphform/core/plain";
import { REF_KEY } from "@graphform/core/schema";
import type { ReferenceMarker } from "./types.js";

export const createMarker = (pointer: string): ReferenceMarker => ({
  [REF_KEY]: pointer,
});

/**
 * A marker is a mapping whose only key is "$ref", holding a string.
 */
export function isReferenceMarker(value: unknown): value is ReferenceMarker {
  if (!isPlainObject(value)) return false;
  const keys = Object.keys(value);
  return keys.length === 1 && keys[0] === REF_KEY && typeof value[REF_KEY] === "string";
}
