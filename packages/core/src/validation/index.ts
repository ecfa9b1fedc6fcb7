import { err, ok, Result } from "../result/result.js";
import { typeMismatch, TypeMismatchError } from "../errors/index.js";

const describeActual = (value: unknown): string => {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
};

/**
 * Accepts strings with at least one non-whitespace character.
 */
export function checkNonEmptyString(
  value: unknown,
  label: string,
  path = "#"
): Result<string, TypeMismatchError> {
  if (typeof value !== "string") {
    return err(typeMismatch(path, label, "non-empty string", describeActual(value)));
  }
  if (value.trim() === "") {
    return err(typeMismatch(path, label, "non-empty string", "empty string"));
  }
  return ok(value);
}
