import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { err, ok, Result } from "@graphform/core/result";
import { invalidDocument, InvalidDocumentError } from "@graphform/core/errors";
import { isPlainValue, PlainValue } from "@graphform/core/plain";
import type { TextFormat } from "./types.js";

export function stringifyForm(form: PlainValue, format: TextFormat = "json"): string {
  if (format === "yaml") {
    return stringifyYaml(form);
  }
  return JSON.stringify(form, null, 2);
}

/**
 * Decode text into a plain serialized value. Anything the text decodes to
 * beyond plain values (YAML tags, anchors to non-plain nodes) is rejected.
 */
export function parseForm(
  text: string,
  format: TextFormat = "json"
): Result<PlainValue, InvalidDocumentError> {
  let decoded: unknown;
  try {
    decoded = format === "yaml" ? parseYaml(text) : JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(invalidDocument(`Cannot parse ${format}: ${reason}`));
  }

  // returned as decoded, so own "__proto__" keys stay data
  if (!isPlainValue(decoded)) {
    return err(invalidDocument(`Decoded ${format} is not a plain value`));
  }
  return ok(decoded);
}
