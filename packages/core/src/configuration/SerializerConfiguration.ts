import { z } from "zod";
import { err, ok, Result } from "../result/result.js";
import { invalidDocument, InvalidDocumentError } from "../errors/index.js";

export const SerializerConfiguration = z.object({
  cycles: z
    .enum(["reference", "error"])
    .describe(
      `What to do when an object is met again on its own path: emit a {"$ref"} marker, or fail with cyclicReference`
    )
    .default("reference"),
  sharedReferences: z
    .enum(["copy", "reference"])
    .describe(
      `How to emit an object reached again through another path: serialize it again, or emit a {"$ref"} marker to its first occurrence`
    )
    .default("copy"),
  maxNodes: z
    .number()
    .int()
    .positive()
    .describe(`Upper bound on entities and containers visited in one call`)
    .default(100_000),
  coerce: z
    .boolean()
    .describe(
      `Accept numeric text for number fields and "true"/"false" for boolean fields when deserializing`
    )
    .default(false),
  unknownAttributes: z
    .enum(["ignore", "error"])
    .describe(`What to do with undeclared attributes found in a serialized form`)
    .default("ignore"),
  debug: z
    .boolean()
    .describe(`Enable debug logging of traversal and reference resolution`)
    .default(false),
});

export type SerializerConfiguration = z.infer<typeof SerializerConfiguration>;

export type SerializerConfigurationInput = z.input<typeof SerializerConfiguration>;

export const loadConfiguration = (
  input: unknown = {}
): Result<SerializerConfiguration, InvalidDocumentError> => {
  const parsed = SerializerConfiguration.safeParse(input);
  if (parsed.success) {
    return ok(parsed.data);
  }
  return err(
    invalidDocument(`Invalid serializer configuration:\n${z.prettifyError(parsed.error)}`)
  );
};
