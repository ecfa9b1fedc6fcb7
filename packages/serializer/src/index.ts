// Re-export public API
export { Serializer } from "./Serializer.js";
export { serializeGraph } from "./serializeGraph.js";
export { deserializeGraph } from "./deserializeGraph.js";
export { structurallyEqual } from "./equality.js";
export { parseForm, stringifyForm } from "./codec.js";
export { createMarker, isReferenceMarker } from "./references.js";
export type {
  DeserializeContext,
  ReferenceMarker,
  SerializedForm,
  TextFormat,
  TraversalContext,
} from "./types.js";
