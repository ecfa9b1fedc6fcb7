import type { SerializerConfiguration } from "@graphform/core/configuration";
import type { Logger } from "@graphform/core/logging";
import type { KindRegistry } from "@graphform/core/schema";
import type { PlainObject } from "@graphform/core/plain";

// Internal context shared by the graph walkers
export interface TraversalContext {
  config: SerializerConfiguration;
  logger: Logger;
}

export interface DeserializeContext extends TraversalContext {
  registry: KindRegistry;
}

/** Serialized form of an entity or a top-level container */
export type SerializedForm = PlainObject;

/** Stands in for an object that was already emitted elsewhere in the form */
export type ReferenceMarker = { $ref: string };

export type TextFormat = "json" | "yaml";
