import { err, ok, Result } from "@graphform/core/result";
import { GraphError, typeMismatch, unwrap } from "@graphform/core/errors";
import { Container, Entity, isEntityOf } from "@graphform/core/entity";
import type { FieldShape, KindRegistry, KindSchema } from "@graphform/core/schema";
import { describeValue } from "@graphform/core/schema";
import {
  loadConfiguration,
  SerializerConfiguration,
  SerializerConfigurationInput,
} from "@graphform/core/configuration";
import { createLogger, Logger } from "@graphform/core/logging";
import { serializeGraph } from "./serializeGraph.js";
import { deserializeGraph } from "./deserializeGraph.js";
import { structurallyEqual } from "./equality.js";
import { parseForm, stringifyForm } from "./codec.js";
import type { DeserializeContext, SerializedForm, TextFormat } from "./types.js";

/**
 * Converts entity graphs to plain forms and back, against one registry of
 * kinds and one configuration.
 */
export class Serializer {
  public readonly config: SerializerConfiguration;
  private logger: Logger;

  /**
   * @throws GraphformError when the configuration is invalid
   */
  constructor(
    public readonly registry: KindRegistry,
    config: SerializerConfigurationInput = {}
  ) {
    this.config = unwrap(loadConfiguration(config));
    this.logger = createLogger("serializer", this.config.debug ? { level: "debug" } : {});
  }

  private get ctx(): DeserializeContext {
    return { config: this.config, logger: this.logger, registry: this.registry };
  }

  serialize(root: Entity | Container): Result<SerializedForm, GraphError> {
    return serializeGraph(root, this.ctx);
  }

  /**
   * Rebuild whatever the form holds. `expectedKind` is the entity kind,
   * or for a container form its item kind.
   */
  deserialize(
    form: unknown,
    expectedKind?: string
  ): Result<Entity | Container, GraphError> {
    return deserializeGraph(form, expectedKind, this.ctx);
  }

  deserializeEntity(form: unknown, expectedKind?: string): Result<Entity, GraphError> {
    const result = this.deserialize(form, expectedKind);
    if (!result.success) return result;
    if (result.data instanceof Entity) return ok(result.data);
    return err(typeMismatch("#", "type", "entity", describeValue(result.data)));
  }

  deserializeContainer(
    form: unknown,
    expectedKind?: string
  ): Result<Container, GraphError> {
    const result = this.deserialize(form, expectedKind);
    if (!result.success) return result;
    if (result.data instanceof Container) return ok(result.data);
    return err(typeMismatch("#", "type", "container", describeValue(result.data)));
  }

  /**
   * Typed variant of deserializeEntity for a known kind.
   */
  deserializeAs<S extends FieldShape>(
    form: unknown,
    kind: KindSchema<S>
  ): Result<Entity<S>, GraphError> {
    const result = this.deserializeEntity(form, kind.name);
    if (!result.success) return result;
    if (isEntityOf(result.data, kind)) return ok(result.data);
    return err(typeMismatch("#", "type", kind.name, result.data.type));
  }

  equals(a: Entity | Container, b: Entity | Container): Result<boolean, GraphError> {
    return structurallyEqual(a, b, this.ctx);
  }

  toText(root: Entity | Container, format: TextFormat = "json"): Result<string, GraphError> {
    const form = this.serialize(root);
    if (!form.success) return form;
    return ok(stringifyForm(form.data, format));
  }

  fromText(
    text: string,
    format: TextFormat = "json",
    expectedKind?: string
  ): Result<Entity | Container, GraphError> {
    const form = parseForm(text, format);
    if (!form.success) return form;
    return this.deserialize(form.data, expectedKind);
  }
}
