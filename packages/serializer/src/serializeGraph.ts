import { err, ok, Result } from "@graphform/core/result";
import { formatJsonPointer, JsonPointer } from "@graphform/core/json-pointer";
import {
  cyclicReference,
  GraphError,
  nodeLimitExceeded,
  typeMismatch,
} from "@graphform/core/errors";
import { Container, Entity } from "@graphform/core/entity";
import { isPlainObject, PlainObject, PlainValue, setEntry } from "@graphform/core/plain";
import {
  CONTAINER_TYPE,
  describeFieldType,
  describeValue,
  FieldType,
  isPrimValue,
  TYPE_KEY,
} from "@graphform/core/schema";
import { createMarker } from "./references.js";
import { keepsKeyOrder, ORDER_KEY } from "./containerForm.js";
import type { SerializedForm, TraversalContext } from "./types.js";

type GraphNode = Entity | Container;

type Put = (value: PlainValue) => void;

const isFormObject = (value: PlainValue | undefined): value is PlainObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

type Task =
  | {
      kind: "value";
      field: FieldType;
      value: unknown;
      path: JsonPointer;
      attribute: string;
      put: Put;
    }
  | { kind: "leave"; node: GraphNode; pointer: string; finish?: () => void };

/**
 * Serialize an entity or container into a plain form.
 *
 * Depth-first walk over an explicit stack. Two maps keep track of objects:
 * `onPath` holds the objects currently being serialized (cycle breaking),
 * `completed` the ones already fully emitted (shared-object dedup).
 * Both map an object to the pointer of its first occurrence.
 */
export function serializeGraph(
  root: GraphNode,
  ctx: TraversalContext
): Result<SerializedForm, GraphError> {
  const { config, logger } = ctx;
  const onPath = new Map<GraphNode, string>();
  const completed = new Map<GraphNode, string>();
  const stack: Task[] = [];
  let visited = 0;
  let markers = 0;

  // Opens a node; returns an error or undefined
  const enter = (
    node: GraphNode,
    path: JsonPointer,
    put: Put
  ): GraphError | undefined => {
    const pointer = formatJsonPointer(path);

    const openAt = onPath.get(node);
    if (openAt !== undefined) {
      if (config.cycles === "error") {
        return cyclicReference(pointer, openAt);
      }
      logger.debug(`cycle at ${pointer} broken with a reference to ${openAt}`);
      markers++;
      put(createMarker(openAt));
      return undefined;
    }

    const doneAt = completed.get(node);
    if (doneAt !== undefined && config.sharedReferences === "reference") {
      markers++;
      put(createMarker(doneAt));
      return undefined;
    }

    visited++;
    if (visited > config.maxNodes) {
      return nodeLimitExceeded(pointer, config.maxNodes);
    }
    onPath.set(node, pointer);

    const out: PlainObject = {};
    put(out);

    if (node instanceof Container) {
      // Top-level containers are wrapped so they carry a discriminator.
      // Nested ones are wrapped only when a mapping would reorder their names.
      const names = node.names();
      const ordered = keepsKeyOrder(names);
      let items = out;
      let itemPath = path;
      if (path.length === 0 || !ordered) {
        items = {};
        itemPath = [...path, "items"];
        out[TYPE_KEY] = CONTAINER_TYPE;
        out.kind = node.kind;
        if (path.length === 0 && node.duplicates !== "reject") {
          out.duplicates = node.duplicates;
        }
        if (!ordered) {
          out[ORDER_KEY] = names;
        }
        out.items = items;
      }
      stack.push({ kind: "leave", node, pointer });
      const entries = node.entries();
      for (let i = entries.length - 1; i >= 0; i--) {
        const [name, entity] = entries[i];
        stack.push({
          kind: "value",
          field: { kind: "entity", of: node.kind },
          value: entity,
          path: [...itemPath, name],
          attribute: name,
          put: (value) => {
            setEntry(items, name, value);
          },
        });
      }
      return undefined;
    }

    out.name = node.name;
    out.isactive = node.isActive;
    stack.push({
      kind: "leave",
      node,
      pointer,
      finish: () => {
        out[TYPE_KEY] = node.type;
      },
    });
    const attributes = node.attributes();
    for (let i = attributes.length - 1; i >= 0; i--) {
      const [key, value] = attributes[i];
      stack.push({
        kind: "value",
        field: node.kind.fields[key],
        value,
        path: [...path, key],
        attribute: key,
        put: (serialized) => {
          setEntry(out, key, serialized);
        },
      });
    }
    return undefined;
  };

  const mismatch = (task: {
    field: FieldType;
    value: unknown;
    path: JsonPointer;
    attribute: string;
  }) =>
    typeMismatch(
      formatJsonPointer(task.path),
      task.attribute,
      describeFieldType(task.field),
      describeValue(task.value)
    );

  const output: { root?: PlainValue } = {};
  const rootError = enter(root, [], (value) => {
    output.root = value;
  });
  if (rootError) return err(rootError);

  for (let task = stack.pop(); task; task = stack.pop()) {
    if (task.kind === "leave") {
      task.finish?.();
      onPath.delete(task.node);
      completed.set(task.node, task.pointer);
      continue;
    }

    const { field, value, path, put } = task;
    switch (field.kind) {
      case "prim":
        if (!isPrimValue(field.prim, value)) return err(mismatch(task));
        put(value);
        break;
      case "optional":
        if (value !== undefined) {
          stack.push({ ...task, field: field.inner });
        }
        break;
      case "nullable":
        if (value === null) {
          put(null);
        } else {
          stack.push({ ...task, field: field.inner });
        }
        break;
      case "list": {
        if (!Array.isArray(value)) return err(mismatch(task));
        const items: PlainValue[] = new Array<PlainValue>(value.length).fill(null);
        put(items);
        for (let i = value.length - 1; i >= 0; i--) {
          stack.push({
            ...task,
            field: field.items,
            value: value[i],
            path: [...path, String(i)],
            put: (item) => {
              items[i] = item;
            },
          });
        }
        break;
      }
      case "record": {
        if (!isPlainObject(value)) return err(mismatch(task));
        const entries: PlainObject = {};
        put(entries);
        const pairs = Object.entries(value);
        for (let i = pairs.length - 1; i >= 0; i--) {
          const [key, item] = pairs[i];
          stack.push({
            ...task,
            field: field.values,
            value: item,
            path: [...path, key],
            put: (serialized) => {
              setEntry(entries, key, serialized);
            },
          });
        }
        break;
      }
      case "entity": {
        if (!(value instanceof Entity) || !value.isKindOf(field.of)) {
          return err(mismatch(task));
        }
        const error = enter(value, path, put);
        if (error) return err(error);
        break;
      }
      case "container": {
        if (!(value instanceof Container) || value.kind !== field.of) {
          return err(mismatch(task));
        }
        const error = enter(value, path, put);
        if (error) return err(error);
        break;
      }
    }
  }

  logger.debug(`serialized ${visited} nodes with ${markers} references`);

  if (!isFormObject(output.root)) {
    throw new Error("Serialization produced no root object");
  }
  return ok(output.root);
}
