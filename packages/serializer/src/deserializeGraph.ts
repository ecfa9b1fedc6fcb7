import { err, ok, Result } from "@graphform/core/result";
import { formatJsonPointer, JsonPointer } from "@graphform/core/json-pointer";
import {
  GraphError,
  nodeLimitExceeded,
  typeMismatch,
} from "@graphform/core/errors";
import { Container, Entity } from "@graphform/core/entity";
import { isPlainObject, setEntry } from "@graphform/core/plain";
import { checkNonEmptyString } from "@graphform/core/validation";
import {
  CONTAINER_TYPE,
  copyFieldValue,
  describeFieldType,
  describeValue,
  DuplicatePolicy,
  FieldType,
  isKindOf,
  parsePrim,
  TYPE_KEY,
} from "@graphform/core/schema";
import { isReferenceMarker } from "./references.js";
import { ContainerLayout, readContainerLayout } from "./containerForm.js";
import {
  LocatedObjects,
  PendingReference,
  resolveReferences,
} from "./resolveReferences.js";
import type { DeserializeContext } from "./types.js";

type Task = {
  field: FieldType;
  value: unknown;
  path: JsonPointer;
  attribute: string;
  /** Key under which a container holds the entity */
  nameHint?: string;
  put: (value: unknown) => void;
};

type ContainerSlots = {
  container: Container;
  names: string[];
  itemPath: JsonPointer;
  slots: unknown[];
};

const BUILTIN_KEYS = new Set(["name", "isactive", TYPE_KEY]);

const DUPLICATE_POLICIES: readonly string[] = ["reject", "overwrite"] satisfies DuplicatePolicy[];

const isDuplicatePolicy = (value: unknown): value is DuplicatePolicy =>
  typeof value === "string" && DUPLICATE_POLICIES.includes(value);

/**
 * Rebuild an entity or container from its serialized form.
 *
 * The first pass walks the form over an explicit stack, allocating every
 * entity and container and recording where each one sits. Markers are
 * queued and patched in a second pass, once every target exists. Container
 * membership is applied last so slot order survives the patching.
 */
export function deserializeGraph(
  form: unknown,
  expectedKind: string | undefined,
  ctx: DeserializeContext
): Result<Entity | Container, GraphError> {
  const { config, logger, registry } = ctx;
  const located: LocatedObjects = new Map();
  const pending: PendingReference[] = [];
  const containers: ContainerSlots[] = [];
  const rebuilt: { entity: Entity; path: JsonPointer }[] = [];
  const stack: Task[] = [];
  let allocated = 0;

  const output: { root?: unknown } = {};
  const putRoot = (value: unknown) => {
    output.root = value;
  };

  const count = (path: JsonPointer): GraphError | undefined => {
    allocated++;
    if (allocated > config.maxNodes) {
      return nodeLimitExceeded(formatJsonPointer(path), config.maxNodes);
    }
    return undefined;
  };

  const mismatch = (task: Task) =>
    typeMismatch(
      formatJsonPointer(task.path),
      task.attribute,
      describeFieldType(task.field),
      describeValue(task.value)
    );

  const openContainer = (
    container: Container,
    { items, names }: ContainerLayout,
    path: JsonPointer,
    itemPath: JsonPointer
  ): GraphError | undefined => {
    const limit = count(path);
    if (limit) return limit;

    located.set(formatJsonPointer(path), container);
    const slots: unknown[] = [];
    containers.push({ container, names, itemPath, slots });

    for (let i = names.length - 1; i >= 0; i--) {
      const name = names[i];
      stack.push({
        field: { kind: "entity", of: container.kind },
        value: items[name],
        path: [...itemPath, name],
        attribute: name,
        nameHint: name,
        put: (entity) => {
          slots[i] = entity;
        },
      });
    }
    return undefined;
  };

  const openEntity = (
    task: Task,
    of: string,
    form: Record<string, unknown>
  ): GraphError | undefined => {
    const { path } = task;
    const pointer = formatJsonPointer(path);

    let typeName = of;
    const discriminator = form[TYPE_KEY];
    if (discriminator !== undefined) {
      if (typeof discriminator !== "string") {
        return typeMismatch(
          formatJsonPointer([...path, TYPE_KEY]),
          TYPE_KEY,
          "string",
          describeValue(discriminator)
        );
      }
      typeName = discriminator;
    }

    const kind = registry.resolve(typeName, pointer);
    if (!kind.success) return kind.error;
    if (!isKindOf(kind.data, of)) {
      return typeMismatch(pointer, task.attribute, `entity<${of}>`, `entity<${typeName}>`);
    }

    const name = checkNonEmptyString(
      form.name ?? task.nameHint,
      "name",
      formatJsonPointer([...path, "name"])
    );
    if (!name.success) return name.error;
    if (task.nameHint !== undefined && name.data !== task.nameHint) {
      return typeMismatch(
        formatJsonPointer([...path, "name"]),
        "name",
        JSON.stringify(task.nameHint),
        JSON.stringify(name.data)
      );
    }

    let active = true;
    if (form.isactive !== undefined) {
      const parsed = parsePrim("boolean", form.isactive, config.coerce);
      if (!parsed.success) {
        return typeMismatch(
          formatJsonPointer([...path, "isactive"]),
          "isactive",
          "boolean",
          parsed.error
        );
      }
      active = parsed.data;
    }

    const limit = count(path);
    if (limit) return limit;

    const entity = Entity.allocate(kind.data, name.data, active);
    located.set(pointer, entity);
    rebuilt.push({ entity, path });
    task.put(entity);

    const fields = kind.data.fields;
    for (const [key, value] of Object.entries(form)) {
      if (BUILTIN_KEYS.has(key) || Object.hasOwn(fields, key)) continue;
      if (config.unknownAttributes === "error") {
        return typeMismatch(
          formatJsonPointer([...path, key]),
          key,
          "undeclared",
          describeValue(value)
        );
      }
      logger.warn(`ignoring undeclared attribute "${key}" of ${typeName} at ${pointer}`);
    }

    const declared = Object.entries(fields);
    for (let i = declared.length - 1; i >= 0; i--) {
      const [key, field] = declared[i];
      const value = form[key];
      const fieldPath = [...path, key];

      if (value === undefined) {
        if (field.kind === "container") {
          entity.assign(key, new Container(field.of, { duplicates: field.duplicates }));
        } else if ("default" in field && field.default !== undefined) {
          entity.assign(key, copyFieldValue(field.default));
        } else if (field.kind !== "optional") {
          return typeMismatch(
            formatJsonPointer(fieldPath),
            key,
            describeFieldType(field),
            "undefined"
          );
        }
        continue;
      }

      stack.push({
        field,
        value,
        path: fieldPath,
        attribute: key,
        put: (attribute) => {
          entity.assign(key, attribute);
        },
      });
    }
    return undefined;
  };

  // Root
  if (isPlainObject(form) && form[TYPE_KEY] === CONTAINER_TYPE) {
    const kind = form.kind;
    if (typeof kind !== "string") {
      return err(typeMismatch("#/kind", "kind", "string", describeValue(kind)));
    }
    const resolved = registry.resolve(kind, "#/kind");
    if (!resolved.success) return resolved;
    if (expectedKind !== undefined && !isKindOf(resolved.data, expectedKind)) {
      return err(
        typeMismatch("#/kind", "kind", `container<${expectedKind}>`, `container<${kind}>`)
      );
    }
    const duplicates = form.duplicates ?? "reject";
    if (!isDuplicatePolicy(duplicates)) {
      return err(
        typeMismatch("#/duplicates", "duplicates", `"reject" | "overwrite"`, describeValue(duplicates))
      );
    }
    const layout = readContainerLayout(form, [], kind);
    if (!layout.success) return layout;
    const container = new Container(kind, { duplicates });
    putRoot(container);
    const error = openContainer(container, layout.data, [], ["items"]);
    if (error) return err(error);
  } else {
    const rootKind =
      expectedKind ?? (isPlainObject(form) ? form[TYPE_KEY] : undefined);
    if (typeof rootKind !== "string") {
      return err(typeMismatch("#/type", TYPE_KEY, "string", describeValue(rootKind)));
    }
    stack.push({
      field: { kind: "entity", of: rootKind },
      value: form,
      path: [],
      attribute: rootKind,
      put: putRoot,
    });
  }

  for (let task = stack.pop(); task; task = stack.pop()) {
    const { field, value, path, put } = task;

    switch (field.kind) {
      case "prim": {
        const parsed = parsePrim(field.prim, value, config.coerce);
        if (!parsed.success) return err(mismatch(task));
        put(parsed.data);
        break;
      }
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
        const items: unknown[] = new Array<unknown>(value.length);
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
        const entries: Record<string, unknown> = {};
        put(entries);
        const pairs = Object.entries(value);
        for (let i = pairs.length - 1; i >= 0; i--) {
          const [key, item] = pairs[i];
          // keep key order even though values arrive later
          setEntry(entries, key, undefined);
          stack.push({
            ...task,
            field: field.values,
            value: item,
            path: [...path, key],
            put: (converted) => {
              setEntry(entries, key, converted);
            },
          });
        }
        break;
      }
      case "entity":
      case "container": {
        if (isReferenceMarker(value)) {
          pending.push({
            ref: value.$ref,
            path: formatJsonPointer(path),
            attribute: task.attribute,
            expected: field,
            put,
          });
          break;
        }
        if (!isPlainObject(value)) return err(mismatch(task));

        if (field.kind === "entity") {
          const error = openEntity(task, field.of, value);
          if (error) return err(error);
          break;
        }
        let layout: ContainerLayout = { items: value, names: Object.keys(value) };
        let itemPath = path;
        if (value[TYPE_KEY] === CONTAINER_TYPE) {
          if (value.kind !== field.of) {
            return err(
              typeMismatch(
                formatJsonPointer([...path, "kind"]),
                "kind",
                field.of,
                typeof value.kind === "string" ? value.kind : describeValue(value.kind)
              )
            );
          }
          const wrapped = readContainerLayout(value, path, field.of);
          if (!wrapped.success) return wrapped;
          layout = wrapped.data;
          itemPath = [...path, "items"];
        }
        const container = new Container(field.of, { duplicates: field.duplicates });
        put(container);
        const error = openContainer(container, layout, path, itemPath);
        if (error) return err(error);
        break;
      }
    }
  }

  const resolved = resolveReferences(pending, located, logger);
  if (!resolved.success) return resolved;

  for (const { container, names, itemPath, slots } of containers) {
    for (let i = 0; i < slots.length; i++) {
      const entity = slots[i];
      if (!(entity instanceof Entity)) {
        throw new Error(`Unfilled slot in container<${container.kind}>`);
      }
      // a marker in a slot must still land under its own name
      if (entity.name !== names[i]) {
        return err(
          typeMismatch(
            formatJsonPointer([...itemPath, names[i]]),
            "name",
            JSON.stringify(names[i]),
            JSON.stringify(entity.name)
          )
        );
      }
      const added = container.add(entity);
      if (!added.success) return added;
    }
  }

  for (const { entity, path } of rebuilt) {
    const checked = entity.validate(path);
    if (!checked.success) return checked;
  }

  logger.debug(
    `rebuilt ${allocated} nodes, patched ${pending.length} references`
  );

  const root = output.root;
  if (root instanceof Entity || root instanceof Container) {
    return ok(root);
  }
  throw new Error("Deserialization produced no root object");
}
