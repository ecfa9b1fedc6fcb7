import { describe, it, expect } from "vitest";
import { Container, Entity } from "@graphform/core/entity";
import { unwrap } from "@graphform/core/errors";
import { isPlainObject } from "@graphform/core/plain";
import { Serializer } from "../src/index.js";
import {
  createDiamond,
  createFriends,
  createRegistry,
  person,
  X,
} from "./utils/kinds.js";

const countMarkers = (value: unknown): number => {
  if (Array.isArray(value)) {
    return value.reduce((sum: number, item) => sum + countMarkers(item), 0);
  }
  if (typeof value === "object" && value !== null) {
    const own = "$ref" in value ? 1 : 0;
    return Object.values(value).reduce((sum: number, item) => sum + countMarkers(item), own);
  }
  return 0;
};

describe("serialize", () => {
  const serializer = new Serializer(createRegistry());

  it("emits builtins, declared attributes, then the discriminator", () => {
    const x = unwrap(Entity.create(X, { name: "x", value: 42 }));
    const form = unwrap(serializer.serialize(x));

    expect(form).toEqual({ name: "x", isactive: true, value: 42, type: "X" });
    expect(Object.keys(form)).toEqual(["name", "isactive", "value", "type"]);
  });

  it("breaks a two-entity cycle with exactly one marker", () => {
    const { alice } = createFriends();
    const form = unwrap(serializer.serialize(alice));

    expect(form).toEqual({
      name: "alice",
      isactive: true,
      age: 0,
      friend: {
        name: "bob",
        isactive: true,
        age: 0,
        friend: { $ref: "#" },
        children: {},
        type: "Person",
      },
      children: {},
      type: "Person",
    });
    expect(countMarkers(form)).toBe(1);
  });

  it("breaks a self reference", () => {
    const solo = person("solo");
    unwrap(solo.update({ friend: solo }));
    const form = unwrap(serializer.serialize(solo));
    expect(form.friend).toEqual({ $ref: "#" });
  });

  it("fails on cycles when configured to", () => {
    const strict = new Serializer(createRegistry(), { cycles: "error" });
    const { alice } = createFriends();

    expect(strict.serialize(alice)).toEqual({
      success: false,
      error: {
        type: "cyclicReference",
        path: "#/friend/friend",
        target: "#",
        message: "Cyclic reference at #/friend/friend back to #",
      },
    });
  });

  it("copies shared entities by default", () => {
    const { pair } = createDiamond();
    const leaf = { name: "d", isactive: true, weight: 1.5, type: "Leaf" };

    expect(unwrap(serializer.serialize(pair))).toEqual({
      name: "p",
      isactive: true,
      a: leaf,
      b: leaf,
      type: "Pair",
    });
  });

  it("refers back to shared entities when configured to", () => {
    const sharing = new Serializer(createRegistry(), { sharedReferences: "reference" });
    const { pair } = createDiamond();

    expect(unwrap(sharing.serialize(pair))).toEqual({
      name: "p",
      isactive: true,
      a: { name: "d", isactive: true, weight: 1.5, type: "Leaf" },
      b: { $ref: "#/a" },
      type: "Pair",
    });
  });

  it("emits container attributes as a mapping of entity forms", () => {
    const parent = person("parent");
    const kid = person("kid");
    unwrap(parent.get("children").add(kid));

    const form = unwrap(serializer.serialize(parent));
    expect(form.children).toEqual({
      kid: { name: "kid", isactive: true, age: 0, children: {}, type: "Person" },
    });
  });

  it("wraps a top-level container", () => {
    const people = new Container("Person", { duplicates: "overwrite" });
    unwrap(people.add(person("a")));
    const form = unwrap(serializer.serialize(people));

    expect(form).toEqual({
      type: "Container",
      kind: "Person",
      duplicates: "overwrite",
      items: {
        a: { name: "a", isactive: true, age: 0, children: {}, type: "Person" },
      },
    });
    expect(Object.keys(form)).toEqual(["type", "kind", "duplicates", "items"]);
  });

  it("keeps a __proto__ name as an ordinary key", () => {
    const people = new Container("Person");
    unwrap(people.add(person("__proto__")));
    unwrap(people.add(person("bob")));

    const items = unwrap(serializer.serialize(people)).items;
    expect(isPlainObject(items) && Object.keys(items)).toEqual(["__proto__", "bob"]);
  });

  it("records the order of names a mapping would reorder", () => {
    const people = new Container("Person");
    for (const name of ["b", "10", "2"]) {
      unwrap(people.add(person(name)));
    }

    const form = unwrap(serializer.serialize(people));
    expect(Object.keys(form)).toEqual(["type", "kind", "order", "items"]);
    expect(form.order).toEqual(["b", "10", "2"]);
  });

  it("wraps a container attribute only when its order needs recording", () => {
    const parent = person("parent");
    unwrap(parent.get("children").add(person("10")));
    unwrap(parent.get("children").add(person("2")));
    const kid = { isactive: true, age: 0, children: {}, type: "Person" };

    expect(unwrap(serializer.serialize(parent)).children).toEqual({
      type: "Container",
      kind: "Person",
      order: ["10", "2"],
      items: {
        "2": { name: "2", ...kid },
        "10": { name: "10", ...kid },
      },
    });

    const sorted = person("sorted");
    unwrap(sorted.get("children").add(person("2")));
    unwrap(sorted.get("children").add(person("10")));
    expect(unwrap(serializer.serialize(sorted)).children).toEqual({
      "2": { name: "2", ...kid },
      "10": { name: "10", ...kid },
    });
  });

  it("points markers inside a top-level container at its items", () => {
    const people = new Container("Person");
    const a = person("a");
    const b = person("b");
    unwrap(a.update({ friend: b }));
    unwrap(b.update({ friend: a }));
    unwrap(people.add(a));
    unwrap(people.add(b));

    const form = unwrap(serializer.serialize(people));
    expect(form).toEqual({
      type: "Container",
      kind: "Person",
      items: {
        a: {
          name: "a",
          isactive: true,
          age: 0,
          friend: {
            name: "b",
            isactive: true,
            age: 0,
            friend: { $ref: "#/items/a" },
            children: {},
            type: "Person",
          },
          children: {},
          type: "Person",
        },
        b: {
          name: "b",
          isactive: true,
          age: 0,
          friend: {
            name: "a",
            isactive: true,
            age: 0,
            friend: { $ref: "#/items/b" },
            children: {},
            type: "Person",
          },
          children: {},
          type: "Person",
        },
      },
    });
  });

  it("stops at the node limit", () => {
    const small = new Serializer(createRegistry(), { maxNodes: 2 });
    const { alice } = createFriends();

    expect(small.serialize(alice)).toEqual({
      success: false,
      error: {
        type: "nodeLimitExceeded",
        path: "#/friend/children",
        limit: 2,
        message: "Graph exceeds 2 nodes at #/friend/children",
      },
    });
  });
});
