import { describe, it, expect } from "vitest";
import { defineKind, isKindOf, KindRegistry, t } from "../src/schema/index.js";

const Animal = defineKind("Animal", { legs: t.integer() });
const Dog = defineKind("Dog", { breed: t.string({ default: "mixed" }) }, Animal);

describe("defineKind", () => {
  it("puts inherited fields before own fields", () => {
    expect(Object.keys(Dog.fields)).toEqual(["legs", "breed"]);
    expect(Dog.parent).toBe(Animal);
  });

  it("follows the parent chain in isKindOf", () => {
    expect(isKindOf(Dog, "Dog")).toBe(true);
    expect(isKindOf(Dog, "Animal")).toBe(true);
    expect(isKindOf(Animal, "Dog")).toBe(false);
  });

  it("rejects reserved attribute names", () => {
    expect(() => defineKind("Bad", { type: t.string() })).toThrow(
      'Attribute "type" of kind Bad is reserved'
    );
    expect(() => defineKind("Bad", { $ref: t.string() })).toThrow();
    expect(() => defineKind("Bad", { name: t.string() })).toThrow();
  });

  it("rejects the container discriminator as a kind name", () => {
    expect(() => defineKind("Container", {})).toThrow(
      '"Container" is reserved and cannot name a kind'
    );
  });

  it("rejects a blank kind name", () => {
    expect(() => defineKind("  ", {})).toThrow();
  });

  it("rejects fields shadowing the parent", () => {
    expect(() => defineKind("Cat", { legs: t.integer() }, Animal)).toThrow(
      'Attribute "legs" of kind Cat shadows an attribute of Animal'
    );
  });

  it("rejects an ill-typed default", () => {
    expect(() => defineKind("Counter", { count: t.integer({ default: 1.5 }) })).toThrow(
      'Invalid default for Counter.count: Attribute "count" at #/count expected integer, got number'
    );
  });

  it("describes container fields with a reject policy by default", () => {
    expect(t.container("Dog")).toEqual({ kind: "container", of: "Dog", duplicates: "reject" });
    expect(t.container("Dog", { duplicates: "overwrite" }).duplicates).toBe("overwrite");
  });
});

describe("KindRegistry", () => {
  it("registers ancestors along with a kind", () => {
    const registry = new KindRegistry([Dog]);
    expect(registry.names()).toEqual(["Dog", "Animal"]);
    expect(registry.get("Animal")).toBe(Animal);
  });

  it("resolves known names", () => {
    const registry = new KindRegistry([Dog]);
    expect(registry.resolve("Dog")).toEqual({ success: true, data: Dog });
  });

  it("fails with unknownType for unknown names", () => {
    const registry = new KindRegistry([Animal]);
    expect(registry.resolve("Ghost", "#/pet")).toEqual({
      success: false,
      error: {
        type: "unknownType",
        path: "#/pet",
        discriminator: "Ghost",
        message: 'Unknown type "Ghost" at #/pet',
      },
    });
  });

  it("ignores registering the same schema twice", () => {
    const registry = new KindRegistry([Animal, Dog, Animal]);
    expect(registry.names()).toEqual(["Animal", "Dog"]);
  });

  it("throws on a different schema under a taken name", () => {
    const registry = new KindRegistry([Animal]);
    const Impostor = defineKind("Animal", { wings: t.integer() });
    expect(() => registry.register(Impostor)).toThrow(
      'A different kind is already registered as "Animal"'
    );
  });

  it("answers subkind queries", () => {
    const registry = new KindRegistry([Dog]);
    expect(registry.isSubkind("Dog", "Animal")).toBe(true);
    expect(registry.isSubkind("Animal", "Dog")).toBe(false);
    expect(registry.isSubkind("Ghost", "Animal")).toBe(false);
  });
});
