import { Entity } from "@graphform/core/entity";
import { unwrap } from "@graphform/core/errors";
import { defineKind, KindRegistry, t } from "@graphform/core/schema";

export const X = defineKind("X", { value: t.integer() });

export const Person = defineKind("Person", {
  age: t.integer({ default: 0 }),
  friend: t.optional(t.entity("Person")),
  children: t.container("Person"),
});

export const Leaf = defineKind("Leaf", { weight: t.number() });

export const Pair = defineKind("Pair", {
  a: t.entity("Leaf"),
  b: t.entity("Leaf"),
});

export const Link = defineKind("Link", { next: t.optional(t.entity("Link")) });

export const Animal = defineKind("Animal", { legs: t.integer({ default: 4 }) });
export const Dog = defineKind("Dog", { breed: t.string() }, Animal);

export const createRegistry = () =>
  new KindRegistry([X, Person, Leaf, Pair, Link, Dog]);

export const person = (name: string) => unwrap(Entity.create(Person, { name }));

/** Two people who are each other's friend */
export const createFriends = () => {
  const alice = person("alice");
  const bob = person("bob");
  unwrap(alice.update({ friend: bob }));
  unwrap(bob.update({ friend: alice }));
  return { alice, bob };
};

/** A pair whose two slots hold the same leaf */
export const createDiamond = () => {
  const leaf = unwrap(Entity.create(Leaf, { name: "d", weight: 1.5 }));
  const pair = unwrap(Entity.create(Pair, { name: "p", a: leaf, b: leaf }));
  return { leaf, pair };
};
