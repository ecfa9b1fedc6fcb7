import picomatch from "picomatch";
import { err, ok, Result } from "../result/result.js";
import { formatJsonPointer } from "../json-pointer/index.js";
import {
  ContainerError,
  duplicateName,
  ownershipConflict,
  typeMismatch,
} from "../errors/index.js";
import type { DuplicatePolicy } from "../schema/types.js";
import type { Entity } from "./Entity.js";

export interface ContainerOptions {
  /** What `add` does when the name is taken. Default: "reject" */
  duplicates?: DuplicatePolicy;
}

export interface FilterCriteria<E extends Entity = Entity> {
  /** Glob matched against entity names, e.g. "user-*" */
  name?: string;
  isactive?: boolean;
  /** Kind name; subkinds match too */
  type?: string;
  where?: (entity: E) => boolean;
}

/**
 * Insertion-ordered, name-keyed set of entities of one kind.
 * A container owns its entities: an entity belongs to at most one.
 */
export class Container<E extends Entity = Entity> implements Iterable<E> {
  private items = new Map<string, E>();
  public readonly duplicates: DuplicatePolicy;

  constructor(
    public readonly kind: string,
    options: ContainerOptions = {}
  ) {
    this.duplicates = options.duplicates ?? "reject";
  }

  get size(): number {
    return this.items.size;
  }

  /**
   * Add an entity under its name. With the "overwrite" policy an existing
   * entity of the same name is released and replaced in place.
   */
  add(entity: E): Result<E, ContainerError> {
    if (!entity.isKindOf(this.kind)) {
      return err(
        typeMismatch(formatJsonPointer([entity.name]), "type", this.kind, entity.type)
      );
    }

    const owner = entity.container;
    if (owner && owner !== this) {
      return err(ownershipConflict(entity.name));
    }

    const existing = this.items.get(entity.name);
    if (existing === entity) {
      return ok(entity);
    }
    if (existing) {
      if (this.duplicates === "reject") {
        return err(duplicateName(entity.name, this.kind));
      }
      existing.detach();
    }

    // Map#set keeps the original position when the key exists
    this.items.set(entity.name, entity);
    entity.attach(this);
    return ok(entity);
  }

  get(name: string): E | undefined {
    return this.items.get(name);
  }

  has(name: string): boolean {
    return this.items.has(name);
  }

  remove(name: string): E | undefined {
    const entity = this.items.get(name);
    if (!entity) return undefined;

    this.items.delete(name);
    entity.detach();
    return entity;
  }

  clear(): void {
    for (const entity of this.items.values()) {
      entity.detach();
    }
    this.items.clear();
  }

  names(): string[] {
    return [...this.items.keys()];
  }

  values(): E[] {
    return [...this.items.values()];
  }

  entries(): [string, E][] {
    return [...this.items.entries()];
  }

  [Symbol.iterator](): Iterator<E> {
    return this.items.values();
  }

  /**
   * Linear scan for entities matching every given criterion.
   */
  filter(criteria: FilterCriteria<E> = {}): E[] {
    const matchName = criteria.name ? picomatch(criteria.name) : undefined;

    return this.values().filter(
      (entity) =>
        (matchName === undefined || matchName(entity.name)) &&
        (criteria.isactive === undefined || entity.isActive === criteria.isactive) &&
        (criteria.type === undefined || entity.isKindOf(criteria.type)) &&
        (criteria.where === undefined || criteria.where(entity))
    );
  }
}
