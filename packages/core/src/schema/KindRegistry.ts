import { err, ok, Result } from "../result/result.js";
import { unknownType, UnknownTypeError } from "../errors/index.js";
import type { KindSchema } from "./types.js";
import { isKindOf } from "./defineKind.js";

/**
 * Maps `type` discriminators to kind schemas.
 */
export class KindRegistry {
  private kinds = new Map<string, KindSchema>();

  constructor(kinds: Iterable<KindSchema> = []) {
    for (const kind of kinds) {
      this.register(kind);
    }
  }

  /**
   * Register a kind along with its ancestors.
   * Re-registering the same schema is a no-op.
   */
  register(kind: KindSchema): this {
    for (let current: KindSchema | undefined = kind; current; current = current.parent) {
      const existing = this.kinds.get(current.name);
      if (existing === current) continue;
      if (existing) {
        throw new Error(`A different kind is already registered as "${current.name}"`);
      }
      this.kinds.set(current.name, current);
    }
    return this;
  }

  has(name: string): boolean {
    return this.kinds.has(name);
  }

  get(name: string): KindSchema | undefined {
    return this.kinds.get(name);
  }

  resolve(name: string, path = "#"): Result<KindSchema, UnknownTypeError> {
    const kind = this.kinds.get(name);
    if (kind) {
      return ok(kind);
    }
    return err(unknownType(path, name));
  }

  /**
   * Whether the kind registered as `name` is `base` or one of its subkinds.
   */
  isSubkind(name: string, base: string): boolean {
    const kind = this.kinds.get(name);
    return kind !== undefined && isKindOf(kind, base);
  }

  names(): string[] {
    return [...this.kinds.keys()];
  }
}
