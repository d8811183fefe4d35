import { EnumerationNameCollisionError, UnknownEnumerationError } from '../errors/errors.js';
import type { CatalogBag, CatalogStore } from '../types/global.js';
import {
  isValueRef,
  isValueSetRef,
  type CatalogedEnumeration,
  type ValueRef,
  type ValueSetRef,
} from '../types/types.js';

const DEFAULT_NAMESPACE = 'default';

/**
 * Ensure the global catalog store exists.
 *
 * The store lives on globalThis so that one process has one catalog even if
 * this module is bundled more than once.
 */
function ensureStore(): CatalogStore {
  const existing = globalThis.__ENUMKIT_CATALOG__;
  if (existing) return existing;
  const fresh: CatalogStore = { defaultBag: new Map(), namespaces: new Map() };
  globalThis.__ENUMKIT_CATALOG__ = fresh;
  return fresh;
}

/**
 * Resolve the bag for a namespace, creating it on first use.
 */
function resolveBag(namespace?: string): CatalogBag {
  const store = ensureStore();
  if (!namespace || namespace === DEFAULT_NAMESPACE) return store.defaultBag;
  let bag = store.namespaces.get(namespace);
  if (!bag) {
    bag = new Map();
    store.namespaces.set(namespace, bag);
  }
  return bag;
}

/**
 * Process-wide directory of enumerations, keyed by enumeration name.
 *
 * Serialized values (`{ $enum, id }`) and value sets (`{ $enum, mask }`) only
 * carry the enumeration's name; the catalog turns them back into the
 * canonical instances held by that enumeration. Revival never creates values.
 *
 * Namespace support:
 * - Default namespace: used when no namespace is passed
 * - Named namespaces: test isolation, or several enumerations sharing a name
 *
 * @example
 * ```typescript
 * EnumCatalog.add(DayEnum);
 *
 * const json = JSON.stringify({ day: Days.Friday, off: Days.Saturday.combine(Days.Sunday) });
 * const parsed = JSON.parse(json, EnumCatalog.reviver());
 * parsed.day === Days.Friday; // true
 * ```
 */
export class EnumCatalog {
  /**
   * Add an enumeration under its name. Adding the same enumeration twice is
   * a no-op.
   *
   * @throws EnumerationNameCollisionError if another enumeration holds the name
   */
  static add(enumeration: CatalogedEnumeration, namespace?: string): void {
    const bag = resolveBag(namespace);
    const existing = bag.get(enumeration.name);
    if (existing && existing !== enumeration) {
      throw new EnumerationNameCollisionError(enumeration.name, namespace ?? DEFAULT_NAMESPACE);
    }
    bag.set(enumeration.name, enumeration);
  }

  static get(name: string, namespace?: string): CatalogedEnumeration | undefined {
    return resolveBag(namespace).get(name);
  }

  static has(name: string, namespace?: string): boolean {
    return resolveBag(namespace).has(name);
  }

  static remove(name: string, namespace?: string): boolean {
    return resolveBag(namespace).delete(name);
  }

  /** Cataloged enumeration names, in insertion order. */
  static names(namespace?: string): string[] {
    return Array.from(resolveBag(namespace).keys());
  }

  /**
   * Canonical value for a `ValueRef`, or the value set for a `ValueSetRef`.
   *
   * @throws UnknownEnumerationError if the enumeration is not cataloged
   * @throws UnknownIdentifierError if the id (or a set bit) is not registered
   */
  static revive(ref: ValueRef | ValueSetRef, namespace?: string): unknown {
    const enumeration = this.get(ref.$enum, namespace);
    if (!enumeration) {
      throw new UnknownEnumerationError(ref.$enum, namespace ?? DEFAULT_NAMESPACE, this.names(namespace));
    }
    return isValueSetRef(ref) ? enumeration.fromBitMask(ref.mask) : enumeration.revive(ref);
  }

  /**
   * `JSON.parse` reviver that swaps serialized references for canonical
   * values and value sets.
   */
  static reviver(namespace?: string): (key: string, value: unknown) => unknown {
    return (_key, value) =>
      isValueSetRef(value) || isValueRef(value) ? this.revive(value, namespace) : value;
  }

  /**
   * Empty a namespace (the default one when omitted).
   *
   * ⚠️ Intended for tests. Values already serialized under removed
   * enumerations can no longer be revived.
   */
  static reset(namespace?: string): void {
    const store = ensureStore();
    if (!namespace || namespace === DEFAULT_NAMESPACE) {
      store.defaultBag = new Map();
      return;
    }
    store.namespaces.set(namespace, new Map());
  }

  /**
   * Test helper: drop every namespace.
   */
  static resetForTests(): void {
    globalThis.__ENUMKIT_CATALOG__ = { defaultBag: new Map(), namespaces: new Map() };
  }
}
