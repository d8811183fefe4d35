import type { NameSource } from '../core/name-source.js';

/**
 * Options accepted by `Enumeration.register()`.
 */
export interface RegisterOptions {
  /** Explicit id. Defaults to the enumeration's `nextId`. */
  id?: number;
  /**
   * Explicit display name. When omitted the name is resolved lazily from the
   * enumeration's name sources on first use.
   */
  name?: string;
}

/**
 * Enumeration configuration passed to the constructor.
 */
export interface EnumerationConfig<V> {
  /**
   * Name used in `toString()`, error messages, serialized references and
   * catalog lookups.
   *
   * @default 'Enumeration'
   */
  name?: string;

  /**
   * First id handed out by auto-assignment.
   *
   * @default 0
   */
  initial?: number;

  /**
   * Name source consulted when a name lookup misses. More sources can be
   * attached later with `bindScope()` / `addNameSource()`.
   */
  nameSource?: NameSource;

  /**
   * Optional hook invoked after a value is committed to the enumeration.
   * Useful for building side indexes keyed by value.
   */
  onRegister?: (value: V) => void;

  /**
   * Emit development warnings (foreign values reported by a name source).
   * Warnings are always silent when NODE_ENV is 'production'.
   *
   * @default true
   */
  warnings?: boolean;
}

/**
 * Serialized form of a single enumeration value.
 *
 * @example
 * ```typescript
 * JSON.stringify(Days.Monday); // '{"$enum":"Day","id":0}'
 * ```
 */
export interface ValueRef {
  readonly $enum: string;
  readonly id: number;
}

/**
 * Serialized form of a value set. `mask` uses the `toBitMask()` layout.
 */
export interface ValueSetRef {
  readonly $enum: string;
  readonly mask: readonly number[];
}

/**
 * Runtime check for a serialized value reference.
 */
export function isValueRef(x: unknown): x is ValueRef {
  return (
    typeof x === 'object' &&
    x !== null &&
    '$enum' in x &&
    'id' in x &&
    typeof x.$enum === 'string' &&
    typeof x.id === 'number'
  );
}

/**
 * Runtime check for a serialized value set reference.
 */
export function isValueSetRef(x: unknown): x is ValueSetRef {
  return (
    typeof x === 'object' &&
    x !== null &&
    '$enum' in x &&
    'mask' in x &&
    typeof x.$enum === 'string' &&
    Array.isArray(x.mask) &&
    x.mask.every((word: unknown) => typeof word === 'number')
  );
}

/**
 * What the catalog needs from an enumeration. Every `Enumeration` satisfies it.
 */
export interface CatalogedEnumeration {
  readonly name: string;
  revive(ref: ValueRef | number): unknown;
  fromBitMask(words: readonly number[]): unknown;
}
