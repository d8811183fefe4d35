/*
 * Name sources
 * ------------
 * An enumeration never indexes names at registration time. The first name
 * lookup that misses asks every bound NameSource for its declared
 * (name, value) pairs and caches the names of the values it owns.
 *
 * Sources may report anything; the enumeration keeps only its own values.
 */

/**
 * Supplies declared names for enumeration values.
 */
export interface NameSource {
  /**
   * Declared `(name, candidate)` pairs in declaration order. Called only when
   * a name lookup misses; may be called more than once.
   */
  declaredNames(): Iterable<readonly [name: string, candidate: unknown]>;
}

/**
 * A declaring scope, or a thunk returning it once it exists. Any function
 * other than a class is called as a thunk; a class is walked for its statics.
 */
export type DeclaringScope = object | (() => object);

function isThunk(scope: DeclaringScope): scope is () => object {
  if (typeof scope !== 'function') return false;
  // Class prototypes are read-only; arrow functions have none.
  return Object.getOwnPropertyDescriptor(scope, 'prototype')?.writable !== false;
}

/**
 * The scope object, or undefined while a thunk's binding is still
 * uninitialized (a class whose static fields are being evaluated).
 */
function resolveScope(scope: DeclaringScope): object | undefined {
  if (!isThunk(scope)) return scope;
  try {
    return scope();
  } catch (error) {
    if (error instanceof ReferenceError) return undefined;
    throw error;
  }
}

/**
 * Walk own data properties of `target` and of its prototype chain, stopping at
 * the built-in Object and Function prototypes. Accessors are skipped.
 */
function* dataProperties(target: object): Generator<readonly [string, unknown]> {
  const seen = new Set<string>();
  let current: object | null = target;
  while (current && current !== Object.prototype && current !== Function.prototype) {
    for (const key of Object.getOwnPropertyNames(current)) {
      if (seen.has(key)) continue;
      seen.add(key);
      const descriptor = Object.getOwnPropertyDescriptor(current, key);
      if (!descriptor || !('value' in descriptor)) continue;
      yield [key, descriptor.value];
    }
    current = Object.getPrototypeOf(current);
  }
}

/**
 * Name source that discovers names from the objects declaring the values.
 *
 * A scope may be a plain object (`{ Red: ..., Green: ... }`), a class holding
 * the values as static fields, or a thunk returning either. Thunks let a scope
 * be bound before the object that holds the values has been created.
 *
 * @example
 * ```typescript
 * const ColorEnum = new SimpleEnumeration({
 *   name: 'Color',
 *   nameSource: scopeNameSource(() => Color),
 * });
 *
 * class Color {
 *   static readonly Red = ColorEnum.create();
 *   static readonly Green = ColorEnum.create();
 * }
 *
 * Color.Red.toString(); // 'Red'
 * ```
 */
export function scopeNameSource(...scopes: DeclaringScope[]): NameSource {
  return {
    *declaredNames() {
      for (const scope of scopes) {
        const target = resolveScope(scope);
        if (target) yield* dataProperties(target);
      }
    },
  };
}

/**
 * Name source over a fixed list of `(name, value)` pairs.
 */
export function explicitNameSource(
  pairs: Iterable<readonly [name: string, value: unknown]>
): NameSource {
  const frozen = Array.from(pairs);
  return {
    declaredNames() {
      return frozen;
    },
  };
}

/**
 * Concatenate several sources; earlier sources win when names disagree.
 */
export function composeNameSources(...sources: NameSource[]): NameSource {
  return {
    *declaredNames() {
      for (const source of sources) yield* source.declaredNames();
    },
  };
}
