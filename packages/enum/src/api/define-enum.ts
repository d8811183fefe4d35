import { SimpleEnumeration, type SimpleValue } from '../core/simple-enumeration.js';
import type { EnumerationConfig } from '../types/types.js';

export interface EnumDefinition<K extends string> {
  readonly enumeration: SimpleEnumeration;
  readonly members: { readonly [P in K]: SimpleValue };
}

/**
 * Define a plain enumeration in one call.
 * Members get ids `initial, initial + 1, ...` in the order given.
 *
 * @param name - Enumeration name (used in toString, errors and serialization)
 * @param names - Member names, in id order
 * @param options - Remaining enumeration configuration
 *
 * @example
 * ```typescript
 * const { enumeration: Suit, members } = defineEnum('Suit', ['Clubs', 'Diamonds', 'Hearts', 'Spades']);
 * // members.Hearts: SimpleValue with id 2
 * Suit.valueByName('Spades') === members.Spades; // true
 * ```
 */
export function defineEnum<K extends string>(
  name: string,
  names: readonly K[],
  options: Omit<EnumerationConfig<SimpleValue>, 'name'> = {}
): EnumDefinition<K> {
  const enumeration = new SimpleEnumeration({ ...options, name });
  const members = enumeration.declareNames(...names);
  return Object.freeze({ enumeration, members });
}
