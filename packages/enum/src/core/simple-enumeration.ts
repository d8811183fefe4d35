import type { RegisterOptions } from '../types/types.js';
import { Enumeration } from './enumeration.js';
import { EnumValue, type ValueFactory } from './value.js';

/**
 * Value class for enumerations whose values carry no extra state.
 */
export class SimpleValue extends EnumValue<SimpleValue> {}

const simpleValue: ValueFactory<SimpleValue> = (init) => new SimpleValue(init);

/**
 * Enumeration of `SimpleValue`s, with shorthands that need no factory.
 *
 * @example
 * ```typescript
 * const Color = new SimpleEnumeration({ name: 'Color' });
 * const { Red, Green, Blue } = Color.declareNames('Red', 'Green', 'Blue');
 *
 * Red.combine(Blue).toString(); // 'Color.ValueSet(Red, Blue)'
 * ```
 */
export class SimpleEnumeration extends Enumeration<SimpleValue> {
  create(options?: RegisterOptions): SimpleValue {
    return this.register(simpleValue, options);
  }

  /**
   * Register one value per name, in order, each carrying its name explicitly.
   */
  declareNames<K extends string>(...names: K[]): { readonly [P in K]: SimpleValue } {
    const declared = {} as { [P in K]: SimpleValue };
    names.forEach((name) => {
      declared[name] = this.create({ name });
    });
    return Object.freeze(declared);
  }
}
