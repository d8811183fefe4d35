import type { ValueRef } from '../types/types.js';
import type { Enumeration } from './enumeration.js';
import type { ValueSet } from './value-set.js';

/**
 * Construction record handed to a value factory by `Enumeration.register()`.
 *
 * A value must pass the init it received to the `EnumValue` constructor
 * unchanged; the enumeration rejects values built from any other init.
 */
export interface ValueInit<V extends EnumValue<V>> {
  readonly id: number;
  readonly name: string | undefined;
  readonly enumeration: Enumeration<V>;
}

/**
 * Builds one value from the init allocated by the enumeration.
 */
export type ValueFactory<V extends EnumValue<V>> = (init: ValueInit<V>) => V;

/**
 * Display string for values whose name cannot be resolved.
 */
export function invalidValueName(id: number): string {
  return `<Invalid enum: no field for #${id}>`;
}

/**
 * Base class of every enumeration value.
 *
 * Subclasses pass themselves as the type parameter so that the enumeration,
 * its value sets and `combine()` are all typed to the concrete value class:
 *
 * @example
 * ```typescript
 * class Day extends EnumValue<Day> {
 *   get isWorkingDay(): boolean {
 *     return !this.equals(Days.Saturday) && !this.equals(Days.Sunday);
 *   }
 * }
 *
 * const DayEnum = new Enumeration<Day>({ name: 'Day' });
 * const Days = DayEnum.declare({
 *   Monday: (init) => new Day(init),
 *   // ...
 *   Saturday: (init) => new Day(init),
 *   Sunday: (init) => new Day(init),
 * });
 *
 * DayEnum.values.filter((d) => d.isWorkingDay).toString();
 * // 'Day.ValueSet(Monday, Tuesday, Wednesday, Thursday, Friday)'
 * ```
 */
export abstract class EnumValue<V extends EnumValue<V>> {
  /** Id and bit position of this value. */
  readonly id: number;

  /** Owning enumeration; equality is scoped to it. */
  readonly enumeration: Enumeration<V>;

  private readonly explicitName: string | undefined;

  constructor(init: ValueInit<V>) {
    this.id = init.id;
    this.enumeration = init.enumeration;
    this.explicitName = init.name;
  }

  /**
   * Explicit name given at registration, otherwise the name the enumeration
   * resolves from its name sources. Undefined when neither knows one.
   */
  get name(): string | undefined {
    return this.explicitName ?? this.enumeration.nameOf(this.id);
  }

  /**
   * Same enumeration instance and same id. Values of other enumerations are
   * never equal, whatever their id.
   */
  equals(other: unknown): boolean {
    return (
      other instanceof EnumValue && other.enumeration === this.enumeration && other.id === this.id
    );
  }

  compareTo(other: V): number {
    if (this.id < other.id) return -1;
    if (this.id === other.id) return 0;
    return 1;
  }

  /** Set holding this value and `other`. */
  combine(this: V, other: V): ValueSet<V> {
    return this.enumeration.setOf(this, other);
  }

  /**
   * Display name, or the invalid-value placeholder when the name is unknown
   * or a name source fails while resolving it.
   */
  toString(): string {
    try {
      return this.name ?? invalidValueName(this.id);
    } catch {
      return invalidValueName(this.id);
    }
  }

  toJSON(): ValueRef {
    return { $enum: this.enumeration.name, id: this.id };
  }
}
