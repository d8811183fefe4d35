import { CrossRegistryOperationError, UnknownNameError } from '../errors/errors.js';
import type { ValueSetRef } from '../types/types.js';
import { BitMask } from './bitmask.js';
import type { Enumeration } from './enumeration.js';
import type { EnumValue } from './value.js';

/**
 * Immutable set of values of one enumeration, ordered by id.
 *
 * Membership is a BitMask in which bit `id - base` is set for every member.
 * `base` is the enumeration's `minId` at the time the set was built; it is
 * never positive, so every index is non-negative. An enumeration's `minId`
 * only ever decreases, and sets built at different bases are re-expressed
 * against the lower base before any bitmap operation.
 *
 * Every operation returns a new set (or the receiver when nothing changes).
 */
export class ValueSet<V extends EnumValue<V>> implements Iterable<V> {
  /** display name -> member, built on first name lookup. */
  private nameIndex: Map<string, V> | undefined;
  // Enumeration names revision the index was built at; -1 once every member had a name.
  private indexRevision = -1;

  /**
   * @internal Use `Enumeration.values`, `setOf()`, `fromIds()` or
   * `fromBitMask()`.
   */
  constructor(
    readonly enumeration: Enumeration<V>,
    private readonly base: number,
    private readonly mask: BitMask
  ) {}

  /**
   * Build a set of `values`.
   *
   * @throws CrossRegistryOperationError if a value belongs to another enumeration
   */
  static of<V extends EnumValue<V>>(
    enumeration: Enumeration<V>,
    values: Iterable<V>,
    operation = 'build a ValueSet'
  ): ValueSet<V> {
    const base = enumeration.minId;
    const indices: number[] = [];
    for (const value of values) {
      if (value.enumeration !== enumeration) {
        throw new CrossRegistryOperationError(operation, enumeration.name, value.enumeration.name);
      }
      indices.push(value.id - base);
    }
    if (indices.length === 0) return enumeration.empty;
    return new ValueSet(enumeration, base, BitMask.fromIndices(indices));
  }

  get size(): number {
    return this.mask.size;
  }

  get isEmpty(): boolean {
    return this.mask.isEmpty;
  }

  /** Member with the lowest id. */
  get first(): V | undefined {
    const index = this.mask.first();
    return index === undefined ? undefined : this.at(index);
  }

  /** Member with the highest id. */
  get last(): V | undefined {
    const index = this.mask.last();
    return index === undefined ? undefined : this.at(index);
  }

  contains(value: V): boolean {
    if (value.enumeration !== this.enumeration) return false;
    return this.mask.has(value.id - this.base);
  }

  insert(value: V): ValueSet<V> {
    this.assertOwned(value, 'insert a value');
    if (this.contains(value)) return this;
    const base = Math.min(this.base, value.id);
    return new ValueSet(this.enumeration, base, this.maskAt(base).with(value.id - base));
  }

  remove(value: V): ValueSet<V> {
    this.assertOwned(value, 'remove a value');
    if (!this.contains(value)) return this;
    return new ValueSet(this.enumeration, this.base, this.mask.without(value.id - this.base));
  }

  union(other: ValueSet<V>): ValueSet<V> {
    this.assertSameEnumeration(other, 'union value sets');
    const base = Math.min(this.base, other.base);
    return new ValueSet(this.enumeration, base, this.maskAt(base).or(other.maskAt(base)));
  }

  intersect(other: ValueSet<V>): ValueSet<V> {
    this.assertSameEnumeration(other, 'intersect value sets');
    const base = Math.min(this.base, other.base);
    return new ValueSet(this.enumeration, base, this.maskAt(base).and(other.maskAt(base)));
  }

  difference(other: ValueSet<V>): ValueSet<V> {
    this.assertSameEnumeration(other, 'diff value sets');
    const base = Math.min(this.base, other.base);
    return new ValueSet(this.enumeration, base, this.maskAt(base).andNot(other.maskAt(base)));
  }

  subsetOf(other: ValueSet<V>): boolean {
    if (other.enumeration !== this.enumeration) return this.isEmpty;
    const base = Math.min(this.base, other.base);
    return this.maskAt(base).isSubsetOf(other.maskAt(base));
  }

  /**
   * Same enumeration and same members. Sets of different enumerations are
   * never equal, empty or not.
   */
  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof ValueSet) || other.enumeration !== this.enumeration) return false;
    const base = Math.min(this.base, other.base);
    return this.maskAt(base).equals(other.maskAt(base));
  }

  [Symbol.iterator](): IterableIterator<V> {
    return this.values();
  }

  /** Members in ascending id order. Each call starts a fresh iteration. */
  *values(): IterableIterator<V> {
    for (const index of this.mask.indices()) yield this.at(index);
  }

  /** Members with `id >= start.id`, ascending. */
  *iteratorFrom(start: V): IterableIterator<V> {
    this.assertOwned(start, 'iterate from a value');
    for (const index of this.mask.indices(start.id - this.base)) yield this.at(index);
  }

  /**
   * Members with `from.id <= id < until.id`. Either bound may be omitted.
   */
  range(from?: V, until?: V): ValueSet<V> {
    if (from) this.assertOwned(from, 'range over a value');
    if (until) this.assertOwned(until, 'range over a value');
    const sliced = this.mask.slice(
      from ? from.id - this.base : undefined,
      until ? until.id - this.base : undefined
    );
    return sliced === this.mask ? this : new ValueSet(this.enumeration, this.base, sliced);
  }

  rangeFrom(from: V): ValueSet<V> {
    return this.range(from);
  }

  rangeUntil(until: V): ValueSet<V> {
    return this.range(undefined, until);
  }

  filter(predicate: (value: V) => boolean): ValueSet<V> {
    const kept: number[] = [];
    for (const index of this.mask.indices()) {
      if (predicate(this.at(index))) kept.push(index);
    }
    if (kept.length === this.size) return this;
    return new ValueSet(this.enumeration, this.base, BitMask.fromIndices(kept));
  }

  /** `[matching, rest]` */
  partition(predicate: (value: V) => boolean): [ValueSet<V>, ValueSet<V>] {
    const matching = this.filter(predicate);
    return [matching, this.difference(matching)];
  }

  /**
   * Map onto values of the same enumeration. The result is a ValueSet again.
   *
   * @throws CrossRegistryOperationError if `f` returns a value of another enumeration
   */
  map(f: (value: V) => V): ValueSet<V> {
    const mapped: V[] = [];
    for (const value of this) mapped.push(f(value));
    return ValueSet.of(this.enumeration, mapped, 'map into a ValueSet');
  }

  /**
   * @throws CrossRegistryOperationError if `f` yields a value of another enumeration
   */
  flatMap(f: (value: V) => Iterable<V>): ValueSet<V> {
    const mapped: V[] = [];
    for (const value of this) {
      for (const produced of f(value)) mapped.push(produced);
    }
    return ValueSet.of(this.enumeration, mapped, 'flatMap into a ValueSet');
  }

  /**
   * Map to anything. Results keep the ascending order of their sources;
   * duplicates are kept.
   */
  mapGeneric<B>(f: (value: V) => B): B[] {
    const mapped: B[] = [];
    for (const value of this) mapped.push(f(value));
    return mapped;
  }

  flatMapGeneric<B>(f: (value: V) => Iterable<B>): B[] {
    const mapped: B[] = [];
    for (const value of this) {
      for (const produced of f(value)) mapped.push(produced);
    }
    return mapped;
  }

  forEach(f: (value: V) => void): void {
    for (const value of this) f(value);
  }

  find(predicate: (value: V) => boolean): V | undefined {
    for (const value of this) if (predicate(value)) return value;
    return undefined;
  }

  some(predicate: (value: V) => boolean): boolean {
    return this.find(predicate) !== undefined;
  }

  every(predicate: (value: V) => boolean): boolean {
    for (const value of this) if (!predicate(value)) return false;
    return true;
  }

  toArray(): V[] {
    return Array.from(this);
  }

  /**
   * Member with display name `name`, looked up within this set only.
   *
   * @throws UnknownNameError if no member carries `name`
   */
  withName(name: string): V {
    const found = this.findByName(name);
    if (!found) {
      throw new UnknownNameError(this.enumeration.name, name, Array.from(this.names().keys()));
    }
    return found;
  }

  findByName(name: string): V | undefined {
    const found = this.names().get(name);
    if (found || this.indexRevision < 0) return found;
    // Some members were unnamed when the index was built; nameOf() asks the sources again.
    return this.find((value) => value.name === name);
  }

  /**
   * Raw bitmap: bit k of the concatenated 32-bit words marks the member with
   * id `enumeration.minId + k`.
   */
  toBitMask(): number[] {
    return this.maskAt(this.enumeration.minId).toWords();
  }

  toJSON(): ValueSetRef {
    return { $enum: this.enumeration.name, mask: this.toBitMask() };
  }

  toString(): string {
    return `${this.enumeration.name}.ValueSet(${this.mapGeneric(String).join(', ')})`;
  }

  // ---- internals ----

  private at(index: number): V {
    return this.enumeration.valueById(this.base + index);
  }

  /** Mask re-expressed against `base` (which must not exceed this.base). */
  private maskAt(base: number): BitMask {
    return base === this.base ? this.mask : this.mask.shift(this.base - base);
  }

  private names(): Map<string, V> {
    const stale =
      this.indexRevision >= 0 && this.indexRevision !== this.enumeration.namesRevision;
    if (!this.nameIndex || stale) {
      const index = new Map<string, V>();
      let complete = true;
      for (const value of this) {
        const name = value.name;
        if (name === undefined) complete = false;
        else if (!index.has(name)) index.set(name, value);
      }
      this.nameIndex = index;
      this.indexRevision = complete ? -1 : this.enumeration.namesRevision;
    }
    return this.nameIndex;
  }

  private assertOwned(value: V, operation: string): void {
    if (value.enumeration !== this.enumeration) {
      throw new CrossRegistryOperationError(operation, this.enumeration.name, value.enumeration.name);
    }
  }

  private assertSameEnumeration(other: ValueSet<V>, operation: string): void {
    if (other.enumeration !== this.enumeration) {
      throw new CrossRegistryOperationError(operation, this.enumeration.name, other.enumeration.name);
    }
  }
}
