/*
 * Enumeration: registry of one closed set of values.
 *
 * Owns id assignment, id -> value lookup, lazy name resolution and the
 * cached `values` snapshot. Values enter only through register(), which
 * validates the id, lets the caller's factory build the value from a fresh
 * ValueInit and commits only after the factory returned a value built from
 * that init. A failed registration leaves every counter and map untouched.
 *
 * The values snapshot is dropped on every registration and every new name
 * source. The name map only grows: a lookup miss asks the name sources again,
 * since a scope may receive its values after they were registered.
 */
import {
  CrossRegistryOperationError,
  DuplicateIdentifierError,
  InvalidEnumerationConfigError,
  InvalidIdentifierError,
  InvalidRegistrationError,
  UnknownIdentifierError,
} from '../errors/errors.js';
import type { EnumerationConfig, RegisterOptions, ValueRef } from '../types/types.js';
import { BitMask } from './bitmask.js';
import { scopeNameSource, type DeclaringScope, type NameSource } from './name-source.js';
import { EnumValue, type ValueFactory, type ValueInit } from './value.js';
import { ValueSet } from './value-set.js';

/**
 * Development mode flag. Warnings are skipped entirely in production.
 */
const IS_DEV = typeof process === 'undefined' || process.env?.NODE_ENV !== 'production';

const DEFAULT_NAME = 'Enumeration';

export class Enumeration<V extends EnumValue<V>> {
  /** Name used in diagnostics, serialized references and the catalog. */
  readonly name: string;

  private readonly idToValue = new Map<number, V>();

  /** id -> declared name; filled lazily by populateNameMap(). */
  private readonly idToName = new Map<number, string>();

  private readonly nameSources: NameSource[] = [];
  private readonly registerHook?: (value: V) => void;
  private readonly warnings: boolean;
  private readonly warned = new Set<string>();

  /** Bumped whenever a population pass caches a new name. */
  private _namesRevision = 0;

  private _nextId: number;
  private _minId: number;
  private _maxId: number;

  // Snapshot of all values; only trusted while snapshotValid is set.
  private snapshot: ValueSet<V> | undefined;
  private snapshotValid = false;
  private emptySet: ValueSet<V> | undefined;

  // Set while a factory runs; registration does not nest.
  private registering = false;

  constructor(config?: EnumerationConfig<V>) {
    const cfg = this._validateAndFreezeConfig(config);

    this.name = cfg.name ?? DEFAULT_NAME;
    this.registerHook = cfg.onRegister;
    this.warnings = cfg.warnings ?? true;

    const initial = cfg.initial ?? 0;
    this._nextId = initial;
    this._maxId = initial;
    this._minId = initial < 0 ? initial : 0;

    if (cfg.nameSource) this.nameSources.push(cfg.nameSource);
  }

  /** Id the next auto-assigned value will get. */
  get nextId(): number {
    return this._nextId;
  }

  /** Lowest id ever assigned, never above 0. Bit offsets are taken from it. */
  get minId(): number {
    return this._minId;
  }

  /** One past the highest id ever assigned. */
  get maxId(): number {
    return this._maxId;
  }

  /**
   * @internal Lets value sets tell whether their name index may be stale.
   */
  get namesRevision(): number {
    return this._namesRevision;
  }

  /** Number of registered values. */
  get size(): number {
    return this.idToValue.size;
  }

  /**
   * All registered values, ascending by id.
   *
   * The snapshot is rebuilt on the first access after a registration and
   * reused until the next one. A snapshot obtained earlier stays a valid
   * subset of the current values.
   */
  get values(): ValueSet<V> {
    if (this.snapshotValid && this.snapshot) return this.snapshot;
    const base = this._minId;
    const indices: number[] = [];
    for (const id of this.idToValue.keys()) indices.push(id - base);
    const built = new ValueSet(this, base, BitMask.fromIndices(indices));
    this.snapshot = built;
    this.snapshotValid = true;
    return built;
  }

  /** The empty set of this enumeration. */
  get empty(): ValueSet<V> {
    return (this.emptySet ??= new ValueSet(this, this._minId, BitMask.EMPTY));
  }

  /**
   * Register a new value.
   *
   * The enumeration allocates the id (or takes `options.id`), hands the
   * factory a `ValueInit` and commits the returned value.
   *
   * @throws InvalidIdentifierError if the id is not a safe integer
   * @throws DuplicateIdentifierError if the id is already taken
   * @throws InvalidRegistrationError if the factory registers re-entrantly or
   *         returns a value not built from its init
   *
   * @example
   * ```typescript
   * const Mercury = PlanetEnum.register((init) => new Planet(init, 3.303e23, 2.4397e6));
   * const Unknown = PlanetEnum.register((init) => new Planet(init, 0, 0), { id: -1, name: 'Unknown' });
   * ```
   */
  register(factory: ValueFactory<V>, options: RegisterOptions = {}): V {
    if (this.registering) {
      throw new InvalidRegistrationError(
        this.name,
        'a value factory tried to register another value while it was running.'
      );
    }

    const id = options.id ?? this._nextId;
    if (!Number.isSafeInteger(id)) throw new InvalidIdentifierError(this.name, id);

    const taken = this.idToValue.get(id);
    if (taken) {
      throw new DuplicateIdentifierError(this.name, id, this.idToName.get(id) ?? `#${id}`);
    }

    const init: ValueInit<V> = Object.freeze({ id, name: options.name, enumeration: this });

    let value: V;
    this.registering = true;
    try {
      value = factory(init);
    } finally {
      this.registering = false;
    }

    if (value.id !== id || value.enumeration !== this) {
      throw new InvalidRegistrationError(
        this.name,
        `the factory returned a value that was not built from the init for id ${id}.`
      );
    }

    this.idToValue.set(id, value);
    if (options.name !== undefined) this.idToName.set(id, options.name);
    this._nextId = id + 1;
    if (this._nextId > this._maxId) this._maxId = this._nextId;
    if (id < this._minId) this._minId = id;
    this.snapshotValid = false;

    this.registerHook?.(value);
    return value;
  }

  /**
   * Register one value per key, in key order, and bind the returned object as
   * a declaring scope so that each value is named after its key.
   *
   * @example
   * ```typescript
   * const Days = DayEnum.declare({
   *   Monday: (init) => new Day(init),
   *   Tuesday: (init) => new Day(init),
   * });
   * Days.Tuesday.toString(); // 'Tuesday'
   * ```
   */
  declare<M extends Record<string, ValueFactory<V>>>(factories: M): { readonly [K in keyof M]: V } {
    const declared = {} as { [K in keyof M]: V };

    (Object.keys(factories) as Array<keyof M & string>).forEach((key) => {
      declared[key] = this.register(factories[key]);
    });

    this.bindScope(declared);
    return Object.freeze(declared);
  }

  /**
   * Attach a declaring scope (object, class with static values, or a thunk
   * returning one) as an additional name source.
   */
  bindScope(scope: DeclaringScope): this {
    return this.addNameSource(scopeNameSource(scope));
  }

  /**
   * Attach a name source. Cached snapshots are dropped so that their name
   * indexes pick up the new names.
   */
  addNameSource(source: NameSource): this {
    this.nameSources.push(source);
    this.snapshotValid = false;
    return this;
  }

  /**
   * @throws UnknownIdentifierError if no value holds `id`
   */
  valueById(id: number): V {
    const value = this.idToValue.get(id);
    if (!value) throw new UnknownIdentifierError(this.name, id, this._minId, this._maxId);
    return value;
  }

  findById(id: number): V | undefined {
    return this.idToValue.get(id);
  }

  /**
   * Look a value up by display name.
   *
   * @throws UnknownNameError if no value carries `name`
   */
  valueByName(name: string): V {
    return this.values.withName(name);
  }

  findByName(name: string): V | undefined {
    return this.values.findByName(name);
  }

  /**
   * Declared name of the value holding `id`.
   *
   * Names are cached once found. A miss runs a population pass over the name
   * sources and retries; misses are never cached.
   */
  nameOf(id: number): string | undefined {
    const cached = this.idToName.get(id);
    if (cached !== undefined || !this.idToValue.has(id)) return cached;
    this.populateNameMap();
    return this.idToName.get(id);
  }

  /** True when `x` is a value registered in this enumeration. */
  isMember(x: unknown): x is V {
    return x instanceof EnumValue && x.enumeration === this && this.idToValue.get(x.id) === x;
  }

  setOf(...values: V[]): ValueSet<V> {
    return ValueSet.of(this, values);
  }

  /**
   * @throws UnknownIdentifierError if an id is not registered
   */
  fromIds(ids: Iterable<number>): ValueSet<V> {
    const values: V[] = [];
    for (const id of ids) values.push(this.valueById(id));
    return ValueSet.of(this, values);
  }

  /**
   * Rebuild a set from `toBitMask()` output: bit k of the concatenated words
   * marks the value with id `minId + k`.
   *
   * @throws InvalidBitMaskError if a word is not an unsigned 32-bit integer
   * @throws UnknownIdentifierError if a set bit maps to an unregistered id
   */
  fromBitMask(words: readonly number[]): ValueSet<V> {
    const base = this._minId;
    const mask = BitMask.fromWords(words);
    for (const index of mask.indices()) this.valueById(base + index);
    return mask.isEmpty ? this.empty : new ValueSet(this, base, mask);
  }

  /**
   * Canonical instance for a serialized reference. Never creates a value.
   *
   * @throws CrossRegistryOperationError if the reference names another enumeration
   * @throws UnknownIdentifierError if the id is not registered
   */
  revive(ref: ValueRef | number): V {
    if (typeof ref === 'number') return this.valueById(ref);
    if (ref.$enum !== this.name) {
      throw new CrossRegistryOperationError('revive a value', this.name, ref.$enum);
    }
    return this.valueById(ref.id);
  }

  toString(): string {
    return this.name;
  }

  // ---- internals ----

  /**
   * Cache the names of every value the name sources report for this
   * enumeration. Values owned by another enumeration are skipped. The first
   * name seen for an id is kept, so later aliases never rename a value.
   */
  private populateNameMap(): void {
    for (const source of this.nameSources) {
      for (const [name, candidate] of source.declaredNames()) {
        if (!(candidate instanceof EnumValue)) continue;
        if (candidate.enumeration !== this) {
          this.warnForeign(name, candidate.enumeration.name);
          continue;
        }
        if (!this.idToName.has(candidate.id)) {
          this.idToName.set(candidate.id, name);
          this._namesRevision += 1;
        }
      }
    }
  }

  private warnForeign(name: string, owner: string): void {
    if (!IS_DEV || !this.warnings) return;
    const key = `${owner}.${name}`;
    if (this.warned.has(key)) return;
    this.warned.add(key);
    console.warn(
      `[enumkit] Name source of '${this.name}' reported '${name}', which belongs to '${owner}'. Ignored.`
    );
  }

  /**
   * Validate configuration and return a frozen copy.
   *
   * @throws InvalidEnumerationConfigError on a malformed field
   */
  private _validateAndFreezeConfig(rawCfg?: EnumerationConfig<V>): Readonly<EnumerationConfig<V>> {
    if (rawCfg === undefined) return Object.freeze({});
    if (typeof rawCfg !== 'object' || rawCfg === null) {
      throw new InvalidEnumerationConfigError(`config must be an object, got ${typeof rawCfg}.`);
    }

    const { name, initial, nameSource, onRegister, warnings } = rawCfg;

    if (name !== undefined && (typeof name !== 'string' || name.length === 0)) {
      throw new InvalidEnumerationConfigError(`'name' must be a non-empty string.`);
    }
    if (initial !== undefined && !Number.isSafeInteger(initial)) {
      throw new InvalidEnumerationConfigError(`'initial' must be a safe integer, got ${initial}.`);
    }
    if (
      nameSource !== undefined &&
      (typeof nameSource !== 'object' ||
        nameSource === null ||
        typeof nameSource.declaredNames !== 'function')
    ) {
      throw new InvalidEnumerationConfigError(`'nameSource' must provide a declaredNames() method.`);
    }
    if (onRegister !== undefined && typeof onRegister !== 'function') {
      throw new InvalidEnumerationConfigError(`'onRegister' must be a function.`);
    }
    if (warnings !== undefined && typeof warnings !== 'boolean') {
      throw new InvalidEnumerationConfigError(`'warnings' must be a boolean.`);
    }

    return Object.freeze({ ...rawCfg });
  }
}
