/*
 * BitMask
 * -------
 * Immutable bit set over non-negative indices, stored as 32-bit words.
 *
 * Memory layout:
 *   Bit k lives in word (k >>> 5) at position (k & 31), least significant
 *   bit first. Words are kept trimmed: the last word is never zero, so two
 *   masks with equal membership have identical word arrays.
 *
 * Every operation that changes membership returns a new mask; a mask handed
 * out is never written to again.
 */
import { InvalidBitMaskError } from '../errors/errors.js';

const WORD_BITS = 32;
const MAX_WORD = 0xffffffff;

function popcount(word: number): number {
  let v = word - ((word >>> 1) & 0x55555555);
  v = (v & 0x33333333) + ((v >>> 2) & 0x33333333);
  return (((v + (v >>> 4)) & 0x0f0f0f0f) * 0x01010101) >>> 24;
}

/** Drop trailing zero words. Returns the input when nothing needs dropping. */
function trim(words: Uint32Array): Uint32Array {
  let end = words.length;
  while (end > 0 && words[end - 1] === 0) end--;
  return end === words.length ? words : words.slice(0, end);
}

export class BitMask {
  static readonly EMPTY = new BitMask(new Uint32Array(0));

  /** Popcount, computed on first access. */
  private count = -1;

  private constructor(private readonly words: Uint32Array) {}

  /**
   * Build a mask with the given indices set.
   *
   * @throws InvalidBitMaskError if an index is negative or not an integer
   */
  static fromIndices(indices: Iterable<number>): BitMask {
    const collected: number[] = [];
    let max = -1;
    for (const index of indices) {
      if (!Number.isSafeInteger(index) || index < 0) {
        throw new InvalidBitMaskError(`bit index ${index} is not a non-negative integer.`);
      }
      collected.push(index);
      if (index > max) max = index;
    }
    if (max < 0) return BitMask.EMPTY;

    const words = new Uint32Array(Math.floor(max / WORD_BITS) + 1);
    for (const index of collected) {
      words[Math.floor(index / WORD_BITS)] |= 1 << (index & 31);
    }
    return new BitMask(words);
  }

  /**
   * Import raw words (bit k of the concatenation = index k).
   *
   * @throws InvalidBitMaskError if a word is not an unsigned 32-bit integer
   */
  static fromWords(words: ArrayLike<number>): BitMask {
    const copy = new Uint32Array(words.length);
    for (let i = 0; i < words.length; i++) {
      const word = words[i];
      if (!Number.isInteger(word) || word < 0 || word > MAX_WORD) {
        throw new InvalidBitMaskError(`word ${i} (${word}) is not an unsigned 32-bit integer.`);
      }
      copy[i] = word;
    }
    const trimmed = trim(copy);
    return trimmed.length === 0 ? BitMask.EMPTY : new BitMask(trimmed);
  }

  /** Number of set bits. */
  get size(): number {
    if (this.count < 0) {
      let c = 0;
      for (let i = 0; i < this.words.length; i++) c += popcount(this.words[i]);
      this.count = c;
    }
    return this.count;
  }

  get isEmpty(): boolean {
    return this.words.length === 0;
  }

  /** Number of words needed to hold the highest set bit. */
  get wordCount(): number {
    return this.words.length;
  }

  has(index: number): boolean {
    if (index < 0) return false;
    const w = Math.floor(index / WORD_BITS);
    if (w >= this.words.length) return false;
    return ((this.words[w] >>> (index & 31)) & 1) === 1;
  }

  with(index: number): BitMask {
    if (this.has(index)) return this;
    if (!Number.isSafeInteger(index) || index < 0) {
      throw new InvalidBitMaskError(`bit index ${index} is not a non-negative integer.`);
    }
    const w = Math.floor(index / WORD_BITS);
    const words = new Uint32Array(Math.max(this.words.length, w + 1));
    words.set(this.words);
    words[w] |= 1 << (index & 31);
    return new BitMask(words);
  }

  without(index: number): BitMask {
    if (!this.has(index)) return this;
    const words = this.words.slice();
    words[Math.floor(index / WORD_BITS)] &= ~(1 << (index & 31));
    return BitMask.wrap(trim(words));
  }

  or(other: BitMask): BitMask {
    if (other.isEmpty) return this;
    if (this.isEmpty) return other;
    const [long, short] =
      this.words.length >= other.words.length ? [this.words, other.words] : [other.words, this.words];
    const words = long.slice();
    for (let i = 0; i < short.length; i++) words[i] |= short[i];
    return new BitMask(words);
  }

  and(other: BitMask): BitMask {
    const len = Math.min(this.words.length, other.words.length);
    const words = new Uint32Array(len);
    for (let i = 0; i < len; i++) words[i] = this.words[i] & other.words[i];
    return BitMask.wrap(trim(words));
  }

  andNot(other: BitMask): BitMask {
    if (this.isEmpty || other.isEmpty) return this;
    const words = this.words.slice();
    const len = Math.min(words.length, other.words.length);
    for (let i = 0; i < len; i++) words[i] &= ~other.words[i];
    return BitMask.wrap(trim(words));
  }

  isSubsetOf(other: BitMask): boolean {
    if (this.words.length > other.words.length) return false;
    for (let i = 0; i < this.words.length; i++) {
      if ((this.words[i] & ~other.words[i]) !== 0) return false;
    }
    return true;
  }

  equals(other: BitMask): boolean {
    if (this === other) return true;
    if (this.words.length !== other.words.length) return false;
    for (let i = 0; i < this.words.length; i++) {
      if (this.words[i] !== other.words[i]) return false;
    }
    return true;
  }

  /**
   * Set indices in ascending order, starting at `from` (inclusive).
   */
  *indices(from = 0): IterableIterator<number> {
    const start = Math.max(0, from);
    for (let w = Math.floor(start / WORD_BITS); w < this.words.length; w++) {
      let bits = this.words[w];
      if (w === Math.floor(start / WORD_BITS)) bits &= MAX_WORD << (start & 31);
      while (bits !== 0) {
        const low = bits & -bits;
        yield w * WORD_BITS + (31 - Math.clz32(low));
        bits ^= low;
      }
    }
  }

  /** Lowest set index. */
  first(): number | undefined {
    for (const index of this.indices()) return index;
    return undefined;
  }

  /** Highest set index. */
  last(): number | undefined {
    const w = this.words.length - 1;
    if (w < 0) return undefined;
    return w * WORD_BITS + (31 - Math.clz32(this.words[w]));
  }

  /**
   * Keep only the bits in `[from, until)`. Both bounds are optional.
   */
  slice(from?: number, until?: number): BitMask {
    const lower = Math.max(0, from ?? 0);
    const upper = Math.min(this.words.length * WORD_BITS, until ?? Number.POSITIVE_INFINITY);
    if (upper <= lower) return BitMask.EMPTY;
    if (lower === 0 && upper === this.words.length * WORD_BITS) return this;

    const words = this.words.slice(0, Math.ceil(upper / WORD_BITS));
    const lw = Math.floor(lower / WORD_BITS);
    words.fill(0, 0, lw);
    words[lw] &= MAX_WORD << (lower & 31);
    const rest = upper & 31;
    if (rest !== 0) words[words.length - 1] &= MAX_WORD >>> (WORD_BITS - rest);
    return BitMask.wrap(trim(words));
  }

  /**
   * Move every set bit up by `n` positions. Used to re-express a mask
   * against a lower base.
   */
  shift(n: number): BitMask {
    if (n === 0 || this.isEmpty) return this;
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new InvalidBitMaskError(`shift ${n} is not a non-negative integer.`);
    }
    const indices: number[] = [];
    for (const index of this.indices()) indices.push(index + n);
    return BitMask.fromIndices(indices);
  }

  /** Copy of the trimmed word array. */
  toWords(): number[] {
    return Array.from(this.words);
  }

  private static wrap(words: Uint32Array): BitMask {
    return words.length === 0 ? BitMask.EMPTY : new BitMask(words);
  }
}
