/***
 * BitSet — number[]-backed bit set, used as an archetype's component mask.
 *
 * Bit n is ComponentID n. Lookups are O(1); mask comparisons are
 * O(words). Trailing zero words are ignored by equals() and hash(), so two
 * masks with the same bits compare equal whatever their capacity.
 *
 ***/

import { FNV_OFFSET_BASIS, FNV_PRIME } from "utils/constants";

const INITIAL_WORD_COUNT = 2; // 64 component IDs before first grow

export class BitSet {
  _words: number[];

  constructor(words?: number[]) {
    this._words = words ?? new Array<number>(INITIAL_WORD_COUNT).fill(0);
  }

  static of(bits: Iterable<number>): BitSet {
    const set = new BitSet();
    for (const bit of bits) set.set(bit);
    return set;
  }

  has(bit: number): boolean {
    const word_index = bit >>> 5;
    if (word_index >= this._words.length) return false;
    return (this._words[word_index] & (1 << (bit & 31))) !== 0;
  }

  set(bit: number): void {
    const word_index = bit >>> 5;
    if (word_index >= this._words.length) this.grow(word_index + 1);
    this._words[word_index] |= 1 << (bit & 31);
  }

  clear(bit: number): void {
    const word_index = bit >>> 5;
    if (word_index >= this._words.length) return;
    this._words[word_index] &= ~(1 << (bit & 31));
  }

  is_empty(): boolean {
    for (let i = 0; i < this._words.length; i++) {
      if (this._words[i] !== 0) return false;
    }
    return true;
  }

  /** True if the two sets share at least one bit. */
  overlaps(other: BitSet): boolean {
    const a = this._words;
    const b = other._words;
    const len = Math.min(a.length, b.length);
    for (let i = 0; i < len; i++) {
      if ((a[i] & b[i]) !== 0) return true;
    }
    return false;
  }

  /** True if every bit of `other` is set here. */
  contains(other: BitSet): boolean {
    const mine = this._words;
    const theirs = other._words;
    for (let i = 0; i < theirs.length; i++) {
      const o = theirs[i];
      if (o === 0) continue;
      if (i >= mine.length || (mine[i] & o) !== o) return false;
    }
    return true;
  }

  equals(other: BitSet): boolean {
    const a = this._words;
    const b = other._words;
    const max = Math.max(a.length, b.length);
    for (let i = 0; i < max; i++) {
      if ((a[i] ?? 0) !== (b[i] ?? 0)) return false;
    }
    return true;
  }

  copy(): BitSet {
    return new BitSet(this._words.slice());
  }

  with(bit: number): BitSet {
    const next = this.copy();
    next.set(bit);
    return next;
  }

  without(bit: number): BitSet {
    const next = this.copy();
    next.clear(bit);
    return next;
  }

  /** FNV-1a over the words up to the last non-zero one. */
  hash(): number {
    const words = this._words;
    let last = words.length - 1;
    while (last >= 0 && words[last] === 0) last--;

    let h = FNV_OFFSET_BASIS;
    for (let i = 0; i <= last; i++) {
      h ^= words[i];
      h = Math.imul(h, FNV_PRIME);
    }
    return h;
  }

  /** Visit set bits in ascending order. */
  for_each(fn: (bit: number) => void): void {
    const words = this._words;
    for (let i = 0; i < words.length; i++) {
      let word = words[i];
      const base = i << 5;
      while (word !== 0) {
        // isolate the lowest set bit, then clear it
        const low = word & (-word >>> 0);
        fn(base + 31 - Math.clz32(low));
        word ^= low;
      }
    }
  }

  to_array(): number[] {
    const bits: number[] = [];
    this.for_each((bit) => bits.push(bit));
    return bits;
  }

  private grow(min_words: number): void {
    let cap = Math.max(this._words.length, 1);
    while (cap < min_words) cap *= 2;
    const next = new Array<number>(cap).fill(0);
    for (let i = 0; i < this._words.length; i++) next[i] = this._words[i];
    this._words = next;
  }
}
