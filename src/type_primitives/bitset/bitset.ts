/***
 * BitSet — number[]-backed bit set with auto-grow.
 *
 * Three kinds of set share this type: an entity's component bits (one
 * bit per ComponentBit), an entity's family bits (one bit per
 * FamilyIndex) and the masks a Family tests against. has/set/clear are
 * O(1); mask comparisons (contains, overlaps, equals) are O(words).
 *
 * Bit layout within each 32-bit word:
 *   word_index = bit >>> 5       (divide by 32)
 *   bit_offset = bit & 31        (mod 32)
 *   test:  word & (1 << offset)
 *   set:   word |= (1 << offset)
 *   clear: word &= ~(1 << offset)
 *
 ***/

import {
  BITS_PER_WORD_MASK,
  BITS_PER_WORD_SHIFT,
  FNV_OFFSET_BASIS,
  FNV_PRIME,
  INITIAL_BITSET_WORDS,
} from "utils/constants";

export class BitSet {
  private words: number[];

  constructor(words?: number[]) {
    this.words = words ?? new Array<number>(INITIAL_BITSET_WORDS).fill(0);
  }

  has(bit: number): boolean {
    const word_index = bit >>> BITS_PER_WORD_SHIFT;
    if (word_index >= this.words.length) return false;
    return (this.words[word_index] & (1 << (bit & BITS_PER_WORD_MASK))) !== 0;
  }

  set(bit: number): void {
    const word_index = bit >>> BITS_PER_WORD_SHIFT;
    if (word_index >= this.words.length) this.grow(word_index + 1);
    this.words[word_index] |= 1 << (bit & BITS_PER_WORD_MASK);
  }

  clear(bit: number): void {
    const word_index = bit >>> BITS_PER_WORD_SHIFT;
    if (word_index >= this.words.length) return;
    this.words[word_index] &= ~(1 << (bit & BITS_PER_WORD_MASK));
  }

  is_empty(): boolean {
    const words = this.words;
    for (let i = 0; i < words.length; i++) {
      if (words[i] !== 0) return false;
    }
    return true;
  }

  /** True if any bit is set in both this and other (non-empty intersection). */
  overlaps(other: BitSet): boolean {
    const a = this.words,
      b = other.words;
    const len = a.length < b.length ? a.length : b.length;
    for (let i = 0; i < len; i++) {
      if ((a[i] & b[i]) !== 0) return true;
    }
    return false;
  }

  /** True if this is a superset of other (all bits in other are set in this). */
  contains(other: BitSet): boolean {
    const other_words = other.words;
    const this_words = this.words;

    for (let i = 0; i < other_words.length; i++) {
      const o = other_words[i];
      if (o === 0) continue;
      if (i >= this_words.length) return false;
      if ((this_words[i] & o) !== o) return false;
    }
    return true;
  }

  equals(other: BitSet): boolean {
    const a = this.words;
    const b = other.words;
    const max = a.length > b.length ? a.length : b.length;

    for (let i = 0; i < max; i++) {
      const va = i < a.length ? a[i] : 0;
      const vb = i < b.length ? b[i] : 0;
      if (va !== vb) return false;
    }
    return true;
  }

  /** FNV-1a hash. Trailing zero words are skipped so equal sets hash equally whatever their backing length. */
  hash(): number {
    let h = FNV_OFFSET_BASIS;
    const words = this.words;
    let last = words.length - 1;
    while (last >= 0 && words[last] === 0) last--;

    for (let i = 0; i <= last; i++) {
      h ^= words[i];
      h = Math.imul(h, FNV_PRIME);
    }
    return h;
  }

  /** Iterate all set bits in ascending order via lowest-set-bit extraction. */
  for_each(fn: (bit: number) => void): void {
    const words = this.words;
    for (let i = 0; i < words.length; i++) {
      let word = words[i];
      if (word === 0) continue;
      const base = i << BITS_PER_WORD_SHIFT;
      while (word !== 0) {
        // Isolate lowest set bit: 0b1010 → 0b0010
        const t = word & (-word >>> 0);
        // clz32(0b0010) = 30 → bit 1
        fn(base + 31 - Math.clz32(t));
        word ^= t;
      }
    }
  }

  to_array(): number[] {
    const bits: number[] = [];
    this.for_each((bit) => bits.push(bit));
    return bits;
  }

  private grow(min_words: number): void {
    let cap = this.words.length > 0 ? this.words.length : 1;
    while (cap < min_words) cap *= 2;
    const next = new Array<number>(cap).fill(0);
    for (let i = 0; i < this.words.length; i++) next[i] = this.words[i];
    this.words = next;
  }
}
