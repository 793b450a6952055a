/**
 * Fixed-size bit-set over the slots of one link.
 *
 * Slots are packed 32 per word into a `Uint32Array` so that range checks and
 * range updates touch one word per 32 slots instead of one cell per slot.
 * Bits past `size` in the last word are never set; scans treat them as the
 * end of the spectrum.
 *
 * Note: not thread-safe; intended for typical single-threaded JS execution.
 */

const WORD_BITS = 32;
const WORD_SHIFT = 5;
const WORD_MASK = 31;

/** Count trailing zero bits of a non-zero 32-bit value. */
function ctz(word: number): number {
  return 31 - Math.clz32(word & -word);
}

/** Population count of a 32-bit value. */
function popcount(word: number): number {
  let v = word - ((word >>> 1) & 0x55555555);
  v = (v & 0x33333333) + ((v >>> 2) & 0x33333333);
  return (((v + (v >>> 4)) & 0x0f0f0f0f) * 0x01010101) >>> 24;
}

export class SlotBitset {
  /** Number of addressable slots. */
  readonly size: number;
  /** Packed occupancy words; bit `s & 31` of word `s >>> 5` is slot `s`. */
  readonly words: Uint32Array;

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 0)
      throw new RangeError(`bitset size must be a non-negative integer (got ${size})`);
    this.size = size;
    this.words = new Uint32Array(Math.ceil(size / WORD_BITS));
  }

  /**
   * Visit the words overlapped by `[start, end)` together with the mask of
   * bits inside the range for each word. Caller guarantees bounds.
   */
  private forEachWord(
    start: number,
    end: number,
    visit: (wordIndex: number, mask: number) => boolean | void
  ): boolean {
    let pos = start;
    while (pos < end) {
      const wordIndex = pos >>> WORD_SHIFT;
      const stop = Math.min(end, (wordIndex + 1) << WORD_SHIFT);
      const width = stop - pos;
      const mask = ((0xffffffff >>> (WORD_BITS - width)) << (pos & WORD_MASK)) >>> 0;
      if (visit(wordIndex, mask) === false) return false;
      pos = stop;
    }
    return true;
  }

  private inBounds(start: number, length: number): boolean {
    return (
      Number.isInteger(start) &&
      Number.isInteger(length) &&
      start >= 0 &&
      length > 0 &&
      start + length <= this.size
    );
  }

  /** Whether slot `slot` is occupied. Out-of-range slots read as free. */
  has(slot: number): boolean {
    if (!Number.isInteger(slot) || slot < 0 || slot >= this.size) return false;
    return ((this.words[slot >>> WORD_SHIFT] >>> (slot & WORD_MASK)) & 1) === 1;
  }

  /** Whether every slot of `[start, start + length)` is free. False when out of bounds. */
  isRangeFree(start: number, length: number): boolean {
    if (!this.inBounds(start, length)) return false;
    return this.forEachWord(
      start,
      start + length,
      (w, mask) => (this.words[w] & mask) === 0
    );
  }

  /** Mark `[start, start + length)` occupied. Returns false (no mutation) when out of bounds. */
  setRange(start: number, length: number): boolean {
    if (!this.inBounds(start, length)) return false;
    this.forEachWord(start, start + length, (w, mask) => {
      this.words[w] |= mask;
    });
    return true;
  }

  /** Mark `[start, start + length)` free. Returns false (no mutation) when out of bounds. */
  clearRange(start: number, length: number): boolean {
    if (!this.inBounds(start, length)) return false;
    this.forEachWord(start, start + length, (w, mask) => {
      this.words[w] &= ~mask;
    });
    return true;
  }

  /** Index of the first free slot at or after `from`, or `size` when none. */
  nextClear(from: number): number {
    let pos = Math.max(0, from);
    while (pos < this.size) {
      const w = pos >>> WORD_SHIFT;
      const free = ~this.words[w] & (0xffffffff << (pos & WORD_MASK));
      if (free !== 0) return Math.min(this.size, (w << WORD_SHIFT) + ctz(free));
      pos = (w + 1) << WORD_SHIFT;
    }
    return this.size;
  }

  /** Index of the first occupied slot at or after `from`, or `size` when none. */
  nextSet(from: number): number {
    let pos = Math.max(0, from);
    while (pos < this.size) {
      const w = pos >>> WORD_SHIFT;
      const used = this.words[w] & (0xffffffff << (pos & WORD_MASK));
      if (used !== 0) return Math.min(this.size, (w << WORD_SHIFT) + ctz(used));
      pos = (w + 1) << WORD_SHIFT;
    }
    return this.size;
  }

  /** Highest occupied slot index, or -1 when empty. */
  highestSet(): number {
    for (let w = this.words.length - 1; w >= 0; w--) {
      const word = this.words[w];
      if (word !== 0) return (w << WORD_SHIFT) + 31 - Math.clz32(word);
    }
    return -1;
  }

  /** Number of occupied slots. */
  count(): number {
    let total = 0;
    for (let w = 0; w < this.words.length; w++) total += popcount(this.words[w]);
    return total;
  }

  /** Occupy every slot. */
  fill() {
    if (this.size > 0) this.setRange(0, this.size);
  }

  /** Free every slot. */
  clear() {
    this.words.fill(0);
  }

  /** OR `other` into this set (sizes must match). */
  orWith(other: SlotBitset) {
    if (other.size !== this.size)
      throw new RangeError(`bitset size mismatch (${this.size} vs ${other.size})`);
    for (let w = 0; w < this.words.length; w++) this.words[w] |= other.words[w];
  }

  /** Union of several equally sized sets, as a fresh set. */
  static union(size: number, sets: Iterable<SlotBitset>): SlotBitset {
    const merged = new SlotBitset(size);
    for (const set of sets) merged.orWith(set);
    return merged;
  }
}
