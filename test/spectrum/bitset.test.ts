import { SlotBitset } from '../../src/spectrum/bitset';

describe('SlotBitset', () => {
  describe('Scenario: range spanning a word boundary', () => {
    const set = new SlotBitset(70);
    set.setRange(30, 5); // slots 30..34 straddle words 0 and 1
    it('marks every slot of the range', () => {
      expect([29, 30, 31, 32, 34, 35].map((s) => set.has(s))).toEqual([
        false,
        true,
        true,
        true,
        true,
        false,
      ]);
    });
    it('counts the occupied slots', () => {
      expect(set.count()).toBe(5);
    });
    it('reports the highest occupied slot', () => {
      expect(set.highestSet()).toBe(34);
    });
    it('finds the next free slot after the range', () => {
      expect(set.nextClear(30)).toBe(35);
    });
    it('finds the start of the range from below', () => {
      expect(set.nextSet(0)).toBe(30);
    });
  });

  describe('bounds checks', () => {
    const set = new SlotBitset(10);
    it('rejects a range running past the end', () => {
      expect(set.setRange(8, 3)).toBe(false);
    });
    it('rejects a negative start', () => {
      expect(set.isRangeFree(-1, 2)).toBe(false);
    });
    it('rejects a zero length', () => {
      expect(set.clearRange(0, 0)).toBe(false);
    });
    it('leaves the set untouched after rejected writes', () => {
      expect(set.count()).toBe(0);
    });
    it('reads out-of-range slots as free', () => {
      expect(set.has(10)).toBe(false);
    });
  });

  describe('scans on an empty or full set', () => {
    it('returns size from nextSet when nothing is occupied', () => {
      expect(new SlotBitset(40).nextSet(0)).toBe(40);
    });
    it('returns size from nextClear when everything is occupied', () => {
      const full = new SlotBitset(40);
      full.fill();
      expect(full.nextClear(0)).toBe(40);
    });
    it('returns -1 from highestSet on an empty set', () => {
      expect(new SlotBitset(40).highestSet()).toBe(-1);
    });
    it('fills exactly size slots', () => {
      const full = new SlotBitset(40);
      full.fill();
      expect(full.count()).toBe(40);
    });
  });

  describe('clearRange()', () => {
    const set = new SlotBitset(64);
    set.setRange(0, 64);
    set.clearRange(10, 40);
    it('frees only the requested slots', () => {
      expect(set.count()).toBe(24);
    });
    it('leaves the window free', () => {
      expect(set.isRangeFree(10, 40)).toBe(true);
    });
  });

  describe('union()', () => {
    const a = new SlotBitset(20);
    const b = new SlotBitset(20);
    a.setRange(5, 6);
    b.setRange(8, 5);
    const merged = SlotBitset.union(20, [a, b]);
    it('holds the slots occupied on either set', () => {
      expect(merged.count()).toBe(8); // 5..12
    });
    it('does not modify its inputs', () => {
      expect([a.count(), b.count()]).toEqual([6, 5]);
    });
    it('throws on size mismatch', () => {
      expect(() => SlotBitset.union(20, [new SlotBitset(21)])).toThrow(RangeError);
    });
  });

  it('throws for a negative size', () => {
    expect(() => new SlotBitset(-1)).toThrow(RangeError);
  });
});
