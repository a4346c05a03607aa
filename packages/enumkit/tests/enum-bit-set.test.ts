import { describe, expect, it, vi } from 'vitest';

import { defineEnumBitSet } from '../src/api/define.js';
import { EnumBitSet } from '../src/core/enum-bit-set.js';
import { Uint32, Uint64, Uint8 } from '../src/core/storage.js';
import { enumEnd, enumValues } from '../src/core/underlying.js';
import { BitSetLayoutMismatchError, BitSetTruncationError } from '../src/errors/errors.js';
import { TruncationPolicy } from '../src/types/types.js';

enum Direction {
  North,
  East,
  South,
  West,
}

const DirectionSet = defineEnumBitSet(Direction, Uint8, {
  end: Direction.West + 1,
  name: 'Compass',
});

describe('EnumBitSet', () => {
  it('masks a four-value compass in an 8-bit word', () => {
    expect(DirectionSet.mask).toBe(0b0000_1111);

    const seen = DirectionSet.empty().set(Direction.North).set(Direction.South);

    expect(seen.base()).toBe(0b0000_0101);
    expect(seen.test(Direction.East)).toBe(false);
    expect(seen.all(DirectionSet.of(Direction.North, Direction.South))).toBe(true);
    expect(seen.any(DirectionSet.of(Direction.East, Direction.West))).toBe(false);
  });

  it('sets one value without touching the others', () => {
    for (const value of enumValues(Direction)) {
      const set = DirectionSet.empty();
      expect(set.test(value)).toBe(false);

      set.set(value);
      for (const other of enumValues(Direction)) {
        expect(set.test(other)).toBe(other === value);
      }
    }
  });

  it('builds single-value sets through of() and the constructor', () => {
    expect(DirectionSet.of(Direction.West).base()).toBe(0b1000);
    expect(new EnumBitSet(DirectionSet, [Direction.East]).base()).toBe(0b0010);
    expect(DirectionSet.from(new Set([Direction.East, Direction.South])).base()).toBe(0b0110);
  });

  it('treats flip as its own inverse', () => {
    for (const value of enumValues(Direction)) {
      const set = DirectionSet.of(Direction.East);
      const before = set.base();

      set.flip(value).flip(value);
      expect(set.base()).toBe(before);
    }
  });

  it('flips a bit on and off', () => {
    const set = DirectionSet.empty();

    expect(set.flip(Direction.South).test(Direction.South)).toBe(true);
    expect(set.flip(Direction.South).test(Direction.South)).toBe(false);
  });

  it('resets idempotently', () => {
    const set = DirectionSet.of(Direction.North, Direction.West);

    set.reset(Direction.West);
    expect(set.base()).toBe(0b0001);
    set.reset(Direction.West);
    expect(set.base()).toBe(0b0001);
  });

  it('matches sequential set() calls when built from a list with duplicates', () => {
    const listed = DirectionSet.of(Direction.West, Direction.North, Direction.West);
    const stepped = DirectionSet.empty()
      .set(Direction.West)
      .set(Direction.North)
      .set(Direction.West);

    expect(listed.equals(stepped)).toBe(true);
    expect(listed.base()).toBe(0b1001);
  });

  it('answers all() and any() reflexively and vacuously', () => {
    const x = DirectionSet.of(Direction.North, Direction.West);
    const empty = DirectionSet.empty();

    expect(x.all(x)).toBe(true);
    expect(x.any(x)).toBe(true);
    expect(x.all(empty)).toBe(true);
    expect(x.any(empty)).toBe(false);
    expect(x.all(DirectionSet.of(Direction.North, Direction.East))).toBe(false);
    expect(x.any(DirectionSet.of(Direction.East, Direction.West))).toBe(true);
  });

  it('masks out-of-range bits of a raw word', () => {
    const set = DirectionSet.fromBase(0b1111_0110);

    expect(set.base()).toBe(0b0110);
    expect(set.isValid()).toBe(true);
    expect(DirectionSet.isValidBase(0b1111_0110)).toBe(false);
    expect(DirectionSet.isValidBase(0b0110)).toBe(true);
  });

  it('reduces negative raw words to the storage width before masking', () => {
    expect(DirectionSet.fromBase(-1).base()).toBe(0b1111);
    expect(DirectionSet.isValidBase(-1)).toBe(false);
  });

  it('combines sets with or() and and()', () => {
    const a = DirectionSet.of(Direction.North, Direction.East);
    const b = DirectionSet.of(Direction.East, Direction.South);
    const c = DirectionSet.of(Direction.West);

    expect(a.or(b).base()).toBe(0b0111);
    expect(a.and(b).base()).toBe(0b0010);

    expect(a.or(c).base()).toBe(0b1011);
    expect(a.and(c).base()).toBe(0);
  });

  it('keeps or() and and() commutative and absorbing for every pair', () => {
    const all = Array.from({ length: 16 }, (_, raw) => DirectionSet.fromBase(raw));

    for (const a of all) {
      for (const b of all) {
        expect(a.or(b).equals(b.or(a))).toBe(true);
        expect(a.and(b).equals(b.and(a))).toBe(true);
        expect(a.or(b).and(a).equals(a)).toBe(true);
        expect(a.and(b).or(a).equals(a)).toBe(true);
      }
    }
  });

  it('keeps or() and and() associative for every triple', () => {
    const all = Array.from({ length: 16 }, (_, raw) => DirectionSet.fromBase(raw));

    for (const a of all) {
      for (const b of all) {
        for (const c of all) {
          expect(a.or(b).or(c).base()).toBe(a.or(b.or(c)).base());
          expect(a.and(b).and(c).base()).toBe(a.and(b.and(c)).base());
        }
      }
    }
  });

  it('returns new sets from or() and and()', () => {
    const a = DirectionSet.of(Direction.North);
    const union = a.or(DirectionSet.of(Direction.West));

    expect(union).not.toBe(a);
    expect(a.base()).toBe(0b0001);
  });

  it('orders sets by storage word', () => {
    const sets = [
      DirectionSet.of(Direction.South),
      DirectionSet.of(Direction.North),
      DirectionSet.of(Direction.East, Direction.North),
    ];

    const sorted = [...sets].sort(EnumBitSet.compare);

    expect(sorted.map((set) => set.base())).toEqual([0b0001, 0b0011, 0b0100]);
    expect(DirectionSet.of(Direction.North).compare(DirectionSet.of(Direction.North))).toBe(0);
    expect(DirectionSet.of(Direction.West).compare(DirectionSet.of(Direction.South))).toBe(1);
  });

  it('copies by value with clone()', () => {
    const original = DirectionSet.of(Direction.North);
    const copy = original.clone().set(Direction.West);

    expect(original.test(Direction.West)).toBe(false);
    expect(copy.base()).toBe(0b1001);
    expect(copy.layout).toBe(DirectionSet);
  });

  it('iterates members in ascending order', () => {
    const set = DirectionSet.of(Direction.West, Direction.North, Direction.South);

    expect([...set]).toEqual([Direction.North, Direction.South, Direction.West]);
    expect([...DirectionSet.empty()]).toEqual([]);
  });

  it('never stores members at or past the end value', () => {
    enum Tile {
      Grass,
      Water,
      Rock,
      Invalid = 0xff,
    }
    const TileSet = defineEnumBitSet(Tile, Uint8, { end: Tile.Rock + 1 });

    const set = TileSet.of(Tile.Water).set(Tile.Invalid);

    expect(set.base()).toBe(0b010);
    expect(set.test(Tile.Invalid)).toBe(false);
    expect(set.isValid()).toBe(true);
  });

  it('keeps an end value of zero empty', () => {
    const Nothing = defineEnumBitSet(Direction, Uint8, { end: 0 });

    expect(Nothing.mask).toBe(0);
    expect(Nothing.of(Direction.North).base()).toBe(0);
  });

  it('rejects sets of a different layout in development builds', () => {
    const Other = defineEnumBitSet(Direction, Uint8, { end: 4, name: 'OtherCompass' });
    const mine = DirectionSet.of(Direction.North);
    const theirs = Other.of(Direction.North);

    expect(() => mine.all(theirs)).toThrow(BitSetLayoutMismatchError);
    expect(() => mine.any(theirs)).toThrow(BitSetLayoutMismatchError);
    expect(() => mine.or(theirs)).toThrow(BitSetLayoutMismatchError);
    expect(() => mine.and(theirs)).toThrow(BitSetLayoutMismatchError);
    expect(() => mine.equals(theirs)).toThrow(BitSetLayoutMismatchError);
    expect(() => mine.compare(theirs)).toThrow(BitSetLayoutMismatchError);
  });
});

describe('EnumBitSet on wide storage', () => {
  it('uses the top bit of a 32-bit word as an unsigned value', () => {
    enum Bit {
      Low = 0,
      High = 31,
    }
    const BitSet32 = defineEnumBitSet(Bit, Uint32);

    const set = BitSet32.of(Bit.High);

    expect(BitSet32.mask).toBe(0xffffffff);
    expect(set.base()).toBe(0x80000000);
    expect(set.test(Bit.High)).toBe(true);
    expect(set.set(Bit.Low).base()).toBe(0x80000001);
    expect(set.reset(Bit.High).base()).toBe(1);
  });

  it('stores 64 positions in a bigint word', () => {
    enum Slot {
      First = 0,
      Middle = 31,
      Last = 63,
    }
    const SlotSet = defineEnumBitSet(Slot, Uint64);

    const set = SlotSet.of(Slot.First, Slot.Last);

    expect(SlotSet.mask).toBe(0xffff_ffff_ffff_ffffn);
    expect(set.base()).toBe(0x8000_0000_0000_0001n);
    expect(set.test(Slot.Middle)).toBe(false);
    expect([...set]).toEqual([Slot.First, Slot.Last]);
    expect(set.flip(Slot.Last).base()).toBe(1n);
  });

  it('masks bigint raw words', () => {
    enum Slot {
      First,
      Second,
    }
    const SlotSet = defineEnumBitSet(Slot, Uint64, { end: 40 });

    expect(SlotSet.mask).toBe((1n << 40n) - 1n);
    expect(SlotSet.fromBase((1n << 50n) | 2n).base()).toBe(2n);
    expect(SlotSet.fromBase(-1n).base()).toBe((1n << 40n) - 1n);
    expect(SlotSet.isValidBase(2n)).toBe(true);
    expect(SlotSet.isValidBase(-1n)).toBe(false);
    expect(SlotSet.fromBase(3n).test(Slot.Second)).toBe(true);
  });
});

describe('EnumBitSet truncation policy', () => {
  it('drops extra bits silently by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(DirectionSet.truncation).toBe(TruncationPolicy.Silent);
    expect(DirectionSet.fromBase(0b1_0001).base()).toBe(0b0001);
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns once when dropping bits under the warn policy', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const Loud = defineEnumBitSet(Direction, Uint8, {
      end: enumEnd(Direction),
      name: 'LoudCompass',
      truncation: TruncationPolicy.Warn,
    });

    expect(Loud.fromBase(0b1_1111).base()).toBe(0b1111);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "[enumkit] Raw word 31 of 'LoudCompass' has bits outside mask 0b00001111; kept 0b00001111."
    );

    Loud.fromBase(0b0011);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('rejects the word under the throw policy', () => {
    const Strict = defineEnumBitSet(Direction, Uint8, {
      end: enumEnd(Direction),
      name: 'StrictCompass',
      truncation: TruncationPolicy.Throw,
    });

    let caught: unknown;
    try {
      Strict.fromBase(0b1_0000);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(BitSetTruncationError);
    if (caught instanceof BitSetTruncationError) {
      expect(caught.layoutName).toBe('StrictCompass');
      expect(caught.raw).toBe('16');
      expect(caught.mask).toBe('0b00001111');
    }
    expect(Strict.fromBase(0b0101).base()).toBe(0b0101);
  });

  it('does not consult the policy for words built from other sets', () => {
    const Strict = defineEnumBitSet(Direction, Uint8, {
      end: 4,
      truncation: TruncationPolicy.Throw,
    });
    const a = Strict.of(Direction.North);

    expect(a.or(Strict.of(Direction.West)).base()).toBe(0b1001);
    expect(a.clone().base()).toBe(0b0001);
  });
});
