import { BitSetLayoutMismatchError, BitSetTruncationError } from '../errors/errors.js';
import { TruncationPolicy } from '../types/types.js';
import type { StorageType } from './storage.js';
import { fromUnderlying, toUnderlying } from './underlying.js';

/**
 * Development mode flag for conditional validation.
 * Layout identity checks are skipped in production builds.
 */
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Configuration of one family of bit-sets: the enum, the storage word and the
 * range of valid ordinals. Bit-sets are only combinable with bit-sets of the
 * same layout instance.
 *
 * Create layouts with defineEnumBitSet(); it validates the options.
 *
 * @template E - Enum the bit-sets range over
 * @template T - JavaScript type of the storage word
 */
export class EnumBitSetLayout<E extends number, T extends number | bigint = number> {
  /** Bits that correspond to valid ordinals: `max >> (digits - end)` */
  readonly mask: T;

  constructor(
    readonly storage: StorageType<T>,
    readonly end: number,
    readonly name: string,
    readonly truncation: TruncationPolicy = TruncationPolicy.Silent
  ) {
    this.mask = storage.lowMask(end);
  }

  /**
   * Single-bit word for an enum value, already masked.
   *
   * This is the one place an enum value becomes a bit position; set, reset,
   * flip and test all go through it. Values at or past `end` map to zero.
   */
  bitFor(value: E): T {
    return this.storage.and(this.storage.bit(toUnderlying(value)), this.mask);
  }

  empty(): EnumBitSet<E, T> {
    return new EnumBitSet(this);
  }

  /**
   * Bit-set holding the given values. Duplicates are harmless.
   */
  of(...values: E[]): EnumBitSet<E, T> {
    return new EnumBitSet(this, values);
  }

  from(values: Iterable<E>): EnumBitSet<E, T> {
    return new EnumBitSet(this, values);
  }

  /**
   * Bit-set from a raw storage word, e.g. one read back from disk.
   *
   * The word is reduced to the storage width and masked, so bits outside the
   * layout never reach the set. What happens to dropped bits depends on the
   * layout's truncation policy.
   */
  fromBase(raw: T): EnumBitSet<E, T> {
    return EnumBitSet.fromBase(this, raw);
  }

  /**
   * @returns true iff `raw` already fits the storage width and the mask
   */
  isValidBase(raw: T): boolean {
    return this.storage.and(this.storage.wrap(raw), this.mask) === raw;
  }

  /**
   * Mask a raw word, applying the truncation policy when bits are dropped.
   * @internal Used by EnumBitSet.fromBase()
   */
  truncate(raw: T): T {
    const masked = this.storage.and(this.storage.wrap(raw), this.mask);
    if (masked === raw || this.truncation === TruncationPolicy.Silent) return masked;

    const mask = this.storage.format(this.mask);
    if (this.truncation === TruncationPolicy.Throw) {
      throw new BitSetTruncationError(this.name, String(raw), mask);
    }

    console.warn(
      `[enumkit] Raw word ${String(raw)} of '${this.name}' has bits outside mask ${mask}; ` +
        `kept ${this.storage.format(masked)}.`
    );
    return masked;
  }
}

/**
 * Subset of an enum's values packed into one storage word.
 *
 * Bit `toUnderlying(v)` is set iff `v` is a member. Mutators return the set
 * for chaining.
 *
 * @example
 * ```typescript
 * enum Direction { North, East, South, West }
 * const DirectionSet = defineEnumBitSet(Direction, Uint8, { end: Direction.West + 1 });
 *
 * const seen = DirectionSet.empty().set(Direction.North).set(Direction.South);
 * seen.base(); // 0b0101
 * seen.test(Direction.East); // false
 * ```
 */
export class EnumBitSet<E extends number, T extends number | bigint = number>
  implements Iterable<E>
{
  private data: T;

  constructor(
    readonly layout: EnumBitSetLayout<E, T>,
    values: Iterable<E> = []
  ) {
    this.data = layout.storage.zero;
    for (const value of values) {
      this.set(value);
    }
  }

  /**
   * Bit-set from a raw storage word; see {@link EnumBitSetLayout.fromBase}.
   */
  static fromBase<E extends number, T extends number | bigint>(
    layout: EnumBitSetLayout<E, T>,
    raw: T
  ): EnumBitSet<E, T> {
    const result = new EnumBitSet(layout);
    result.data = layout.truncate(raw);
    return result;
  }

  /**
   * Order by storage word, for `Array.prototype.sort`.
   */
  static compare<E extends number, T extends number | bigint>(
    a: EnumBitSet<E, T>,
    b: EnumBitSet<E, T>
  ): number {
    return a.compare(b);
  }

  set(value: E): this {
    this.data = this.layout.storage.or(this.data, this.layout.bitFor(value));
    return this;
  }

  reset(value: E): this {
    this.data = this.layout.storage.andNot(this.data, this.layout.bitFor(value));
    return this;
  }

  flip(value: E): this {
    if (this.test(value)) {
      return this.reset(value);
    } else {
      return this.set(value);
    }
  }

  test(value: E): boolean {
    const { storage } = this.layout;
    return storage.and(this.data, this.layout.bitFor(value)) !== storage.zero;
  }

  /**
   * @returns true iff every value set in `other` is set here
   */
  all(other: EnumBitSet<E, T>): boolean {
    this.assertSameLayout(other);
    return this.layout.storage.and(this.data, other.data) === other.data;
  }

  /**
   * @returns true iff at least one value is set in both
   */
  any(other: EnumBitSet<E, T>): boolean {
    this.assertSameLayout(other);
    const { storage } = this.layout;
    return storage.and(this.data, other.data) !== storage.zero;
  }

  /** Union */
  or(other: EnumBitSet<E, T>): EnumBitSet<E, T> {
    this.assertSameLayout(other);
    return EnumBitSet.fromBase(this.layout, this.layout.storage.or(this.data, other.data));
  }

  /** Intersection */
  and(other: EnumBitSet<E, T>): EnumBitSet<E, T> {
    this.assertSameLayout(other);
    return EnumBitSet.fromBase(this.layout, this.layout.storage.and(this.data, other.data));
  }

  /**
   * Test that no bit outside the layout mask is set.
   *
   * Every path that writes the word masks it, so this is always true for sets
   * built through the layout. Check untrusted raw words with
   * {@link EnumBitSetLayout.isValidBase} before handing them to fromBase().
   */
  isValid(): boolean {
    return this.layout.storage.and(this.data, this.layout.mask) === this.data;
  }

  /**
   * Raw storage word, for serialization.
   */
  base(): T {
    return this.data;
  }

  equals(other: EnumBitSet<E, T>): boolean {
    this.assertSameLayout(other);
    return this.data === other.data;
  }

  /**
   * Compare storage words. Not a subset order.
   * @returns negative, zero or positive like a sort comparator
   */
  compare(other: EnumBitSet<E, T>): number {
    this.assertSameLayout(other);
    return this.layout.storage.compare(this.data, other.data);
  }

  clone(): EnumBitSet<E, T> {
    return EnumBitSet.fromBase(this.layout, this.data);
  }

  /**
   * Members in ascending ordinal order.
   */
  *[Symbol.iterator](): IterableIterator<E> {
    for (let position = 0; position < this.layout.end; position++) {
      const value = fromUnderlying<E>(position);
      if (this.test(value)) yield value;
    }
  }

  private assertSameLayout(other: EnumBitSet<E, T>): void {
    if (!IS_DEV) return;
    if (other.layout !== this.layout) {
      throw new BitSetLayoutMismatchError(this.layout.name, other.layout.name);
    }
  }
}
