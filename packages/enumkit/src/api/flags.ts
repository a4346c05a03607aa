import { fromUnderlying, toUnderlying, type EnumRef } from '../core/underlying.js';
import { FlagOutOfRangeError } from '../errors/errors.js';

/*
 * Flag arithmetic on enum values used as bit masks.
 *
 * The binary operators stay internal: enums get them through
 * declareEnumAsBitSet(), which types them to a single enum. Only the flag
 * test and toggle are usable with any enum.
 */

/**
 * @returns true iff `value` survives the bitwise operators unchanged, read as
 * either a signed or an unsigned 32-bit word
 * @internal
 */
export const isFlagWord = (value: number): boolean =>
  (value | 0) === value || value >>> 0 === value;

/** @internal */
export const orFlags = <E extends number>(m1: E, m2: E): E =>
  fromUnderlying<E>(toUnderlying(m1) | toUnderlying(m2));

/** @internal */
export const andFlags = <E extends number>(m1: E, m2: E): E =>
  fromUnderlying<E>(toUnderlying(m1) & toUnderlying(m2));

/** @internal */
export const xorFlags = <E extends number>(m1: E, m2: E): E =>
  fromUnderlying<E>(toUnderlying(m1) ^ toUnderlying(m2));

/** @internal */
export const notFlags = <E extends number>(m: E): E => fromUnderlying<E>(~toUnderlying(m));

/**
 * Checks if a value in a bitset enum is set.
 *
 * Both sides are compared in the 32-bit domain of the bitwise operators, so a
 * flag on bit 31 compares equal to the result of `&`. A flag outside that
 * domain (e.g. `2 ** 32`) would be truncated, so it is rejected.
 *
 * @param x - The value to check
 * @param y - The flag to check
 * @returns true iff every bit of `y` is present in `x`
 * @throws {FlagOutOfRangeError} If `y` does not fit in 32 bits
 */
export function hasFlag<E extends number>(x: E, y: E): boolean {
  if (!isFlagWord(toUnderlying(y))) {
    throw new FlagOutOfRangeError(toUnderlying(y));
  }
  return toUnderlying(andFlags(x, y)) === (toUnderlying(y) | 0);
}

/**
 * Toggle a value in a bitset enum: clear `y` when present, set it otherwise.
 *
 * @param x - Holder of the value to change
 * @param y - The flag to toggle
 * @throws {FlagOutOfRangeError} If `x.value` or `y` does not fit in 32 bits
 */
export function toggleFlag<E extends number>(x: EnumRef<E>, y: E): void {
  if (!isFlagWord(toUnderlying(x.value))) {
    throw new FlagOutOfRangeError(toUnderlying(x.value));
  }
  if (hasFlag(x.value, y)) {
    x.value = andFlags(x.value, notFlags(y));
  } else {
    x.value = orFlags(x.value, y);
  }
}
