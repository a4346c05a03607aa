import { EnumBitSetLayout } from '../core/enum-bit-set.js';
import { isStorageType, type StorageType } from '../core/storage.js';
import type { EnumObject, EnumValue } from '../core/underlying.js';
import { InvalidBitSetConfigError } from '../errors/errors.js';
import { TruncationPolicy, isTruncationPolicy, type EnumBitSetOptions } from '../types/types.js';

/**
 * Define a bit-set layout over a numeric enum.
 *
 * The returned layout is the factory for bit-sets of that enum
 * (`empty()`, `of()`, `from()`, `fromBase()`), and carries the mask.
 *
 * @param enumObject - The enum the sets range over
 * @param storage - Word type: Uint8, Uint16, Uint32 or Uint64
 * @param options - `end` (last valid value + 1), `name`, `truncation`
 * @throws InvalidBitSetConfigError when the inputs do not describe a layout
 *
 * @example
 * ```typescript
 * enum Direction { North, East, South, West }
 * const DirectionSet = defineEnumBitSet(Direction, Uint8, { end: enumEnd(Direction) });
 *
 * DirectionSet.mask; // 0b0000_1111
 * DirectionSet.of(Direction.North, Direction.South).base(); // 0b0000_0101
 * ```
 */
export function defineEnumBitSet<O extends EnumObject, T extends number | bigint>(
  enumObject: O,
  storage: StorageType<T>,
  options: EnumBitSetOptions = {}
): EnumBitSetLayout<EnumValue<O>, T> {
  if (typeof enumObject !== 'object' || enumObject === null) {
    throw new InvalidBitSetConfigError('enum object must be a non-null object');
  }
  if (!isStorageType(storage)) {
    throw new InvalidBitSetConfigError('storage must be one of Uint8, Uint16, Uint32, Uint64');
  }

  const end = options.end ?? storage.digits;
  if (!Number.isInteger(end) || end < 0 || end > storage.digits) {
    throw new InvalidBitSetConfigError(
      `end must be an integer between 0 and ${storage.digits} for ${storage.name} storage, got ${String(end)}`
    );
  }

  const truncation = options.truncation ?? TruncationPolicy.Silent;
  if (!isTruncationPolicy(truncation)) {
    throw new InvalidBitSetConfigError(`unknown truncation policy '${String(truncation)}'`);
  }

  const name = options.name ?? `EnumBitSet<${storage.name}>`;
  return new EnumBitSetLayout<EnumValue<O>, T>(storage, end, name, truncation);
}
