import { NonContiguousEnumError } from '../errors/errors.js';

/**
 * Runtime object of a numeric TypeScript enum.
 *
 * Numeric enums compile to an object holding both `Name -> value` and the
 * reverse `value -> 'Name'` mapping, hence the string half of the union.
 */
export type EnumObject = Readonly<Record<string, string | number>>;

/**
 * Value type of the enum behind an enum object.
 *
 * @example
 * ```typescript
 * enum Direction { North, East, South, West }
 * type D = EnumValue<typeof Direction>; // Direction
 * ```
 */
export type EnumValue<O extends EnumObject> = Extract<O[keyof O], number>;

/**
 * Mutable operand of the in-place enum operations.
 *
 * JavaScript has no references to variables, so prefix/postfix stepping,
 * compound assignment and toggling read and write `value` on a holder.
 */
export interface EnumRef<E extends number> {
  value: E;
}

/** Integer representation of an enum value. */
export function toUnderlying<E extends number>(value: E): number {
  return value;
}

/**
 * Reinterpret an integer as a member of `E`.
 *
 * No range check: arithmetic past the last member yields a value the enum does
 * not declare, the same as stepping a raw integer.
 */
export function fromUnderlying<E extends number>(value: number): E {
  return value as E;
}

/**
 * Numeric members of an enum object in ascending order.
 * Reverse mappings are skipped and aliases collapse to one entry.
 */
export function enumValues<O extends EnumObject>(enumObject: O): Array<EnumValue<O>> {
  const seen = new Set<number>();
  for (const value of Object.values(enumObject)) {
    if (typeof value === 'number') seen.add(value);
  }
  return Array.from(seen)
    .sort((a, b) => a - b)
    .map((value) => fromUnderlying<EnumValue<O>>(value));
}

/**
 * Exclusive upper bound of a contiguous enum.
 *
 * @returns The member count `n`, once the members are verified to be exactly `0..n-1`
 * @throws NonContiguousEnumError on gaps, negative or fractional values
 */
export function enumEnd<O extends EnumObject>(enumObject: O): number {
  const values = enumValues(enumObject).map((value) => toUnderlying(value));
  const missing: number[] = [];

  for (const value of values) {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new NonContiguousEnumError(values, []);
    }
  }

  const last = values.length > 0 ? values[values.length - 1] : -1;
  const present = new Set(values);
  for (let ordinal = 0; ordinal <= last; ordinal++) {
    if (!present.has(ordinal)) missing.push(ordinal);
  }

  if (missing.length > 0) throw new NonContiguousEnumError(values, missing);
  return values.length;
}
