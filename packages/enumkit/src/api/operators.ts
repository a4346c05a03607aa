import {
  enumValues,
  fromUnderlying,
  toUnderlying,
  type EnumObject,
  type EnumRef,
  type EnumValue,
} from '../core/underlying.js';
import { FlagOutOfRangeError } from '../errors/errors.js';
import {
  andFlags,
  hasFlag,
  isFlagWord,
  notFlags,
  orFlags,
  toggleFlag,
  xorFlags,
} from './flags.js';

/**
 * Prefix/postfix stepping for one enum, obtained from
 * declareIncrementDecrementOperators().
 *
 * Stepping is raw integer arithmetic: stepping past the first or last member
 * yields an ordinal the enum does not declare. Callers that care check the
 * range themselves.
 *
 * @template E - The enum that opted in
 */
export interface IncrementDecrementOperators<E extends number> {
  next(value: E): E;
  prev(value: E): E;
  /** `++ref`: steps in place, returns the updated holder */
  preIncrement(ref: EnumRef<E>): EnumRef<E>;
  /** `ref++`: steps in place, returns the value before the step */
  postIncrement(ref: EnumRef<E>): E;
  preDecrement(ref: EnumRef<E>): EnumRef<E>;
  postDecrement(ref: EnumRef<E>): E;
  ref(value: E): EnumRef<E>;
}

/**
 * Bitwise operators for one enum used as a flag set, obtained from
 * declareEnumAsBitSet().
 *
 * Results live in the 32-bit signed domain of JavaScript's bitwise operators.
 *
 * @template E - The enum that opted in
 */
export interface EnumFlagOperators<E extends number> {
  or(m1: E, m2: E): E;
  and(m1: E, m2: E): E;
  xor(m1: E, m2: E): E;
  not(m: E): E;
  /** `ref |= m` */
  orAssign(ref: EnumRef<E>, m: E): EnumRef<E>;
  /** `ref &= m` */
  andAssign(ref: EnumRef<E>, m: E): EnumRef<E>;
  /** `ref ^= m` */
  xorAssign(ref: EnumRef<E>, m: E): EnumRef<E>;
  hasFlag(x: E, y: E): boolean;
  toggleFlag(x: EnumRef<E>, y: E): void;
  ref(value: E): EnumRef<E>;
}

/**
 * An enum whose values can offset members of other enums.
 *
 * @template A - The addable enum
 */
export interface AddableEnum<A extends number> {
  /**
   * Addition of `A` onto the members of `target`.
   * The sum is not checked against the target's range.
   */
  onto<O extends EnumObject>(target: O): (m1: EnumValue<O>, m2: A) => EnumValue<O>;
}

const makeRef = <E extends number>(value: E): EnumRef<E> => ({ value });

/**
 * Opt an enum into prefix/postfix increment and decrement.
 *
 * Only the returned object carries the operators, typed to this enum; members
 * of other enums are rejected by the compiler.
 *
 * @example
 * ```typescript
 * enum Track { First, Second, Third }
 * const TrackStep = declareIncrementDecrementOperators(Track);
 *
 * const cursor = TrackStep.ref(Track.First);
 * TrackStep.postIncrement(cursor); // Track.First
 * cursor.value; // Track.Second
 * ```
 */
export function declareIncrementDecrementOperators<O extends EnumObject>(
  _enumObject: O
): IncrementDecrementOperators<EnumValue<O>> {
  type E = EnumValue<O>;

  const next = (value: E): E => fromUnderlying<E>(toUnderlying(value) + 1);
  const prev = (value: E): E => fromUnderlying<E>(toUnderlying(value) - 1);

  const preIncrement = (ref: EnumRef<E>): EnumRef<E> => {
    ref.value = next(ref.value);
    return ref;
  };
  const preDecrement = (ref: EnumRef<E>): EnumRef<E> => {
    ref.value = prev(ref.value);
    return ref;
  };

  return Object.freeze({
    next,
    prev,
    preIncrement,
    postIncrement: (ref: EnumRef<E>): E => {
      const original = ref.value;
      preIncrement(ref);
      return original;
    },
    preDecrement,
    postDecrement: (ref: EnumRef<E>): E => {
      const original = ref.value;
      preDecrement(ref);
      return original;
    },
    ref: makeRef<E>,
  });
}

/**
 * Opt an enum into bitwise flag operators.
 *
 * Every numeric member must fit in a 32-bit word, signed or unsigned; the
 * bitwise operators would drop higher bits.
 *
 * @example
 * ```typescript
 * enum Access { None = 0, Read = 1 << 0, Write = 1 << 1 }
 * const AccessFlags = declareEnumAsBitSet(Access);
 *
 * const rw = AccessFlags.or(Access.Read, Access.Write);
 * AccessFlags.hasFlag(rw, Access.Write); // true
 * ```
 */
export function declareEnumAsBitSet<O extends EnumObject>(
  enumObject: O
): EnumFlagOperators<EnumValue<O>> {
  type E = EnumValue<O>;

  for (const value of enumValues(enumObject)) {
    if (!isFlagWord(value)) {
      const member = Object.keys(enumObject).find((key) => enumObject[key] === value);
      throw new FlagOutOfRangeError(value, member);
    }
  }

  return Object.freeze({
    or: orFlags<E>,
    and: andFlags<E>,
    xor: xorFlags<E>,
    not: notFlags<E>,
    orAssign: (ref: EnumRef<E>, m: E): EnumRef<E> => {
      ref.value = orFlags(ref.value, m);
      return ref;
    },
    andAssign: (ref: EnumRef<E>, m: E): EnumRef<E> => {
      ref.value = andFlags(ref.value, m);
      return ref;
    },
    xorAssign: (ref: EnumRef<E>, m: E): EnumRef<E> => {
      ref.value = xorFlags(ref.value, m);
      return ref;
    },
    hasFlag: hasFlag<E>,
    toggleFlag: toggleFlag<E>,
    ref: makeRef<E>,
  });
}

/**
 * Opt an enum into being added to members of other enums, e.g. a "kind"
 * enum used as an offset into a range of index-style members.
 *
 * @example
 * ```typescript
 * enum RoadKind { Road, Tram }
 * enum Slot { Base = 0, Overlay = 8 }
 * const addKind = declareEnumAsAddable(RoadKind).onto(Slot);
 *
 * addKind(Slot.Overlay, RoadKind.Tram); // 9
 * ```
 */
export function declareEnumAsAddable<O extends EnumObject>(
  _enumObject: O
): AddableEnum<EnumValue<O>> {
  type A = EnumValue<O>;

  return Object.freeze({
    onto<T extends EnumObject>(_target: T) {
      return (m1: EnumValue<T>, m2: A): EnumValue<T> =>
        fromUnderlying<EnumValue<T>>(toUnderlying(m1) + toUnderlying(m2));
    },
  });
}
