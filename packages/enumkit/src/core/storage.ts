/*
 * Storage Types
 * -------------
 * One descriptor per unsigned word width a bit-set can live in.
 *
 *   Uint8 / Uint16 / Uint32  ->  number, kept in [0, max] with `>>> 0`
 *   Uint64                   ->  bigint, kept in [0, max] with BigInt.asUintN
 *
 * Bitwise operators on `number` work on 32 bits, so 32 is the widest width a
 * number-backed word can have; wider layouts go through bigint.
 */

/** Name of a supported unsigned width. */
export type StorageName = 'uint8' | 'uint16' | 'uint32' | 'uint64';

/**
 * Word operations for one unsigned width.
 *
 * Every operation returns a value inside `[0, max]`. `bit()` maps positions
 * outside `[0, digits)` to `zero`, so a position that does not fit the word
 * never lands on another bit.
 *
 * @template T - JavaScript type holding the word
 */
export interface StorageType<T extends number | bigint> {
  readonly name: StorageName;
  /** Number of value bits */
  readonly digits: number;
  readonly zero: T;
  /** All-ones word */
  readonly max: T;
  bit(position: number): T;
  or(a: T, b: T): T;
  and(a: T, b: T): T;
  /** `a & ~b` */
  andNot(a: T, b: T): T;
  /** The lowest `count` bits set; `max >> (digits - count)` */
  lowMask(count: number): T;
  /** Reduce an arbitrary value modulo 2^digits, the unsigned conversion */
  wrap(raw: T): T;
  compare(a: T, b: T): number;
  /** Binary rendering padded to `digits`, for messages */
  format(word: T): string;
}

const binary = (word: number | bigint, digits: number): string =>
  `0b${word.toString(2).padStart(digits, '0')}`;

function numberStorage(name: StorageName, digits: number): StorageType<number> {
  const max = digits === 32 ? 0xffffffff : (1 << digits) - 1;
  return Object.freeze<StorageType<number>>({
    name,
    digits,
    zero: 0,
    max,
    bit: (position: number) =>
      Number.isInteger(position) && position >= 0 && position < digits ? (1 << position) >>> 0 : 0,
    or: (a: number, b: number) => (a | b) >>> 0,
    and: (a: number, b: number) => (a & b) >>> 0,
    andNot: (a: number, b: number) => (a & ~b) >>> 0,
    lowMask: (count: number) => (count <= 0 ? 0 : max >>> (digits - count)),
    wrap: (raw: number) => (raw & max) >>> 0,
    compare: (a: number, b: number) => (a < b ? -1 : a > b ? 1 : 0),
    format: (word: number) => binary(word, digits),
  });
}

export const Uint8: StorageType<number> = numberStorage('uint8', 8);
export const Uint16: StorageType<number> = numberStorage('uint16', 16);
export const Uint32: StorageType<number> = numberStorage('uint32', 32);

const U64_DIGITS = 64;
const U64_MAX = (1n << 64n) - 1n;

export const Uint64: StorageType<bigint> = Object.freeze<StorageType<bigint>>({
  name: 'uint64',
  digits: U64_DIGITS,
  zero: 0n,
  max: U64_MAX,
  bit: (position: number) =>
    Number.isInteger(position) && position >= 0 && position < U64_DIGITS
      ? 1n << BigInt(position)
      : 0n,
  or: (a: bigint, b: bigint) => a | b,
  and: (a: bigint, b: bigint) => a & b,
  andNot: (a: bigint, b: bigint) => a & ~b & U64_MAX,
  lowMask: (count: number) => (count <= 0 ? 0n : U64_MAX >> BigInt(U64_DIGITS - count)),
  wrap: (raw: bigint) => BigInt.asUintN(U64_DIGITS, raw),
  compare: (a: bigint, b: bigint) => (a < b ? -1 : a > b ? 1 : 0),
  format: (word: bigint) => binary(word, U64_DIGITS),
});

/** Every built-in storage type, keyed by name. */
export const StorageTypes = {
  uint8: Uint8,
  uint16: Uint16,
  uint32: Uint32,
  uint64: Uint64,
} as const;

/**
 * Runtime guard for storage descriptors handed in by callers.
 * Only the built-in descriptors are accepted.
 */
export function isStorageType(x: unknown): x is StorageType<number> | StorageType<bigint> {
  return x === Uint8 || x === Uint16 || x === Uint32 || x === Uint64;
}
