export { defineEnumBitSet } from './api/define.js';
export { hasFlag, toggleFlag } from './api/flags.js';
export {
  declareEnumAsAddable,
  declareEnumAsBitSet,
  declareIncrementDecrementOperators,
} from './api/operators.js';
export type {
  AddableEnum,
  EnumFlagOperators,
  IncrementDecrementOperators,
} from './api/operators.js';

export { EnumBitSet, EnumBitSetLayout } from './core/enum-bit-set.js';
export { StorageTypes, Uint16, Uint32, Uint64, Uint8 } from './core/storage.js';
export type { StorageName, StorageType } from './core/storage.js';
export { enumEnd, enumValues, fromUnderlying, toUnderlying } from './core/underlying.js';
export type { EnumObject, EnumRef, EnumValue } from './core/underlying.js';

export { TruncationPolicy } from './types/types.js';
export type { EnumBitSetOptions, TruncationPolicyType } from './types/types.js';

// Errors
export {
  BitSetLayoutMismatchError,
  BitSetTruncationError,
  FlagOutOfRangeError,
  InvalidBitSetConfigError,
  NonContiguousEnumError,
} from './errors/errors.js';
