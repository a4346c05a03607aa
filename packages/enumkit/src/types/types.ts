/**
 * What fromBase() does with bits outside the layout mask.
 *
 *   - **Silent**: drop them (default)
 *   - **Warn**: drop them and report once per call through `console.warn`
 *   - **Throw**: reject the word with BitSetTruncationError
 *
 * @example
 * ```typescript
 * const Loaded = defineEnumBitSet(Direction, Uint8, {
 *   end: enumEnd(Direction),
 *   truncation: TruncationPolicy.Throw,
 * });
 * ```
 */
export const TruncationPolicy = {
  Silent: 'silent',
  Warn: 'warn',
  Throw: 'throw',
} as const;

export type TruncationPolicyType = (typeof TruncationPolicy)[keyof typeof TruncationPolicy];
export type TruncationPolicy = TruncationPolicyType;

const TRUNCATION_POLICIES: ReadonlySet<string> = new Set(Object.values(TruncationPolicy));

export function isTruncationPolicy(x: unknown): x is TruncationPolicy {
  return typeof x === 'string' && TRUNCATION_POLICIES.has(x);
}

/**
 * Options accepted by defineEnumBitSet().
 */
export interface EnumBitSetOptions {
  /**
   * Last valid ordinal + 1. Defaults to the storage width, which leaves every
   * bit of the word valid. Only set it when values must be masked.
   */
  end?: number;
  /** Label used in error messages and warnings */
  name?: string;
  truncation?: TruncationPolicy;
}
