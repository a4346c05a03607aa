const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * Invalid layout configuration passed to defineEnumBitSet()
 */
export class InvalidBitSetConfigError extends Error {
  constructor(public reason: string) {
    const dev = [
      'Invalid bit-set configuration',
      '',
      `Invalid bit-set configuration: ${reason}`,
      '',
      'A bit-set layout needs:',
      `  - A numeric enum object (e.g. 'Direction')`,
      `  - A storage type: Uint8, Uint16, Uint32 or Uint64`,
      `  - An optional 'end' between 0 and the storage width`,
    ];
    super(format(`Invalid bit-set configuration: ${reason}`, dev));
    this.name = 'InvalidBitSetConfigError';
  }
}

/**
 * Enum members do not form the range 0..n-1
 */
export class NonContiguousEnumError extends Error {
  constructor(
    public values: number[],
    public missing: number[]
  ) {
    const listed = values.join(', ');
    const parts: string[] = ['Non-contiguous enum', '', `Enum values: ${listed}`, ''];

    if (missing.length > 0) {
      parts.push(`Missing ordinals: ${missing.join(', ')}`, '');
    } else {
      parts.push('Every value must be a non-negative integer.', '');
    }

    parts.push(
      'To fix this:',
      '  1. Declare members without explicit initializers so they count up from 0',
      `  2. Or pass an explicit 'end' to defineEnumBitSet() instead of enumEnd()`
    );

    super(format(`Enum values [${listed}] are not contiguous from 0.`, parts));
    this.name = 'NonContiguousEnumError';
  }
}

/**
 * Two bit-sets built from different layouts were combined
 */
export class BitSetLayoutMismatchError extends Error {
  constructor(
    public expected: string,
    public received: string
  ) {
    const dev = [
      'Bit-set layout mismatch',
      '',
      `Expected a bit-set of layout '${expected}', received one of layout '${received}'.`,
      '',
      'Bit positions only line up between sets created by the same defineEnumBitSet() call.',
      `Convert explicitly with ${expected}.fromBase(other.base()) if the words are compatible.`,
    ];
    super(format(`Bit-set layout mismatch: '${expected}' vs '${received}'.`, dev));
    this.name = 'BitSetLayoutMismatchError';
  }
}

/**
 * A raw storage word carried bits outside the layout mask
 */
export class BitSetTruncationError extends Error {
  constructor(
    public layoutName: string,
    public raw: string,
    public mask: string
  ) {
    const dev = [
      'Bit-set truncation',
      '',
      `Raw word ${raw} has bits outside the mask ${mask} of layout '${layoutName}'.`,
      '',
      `The layout uses truncation: 'throw'.`,
      'To fix this:',
      `  1. Validate the word with ${layoutName}.isValidBase() before fromBase()`,
      `  2. Or use truncation: 'silent' or 'warn' to drop the extra bits`,
    ];
    super(format(`Raw word ${raw} exceeds mask ${mask} of '${layoutName}'.`, dev));
    this.name = 'BitSetTruncationError';
  }
}

/**
 * A flag value that the 32-bit bitwise operators would truncate
 */
export class FlagOutOfRangeError extends Error {
  constructor(
    public value: number,
    public member?: string
  ) {
    const subject = member === undefined ? `Flag ${value}` : `Flag '${member}' (${value})`;
    const dev = [
      'Flag out of range',
      '',
      `${subject} does not fit in 32 bits.`,
      '',
      'Flag operators work on 32-bit words; wider bits would be dropped silently.',
      'To fix this:',
      '  1. Keep flag members between -(2 ** 31) and 2 ** 32 - 1',
      '  2. Or store the values in a bit-set with defineEnumBitSet(Enum, Uint64)',
    ];
    super(format(`${subject} does not fit in 32 bits.`, dev));
    this.name = 'FlagOutOfRangeError';
  }
}
