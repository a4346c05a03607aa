import { describe, expect, it } from 'vitest';

import { enumEnd, enumValues, fromUnderlying, toUnderlying } from '../src/core/underlying.js';
import { NonContiguousEnumError } from '../src/errors/errors.js';

enum Season {
  Spring,
  Summer,
  Autumn,
  Winter,
}

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('toUnderlying() / fromUnderlying()', () => {
  it('converts between enum values and integers', () => {
    expect(toUnderlying(Season.Autumn)).toBe(2);
    expect(fromUnderlying<Season>(3)).toBe(Season.Winter);
  });
});

describe('enumValues()', () => {
  it('lists numeric members and skips reverse mappings', () => {
    expect(enumValues(Season)).toEqual([0, 1, 2, 3]);
  });

  it('collapses aliases and sorts by value', () => {
    enum Heading {
      West = 3,
      North = 0,
      Begin = 0,
      East = 1,
    }

    expect(enumValues(Heading)).toEqual([0, 1, 3]);
  });
});

describe('enumEnd()', () => {
  it('returns the member count of a contiguous enum', () => {
    expect(enumEnd(Season)).toBe(4);
  });

  it('counts a trailing sentinel member', () => {
    enum Corner {
      TopLeft,
      TopRight,
      End,
    }

    expect(enumEnd(Corner)).toBe(Corner.End + 1);
  });

  it('reports missing ordinals', () => {
    enum Sparse {
      A = 0,
      C = 2,
      E = 4,
    }

    const error = captureError(() => enumEnd(Sparse));

    expect(error).toBeInstanceOf(NonContiguousEnumError);
    if (error instanceof NonContiguousEnumError) {
      expect(error.values).toEqual([0, 2, 4]);
      expect(error.missing).toEqual([1, 3]);
    }
  });

  it('rejects negative members', () => {
    enum Signed {
      Below = -1,
      Zero = 0,
    }

    const error = captureError(() => enumEnd(Signed));

    expect(error).toBeInstanceOf(NonContiguousEnumError);
    if (error instanceof NonContiguousEnumError) {
      expect(error.values).toEqual([-1, 0]);
      expect(error.missing).toEqual([]);
    }
  });

  it('rejects enums that do not start at zero', () => {
    enum Offset {
      One = 1,
      Two,
    }

    expect(() => enumEnd(Offset)).toThrow(NonContiguousEnumError);
  });
});
