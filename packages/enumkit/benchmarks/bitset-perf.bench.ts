/**
 * EnumBitSet Performance Benchmark
 *
 * Compares the typed container with the hand-written bit manipulation it
 * replaces.
 *
 * Scenarios:
 * 1. Raw: set/test on a plain number with `|` and `&`
 * 2. EnumBitSet (uint8): same operations through the layout
 * 3. EnumBitSet (uint64): same operations on a bigint word
 * 4. Flag operators: declareEnumAsBitSet() against inline `|`
 */

import { Bench } from 'tinybench';
import { declareEnumAsBitSet } from '../src/api/operators.js';
import { defineEnumBitSet } from '../src/api/define.js';
import { Uint64, Uint8 } from '../src/core/storage.js';
import { enumEnd } from '../src/core/underlying.js';

// ==================== Test Setup ====================

enum Direction {
  North,
  East,
  South,
  West,
}

enum Access {
  Read = 1 << 0,
  Write = 1 << 1,
  Exec = 1 << 2,
}

const DirectionSet = defineEnumBitSet(Direction, Uint8, { end: enumEnd(Direction) });
const WideDirectionSet = defineEnumBitSet(Direction, Uint64, { end: enumEnd(Direction) });
const AccessFlags = declareEnumAsBitSet(Access);

const DIRECTIONS = [Direction.North, Direction.East, Direction.South, Direction.West];

// ==================== Benchmark ====================

const bench = new Bench({
  time: 1000,
  iterations: 10,
  warmupIterations: 5,
});

bench.add('raw: set + test (number)', () => {
  let data = 0;
  for (const d of DIRECTIONS) data |= 1 << d;
  if ((data & (1 << Direction.South)) === 0) throw new Error('Invalid');
});

bench.add('EnumBitSet: set + test (uint8)', () => {
  const set = DirectionSet.empty();
  for (const d of DIRECTIONS) set.set(d);
  if (!set.test(Direction.South)) throw new Error('Invalid');
});

bench.add('EnumBitSet: set + test (uint64)', () => {
  const set = WideDirectionSet.empty();
  for (const d of DIRECTIONS) set.set(d);
  if (!set.test(Direction.South)) throw new Error('Invalid');
});

bench.add('raw: flag union', () => {
  const rw = Access.Read | Access.Write;
  if ((rw & Access.Write) !== Access.Write) throw new Error('Invalid');
});

bench.add('declareEnumAsBitSet: flag union', () => {
  const rw = AccessFlags.or(Access.Read, Access.Write);
  if (!AccessFlags.hasFlag(rw, Access.Write)) throw new Error('Invalid');
});

// ==================== Run Benchmark ====================

await bench.run();

console.log('\n' + '='.repeat(80));
console.log('EnumBitSet Performance Results');
console.log('='.repeat(80) + '\n');

console.table(
  bench.tasks.map((task) => ({
    'Test Case': task.name,
    'avg (ms)': task.result?.period ? task.result.period.toFixed(6) : 'N/A',
    hz: task.result?.hz ? task.result.hz.toFixed(2) : 'N/A',
  }))
);

const raw = bench.tasks.find((t) => t.name === 'raw: set + test (number)');
const typed = bench.tasks.find((t) => t.name === 'EnumBitSet: set + test (uint8)');

if (raw?.result?.period && typed?.result?.period) {
  const overhead = ((typed.result.period - raw.result.period) * 1000000).toFixed(2);
  console.log(`\nEnumBitSet overhead vs raw bits: ${overhead}ns per iteration`);
}
