/**
 * ValueSet Performance Benchmark
 *
 * Scenarios:
 * 1. Lookups: valueById / valueByName on a warm enumeration
 * 2. Membership: contains / insert / remove
 * 3. Algebra: union / intersect / difference on 1000-value sets
 * 4. Iteration and bit mask export / import
 * 5. Cold start: registration of 1000 values plus first name lookup
 */

import { Bench } from 'tinybench';
import { SimpleEnumeration } from '../src/core/simple-enumeration.js';

// ==================== Test Setup ====================

const SIZE = 1000;

function buildEnumeration(name: string): SimpleEnumeration {
  const enumeration = new SimpleEnumeration({ name });
  for (let i = 0; i < SIZE; i++) enumeration.create({ name: `V${i}` });
  return enumeration;
}

const Wide = buildEnumeration('Wide');
const all = Wide.values;
const evens = all.filter((v) => v.id % 2 === 0);
const thirds = all.filter((v) => v.id % 3 === 0);
const middle = Wide.valueById(SIZE / 2);
const mask = evens.toBitMask();

// ==================== Benchmark ====================

const bench = new Bench({
  time: 1000,
  iterations: 10,
  warmupIterations: 5,
});

bench.add('lookup: valueById', () => {
  if (Wide.valueById(SIZE - 1).id !== SIZE - 1) throw new Error('Invalid');
});

bench.add('lookup: valueByName', () => {
  if (Wide.valueByName('V999').id !== SIZE - 1) throw new Error('Invalid');
});

bench.add('membership: contains', () => {
  if (!evens.contains(middle)) throw new Error('Invalid');
});

bench.add('membership: insert + remove', () => {
  const odd = Wide.valueById(1);
  if (evens.insert(odd).remove(odd).size !== evens.size) throw new Error('Invalid');
});

bench.add('algebra: union', () => {
  if (evens.union(thirds).isEmpty) throw new Error('Invalid');
});

bench.add('algebra: intersect', () => {
  if (evens.intersect(thirds).size !== 167) throw new Error('Invalid');
});

bench.add('algebra: difference', () => {
  if (evens.difference(thirds).size !== 333) throw new Error('Invalid');
});

bench.add('iteration: for..of over 1000 values', () => {
  let sum = 0;
  for (const value of all) sum += value.id;
  if (sum !== (SIZE * (SIZE - 1)) / 2) throw new Error('Invalid');
});

bench.add('bit mask: export', () => {
  if (evens.toBitMask().length !== mask.length) throw new Error('Invalid');
});

bench.add('bit mask: import', () => {
  if (Wide.fromBitMask(mask).size !== evens.size) throw new Error('Invalid');
});

bench.add('cold start: register 1000 + first name lookup', () => {
  const fresh = buildEnumeration('Fresh');
  if (fresh.valueByName('V0').id !== 0) throw new Error('Invalid');
});

// ==================== Run Benchmark ====================

await bench.run();

console.log('\n' + '='.repeat(80));
console.log('ValueSet Performance Results');
console.log('='.repeat(80) + '\n');

console.table(
  bench.tasks.map((task) => ({
    'Test Case': task.name,
    'ops/sec': task.result?.hz
      ? task.result.hz.toLocaleString('en-US', { maximumFractionDigits: 0 })
      : 'N/A',
    'avg (ms)': task.result?.period ? task.result.period.toFixed(4) : 'N/A',
  }))
);
