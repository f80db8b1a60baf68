/**
 * Queue and Pump Benchmark
 *
 * Measures the cost of the post → run cycle that every deterministic test
 * pays for each continuation.
 *
 * Scenarios:
 * 1. post + runOne, one callback at a time
 * 2. post a burst of 1000, then runAll
 * 3. self-reposting chain of 1000 drained by runAll
 * 4. posting through the ambient slot
 * 5. constructing and disposing a context with a registry subscriber
 */

import { Bench } from 'tinybench';
import { DispatchSlot } from '../src/core/dispatch-slot.js';
import { ManualDispatchContext } from '../src/core/manual-context.js';
import { ContextRegistry } from '../src/registry/context-registry.js';

// ==================== Setup ====================

const BURST = 1000;
const noop = (): void => undefined;

const slot = new DispatchSlot();
const context = new ManualDispatchContext({ slot, name: 'bench' });

const registry = new ContextRegistry();
let announced = 0;
registry.subscribe(() => {
  announced++;
});

// ==================== Benchmark ====================

const bench = new Bench({
  time: 1000,
  iterations: 10,
  warmupIterations: 5,
});

bench.add('post + runOne', () => {
  context.post(noop, undefined);
  context.runOne();
});

bench.add(`burst of ${BURST}: post then runAll`, () => {
  for (let i = 0; i < BURST; i++) context.post(noop, i);
  if (context.runAll() !== BURST) throw new Error('Invalid');
});

bench.add(`chain of ${BURST}: runAll to fixed point`, () => {
  const step = (n: number): void => {
    if (n < BURST) context.post(step, n + 1);
  };
  context.post(step, 1);
  if (context.runAll() !== BURST) throw new Error('Invalid');
});

bench.add('post through ambient slot', () => {
  slot.post(noop, undefined);
  context.runOne();
});

bench.add('construct + dispose with registry', () => {
  const scratch = new ManualDispatchContext({ slot: new DispatchSlot(), registry });
  scratch.dispose();
});

console.log('\n' + '='.repeat(80));
console.log('Queue and Pump Performance');
console.log('='.repeat(80) + '\n');

await bench.run();

console.table(bench.table());

console.log(`Contexts announced: ${announced}`);
context.dispose();
