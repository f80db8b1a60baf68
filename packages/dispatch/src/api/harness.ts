import type { DispatchSlot } from '../core/dispatch-slot.js';
import { ManualDispatchContext } from '../core/manual-context.js';
import { AggregateDispatchError, DrainLimitExceededError } from '../errors/errors.js';
import { ContextRegistry } from '../registry/context-registry.js';
import type { DispatchHarnessConfig, ManualDispatchConfig } from '../types/index.js';

const DEFAULT_MAX_DRAIN_ROUNDS = 100;

/**
 * Coordinates every context reported to a registry.
 *
 * Code under test often creates its own contexts. The harness subscribes to
 * the registry those contexts report to, keeps track of them, and can pump
 * all of them until the whole system is quiet, then tear them down.
 *
 * @example
 * ```typescript
 * const harness = new DispatchHarness();
 * const subject = createSubject({ registry: harness.registry });
 *
 * subject.start();
 * harness.drainAll();
 * harness.dispose();
 * ```
 */
export class DispatchHarness {
  readonly registry: ContextRegistry;

  private readonly slot?: DispatchSlot;
  private readonly maxDrainRounds: number;
  private readonly tracked: ManualDispatchContext[] = [];
  private readonly stopWatching: () => void;
  private disposed = false;

  constructor(config: DispatchHarnessConfig = {}) {
    this.registry = config.registry ?? new ContextRegistry();
    this.slot = config.slot;
    this.maxDrainRounds = config.maxDrainRounds ?? DEFAULT_MAX_DRAIN_ROUNDS;
    this.stopWatching = this.registry.subscribe((context) => this.track(context));
  }

  /**
   * Tracked contexts, in creation order. A context stops being tracked as
   * soon as it is disposed, so the harness never keeps one alive.
   */
  get contexts(): readonly ManualDispatchContext[] {
    return this.tracked.slice();
  }

  /**
   * Total pending callbacks across live tracked contexts.
   */
  get pendingCount(): number {
    let total = 0;
    for (const context of this.contexts) total += context.pendingCount;
    return total;
  }

  /**
   * Create a context that reports to this harness.
   *
   * The harness slot, if configured, is used unless the config names its
   * own.
   */
  createContext(config: Omit<ManualDispatchConfig, 'registry'> = {}): ManualDispatchContext {
    return new ManualDispatchContext({
      ...config,
      slot: config.slot ?? this.slot,
      registry: this.registry,
    });
  }

  /**
   * Pump every live context until none has pending work.
   *
   * One round runs runAll() on each context in creation order. Work that a
   * callback posts into another context is picked up by the next round.
   *
   * @returns Number of callbacks run
   * @throws {DrainLimitExceededError} if work remains after maxDrainRounds rounds
   */
  drainAll(): number {
    let ran = 0;
    for (let round = 0; round < this.maxDrainRounds; round++) {
      const live = this.contexts;
      if (live.every((c) => c.isEmpty)) return ran;
      for (const context of live) {
        if (!context.isDisposed) ran += context.runAll();
      }
    }
    if (this.pendingCount > 0) {
      throw new DrainLimitExceededError(this.maxDrainRounds, this.pendingCount);
    }
    return ran;
  }

  /**
   * Stop watching the registry, then drain and dispose every tracked context,
   * newest first.
   *
   * Every context gets its teardown even when an earlier one fails.
   * Failures are reported together.
   *
   * @throws {AggregateDispatchError} if any context failed to drain or dispose
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.stopWatching();

    const errors: Error[] = [];
    // Disposal removes entries from tracked; walk a copy, newest first.
    for (const context of this.tracked.slice().reverse()) {
      if (context.isDisposed) continue;
      try {
        try {
          context.runAll();
        } finally {
          context.dispose();
        }
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
    }
    this.tracked.length = 0;

    if (errors.length > 0) throw new AggregateDispatchError(errors);
  }

  // ---- internals ----

  private track(context: ManualDispatchContext): void {
    this.tracked.push(context);
    context.onDispose(() => {
      const index = this.tracked.indexOf(context);
      if (index !== -1) this.tracked.splice(index, 1);
    });
  }
}
