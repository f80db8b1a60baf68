import type { ManualDispatchContext } from '../core/manual-context.js';
import type { ContextCreatedHandler } from '../types/index.js';

/**
 * Subscriber list told about every {@link ManualDispatchContext} constructed
 * against it.
 *
 * Lets a harness find contexts that code under test created on its own,
 * without being handed them. A registry is an ordinary object: construct one
 * per harness (or per test file) and pass it to the contexts that should
 * report to it. Its lifetime is independent of the contexts it announces;
 * disposing a context never touches the registry, and subscribers stay until
 * they unsubscribe or clear() is called.
 *
 * Broadcasts iterate a snapshot of the subscriber list. A handler that
 * subscribes or unsubscribes during a broadcast affects the next broadcast,
 * never the one in flight.
 *
 * @example
 * ```typescript
 * const registry = new ContextRegistry();
 * const seen: ManualDispatchContext[] = [];
 * const stop = registry.subscribe((context) => seen.push(context));
 *
 * const context = new ManualDispatchContext({ registry, install: false });
 * // seen[0] === context
 * stop();
 * ```
 */
export class ContextRegistry {
  /**
   * Handler identity → handler. Map iteration order is insertion order,
   * which gives subscription-order delivery.
   */
  private readonly handlers = new Map<ContextCreatedHandler, ContextCreatedHandler>();

  /**
   * Snapshot reused across broadcasts until the subscriber list changes.
   */
  private snapshot: readonly ContextCreatedHandler[] | undefined;

  get size(): number {
    return this.handlers.size;
  }

  /**
   * Add a handler. Subscribing a handler that is already present keeps its
   * original position.
   *
   * @returns A function that removes this handler
   */
  subscribe(handler: ContextCreatedHandler): () => void {
    if (!this.handlers.has(handler)) {
      this.handlers.set(handler, handler);
      this.snapshot = undefined;
    }
    return () => {
      this.unsubscribe(handler);
    };
  }

  /**
   * @returns true if the handler was subscribed
   */
  unsubscribe(handler: ContextCreatedHandler): boolean {
    const removed = this.handlers.delete(handler);
    if (removed) this.snapshot = undefined;
    return removed;
  }

  /**
   * Deliver a newly constructed context to every subscriber, in order.
   *
   * Handler exceptions are not caught: the first one ends the broadcast and
   * reaches whoever constructed the context.
   */
  notify(context: ManualDispatchContext): void {
    const handlers = (this.snapshot ??= Array.from(this.handlers.values()));
    for (const handler of handlers) handler(context);
  }

  /**
   * Drop every subscriber.
   */
  clear(): void {
    this.handlers.clear();
    this.snapshot = undefined;
  }
}
