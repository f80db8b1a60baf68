import type { DispatchSlot } from '../core/dispatch-slot.js';
import type { ManualDispatchContext } from '../core/manual-context.js';
import type { ContextRegistry } from '../registry/context-registry.js';

/**
 * A unit of deferred work. Receives the state value it was posted with.
 *
 * @template S - Type of the state value carried alongside the callback
 */
export type DispatchCallback<S = unknown> = (state: S) => void;

/**
 * Anything that accepts continuations to run later.
 *
 * Components that schedule work should be handed a Dispatcher rather than
 * reading one from the ambient slot. The slot exists for code that cannot be
 * changed to accept one.
 */
export interface Dispatcher {
  post<S>(callback: DispatchCallback<S>, state: S): void;
}

/**
 * Callback and state bound together at post time.
 * Owned by the queue until dequeued, then discarded after it runs.
 */
export type PendingCallback = () => void;

/**
 * Local "work posted" notification. Receives the pending count after the
 * new callback was enqueued.
 */
export type PostListener = (pendingCount: number) => void;

/**
 * Registry subscriber, told about every context constructed against the
 * registry it subscribed to.
 */
export type ContextCreatedHandler = (context: ManualDispatchContext) => void;

/**
 * Options accepted by {@link ManualDispatchContext}.
 */
export interface ManualDispatchConfig {
  /**
   * Become the ambient dispatcher during construction.
   * @default true
   */
  install?: boolean;

  /** Slot to install into. Defaults to the process-wide ambient slot. */
  slot?: DispatchSlot;

  /** Registry notified once construction finishes. */
  registry?: ContextRegistry;

  /** Label used in error messages and warnings. */
  name?: string;

  /** Post listener registered at construction. */
  onPost?: PostListener;
}

/**
 * Options accepted by {@link DispatchHarness}.
 */
export interface DispatchHarnessConfig {
  /** Registry to watch. A fresh registry is created when omitted. */
  registry?: ContextRegistry;

  /** Slot handed to contexts created through the harness. */
  slot?: DispatchSlot;

  /**
   * Upper bound on drain rounds before drainAll() gives up.
   * @default 100
   */
  maxDrainRounds?: number;
}
