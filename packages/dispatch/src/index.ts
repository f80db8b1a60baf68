export { DispatchHarness } from './api/harness.js';

export { CallbackQueue } from './core/callback-queue.js';
export { ambientDispatchSlot, DispatchSlot } from './core/dispatch-slot.js';
export { ManualDispatchContext } from './core/manual-context.js';

export { ContextRegistry } from './registry/context-registry.js';

export type {
  ContextCreatedHandler,
  DispatchCallback,
  Dispatcher,
  DispatchHarnessConfig,
  ManualDispatchConfig,
  PendingCallback,
  PostListener,
} from './types/index.js';

// Errors
export {
  AggregateDispatchError,
  AlreadyInstalledError,
  ContextDisposedError,
  DrainLimitExceededError,
  EmptyQueueError,
  InvalidCallbackError,
  NotInstalledError,
  PendingWorkError,
  ReentrantDisposeError,
} from './errors/errors.js';
