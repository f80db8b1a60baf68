export type {
  ContextCreatedHandler,
  DispatchCallback,
  Dispatcher,
  DispatchHarnessConfig,
  ManualDispatchConfig,
  PendingCallback,
  PostListener,
} from './types.js';
