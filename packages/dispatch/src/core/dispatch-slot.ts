import type { DispatchCallback, Dispatcher } from '../types/index.js';

/**
 * Single-value register holding "the current place to schedule a
 * continuation".
 *
 * Code that is handed a {@link Dispatcher} should use it directly. The slot is
 * for the boundary where existing code insists on looking one up. Tests can
 * construct a private slot so that nothing leaks between them; the
 * process-wide slot is available through {@link ambientDispatchSlot}.
 */
export class DispatchSlot implements Dispatcher {
  private value: Dispatcher | undefined;

  /**
   * The installed dispatcher, or undefined when nothing is installed.
   */
  get current(): Dispatcher | undefined {
    return this.value;
  }

  /**
   * Replace the installed dispatcher.
   *
   * @returns The dispatcher that was installed before this call
   */
  set(dispatcher: Dispatcher | undefined): Dispatcher | undefined {
    const previous = this.value;
    this.value = dispatcher;
    return previous;
  }

  /**
   * Post through whatever is installed. With an empty slot the callback runs
   * on the next microtask, which is what unmanaged code would get anyway.
   */
  post<S>(callback: DispatchCallback<S>, state: S): void {
    const target = this.value;
    if (target) {
      target.post(callback, state);
      return;
    }
    queueMicrotask(() => callback(state));
  }
}

declare global {
  /**
   * Process-wide ambient dispatch slot. Lives on globalThis so that every
   * copy of this module (duplicated installs, bundled workspaces) agrees on
   * one slot.
   */
  // eslint-disable-next-line no-var
  var __LOCKSTEP_AMBIENT_DISPATCH_SLOT__: DispatchSlot | undefined;
}

/**
 * The process-wide ambient slot, created on first use.
 */
export function ambientDispatchSlot(): DispatchSlot {
  return (globalThis.__LOCKSTEP_AMBIENT_DISPATCH_SLOT__ ??= new DispatchSlot());
}
