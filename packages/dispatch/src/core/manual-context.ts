/* ManualDispatchContext
 *
 * A dispatcher that never runs anything on its own. Every posted callback is
 * queued, and the driver decides when, and how many, run.
 *
 * Purpose:
 *  - Make continuation timing deterministic in tests
 *  - Let a test post, inspect intermediate state, then pump
 *  - Stand in for the ambient dispatcher while code under test runs
 *
 * Lifecycle:
 *  - created → (install ⇄ uninstall)* → disposed
 *  - post/runOne/runAll work whether or not the context is installed
 *  - dispose() drains and restores the previous dispatcher when installed;
 *    after that every operation throws ContextDisposedError
 *
 * Installation keeps exactly one saved dispatcher. Uninstalling with queued
 * callbacks throws PendingWorkError rather than orphaning them.
 *
 * Usage example:
 * ```typescript
 * const context = new ManualDispatchContext();
 * try {
 *   startSomethingThatPostsContinuations();
 *   expect(context.pendingCount).toBe(1);
 *   context.runAll();
 * } finally {
 *   context.dispose();
 * }
 * ```
 */

import {
  AlreadyInstalledError,
  ContextDisposedError,
  EmptyQueueError,
  InvalidCallbackError,
  NotInstalledError,
  PendingWorkError,
  ReentrantDisposeError,
} from '../errors/errors.js';
import type { ContextRegistry } from '../registry/context-registry.js';
import type {
  DispatchCallback,
  Dispatcher,
  ManualDispatchConfig,
  PostListener,
} from '../types/index.js';
import { CallbackQueue } from './callback-queue.js';
import { ambientDispatchSlot, type DispatchSlot } from './dispatch-slot.js';

/**
 * Counter for default context names (context_1, context_2, ...).
 */
let _contextCounter = 0;

export class ManualDispatchContext implements Dispatcher {
  readonly name: string;

  private readonly queue = new CallbackQueue();
  private readonly slot: DispatchSlot;
  private readonly postListeners = new Set<PostListener>();
  private readonly disposeListeners = new Set<() => void>();

  /**
   * Dispatcher that was installed before install(). Held only while this
   * context is installed.
   */
  private previous: Dispatcher | undefined;

  private installed = false;
  private disposing = false;
  private disposed = false;

  /**
   * Create a context, installing it unless `install: false` is passed.
   *
   * The registry, if any, is notified last, after installation, so that
   * subscribers observe a fully set up context.
   *
   * @throws Whatever a registry subscriber throws
   */
  constructor(config: ManualDispatchConfig = {}) {
    const { install = true, slot, registry, name, onPost } = config;
    this.name = name ?? `context_${++_contextCounter}`;
    this.slot = slot ?? ambientDispatchSlot();
    if (onPost) this.postListeners.add(onPost);

    if (install) this.install();

    this.announce(registry);
  }

  get pendingCount(): number {
    return this.queue.size;
  }

  get isEmpty(): boolean {
    return this.queue.isEmpty;
  }

  get isInstalled(): boolean {
    return this.installed;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Queue a callback. It runs only when the driver pumps.
   *
   * Post listeners are told the new pending count after the callback is
   * queued.
   *
   * @throws {InvalidCallbackError} if callback is not a function
   * @throws {ContextDisposedError} if the context has been disposed
   */
  post<S>(callback: DispatchCallback<S>, state: S): void {
    if (typeof callback !== 'function') throw new InvalidCallbackError(this.name, callback);
    this.assertNotDisposed('post');

    this.queue.enqueue(() => callback(state));

    const count = this.queue.size;
    for (const listener of this.postListeners) listener(count);
  }

  /**
   * Listen for posts. The listener receives the pending count.
   *
   * @returns A function that removes the listener
   */
  onPost(listener: PostListener): () => void {
    this.postListeners.add(listener);
    return () => {
      this.postListeners.delete(listener);
    };
  }

  /**
   * Listen for the end of disposal. Listeners run once, after the context is
   * marked disposed, whether or not draining succeeded.
   *
   * @returns A function that removes the listener
   */
  onDispose(listener: () => void): () => void {
    this.disposeListeners.add(listener);
    return () => {
      this.disposeListeners.delete(listener);
    };
  }

  /**
   * Run the oldest pending callback on the calling stack.
   *
   * The callback is removed before it runs. If it throws, the error reaches
   * the caller and the callback is not retried.
   *
   * @throws {ContextDisposedError} if the context has been disposed
   * @throws {EmptyQueueError} if nothing is pending
   */
  runOne(): void {
    this.assertNotDisposed('runOne');

    const next = this.queue.dequeue();
    if (!next) throw new EmptyQueueError(this.name);
    next();
  }

  /**
   * Run callbacks until none are pending, including callbacks posted by the
   * ones being run. Never returns if callbacks keep re-posting forever.
   *
   * @returns Number of callbacks run
   * @throws {ContextDisposedError} if the context has been disposed
   */
  runAll(): number {
    this.assertNotDisposed('runAll');

    let ran = 0;
    // Re-read the live queue each turn; callbacks may post more work.
    while (!this.queue.isEmpty) {
      this.runOne();
      ran++;
    }
    return ran;
  }

  /**
   * Become the slot's dispatcher, remembering the one being replaced.
   *
   * @throws {ContextDisposedError} if the context has been disposed
   * @throws {AlreadyInstalledError} if this context is already installed
   */
  install(): void {
    this.assertNotDisposed('install');
    if (this.installed) throw new AlreadyInstalledError(this.name);

    this.previous = this.slot.set(this);
    this.installed = true;
  }

  /**
   * Put back the dispatcher that install() replaced.
   *
   * @throws {ContextDisposedError} if the context has been disposed
   * @throws {NotInstalledError} if this context is not installed
   * @throws {PendingWorkError} if callbacks are still queued
   */
  uninstall(): void {
    this.assertNotDisposed('uninstall');
    if (!this.installed) throw new NotInstalledError(this.name);
    if (!this.queue.isEmpty) throw new PendingWorkError(this.name, this.queue.size);

    this.restore();
  }

  /**
   * Drain, restore the previous dispatcher, and mark the context disposed.
   *
   * Drain and restore only happen while installed. The restore runs even if
   * a drained callback throws; that error is rethrown afterwards. Calling
   * dispose() again once disposed is a no-op, but calling it from a callback
   * that the drain is running throws ReentrantDisposeError.
   */
  dispose(): void {
    if (this.disposing) throw new ReentrantDisposeError(this.name);
    if (this.disposed) return;
    this.disposing = true;

    try {
      if (this.installed) {
        try {
          this.runAll();
        } finally {
          // A drained callback may already have uninstalled this context.
          if (this.installed) this.restore();
        }
      }
    } finally {
      this.disposing = false;
      this.disposed = true;
      if (!this.queue.isEmpty) {
        console.warn(
          `[Lockstep] Context '${this.name}' disposed with ${this.queue.size} pending callback(s); they will never run.`
        );
      }
      const listeners = Array.from(this.disposeListeners);
      this.disposeListeners.clear();
      for (const listener of listeners) listener();
    }
  }

  // ---- internals ----

  private restore(): void {
    if (this.slot.current !== this) {
      console.warn(
        `[Lockstep] Context '${this.name}' is no longer the ambient dispatcher; restoring the dispatcher it replaced anyway.`
      );
    }
    this.slot.set(this.previous);
    this.previous = undefined;
    this.installed = false;
  }

  private announce(registry: ContextRegistry | undefined): void {
    registry?.notify(this);
  }

  private assertNotDisposed(operation: string): void {
    if (this.disposed) throw new ContextDisposedError(this.name, operation);
  }
}
