const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * post() was called without a callable unit of work.
 */
export class InvalidCallbackError extends Error {
  constructor(
    public contextName: string,
    public received: unknown
  ) {
    const dev = [
      'Invalid callback',
      '',
      `Context '${contextName}' was asked to post a ${typeof received}, expected a function.`,
      '',
      'Usage:',
      `  context.post((state) => { ... }, state);`,
    ];
    super(format(`Context '${contextName}' can only post functions.`, dev));
    this.name = 'InvalidCallbackError';
  }
}

export class ContextDisposedError extends Error {
  constructor(
    public contextName: string,
    public operation: string
  ) {
    const dev = [
      `Context '${contextName}' has been disposed.`,
      '',
      `${operation}() is not allowed after dispose(). Disposal is irreversible;`,
      'create a new context for further work.',
    ];
    super(format(`Context '${contextName}' has been disposed.`, dev));
    this.name = 'ContextDisposedError';
  }
}

export class EmptyQueueError extends Error {
  constructor(public contextName: string) {
    const dev = [
      'Empty queue',
      '',
      `runOne() was called on context '${contextName}' with no pending callbacks.`,
      '',
      'To fix this:',
      '  1. Check context.pendingCount or context.isEmpty before calling runOne()',
      '  2. Use runAll() when the number of pending callbacks is not known',
    ];
    super(format(`Context '${contextName}' has no pending callbacks.`, dev));
    this.name = 'EmptyQueueError';
  }
}

export class AlreadyInstalledError extends Error {
  constructor(public contextName: string) {
    const dev = [
      'Context already installed',
      '',
      `Context '${contextName}' is already the ambient dispatcher.`,
      'Only one level of install/uninstall is supported per context.',
      '',
      'Call uninstall() before installing again.',
    ];
    super(format(`Context '${contextName}' is already installed.`, dev));
    this.name = 'AlreadyInstalledError';
  }
}

export class NotInstalledError extends Error {
  constructor(public contextName: string) {
    const dev = [
      'Context not installed',
      '',
      `uninstall() was called on context '${contextName}', which is not the ambient dispatcher.`,
      '',
      'Contexts created with { install: false } must call install() first.',
    ];
    super(format(`Context '${contextName}' is not installed.`, dev));
    this.name = 'NotInstalledError';
  }
}

/**
 * uninstall() refused because continuations are still queued.
 */
export class PendingWorkError extends Error {
  constructor(
    public contextName: string,
    public pendingCount: number
  ) {
    const dev = [
      'Pending work',
      '',
      `Context '${contextName}' still holds ${pendingCount} pending callback(s).`,
      'Uninstalling now would orphan continuations that callers expect to run.',
      '',
      'To fix this:',
      '  1. Call runAll() before uninstall()',
      '  2. Or call dispose(), which drains before restoring the previous dispatcher',
    ];
    super(
      format(`Context '${contextName}' has ${pendingCount} pending callback(s).`, dev)
    );
    this.name = 'PendingWorkError';
  }
}

export class ReentrantDisposeError extends Error {
  constructor(public contextName: string) {
    const dev = [
      'Re-entrant dispose',
      '',
      `dispose() was called on context '${contextName}' while it was already disposing.`,
      'A callback drained during disposal must not dispose the context that runs it.',
    ];
    super(format(`Context '${contextName}' is already disposing.`, dev));
    this.name = 'ReentrantDisposeError';
  }
}

/**
 * The harness kept finding new work after the configured number of rounds.
 * Usually a callback that re-posts itself forever.
 */
export class DrainLimitExceededError extends Error {
  constructor(
    public rounds: number,
    public pendingCount: number
  ) {
    const dev = [
      'Drain limit exceeded',
      '',
      `Contexts still held ${pendingCount} pending callback(s) after ${rounds} drain round(s).`,
      '',
      'A callback is probably re-posting itself. Raise maxDrainRounds if the chain is finite.',
    ];
    super(format(`Drain did not settle after ${rounds} round(s).`, dev));
    this.name = 'DrainLimitExceededError';
  }
}

/**
 * Collects every failure raised while tearing down several contexts.
 */
export class AggregateDispatchError extends Error {
  constructor(public errors: Error[]) {
    const errorList = errors.map((e, i) => `  ${i + 1}. ${e.message}`).join('\n');
    const dev = [
      'Multiple teardown errors occurred',
      '',
      `${errors.length} error(s) occurred while disposing contexts:`,
      errorList,
      '',
      'Check the `errors` property for detailed information about each failure.',
    ];

    super(format(`${errors.length} teardown error(s) occurred.`, dev));
    this.name = 'AggregateDispatchError';
  }
}
