/**
 * @fileoverview Cooperative background work with cancellation and progress
 * @description Long scans (indexing, search) run as tasks that yield to the
 * event loop between batches, poll an AbortSignal and publish a progress fraction.
 */

import { ErrorCategory, LogrokError } from './errors';

export interface TaskContext {
  signal: AbortSignal;
  reportProgress(fraction: number): void;
}

type ProgressListener = (fraction: number) => void;

/**
 * Resolve on the next turn of the event loop
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

export class BackgroundTask<T> {
  public readonly name: string;
  public readonly promise: Promise<T>;
  public progress: number = 0;
  public done: boolean = false;

  private controller: AbortController = new AbortController();
  private listeners: ProgressListener[] = [];

  constructor(name: string, run: (context: TaskContext) => Promise<T>, parentSignal?: AbortSignal) {
    this.name = name;

    if (parentSignal) {
      if (parentSignal.aborted) {
        this.controller.abort();
      } else {
        parentSignal.addEventListener('abort', () => this.cancel(), { once: true });
      }
    }

    const context: TaskContext = {
      signal: this.controller.signal,
      reportProgress: (fraction: number) => this._setProgress(fraction)
    };

    this.promise = (async () => {
      try {
        if (context.signal.aborted) {
          throw new LogrokError(ErrorCategory.Cancelled, `${name} cancelled`);
        }
        return await run(context);
      } finally {
        this.done = true;
      }
    })();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(): void {
    if (!this.done) {
      this.controller.abort();
    }
  }

  onProgress(listener: ProgressListener): void {
    this.listeners.push(listener);
  }

  private _setProgress(fraction: number): void {
    this.progress = Math.max(0, Math.min(1, fraction));
    for (const listener of this.listeners) {
      listener(this.progress);
    }
  }
}
