/** Handle for one queued prompt: progress notifications plus a completion promise. */

import type { ProgressUpdate } from '../../models/comfy.js';

export interface Disposable {
  dispose(): void;
}

export type ProgressHandler = (update: ProgressUpdate) => void;

export class ComfyTask implements Disposable {
  readonly completion: Promise<void>;
  private readonly progressHandlers = new Set<ProgressHandler>();
  private readonly resolveCompletion: () => void;
  private readonly rejectCompletion: (err: Error) => void;
  private settled = false;
  private disposed = false;

  constructor(
    readonly id: string,
    private readonly onDispose?: (task: ComfyTask) => void,
  ) {
    let resolveFn: () => void = () => undefined;
    let rejectFn: (err: Error) => void = () => undefined;
    this.completion = new Promise<void>((resolve, reject) => {
      resolveFn = resolve;
      rejectFn = reject;
    });
    this.resolveCompletion = resolveFn;
    this.rejectCompletion = rejectFn;
    // Rejections are observed by whoever awaits `completion`; a task nobody
    // waits on must not surface as an unhandled rejection.
    this.completion.catch(() => undefined);
  }

  get isSettled(): boolean {
    return this.settled;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  onProgress(handler: ProgressHandler): Disposable {
    this.progressHandlers.add(handler);
    return { dispose: () => { this.progressHandlers.delete(handler); } };
  }

  get progressHandlerCount(): number {
    return this.progressHandlers.size;
  }

  reportProgress(update: ProgressUpdate): void {
    if (this.disposed) return;
    for (const handler of [...this.progressHandlers]) {
      handler(update);
    }
  }

  complete(): void {
    if (this.settled) return;
    this.settled = true;
    this.resolveCompletion();
  }

  fail(err: Error): void {
    if (this.settled) return;
    this.settled = true;
    this.rejectCompletion(err);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.progressHandlers.clear();
    this.onDispose?.(this);
  }
}
