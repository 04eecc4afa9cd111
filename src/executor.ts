/**
 * Background execution context for one lamp.
 *
 * All transport work for a lamp runs here, one operation at a time and in
 * submission order. Callers get a promise bounded by a deadline; when the
 * deadline passes the caller is released with OperationTimeout but the
 * operation keeps its place and runs to completion.
 */

import { NotConnectedError, OperationCancelled, OperationTimeout } from './errors';
import { withTimeout } from './timing';

export type Operation<T> = () => Promise<T>;

interface QueuedOperation {
  run: () => Promise<void>;
  cancel: (error: Error) => void;
}

export class SerialExecutor {
  private queue: QueuedOperation[] = [];
  private running: Promise<void> | null = null;
  private active = false;

  constructor(private readonly name: string) {}

  get isRunning(): boolean {
    return this.active;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    console.log(`[Executor] ${this.name} started`);
  }

  submit<T>(operation: Operation<T>, timeoutMs: number): Promise<T> {
    if (!this.active) {
      return Promise.reject(new NotConnectedError());
    }

    const completion = new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: () => Promise.resolve().then(operation).then(resolve, reject),
        cancel: reject,
      });
    });
    this.drain();

    return withTimeout(
      completion,
      timeoutMs,
      () => new OperationTimeout(`Operation timed out after ${(timeoutMs / 1000).toFixed(1)}s`)
    );
  }

  /**
   * Stop accepting work, cancel everything still queued and give the
   * running operation up to `graceMs` to finish.
   */
  async stop(graceMs: number = 2000): Promise<void> {
    if (!this.active) {
      return;
    }
    this.active = false;

    const abandoned = this.queue.splice(0);
    for (const op of abandoned) {
      op.cancel(new OperationCancelled(`Operation cancelled: ${this.name} stopped`));
    }
    if (abandoned.length > 0) {
      console.log(`[Executor] Cancelled ${abandoned.length} pending operation(s) for ${this.name}`);
    }

    if (this.running) {
      await withTimeout(this.running, graceMs, () => new OperationTimeout('Shutdown grace period elapsed')).catch(
        (error: unknown) => {
          console.warn(`[Executor] ${this.name} stopped with an operation still running: ${String(error)}`);
        }
      );
    }
    console.log(`[Executor] ${this.name} stopped`);
  }

  private drain(): void {
    if (this.running) {
      return;
    }
    const next = this.queue.shift();
    if (!next) {
      return;
    }
    this.running = next.run().finally(() => {
      this.running = null;
      this.drain();
    });
  }
}
