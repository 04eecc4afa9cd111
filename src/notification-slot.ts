/**
 * Holds the most recent notification from the lamp plus a wake signal.
 *
 * Only the latest frame matters for state queries, so nothing is queued:
 * each publish overwrites the slot and wakes everyone waiting.
 */
export class NotificationSlot {
  private last: Buffer | null = null;
  private signalled = false;
  private waiters = new Set<() => void>();

  get latest(): Buffer | null {
    return this.last;
  }

  publish(data: Buffer): void {
    this.last = Buffer.from(data);
    this.signalled = true;
    for (const wake of this.waiters) wake();
    this.waiters.clear();
  }

  /** Lower the wake signal; the stored frame is kept. */
  reset(): void {
    this.signalled = false;
  }

  clear(): void {
    this.last = null;
    this.signalled = false;
  }

  /**
   * Resolve true as soon as the signal is raised, or false after `timeoutMs`.
   */
  wait(timeoutMs: number): Promise<boolean> {
    if (this.signalled) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>(resolve => {
      const wake = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.waiters.delete(wake);
        resolve(false);
      }, Math.max(0, timeoutMs));
      this.waiters.add(wake);
    });
  }
}
