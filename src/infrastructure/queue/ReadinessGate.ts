type Waiter = (ready: boolean) => void;

/**
 * One-shot latch signalled when the model has finished loading.
 *
 * `wait()` is always bounded by a timeout. Once `reset()` has been called
 * (shutdown or failed initialization) the gate is closed for good and every
 * wait resolves to false straight away.
 */
export class ReadinessGate {
  private ready = false;
  private closed = false;
  private waiters: Set<Waiter> = new Set();

  /**
   * Set the latch and wake all waiters. No-op after the first call or after reset.
   */
  signal(): void {
    if (this.ready || this.closed) return;
    this.ready = true;
    this.flush(true);
  }

  /**
   * Resolve true if the latch is set within `timeoutMs`, false otherwise
   */
  wait(timeoutMs: number): Promise<boolean> {
    if (this.ready) return Promise.resolve(true);
    if (this.closed || timeoutMs <= 0) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const settle: Waiter = (ready) => {
        clearTimeout(timer);
        this.waiters.delete(settle);
        resolve(ready);
      };
      const timer = setTimeout(() => settle(false), timeoutMs);
      this.waiters.add(settle);
    });
  }

  isSet(): boolean {
    return this.ready;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Permanently mark the gate as not ready and release every waiter
   */
  reset(): void {
    this.ready = false;
    this.closed = true;
    this.flush(false);
  }

  private flush(ready: boolean): void {
    for (const waiter of Array.from(this.waiters)) {
      waiter(ready);
    }
    this.waiters.clear();
  }
}
