/**
 * Admission Gate
 *
 * Process-wide counting semaphore bounding how many connections are handled
 * at once, across every port.
 */

export interface AdmissionToken {
  /** Return the slot. Idempotent; never blocks. */
  release(): void;
  readonly released: boolean;
}

interface Waiter {
  resolve: (token: AdmissionToken | null) => void;
  cleanup: () => void;
}

export class AdmissionGate {
  private readonly capacity: number;
  private readonly waiters: Waiter[] = [];
  private held = 0;
  private acquired = 0;
  private releasedCount = 0;
  private closed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Admission capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Wait for a free slot. Resolves null once the gate is closed or the signal
   * aborts; waiters are served in arrival order.
   */
  acquire(signal?: AbortSignal): Promise<AdmissionToken | null> {
    if (this.closed || signal?.aborted) {
      return Promise.resolve(null);
    }
    if (this.held < this.capacity && this.waiters.length === 0) {
      return Promise.resolve(this.grant());
    }

    return new Promise(resolve => {
      const onAbort = (): void => {
        this.removeWaiter(waiter);
        resolve(null);
      };
      const waiter: Waiter = {
        resolve,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Wake every waiter with null and refuse further acquisitions. Tokens already
   * handed out stay valid until released.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.cleanup();
      waiter.resolve(null);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Maximum concurrently held tokens */
  get size(): number {
    return this.capacity;
  }

  /** Tokens currently held */
  get inUse(): number {
    return this.held;
  }

  /** Callers blocked in acquire */
  get waiting(): number {
    return this.waiters.length;
  }

  get acquiredTotal(): number {
    return this.acquired;
  }

  get releasedTotal(): number {
    return this.releasedCount;
  }

  private grant(): AdmissionToken {
    this.held++;
    this.acquired++;

    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.held--;
        this.releasedCount++;
        this.dispatch();
      },
      get released() {
        return released;
      },
    };
  }

  private dispatch(): void {
    while (this.held < this.capacity && this.waiters.length > 0 && !this.closed) {
      const waiter = this.waiters.shift();
      if (!waiter) break;
      waiter.cleanup();
      waiter.resolve(this.grant());
    }
  }

  private removeWaiter(waiter: Waiter): void {
    const idx = this.waiters.indexOf(waiter);
    if (idx !== -1) {
      this.waiters.splice(idx, 1);
    }
  }
}
