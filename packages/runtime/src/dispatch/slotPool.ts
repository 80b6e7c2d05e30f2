import { CancelledError, OverloadedError } from '@kiln/core';

export interface SlotPoolOptions {
  capacity: number;
  /** Waiters beyond this are turned away immediately. */
  maxQueued: number;
}

export interface AcquireSlotInput {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface SlotLease {
  /** Safe to call more than once; only the first call frees the slot. */
  release(): void;
}

interface Waiter {
  grant(lease: SlotLease): void;
}

/**
 * Counting semaphore over inference slots with a bounded FIFO wait queue.
 * A released slot is handed straight to the oldest waiter, so the in-use
 * count never exceeds capacity.
 */
export class SlotPool {
  private used = 0;
  private peak = 0;
  private readonly waiters: Waiter[] = [];

  public constructor(private readonly options: SlotPoolOptions) { }

  public get capacity(): number {
    return this.options.capacity;
  }

  public get inUse(): number {
    return this.used;
  }

  public get waiting(): number {
    return this.waiters.length;
  }

  /** Highest number of slots held at once since construction. */
  public get peakInUse(): number {
    return this.peak;
  }

  public acquire(input: AcquireSlotInput): Promise<SlotLease> {
    const { signal } = input;
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('queue'));
    }
    if (this.used < this.options.capacity && this.waiters.length === 0) {
      this.used += 1;
      this.peak = Math.max(this.peak, this.used);
      return Promise.resolve(this.createLease());
    }
    if (this.waiters.length >= this.options.maxQueued) {
      return Promise.reject(new OverloadedError(0));
    }

    return new Promise<SlotLease>((resolve, reject) => {
      const leave = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
      };
      const onAbort = () => {
        leave();
        reject(new CancelledError('queue'));
      };
      const waiter: Waiter = {
        grant: (lease) => {
          leave();
          resolve(lease);
        }
      };
      const timer = setTimeout(() => {
        leave();
        reject(new OverloadedError(input.timeoutMs));
      }, input.timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private createLease(): SlotLease {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.handOff();
      }
    };
  }

  private handOff(): void {
    const next = this.waiters[0];
    if (next) {
      next.grant(this.createLease());
      return;
    }
    this.used -= 1;
  }
}
