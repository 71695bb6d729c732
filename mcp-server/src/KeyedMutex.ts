import { PipelineError } from './errors';

interface Waiter {
  grant: () => void;
  timer?: ReturnType<typeof setTimeout>;
}

interface LockState {
  waiters: Waiter[];
}

export interface ExclusiveOptions {
  /** How long to wait for the lock before failing BUSY. Waits forever when omitted. */
  timeoutMs?: number;
  /** What the lock protects, reported in the BUSY error. */
  label?: string;
}

/**
 * FIFO mutexes addressed by string key. A key's state is dropped as soon as
 * nobody holds or waits for it.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, LockState>();

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  async acquire(key: string, options: ExclusiveOptions = {}): Promise<() => void> {
    let released = false;
    const release = () => {
      if (released) return;
      released = true;
      const state = this.locks.get(key);
      if (!state) return;
      const next = state.waiters.shift();
      if (next) {
        if (next.timer) clearTimeout(next.timer);
        next.grant();
        return;
      }
      this.locks.delete(key);
    };

    const state = this.locks.get(key);
    if (!state) {
      this.locks.set(key, { waiters: [] });
      return release;
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = { grant: () => resolve(release) };
      if (options.timeoutMs !== undefined) {
        const timeoutMs = options.timeoutMs;
        waiter.timer = setTimeout(() => {
          const index = state.waiters.indexOf(waiter);
          if (index >= 0) state.waiters.splice(index, 1);
          reject(
            new PipelineError('BUSY', `${options.label ?? key} is busy`, {
              details: { resource: options.label ?? key, waitedMs: timeoutMs },
              hint: 'Retry the request; reuse the same idempotencyKey to stay safe.',
              retryable: true,
            }),
          );
        }, timeoutMs);
      }
      state.waiters.push(waiter);
    });
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>, options: ExclusiveOptions = {}): Promise<T> {
    const release = await this.acquire(key, options);
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
