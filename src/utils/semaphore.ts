import { DelegationCancelledError } from '../types/delegation-errors.js';

type Waiter = {
  grant: () => void;
};

/** Counting semaphore. `acquire` resolves to a release function that is safe to call more than once. */
export class Semaphore {
  #permits: number;
  readonly #queue: Waiter[] = [];

  constructor(permits: number) {
    this.#permits = Math.max(1, Math.floor(permits));
  }

  get available(): number {
    return this.#permits;
  }

  get waiting(): number {
    return this.#queue.length;
  }

  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(new DelegationCancelledError(signal.reason));
    }

    if (this.#permits > 0) {
      this.#permits -= 1;
      return Promise.resolve(this.#createRelease());
    }

    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.#queue.indexOf(waiter);
        if (index >= 0) {
          this.#queue.splice(index, 1);
        }
        reject(new DelegationCancelledError(signal?.reason));
      };

      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          this.#permits -= 1;
          resolve(this.#createRelease());
        },
      };

      this.#queue.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  #createRelease(): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.#permits += 1;
      const next = this.#queue.shift();
      if (next) {
        next.grant();
      }
    };
  }
}
