export type ReleasePermit = () => void;

export interface ProviderBudget {
  acquire(signal?: AbortSignal): Promise<ReleasePermit>;
  getActiveCount(): number;
  getWaitingCount(): number;
}

interface Waiter {
  grant: () => void;
}

/**
 * Caps how many provider calls are in flight across concurrent runs.
 * Waiters are served first come, first served; a released permit goes straight
 * to the oldest waiter. A waiter whose signal aborts leaves the queue and
 * rejects with the signal's reason.
 */
export function createProviderBudget(size: number): ProviderBudget {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Provider budget size must be a positive integer, got ${size}.`);
  }

  const waitingQueue: Waiter[] = [];
  let active = 0;

  function release() {
    const next = waitingQueue.shift();
    if (next) {
      next.grant();
      return;
    }
    active -= 1;
  }

  function createPermit(): ReleasePermit {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
    };
  }

  return {
    acquire(signal?: AbortSignal): Promise<ReleasePermit> {
      if (signal?.aborted) {
        return Promise.reject(signal.reason);
      }

      if (active < size) {
        active += 1;
        return Promise.resolve(createPermit());
      }

      return new Promise((resolve, reject) => {
        const onAbort = () => {
          const index = waitingQueue.indexOf(waiter);
          if (index >= 0) waitingQueue.splice(index, 1);
          reject(signal?.reason);
        };
        const waiter: Waiter = {
          grant: () => {
            signal?.removeEventListener("abort", onAbort);
            resolve(createPermit());
          },
        };

        waitingQueue.push(waiter);
        signal?.addEventListener("abort", onAbort, { once: true });
      });
    },

    getActiveCount(): number {
      return active;
    },

    getWaitingCount(): number {
      return waitingQueue.length;
    },
  };
}
