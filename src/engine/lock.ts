import { AsyncLocalStorage } from "node:async_hooks";
import { ReentrantCallError } from "../utils/errors.js";

interface Holder {
  operation: string;
  active: boolean;
}

/**
 * Serializes engine operations. Each call waits for the previous one to
 * settle, and the lock stays held across every await inside the body.
 *
 * Calls made from inside a running body (for example from a token callback)
 * inherit its async context and are rejected rather than queued, which would
 * otherwise dead-lock. Work a body schedules for later (timers, queued
 * callbacks) inherits the same context; once the body has settled its holder
 * is inactive and such calls queue normally.
 */
export class OperationLock {
  private tail: Promise<void> = Promise.resolve();
  private readonly holder = new AsyncLocalStorage<Holder>();

  run<T>(operation: string, body: () => Promise<T>): Promise<T> {
    const running = this.current();
    if (running !== undefined) {
      return Promise.reject(new ReentrantCallError(`${operation} (inside ${running})`));
    }
    const result = this.tail.then(() => {
      const holder: Holder = { operation, active: true };
      return this.holder.run(holder, async () => {
        try {
          return await body();
        } finally {
          holder.active = false;
        }
      });
    });
    this.tail = result.then(settled, settled);
    return result;
  }

  /** Name of the operation holding the lock in the current async context. */
  current(): string | undefined {
    const holder = this.holder.getStore();
    return holder?.active ? holder.operation : undefined;
  }
}

function settled(): void {}
