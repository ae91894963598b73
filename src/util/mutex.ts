import { assert } from "./assert.js";

/**
 * Serializes async operations: at most one synchronized action runs at a
 * time, and waiting actions run in call order.
 */
export class Mutex {
  private readonly waiting: (() => void)[] = [];
  private held = false;

  public get isLocked(): boolean {
    return this.held;
  }

  public async lock(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  public unlock(): void {
    assert(this.held, "unlock() called on a mutex that is not locked");
    const next = this.waiting.shift();

    // ownership passes straight to the next waiter
    if (next) {
      next();
    } else {
      this.held = false;
    }
  }

  public synchronize<Return, Arguments extends unknown[]>(
    action: (...args: Arguments) => PromiseLike<Return>,
  ): (...args: Arguments) => Promise<Return> {
    return async (...args: Arguments): Promise<Return> => {
      await this.lock();
      try {
        return await action(...args);
      } finally {
        this.unlock();
      }
    };
  }
}
