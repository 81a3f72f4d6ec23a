import { InvariantViolationError } from './errors.js';

/**
 * Mutual exclusion for synchronous critical sections.
 *
 * A critical section runs to completion on the event loop, so holding the
 * lock for the duration of `run` makes its body atomic with respect to every
 * other caller. The body may not start async work under the lock, and may
 * not re-enter it.
 */
export class SyncLock {
  private held = false;

  constructor(private readonly name: string) {}

  get locked(): boolean {
    return this.held;
  }

  run<T>(fn: () => T): T {
    if (this.held) {
      throw new InvariantViolationError(`Lock re-entered: ${this.name}`, { lock: this.name });
    }
    this.held = true;
    let result: T;
    try {
      result = fn();
    } finally {
      this.held = false;
    }
    if (result instanceof Promise) {
      throw new InvariantViolationError(`Lock held across async work: ${this.name}`, { lock: this.name });
    }
    return result;
  }
}
