import { InvariantViolationError } from './errors.js';

export interface DisposableValue {
  dispose(): void;
}

interface Cell<T> {
  value: T;
  refs: number;
}

/**
 * Reference-counted shared ownership of a disposable value.
 *
 * Every handle, including clones, must be released exactly once. The value
 * is disposed when the last handle is released.
 */
export class SharedHandle<T extends DisposableValue> {
  private released = false;

  private constructor(private readonly cell: Cell<T>) {}

  static create<T extends DisposableValue>(value: T): SharedHandle<T> {
    return new SharedHandle({ value, refs: 1 });
  }

  get value(): T {
    if (this.released) {
      throw new InvariantViolationError('Shared handle used after release');
    }
    return this.cell.value;
  }

  /** Live handles to the value, this one included. */
  get refCount(): number {
    return this.cell.refs;
  }

  get isReleased(): boolean {
    return this.released;
  }

  clone(): SharedHandle<T> {
    if (this.released) {
      throw new InvariantViolationError('Cannot clone a released shared handle');
    }
    this.cell.refs++;
    return new SharedHandle(this.cell);
  }

  /**
   * Drops this handle. Returns true when it was the last one and the value
   * was disposed. Releasing twice is a no-op returning false.
   */
  release(): boolean {
    if (this.released) return false;
    this.released = true;
    this.cell.refs--;
    if (this.cell.refs > 0) return false;
    this.cell.value.dispose();
    return true;
  }

  /** True when both handles share the same underlying value. */
  sameAs(other: SharedHandle<T>): boolean {
    return this.cell === other.cell;
  }
}
