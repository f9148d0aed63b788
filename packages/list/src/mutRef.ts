import {ListError, ListErrorCode} from "./errors.js";
import type {Slot} from "./slot.js";

/**
 * Exclusive mutable access to the value of one slot.
 *
 * A reference is live until the next operation on the list it came from, reads included. Any use
 * after that throws `ListError` with code `STALE_REFERENCE`.
 */
export class MutRef<T> {
  constructor(
    private readonly slot: Slot<T>,
    readonly index: number,
    private readonly isLive: () => boolean
  ) {}

  get value(): T {
    this.assertLive();
    return this.slot.value;
  }

  set value(value: T) {
    this.assertLive();
    this.slot.value = value;
  }

  /**
   * Replace the value with `fn(value)` and return the new value
   */
  update(fn: (value: T) => T): T {
    const value = fn(this.value);
    this.value = value;
    return value;
  }

  private assertLive(): void {
    if (!this.isLive()) {
      throw new ListError({code: ListErrorCode.STALE_REFERENCE, index: this.index});
    }
  }
}
