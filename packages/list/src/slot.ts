import {ListError, ListErrorCode} from "./errors.js";
import type {TypeInfo, ValueType} from "./valueType.js";

/**
 * Type-erased view of a stored value, as yielded by list iteration.
 *
 * An item is read-only and only valid while its list is unmodified. Once the list is modified any
 * use of `downcast` or `toString` throws `ListError` with code `STALE_REFERENCE`.
 */
export interface ListItem {
  /** Type the value was stored under */
  readonly type: TypeInfo;
  /** Position of the value at the time it was yielded */
  readonly index: number;
  /** Recover the value if it was stored under exactly `type`, `null` otherwise */
  downcast<U>(type: ValueType<U>): U | null;
  /** Display form of the value, rendered by its type */
  toString(): string;
}

/**
 * What a list knows about a slot without its static type
 */
export interface ErasedSlot {
  readonly type: TypeInfo;
  toString(): string;
}

/**
 * Single storage location of a list, never handed out of it
 */
export class Slot<T> implements ErasedSlot {
  constructor(
    readonly type: ValueType<T>,
    public value: T
  ) {}

  toString(): string {
    return this.type.format(this.value);
  }
}

/**
 * A slot built with `type` holds a `T`: tokens are compared by identity.
 */
export function isSlotOf<T>(slot: ErasedSlot, type: ValueType<T>): slot is Slot<T> {
  return slot instanceof Slot && slot.type === type;
}

export class SlotView implements ListItem {
  constructor(
    private readonly slot: ErasedSlot,
    readonly index: number,
    private readonly isLive: () => boolean
  ) {}

  get type(): TypeInfo {
    return this.slot.type;
  }

  downcast<U>(type: ValueType<U>): U | null {
    const slot = this.liveSlot();
    return isSlotOf(slot, type) ? slot.value : null;
  }

  toString(): string {
    return this.liveSlot().toString();
  }

  private liveSlot(): ErasedSlot {
    if (!this.isLive()) {
      throw new ListError({code: ListErrorCode.STALE_REFERENCE, index: this.index});
    }
    return this.slot;
  }
}
