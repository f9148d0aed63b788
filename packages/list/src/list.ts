import {Err, type Logger, type Result} from "@polylist/utils";
import {ListError, ListErrorCode} from "./errors.js";
import {MutRef} from "./mutRef.js";
import {type ErasedSlot, type ListItem, Slot, SlotView, isSlotOf} from "./slot.js";
import type {TypeInfo, ValueType} from "./valueType.js";

export type HeterogeneousListOpts = {
  /**
   * Receives debug traces of rejected replaces and clears
   */
  logger?: Logger;
};

/**
 * `[type, value]` pairs accepted by `HeterogeneousList.of`, each value checked against its own type
 */
export type ListEntries<T extends unknown[]> = {[K in keyof T]: readonly [ValueType<T[K]>, T[K]]};

/**
 * Ordered, growable list of values of arbitrary, intermixed types.
 *
 * Every value is stored together with the `ValueType` it was inserted under, and can only be read
 * back through that same type. Positions are dense: `0 .. length - 1`.
 *
 * ```ts
 * const list = new HeterogeneousList();
 * list.insert(Types.i32, 42);
 * list.insert(Types.string, "x");
 * list.get(0, Types.i32); // 42
 * list.get(0, Types.f64); // null
 * ```
 */
export class HeterogeneousList implements Iterable<ListItem> {
  private readonly items: ErasedSlot[] = [];
  private readonly logger?: Logger;
  /** Bumped by every operation, a `MutRef` is only live for the epoch it was created in */
  private accessEpoch = 0;
  /** Bumped by every operation that changes slots or hands out mutable access */
  private modCount = 0;

  constructor(opts: HeterogeneousListOpts = {}) {
    this.logger = opts.logger;
  }

  /**
   * Create a list from `[type, value]` pairs, in order
   * ```ts
   * HeterogeneousList.of([Types.i32, 1], [Types.string, "two"]);
   * ```
   */
  static of<T extends unknown[]>(...entries: ListEntries<T>): HeterogeneousList {
    const list = new HeterogeneousList();
    for (const [type, value] of entries) {
      list.insert(type, value);
    }
    return list;
  }

  /**
   * O(1) Number of stored values
   */
  get length(): number {
    this.touch();
    return this.items.length;
  }

  len(): number {
    return this.length;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  /**
   * Append `value` at the end of the list. Existing indices are unchanged.
   */
  insert<T>(type: ValueType<T>, value: T): void {
    this.touch();
    this.items.push(new Slot(type, value));
    this.modCount++;
  }

  /**
   * Prepend `value` as the new index 0, shifting every existing value up by one
   */
  insertAtBeginning<T>(type: ValueType<T>, value: T): void {
    this.touch();
    this.items.unshift(new Slot(type, value));
    this.modCount++;
  }

  /**
   * Drop the value at `index` and store `value` in its place. The new type does not need to match
   * the previous one.
   *
   * Returns an `INDEX_OUT_OF_RANGE` error, leaving the list untouched, if `index` is not in `[0, length)`.
   */
  replace<T>(index: number, type: ValueType<T>, value: T): Result<void, ListError> {
    this.touch();
    if (!this.isInBounds(index)) {
      const length = this.items.length;
      this.logger?.debug("Rejected replace", {index, length});
      return Err(new ListError({code: ListErrorCode.INDEX_OUT_OF_RANGE, index, length}));
    }

    this.items[index] = new Slot(type, value);
    this.modCount++;
    return;
  }

  /**
   * Return the value at `index` if it was stored under exactly `type`.
   *
   * Returns `null` both when `index` is out of bounds and when the types differ.
   */
  get<T>(index: number, type: ValueType<T>): T | null {
    this.touch();
    const slot = this.slotAt(index);
    return slot !== null && isSlotOf(slot, type) ? slot.value : null;
  }

  /**
   * Same contract as `get`, but returns exclusive mutable access to the value in place.
   * The reference stops being usable as soon as anything else touches the list.
   * ```ts
   * const ref = list.getMut(0, Types.i32);
   * if (ref) ref.value += 1;
   * ```
   */
  getMut<T>(index: number, type: ValueType<T>): MutRef<T> | null {
    this.touch();
    const slot = this.slotAt(index);
    if (slot === null || !isSlotOf(slot, type)) {
      return null;
    }

    this.modCount++;
    const epoch = this.accessEpoch;
    return new MutRef(slot, index, () => this.accessEpoch === epoch);
  }

  /**
   * Type of the value at `index`, `null` if out of bounds
   */
  typeAt(index: number): TypeInfo | null {
    this.touch();
    return this.slotAt(index)?.type ?? null;
  }

  /**
   * Drop every value, length becomes 0
   */
  clear(): void {
    this.touch();
    const count = this.items.length;
    this.items.length = 0;
    this.modCount++;
    this.logger?.debug("Cleared list", {count});
  }

  /**
   * Lazy traversal of the current values in index order. Each call starts a fresh traversal.
   *
   * Modifying the list while the returned iterator is being consumed makes its next step throw
   * `ListError` with code `CONCURRENT_MODIFICATION`. Yielded items are read-only views, reading
   * one after the list was modified throws `STALE_REFERENCE`.
   */
  iter(): IterableIterator<ListItem> {
    this.touch();
    return this.traverse(this.modCount);
  }

  [Symbol.iterator](): IterableIterator<ListItem> {
    return this.iter();
  }

  toString(): string {
    this.touch();
    return `[${this.items.map((slot) => slot.toString()).join(", ")}]`;
  }

  private *traverse(expectedModCount: number): Generator<ListItem> {
    for (let i = 0; ; i++) {
      this.touch();
      if (this.modCount !== expectedModCount) {
        throw new ListError({code: ListErrorCode.CONCURRENT_MODIFICATION});
      }
      if (i >= this.items.length) {
        return;
      }
      yield new SlotView(this.items[i], i, () => this.readUnmodified(expectedModCount));
    }
  }

  /**
   * Reading through a view counts as an access of the list
   */
  private readUnmodified(expectedModCount: number): boolean {
    this.touch();
    return this.modCount === expectedModCount;
  }

  private slotAt(index: number): ErasedSlot | null {
    return this.isInBounds(index) ? this.items[index] : null;
  }

  private isInBounds(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.items.length;
  }

  private touch(): void {
    this.accessEpoch++;
  }
}
