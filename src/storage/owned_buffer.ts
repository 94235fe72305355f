/***
 * OwnedBuffer — Exclusively owned, fixed-length slot storage.
 *
 * Allocates all of its slots up front and fills each with a fresh
 * default value, so every slot always holds a valid T. It never grows
 * or shrinks: a container that needs more room allocates a second
 * buffer, relocates into it, and swaps it into place.
 *
 * Nothing else holds the backing array. `raw` hands it out for bulk
 * reads, but the reference is only good until the next swap().
 *
 ***/

import {
  is_non_negative_integer,
  precondition,
  TYPE_ERROR,
  TypeError,
} from "type_primitives";
import type { Slots } from "utils/arrays";

export class OwnedBuffer<T> implements Slots<T> {
  private _items: T[];

  constructor(length: number, make_default: () => T) {
    precondition(
      is_non_negative_integer(length),
      "buffer length must be a non-negative integer",
      { length },
    );
    const items = new Array<T>(length);
    for (let i = 0; i < length; i++) items[i] = make_default();
    this._items = items;
  }

  /** Zero-length buffer; needs no default factory since it has no slots. */
  static empty<T>(): OwnedBuffer<T> {
    return new OwnedBuffer<T>(0, no_default_slot);
  }

  public get length(): number {
    return this._items.length;
  }

  public get(index: number): T {
    this._check(index);
    return this._items[index];
  }

  public set(index: number, value: T): void {
    this._check(index);
    this._items[index] = value;
  }

  /**
   * Backing array, first slot at index 0. Valid until the next swap().
   * Do not change its length.
   */
  public get raw(): T[] {
    return this._items;
  }

  public swap(other: OwnedBuffer<T>): void {
    const items = this._items;
    this._items = other._items;
    other._items = items;
  }

  private _check(index: number): void {
    if (!__DEV__) return;
    precondition(
      is_non_negative_integer(index) && index < this._items.length,
      "buffer slot index out of bounds",
      { index, length: this._items.length },
    );
  }
}

/** Default factory of empty(); a zero-length buffer never calls it. */
export function no_default_slot(): never {
  throw new TypeError(
    TYPE_ERROR.ASSERTION_FAIL_CONDITION,
    "empty OwnedBuffer has no slots to fill",
  );
}
