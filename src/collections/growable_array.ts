/***
 * GrowableArray — Generic resizable array over an OwnedBuffer.
 *
 * Keeps a logical size separate from the capacity of its backing buffer.
 * Elements at 0..size-1 are the visible sequence; slots size..capacity-1
 * hold valid but unspecified values (defaults, or whatever was last
 * popped, erased or cleared out of them).
 *
 * Growth never resizes a buffer in place. A new OwnedBuffer is allocated
 * and filled, the visible elements are relocated into it, and only then
 * is it swapped in. If the allocation throws, the array is unchanged.
 *
 * Capacity at least doubles when an append or insert overflows it, so a
 * run of push_back calls costs amortised O(1) each.
 *
 * Preconditions (unchecked index in range, non-empty pop, insert/erase
 * position in range) are verified only when __DEV__ is set. Only the
 * checked accessors report a recoverable ContainerError.
 *
 ***/

import { OwnedBuffer } from "storage/owned_buffer";
import { is_non_negative_integer, precondition } from "type_primitives";
import {
  copy_range,
  fill_range,
  grown_capacity,
  move_backward,
  move_range,
} from "utils/arrays";
import { EMPTY_CAPACITY, EMPTY_SIZE } from "utils/constants";
import { CONTAINER_ERROR, ContainerError } from "utils/error";
import {
  copy_of,
  to_traits,
  type ElementSource,
  type ElementTraits,
} from "./element";
import { position_unchecked, type Position } from "./position";
import { reserve, ReservationHint } from "./reservation";

/** Mutable handle to one element, yielded by GrowableArray.slots(). */
export interface Slot<T> {
  readonly position: Position;
  value: T;
}

/** The non-mutating surface of a GrowableArray. */
export interface ReadonlyGrowableArray<T> extends Iterable<T> {
  readonly size: number;
  readonly capacity: number;
  readonly is_empty: boolean;
  readonly traits: ElementTraits<T>;
  get(index: number): T;
  at(index: number): T;
  front(): T;
  back(): T;
  begin(): Position;
  end(): Position;
  positions(): Iterable<Position>;
  to_array(): T[];
  clone(): GrowableArray<T>;
}

export class GrowableArray<T> implements ReadonlyGrowableArray<T> {
  private _items: OwnedBuffer<T> = OwnedBuffer.empty();
  private _size = EMPTY_SIZE;
  private _capacity = EMPTY_CAPACITY;
  private _traits: ElementTraits<T>;

  /** Empty array; no slots allocated. */
  constructor(element: ElementSource<T>);
  /** `size` elements, each default-made, or a copy of `value` when given. */
  constructor(element: ElementSource<T>, size: number, ...fill: [] | [T]);
  /** Copies of `items`, in order. */
  constructor(element: ElementSource<T>, items: readonly T[]);
  /** No elements, but room for `hint.capacity` of them. */
  constructor(element: ElementSource<T>, hint: ReservationHint);
  constructor(
    element: ElementSource<T>,
    init?: number | readonly T[] | ReservationHint,
    ...fill: [] | [T]
  ) {
    this._traits = to_traits(element);
    if (init === undefined) return;

    if (typeof init === "number") {
      check_count(init, "size");
      this._items = new OwnedBuffer(init, this._traits.make_default);
      // decided by argument count, so an explicit undefined still fills
      if (fill.length === 1) {
        const value = fill[0];
        const copy = copy_of(this._traits);
        fill_range(this._items, 0, init, () => copy(value));
      }
      this._size = init;
      this._capacity = init;
      return;
    }

    if (init instanceof ReservationHint) {
      this.reserve(init.capacity);
      return;
    }

    const copy = copy_of(this._traits);
    this._items = new OwnedBuffer(init.length, this._traits.make_default);
    for (let i = 0; i < init.length; i++) this._items.set(i, copy(init[i]));
    this._size = init.length;
    this._capacity = init.length;
  }

  /**
   * Move construction. The result holds what `source` held; `source` is
   * left empty (size 0, capacity 0) and still usable.
   */
  static take<T>(source: GrowableArray<T>): GrowableArray<T> {
    const moved = new GrowableArray<T>(source._traits);
    moved.swap(source);
    return moved;
  }

  //=========================================================
  // Queries
  //=========================================================

  public get size(): number {
    return this._size;
  }

  public get capacity(): number {
    return this._capacity;
  }

  public get is_empty(): boolean {
    return this._size === 0;
  }

  public get traits(): ElementTraits<T> {
    return this._traits;
  }

  //=========================================================
  // Element access
  //=========================================================

  /** Unchecked read. `index` must be below size. */
  public get(index: number): T {
    this._check_index(index);
    return this._items.get(index);
  }

  /** Unchecked write. `index` must be below size. */
  public set_at(index: number, value: T): void {
    this._check_index(index);
    this._items.set(index, value);
  }

  /** Checked read; throws ContainerError(OUT_OF_RANGE) when index >= size. */
  public at(index: number): T {
    this._check_range(index);
    return this._items.get(index);
  }

  /** Checked write; throws ContainerError(OUT_OF_RANGE) when index >= size. */
  public assign_at(index: number, value: T): void {
    this._check_range(index);
    this._items.set(index, value);
  }

  public front(): T {
    precondition(this._size > 0, "front() on an empty array");
    return this._items.get(0);
  }

  public back(): T {
    precondition(this._size > 0, "back() on an empty array");
    return this._items.get(this._size - 1);
  }

  //=========================================================
  // Capacity
  //=========================================================

  /**
   * Make room for `new_capacity` elements. Allocates exactly that many
   * slots when it exceeds the current capacity, otherwise does nothing.
   * Size and contents are unchanged either way.
   */
  public reserve(new_capacity: number): void {
    check_count(new_capacity, "capacity");
    if (new_capacity > this._capacity) this._reallocate(new_capacity);
  }

  /**
   * Change the size. Growing past capacity reallocates to
   * max(new_size, 2 * capacity); newly exposed elements are defaults.
   * Shrinking only lowers the size.
   */
  public resize(new_size: number): void {
    check_count(new_size, "size");
    if (new_size > this._capacity) {
      this._reallocate(grown_capacity(this._capacity, new_size));
    } else if (new_size > this._size) {
      fill_range(this._items, this._size, new_size, this._traits.make_default);
    }
    this._size = new_size;
  }

  public clear(): void {
    this._size = EMPTY_SIZE;
  }

  //=========================================================
  // Modifiers
  //=========================================================

  /** Append a copy of `value`. */
  public push_back(value: T): void {
    this._emplace_back(copy_of(this._traits)(value));
  }

  /** Append `value` itself, without copying. */
  public push_back_move(value: T): void {
    this._emplace_back(value);
  }

  /**
   * Insert a copy of `value` before `pos` (pos == end() appends).
   * Returns the position of the inserted element.
   */
  public insert(pos: Position, value: T): Position {
    return this._emplace(pos, copy_of(this._traits)(value));
  }

  public insert_move(pos: Position, value: T): Position {
    return this._emplace(pos, value);
  }

  /** Drop the last element. The array must not be empty. */
  public pop_back(): void {
    precondition(this._size > 0, "pop_back() on an empty array");
    this._size--;
  }

  /**
   * Remove the element at `pos`, shifting the tail left by one.
   * Returns the position now occupied by the element that followed it,
   * which equals end() when the last element was erased.
   * Capacity is unchanged.
   */
  public erase(pos: Position): Position {
    precondition(
      is_non_negative_integer(pos) && pos < this._size,
      "erase position must refer to an element",
      { position: pos, size: this._size },
    );
    move_range(this._items, pos + 1, this._size, this._items, pos);
    this._size--;
    return position_unchecked(pos);
  }

  public swap(other: GrowableArray<T>): void {
    this._items.swap(other._items);

    const size = this._size;
    this._size = other._size;
    other._size = size;

    const capacity = this._capacity;
    this._capacity = other._capacity;
    other._capacity = capacity;

    const traits = this._traits;
    this._traits = other._traits;
    other._traits = traits;
  }

  /** Copy assignment: replace contents, capacity and traits with a copy of `other`'s. */
  public assign(other: ReadonlyGrowableArray<T>): void {
    if (other === this) return;
    const copy = other.clone();
    this.swap(copy);
  }

  /**
   * Copy construction. The copy gets its own buffer with the same
   * capacity, and copies of the visible elements.
   */
  public clone(): GrowableArray<T> {
    const copy = new GrowableArray<T>(this._traits, reserve(this._capacity));
    copy_range(this._items, 0, this._size, copy._items, 0, copy_of(this._traits));
    copy._size = this._size;
    return copy;
  }

  //=========================================================
  // Traversal
  //=========================================================

  public begin(): Position {
    return position_unchecked(0);
  }

  public end(): Position {
    return position_unchecked(this._size);
  }

  [Symbol.iterator](): Iterator<T> {
    let i = 0;
    const items = this._items.raw;
    const len = this._size;
    return {
      next(): IteratorResult<T> {
        if (i < len) return { value: items[i++], done: false };
        return { value: undefined, done: true };
      },
    };
  }

  /** begin() .. end()-1, fresh on every iteration. */
  public positions(): Iterable<Position> {
    return {
      [Symbol.iterator]: (): Iterator<Position> => {
        let i = 0;
        const len = this._size;
        return {
          next(): IteratorResult<Position> {
            if (i < len) return { value: position_unchecked(i++), done: false };
            return { value: undefined, done: true };
          },
        };
      },
    };
  }

  /** Writable handles over the visible elements, fresh on every iteration. */
  public slots(): Iterable<Slot<T>> {
    return {
      [Symbol.iterator]: (): Iterator<Slot<T>> => {
        const positions = this.positions()[Symbol.iterator]();
        return {
          next: (): IteratorResult<Slot<T>> => {
            const next = positions.next();
            if (next.done === true) return { value: undefined, done: true };
            return { value: new ArraySlot(this, next.value), done: false };
          },
        };
      },
    };
  }

  public to_array(): T[] {
    return this._items.raw.slice(0, this._size);
  }

  //=========================================================
  // Internal
  //=========================================================

  private _reallocate(new_capacity: number): void {
    const next = new OwnedBuffer(new_capacity, this._traits.make_default);
    move_range(this._items, 0, this._size, next, 0);
    this._items.swap(next);
    this._capacity = new_capacity;
  }

  private _emplace_back(value: T): void {
    if (this._size === this._capacity) {
      this.resize(this._size + 1);
      this._items.set(this._size - 1, value);
    } else {
      this._items.set(this._size++, value);
    }
  }

  private _emplace(pos: Position, value: T): Position {
    precondition(
      is_non_negative_integer(pos) && pos <= this._size,
      "insert position must lie within [begin, end]",
      { position: pos, size: this._size },
    );
    const old_size = this._size;
    if (old_size === this._capacity) {
      this.resize(old_size + 1);
    } else {
      this._size++;
    }
    // back to front, so no slot is read after it was overwritten
    move_backward(this._items, pos, old_size, old_size + 1);
    this._items.set(pos, value);
    return position_unchecked(pos);
  }

  private _check_index(index: number): void {
    if (!__DEV__) return;
    precondition(
      is_non_negative_integer(index) && index < this._size,
      "index must be below size",
      { index, size: this._size },
    );
  }

  private _check_range(index: number): void {
    if (!is_non_negative_integer(index) || index >= this._size) {
      throw new ContainerError(
        CONTAINER_ERROR.OUT_OF_RANGE,
        `Index ${index} is out of range for size ${this._size}`,
        { index, size: this._size },
      );
    }
  }
}

class ArraySlot<T> implements Slot<T> {
  constructor(
    private readonly _array: GrowableArray<T>,
    public readonly position: Position,
  ) {}

  get value(): T {
    return this._array.get(this.position);
  }

  set value(value: T) {
    this._array.set_at(this.position, value);
  }
}

function check_count(count: number, what: "size" | "capacity"): void {
  precondition(
    is_non_negative_integer(count),
    `${what} must be a non-negative integer`,
    { [what]: count },
  );
}
