import { GROWTH_FACTOR } from "./constants";

/**
 * Indexed slot storage the relocation helpers operate on.
 * OwnedBuffer implements it; plain arrays can be wrapped trivially.
 */
export interface Slots<T> {
  get(index: number): T;
  set(index: number, value: T): void;
}

/**
 * Capacity to grow to when `required` slots do not fit in `capacity`.
 * Multiplies by GROWTH_FACTOR but never undershoots `required`.
 */
export function grown_capacity(capacity: number, required: number): number {
  const doubled = capacity * GROWTH_FACTOR;
  return doubled > required ? doubled : required;
}

/**
 * Move [first, last) of `src` into `dst` starting at `d_first`, front to back.
 * Safe for overlapping ranges within one storage only when d_first <= first.
 */
export function move_range<T>(
  src: Slots<T>,
  first: number,
  last: number,
  dst: Slots<T>,
  d_first: number,
): void {
  for (let i = first; i < last; i++) {
    dst.set(d_first++, src.get(i));
  }
}

/**
 * Move [first, last) so that it ends right before `d_last`, back to front.
 * Used for right shifts inside a single storage.
 */
export function move_backward<T>(
  slots: Slots<T>,
  first: number,
  last: number,
  d_last: number,
): void {
  while (last > first) {
    slots.set(--d_last, slots.get(--last));
  }
}

/** Like move_range, but each value passes through `copy` on its way over. */
export function copy_range<T>(
  src: Slots<T>,
  first: number,
  last: number,
  dst: Slots<T>,
  d_first: number,
  copy: (value: T) => T,
): void {
  for (let i = first; i < last; i++) {
    dst.set(d_first++, copy(src.get(i)));
  }
}

/** Write a fresh value from `make` into every slot of [first, last). */
export function fill_range<T>(
  dst: Slots<T>,
  first: number,
  last: number,
  make: () => T,
): void {
  for (let i = first; i < last; i++) dst.set(i, make());
}
