/***
 * ElementTraits — How a GrowableArray makes and copies its elements.
 *
 * `make_default` value-initializes spare slots (sized construction,
 * resize, freshly allocated buffers). `copy` is applied by the copying
 * operations (fill, literal and copy construction, assign, push_back,
 * insert). Without it a copy stores the value itself, which is already
 * a full copy for primitives. The moving operations never call `copy`.
 *
 ***/

export interface ElementTraits<T> {
  readonly make_default: () => T;
  readonly copy?: (value: T) => T;
}

/** Traits, or just a default factory when values need no custom copy. */
export type ElementSource<T> = ElementTraits<T> | (() => T);

export function to_traits<T>(source: ElementSource<T>): ElementTraits<T> {
  return typeof source === "function" ? { make_default: source } : source;
}

export function copy_of<T>(traits: ElementTraits<T>): (value: T) => T {
  return traits.copy ?? identity;
}

const identity = <T>(value: T): T => value;

export const zero = (): number => 0;
export const empty_string = (): string => "";
export const false_value = (): boolean => false;
