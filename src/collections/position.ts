/***
 * Position — Branded offset into a GrowableArray's visible sequence.
 *
 * Valid positions run from 0 (begin) to size (one past the end). A
 * position stays meaningful only while the array is not resized, inserted
 * into or erased from in front of it; nothing tracks that for the caller.
 *
 ***/

import {
  is_non_negative_integer,
  unsafe_cast,
  validate_and_cast,
  type Brand,
} from "type_primitives";

export type Position = Brand<number, "position">;

export const as_position = (value: number) =>
  validate_and_cast<number, Position>(
    value,
    is_non_negative_integer,
    "Position must be a non-negative integer",
  );

export const advance = (pos: Position, n = 1): Position => as_position(pos + n);

export const distance = (from: Position, to: Position): number => to - from;

// Hot-path variant for offsets the container has already bounded.
export const position_unchecked = (value: number): Position =>
  unsafe_cast<Position>(value);
