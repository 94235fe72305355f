import { is_non_negative_integer, validate_and_cast } from "type_primitives";

/**
 * Construction token asking for `capacity` slots with no elements in them.
 * Distinguishes `new GrowableArray(f, reserve(10))` (empty, room for 10)
 * from `new GrowableArray(f, 10)` (ten default elements).
 */
export class ReservationHint {
  constructor(public readonly capacity: number) {}
}

export function reserve(capacity: number): ReservationHint {
  return new ReservationHint(
    validate_and_cast(
      capacity,
      is_non_negative_integer,
      "reserved capacity must be a non-negative integer",
    ),
  );
}
