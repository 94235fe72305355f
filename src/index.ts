// Container
export {
  GrowableArray,
  type ReadonlyGrowableArray,
  type Slot,
} from "./collections/growable_array";

// Construction helpers
export { reserve, ReservationHint } from "./collections/reservation";
export {
  to_traits,
  zero,
  empty_string,
  false_value,
  type ElementTraits,
  type ElementSource,
} from "./collections/element";

// Positions
export {
  as_position,
  advance,
  distance,
  type Position,
} from "./collections/position";

// Relational operators
export {
  equals,
  not_equals,
  less,
  less_equal,
  greater,
  greater_equal,
  compare,
  type EqualsFn,
  type LessFn,
  type Ordered,
} from "./collections/relational";

// Storage
export { OwnedBuffer } from "./storage/owned_buffer";

// Errors
export {
  AppError,
  ContainerError,
  CONTAINER_ERROR,
  is_container_error,
} from "./utils/error";
export { TypeError, TYPE_ERROR } from "./type_primitives/error";
