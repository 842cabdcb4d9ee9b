// Set
export { OrderedSet, type OrderedSetOptions } from "./ordered_set";

// Cursors
export { Cursor } from "./cursor";

// Ordering
export {
  default_compare,
  reverse,
  type Comparable,
  type Comparator,
} from "./comparator";

// Diagnostics
export { INVARIANT, type InvariantViolation } from "./tree/invariants";

// Errors
export { AppError, SetError, SET_ERROR, is_set_error } from "./utils/error";
