// GrowableArray growth policy: capacity at least doubles on overflow
export const GROWTH_FACTOR = 2;

// Capacity of a default-constructed or moved-from array
export const EMPTY_CAPACITY = 0;

export const EMPTY_SIZE = 0;
