// Shared constants for fields, connectivities and operator invocation

/**
 * Neighbour-table entry meaning "no neighbour at this slot".
 * Connectivity tables hold 1-based indices, so 0 never collides with a valid
 * entry. Negative entries are rejected.
 */
export const NEIGHBOR_SENTINEL = 0;

/** External indices start at `origin + FIRST_INDEX`. */
export const FIRST_INDEX = 1;

export const DEFAULT_ORIGIN = 0;

/** Backend id that evaluates operator bodies in-process. Always registered. */
export const EMBEDDED_BACKEND = 'embedded';

/** Shift distance along a plain axis when no slot is given. */
export const DEFAULT_AXIS_SHIFT = 1;

/** Range of values an int32 field stores without wrapping. */
export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;
