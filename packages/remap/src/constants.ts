/** Hex digits in the largest 64-bit value */
export const MAX_HASH_HEX_DIGITS = 16;

/** Between the hash and the routing suffix */
export const HOST_SEPARATOR = ".";
