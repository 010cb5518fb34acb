/**
 * FNV-1 64-bit hash (Fowler/Noll/Vo).
 *
 * Per byte: multiply the accumulator by the prime modulo 2^64, then XOR in
 * the byte. Multiply-then-XOR is FNV-1, not FNV-1a; values must match the
 * reference `fnv164` tool bit for bit.
 */

export const FNV64_OFFSET_BASIS = 0xcbf29ce484222325n;
export const FNV64_PRIME = 0x100000001b3n;

const encoder = new TextEncoder();

/**
 * Continue an FNV-64 hash over `bytes`, starting from `accumulator`.
 *
 * Hashing A then continuing with B equals hashing A‖B. The accumulator is
 * reduced modulo 2^64 before use. An empty input returns it unchanged.
 */
export function hashFnv64Continue(bytes: Uint8Array, accumulator: bigint): bigint {
  let hval = BigInt.asUintN(64, accumulator);
  for (const byte of bytes) {
    hval = BigInt.asUintN(64, hval * FNV64_PRIME) ^ BigInt(byte);
  }
  return hval;
}

/** FNV-64 of `bytes`, seeded with the offset basis */
export function hashFnv64(bytes: Uint8Array): bigint {
  return hashFnv64Continue(bytes, FNV64_OFFSET_BASIS);
}

/** FNV-64 of the UTF-8 encoding of `text` */
export function hashFnv64String(text: string): bigint {
  return hashFnv64(encoder.encode(text));
}

export interface FormatOptions {
  /** Prepend "0x" (default: false) */
  readonly prefix?: boolean;
}

/**
 * Render a 64-bit value as lowercase hex without zero padding.
 * Out-of-range values are reduced modulo 2^64.
 */
export function formatFnv64(value: bigint, options?: FormatOptions): string {
  const hex = BigInt.asUintN(64, value).toString(16);
  return options?.prefix === true ? `0x${hex}` : hex;
}
