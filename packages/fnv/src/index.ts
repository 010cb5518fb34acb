/**
 * @hashroute/fnv
 *
 * Stateless FNV-64 hashing with continuation across segments.
 */

export {
  FNV64_OFFSET_BASIS,
  FNV64_PRIME,
  type FormatOptions,
  formatFnv64,
  hashFnv64,
  hashFnv64Continue,
  hashFnv64String,
} from "./fnv64.js";

export const PACKAGE_NAME = "@hashroute/fnv" as const;
