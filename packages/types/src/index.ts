/**
 * @setcheck/types — Shared domain types for the setcheck stack.
 *
 * These types are used across all setcheck packages:
 * - Catalog items and their expected members
 * - Effective (post-reconciliation) catalogs
 * - Storage conventions
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Derived structures are new values, never edits of their source
 */

// Catalog types
export type {
  MemberDigests,
  CatalogItem,
  Catalog,
  EffectiveCatalog,
} from "./catalog.js";

// Storage conventions
export type { StorageConvention } from "./convention.js";
export { STORAGE_CONVENTIONS } from "./convention.js";

// Digest comparison
export { normalizeDigest, digestsEqual } from "./digest.js";

// Runtime type guards
export { isStorageConvention } from "./guards.js";
