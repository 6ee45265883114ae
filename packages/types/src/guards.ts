/**
 * Runtime Type Guards
 *
 * Narrowing functions for values that cross a system boundary
 * (command-line flags, deserialized data).
 */

import type { StorageConvention } from "./convention.js";
import { STORAGE_CONVENTIONS } from "./convention.js";

const CONVENTIONS = new Set<string>(STORAGE_CONVENTIONS);

export function isStorageConvention(value: unknown): value is StorageConvention {
  return typeof value === "string" && CONVENTIONS.has(value);
}
