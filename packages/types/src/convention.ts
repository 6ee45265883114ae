/**
 * Storage conventions: how a container stores its members relative to
 * its parent and clones.
 *
 * - independent: every container holds all of its own members
 * - parent-contains-all: the parent container also holds every clone's
 *   members; clones have no container of their own
 * - delta-only: a clone container holds only what its parent lacks
 */
export type StorageConvention =
  | "independent"
  | "parent-contains-all"
  | "delta-only";

export const STORAGE_CONVENTIONS: readonly StorageConvention[] = [
  "independent",
  "parent-contains-all",
  "delta-only",
];
