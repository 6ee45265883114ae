/**
 * Catalog Types
 *
 * A catalog describes the items (romsets) a collection should contain
 * and, for each item, the members (rom files) expected inside its
 * container together with their digests.
 *
 * Rules:
 * - Item names are unique within a catalog
 * - Member names are unique within an item
 * - Digests are opaque hex tokens, compared case-insensitively
 * - A catalog is never mutated once built; derived views are new values
 */

/** Member name → expected (or actual) hex digest. */
export type MemberDigests = ReadonlyMap<string, string>;

/**
 * One named logical unit of the catalog, e.g. one machine's romset.
 */
export interface CatalogItem {
  /** Unique item name (also the container name on disk) */
  readonly name: string;

  /** Name of the item this one is a clone of. Absent for roots. */
  readonly parentName?: string;

  /**
   * Shared unit (BIOS-style set). Under the parent-contains-all
   * convention its members are never merged into its own parent.
   */
  readonly isBaseUnit: boolean;

  /** Members this item declares, with their expected digests */
  readonly expectedMembers: MemberDigests;
}

/** Item name → item, in catalog (insertion) order. */
export type Catalog = ReadonlyMap<string, CatalogItem>;

/**
 * Item name → members its on-disk container must hold, after the
 * storage convention has been applied.
 */
export type EffectiveCatalog = ReadonlyMap<string, MemberDigests>;
