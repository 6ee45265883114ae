/**
 * Shared test fixtures for reconciler tests.
 */
import type { Catalog, CatalogItem, EffectiveCatalog } from "@setcheck/types";

export interface ItemSpec {
  readonly parent?: string;
  readonly base?: boolean;
  readonly members?: Record<string, string>;
}

/** Build a catalog from `{ name: { parent, base, members } }`, in key order. */
export function catalogOf(spec: Record<string, ItemSpec>): Catalog {
  const catalog = new Map<string, CatalogItem>();
  for (const [name, item] of Object.entries(spec)) {
    catalog.set(name, {
      name,
      ...(item.parent !== undefined ? { parentName: item.parent } : {}),
      isBaseUnit: item.base ?? false,
      expectedMembers: new Map(Object.entries(item.members ?? {})),
    });
  }
  return catalog;
}

/** Effective catalog as plain objects, for readable assertions. */
export function plain(effective: EffectiveCatalog): Record<string, Record<string, string>> {
  return Object.fromEntries(
    [...effective].map(([name, members]) => [name, Object.fromEntries(members)]),
  );
}
