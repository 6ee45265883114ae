/**
 * Shared test fixtures for verify tests.
 */
import type { EffectiveCatalog } from "@setcheck/types";
import type { ArchiveStore, ContainerLookup } from "../src/types.js";

/** Effective catalog from `{ item: { member: digest } }`, in key order. */
export function effectiveOf(spec: Record<string, Record<string, string>>): EffectiveCatalog {
  return new Map(
    Object.entries(spec).map(([name, members]): [string, ReadonlyMap<string, string>] => [
      name,
      new Map(Object.entries(members)),
    ]),
  );
}

/**
 * Store whose containers report fixed digests; items listed in
 * `unreadable` fail with the given detail.
 */
export function digestStore(
  containers: Record<string, Record<string, string>>,
  unreadable: Record<string, string> = {},
): ArchiveStore {
  return {
    async lookup(itemName: string): Promise<ContainerLookup> {
      const detail = unreadable[itemName];
      if (detail !== undefined) return { status: "unreadable", detail };
      const members = containers[itemName];
      if (!members) return { status: "absent" };
      return { status: "present", members: new Map(Object.entries(members)) };
    },
  };
}
