/**
 * Parent Merger — the parent-contains-all convention.
 *
 * A parent container also holds every member of its clones, and clones
 * have no container of their own.
 *
 * Strategy:
 * 1. Decide, for every item, whether it stays in the effective catalog
 *    or merges into an ancestor (no edits yet)
 * 2. Seed every staying item with a copy of its own members
 * 3. Merge each clone's members into its target in catalog order; a
 *    member already present keeps its digest
 *
 * An item stays when it has no parent, its parent is missing, it is a
 * base unit, or its parent chain loops. Any other item merges into the
 * nearest ancestor that stays, so a clone of a clone still lands in a
 * container that exists.
 */

import type { Catalog, CatalogItem } from "@setcheck/types";
import { digestsEqual } from "@setcheck/types";
import type { ReconciliationWarning, StrategyOutcome } from "./types.js";
import { danglingParent, digestConflict, parentCycle } from "./warnings.js";

type Placement =
  | { readonly kind: "stay" }
  | { readonly kind: "merge"; readonly target: string };

export class ParentMerger {
  apply(catalog: Catalog): StrategyOutcome {
    const warnings: ReconciliationWarning[] = [];

    // Step 1: placement decisions
    const targets = new Map<string, string>();
    for (const item of catalog.values()) {
      const placement = this.place(item, catalog, warnings);
      if (placement.kind === "merge") {
        targets.set(item.name, placement.target);
      }
    }

    // Step 2: seed staying items with their own members
    const effective = new Map<string, Map<string, string>>();
    for (const item of catalog.values()) {
      if (!targets.has(item.name)) {
        effective.set(item.name, new Map(item.expectedMembers));
      }
    }

    // Step 3: merge clones into their targets
    for (const item of catalog.values()) {
      const target = targets.get(item.name);
      if (target === undefined) continue;

      const members = effective.get(target);
      if (!members) continue;

      for (const [memberName, digest] of item.expectedMembers) {
        const existing = members.get(memberName);
        if (existing === undefined) {
          members.set(memberName, digest);
        } else if (!digestsEqual(existing, digest)) {
          warnings.push(digestConflict(item.name, target, memberName, existing, digest));
        }
      }
    }

    return { effective, warnings };
  }

  private place(
    item: CatalogItem,
    catalog: Catalog,
    warnings: ReconciliationWarning[],
  ): Placement {
    if (item.parentName === undefined) return { kind: "stay" };

    const parent = catalog.get(item.parentName);
    if (!parent) {
      warnings.push(danglingParent(item.name, item.parentName));
      return { kind: "stay" };
    }

    if (item.isBaseUnit) return { kind: "stay" };

    const chain = [item.name];
    let current = parent;
    let next = this.mergeParent(current, catalog);
    while (next) {
      if (chain.includes(current.name)) {
        warnings.push(parentCycle(item.name, [...chain, current.name]));
        return { kind: "stay" };
      }
      chain.push(current.name);
      current = next;
      next = this.mergeParent(current, catalog);
    }

    return { kind: "merge", target: current.name };
  }

  /**
   * The item an item would merge into, or undefined when it keeps its
   * own place (root, base unit or missing parent).
   */
  private mergeParent(item: CatalogItem, catalog: Catalog): CatalogItem | undefined {
    if (item.isBaseUnit || item.parentName === undefined) return undefined;
    return catalog.get(item.parentName);
  }
}
