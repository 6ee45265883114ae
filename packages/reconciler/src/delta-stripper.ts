/**
 * Delta Stripper — the delta-only convention.
 *
 * A clone container holds only the members its parent does not supply.
 * Every member whose name appears among the parent's own members is
 * removed from the clone's expected set. A differing digest is reported
 * as a conflict and the member is still removed.
 *
 * Only the direct parent's original members are consulted.
 */

import type { Catalog } from "@setcheck/types";
import { digestsEqual } from "@setcheck/types";
import type { ReconciliationWarning, StrategyOutcome } from "./types.js";
import { danglingParent, digestConflict, parentCycle } from "./warnings.js";

export class DeltaStripper {
  apply(catalog: Catalog): StrategyOutcome {
    const warnings: ReconciliationWarning[] = [];
    const effective = new Map<string, ReadonlyMap<string, string>>();

    for (const item of catalog.values()) {
      if (item.parentName === undefined) {
        effective.set(item.name, new Map(item.expectedMembers));
        continue;
      }

      const parent = catalog.get(item.parentName);
      if (!parent) {
        warnings.push(danglingParent(item.name, item.parentName));
        effective.set(item.name, new Map(item.expectedMembers));
        continue;
      }

      if (parent.name === item.name) {
        warnings.push(parentCycle(item.name, [item.name, item.name]));
        effective.set(item.name, new Map(item.expectedMembers));
        continue;
      }

      const members = new Map<string, string>();
      for (const [memberName, digest] of item.expectedMembers) {
        const parentDigest = parent.expectedMembers.get(memberName);
        if (parentDigest === undefined) {
          members.set(memberName, digest);
        } else if (!digestsEqual(parentDigest, digest)) {
          warnings.push(digestConflict(item.name, parent.name, memberName, parentDigest, digest));
        }
      }
      effective.set(item.name, members);
    }

    return { effective, warnings };
  }
}
