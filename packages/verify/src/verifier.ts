/**
 * @setcheck/verify — Catalog verification.
 *
 * Checks every item of an effective catalog against its container:
 * 1. No container (or an unreadable one) → absent
 * 2. Expected member not in the container → missing
 * 3. Member present with another digest → wrong digest
 * 4. In strict mode, container member the catalog does not expect → unexpected
 *
 * An item with any finding from steps 2-4 is incomplete.
 *
 * Items are verified one at a time in catalog order and each container
 * is looked up once. A store that throws aborts the whole run; no
 * partial report is returned.
 */

import type { EffectiveCatalog } from "@setcheck/types";
import { digestsEqual } from "@setcheck/types";
import type {
  ArchiveStore,
  DiscrepancyReport,
  ReportSummary,
  UnreadableItem,
  VerifyOptions,
  WrongDigestMember,
} from "./types.js";

/**
 * Verify an effective catalog against an archive store.
 *
 * @param catalog - Item name → members its container must hold
 * @param store - Source of the actual containers
 * @param options - Strict mode and progress reporting
 * @returns DiscrepancyReport with every finding, in catalog order
 */
export async function verifyCatalog(
  catalog: EffectiveCatalog,
  store: ArchiveStore,
  options: VerifyOptions = {},
): Promise<DiscrepancyReport> {
  const strict = options.strict ?? false;

  const absentItems: string[] = [];
  const incompleteItems: string[] = [];
  const unreadableItems: UnreadableItem[] = [];
  const missingMembers = new Map<string, string[]>();
  const wrongDigestMembers = new Map<string, WrongDigestMember[]>();
  const unexpectedMembers = new Map<string, string[]>();

  let index = 0;
  for (const [itemName, expected] of catalog) {
    index += 1;
    const lookup = await store.lookup(itemName);

    if (lookup.status === "present") {
      const missing: string[] = [];
      const wrong: WrongDigestMember[] = [];

      for (const [member, expectedDigest] of expected) {
        const actual = lookup.members.get(member);
        if (actual === undefined) {
          missing.push(member);
        } else if (!digestsEqual(actual, expectedDigest)) {
          wrong.push({ member, expected: expectedDigest, actual });
        }
      }

      const unexpected = strict
        ? [...lookup.members.keys()].filter((member) => !expected.has(member))
        : [];

      if (missing.length > 0) missingMembers.set(itemName, missing);
      if (wrong.length > 0) wrongDigestMembers.set(itemName, wrong);
      if (unexpected.length > 0) unexpectedMembers.set(itemName, unexpected);
      if (missing.length > 0 || wrong.length > 0 || unexpected.length > 0) {
        incompleteItems.push(itemName);
      }
    } else {
      absentItems.push(itemName);
      if (lookup.status === "unreadable") {
        unreadableItems.push({ itemName, detail: lookup.detail });
      }
    }

    options.onProgress?.({ index, total: catalog.size, itemName });
  }

  const summary = summarize(
    catalog.size,
    absentItems,
    incompleteItems,
    unreadableItems,
    missingMembers,
    wrongDigestMembers,
    unexpectedMembers,
  );

  return {
    absentItems,
    incompleteItems,
    missingMembers: Object.fromEntries(missingMembers),
    wrongDigestMembers: Object.fromEntries(wrongDigestMembers),
    ...(strict ? { unexpectedMembers: Object.fromEntries(unexpectedMembers) } : {}),
    unreadableItems,
    summary,
  };
}

// =============================================================================
// Summary
// =============================================================================

function countValues(byItem: ReadonlyMap<string, readonly unknown[]>): number {
  let total = 0;
  for (const values of byItem.values()) total += values.length;
  return total;
}

function summarize(
  totalItems: number,
  absentItems: readonly string[],
  incompleteItems: readonly string[],
  unreadableItems: readonly UnreadableItem[],
  missingMembers: ReadonlyMap<string, readonly string[]>,
  wrongDigestMembers: ReadonlyMap<string, readonly WrongDigestMember[]>,
  unexpectedMembers: ReadonlyMap<string, readonly string[]>,
): ReportSummary {
  return {
    totalItems,
    absentCount: absentItems.length,
    incompleteCount: incompleteItems.length,
    missingMemberCount: countValues(missingMembers),
    wrongDigestMemberCount: countValues(wrongDigestMembers),
    unexpectedMemberCount: countValues(unexpectedMembers),
    unreadableCount: unreadableItems.length,
    allVerified: absentItems.length === 0 && incompleteItems.length === 0,
  };
}
