/**
 * Property-Based Tests for @setcheck/reconciler
 *
 * Uses fast-check to verify invariants that must hold for ANY catalog
 * whose clones point at root items:
 *
 * 1. independent is the identity on items and members
 * 2. parent-contains-all drops every clone and folds its members into the parent
 * 3. delta-only leaves no clone member that the parent has with an equal digest
 * 4. Reconciling twice gives the same result (no hidden accumulation)
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Catalog, CatalogItem, StorageConvention } from "@setcheck/types";
import { digestsEqual } from "@setcheck/types";
import { reconcileCatalog } from "../src/reconciler.js";
import { plain } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbMemberName = fc.constantFrom("a.rom", "b.rom", "c.rom", "d.rom", "e.rom");

/** Small digest alphabet so parents and clones collide often. */
const arbDigest = fc.constantFrom("d1", "d2", "D1", "d3");

const arbMembers = fc.dictionary(arbMemberName, arbDigest, { maxKeys: 5 });

/**
 * Generate a catalog of roots followed by clones. Every clone's parent
 * is one of the roots; some roots are base units.
 */
const arbCatalog: fc.Arbitrary<Catalog> = fc
  .record({
    roots: fc.array(fc.tuple(arbMembers, fc.boolean()), { minLength: 1, maxLength: 4 }),
    clones: fc.array(fc.tuple(fc.nat(), arbMembers), { maxLength: 6 }),
  })
  .map(({ roots, clones }) => {
    const catalog = new Map<string, CatalogItem>();
    roots.forEach(([members, base], i) => {
      catalog.set(`root${i}`, {
        name: `root${i}`,
        isBaseUnit: base,
        expectedMembers: new Map(Object.entries(members)),
      });
    });
    clones.forEach(([parentIndex, members], i) => {
      catalog.set(`clone${i}`, {
        name: `clone${i}`,
        parentName: `root${parentIndex % roots.length}`,
        isBaseUnit: false,
        expectedMembers: new Map(Object.entries(members)),
      });
    });
    return catalog;
  });

const arbConvention = fc.constantFrom<StorageConvention>(
  "independent",
  "parent-contains-all",
  "delta-only",
);

function clonesOf(catalog: Catalog): CatalogItem[] {
  return [...catalog.values()].filter((item) => item.parentName !== undefined);
}

// =============================================================================
// Properties
// =============================================================================

describe("reconciler properties", () => {
  it("independent is the identity", () => {
    fc.assert(
      fc.property(arbCatalog, (catalog) => {
        const { effective, warnings } = reconcileCatalog(catalog, "independent");

        const expected = Object.fromEntries(
          [...catalog.values()].map((item) => [item.name, Object.fromEntries(item.expectedMembers)]),
        );
        expect(plain(effective)).toEqual(expected);
        expect([...effective.keys()]).toEqual([...catalog.keys()]);
        expect(warnings).toEqual([]);
      }),
    );
  });

  it("parent-contains-all drops clones and folds their members into the parent", () => {
    fc.assert(
      fc.property(arbCatalog, (catalog) => {
        const { effective } = reconcileCatalog(catalog, "parent-contains-all");

        for (const clone of clonesOf(catalog)) {
          expect(effective.has(clone.name)).toBe(false);

          const parentName = clone.parentName ?? "";
          const parentMembers = effective.get(parentName);
          const original = catalog.get(parentName)?.expectedMembers;
          for (const memberName of clone.expectedMembers.keys()) {
            expect(parentMembers?.has(memberName)).toBe(true);
            const originalDigest = original?.get(memberName);
            if (originalDigest !== undefined) {
              expect(parentMembers?.get(memberName)).toBe(originalDigest);
            }
          }
        }
      }),
    );
  });

  it("delta-only leaves no member the parent supplies with an equal digest", () => {
    fc.assert(
      fc.property(arbCatalog, (catalog) => {
        const { effective } = reconcileCatalog(catalog, "delta-only");

        for (const clone of clonesOf(catalog)) {
          const parent = catalog.get(clone.parentName ?? "");
          const remaining = effective.get(clone.name);
          for (const [memberName, digest] of remaining ?? []) {
            const parentDigest = parent?.expectedMembers.get(memberName);
            expect(parentDigest !== undefined && digestsEqual(parentDigest, digest)).toBe(false);
          }
        }
      }),
    );
  });

  it("reconciling twice yields the same effective catalog", () => {
    fc.assert(
      fc.property(arbCatalog, arbConvention, (catalog, convention) => {
        const first = reconcileCatalog(catalog, convention);
        const second = reconcileCatalog(catalog, convention);

        expect(plain(second.effective)).toEqual(plain(first.effective));
        expect([...second.effective.keys()]).toEqual([...first.effective.keys()]);
        expect(second.warnings).toEqual(first.warnings);
      }),
    );
  });
});
