/**
 * Reconciler integration tests
 *
 * Tests the top-level Reconciler dispatching to each convention.
 */
import { describe, it, expect, vi } from "vitest";
import type { StorageConvention } from "@setcheck/types";
import { Reconciler, reconcileCatalog } from "../src/reconciler.js";
import type { ReconciliationWarning } from "../src/types.js";
import { catalogOf, plain } from "./helpers.js";

const PARENT_AND_CLONE = catalogOf({
  P: { members: { a: "d1" } },
  C: { parent: "P", members: { a: "d1", b: "d2" } },
});

describe("Reconciler", () => {
  describe("independent", () => {
    it("returns every item with its own members", () => {
      const result = reconcileCatalog(PARENT_AND_CLONE, "independent");

      expect(plain(result.effective)).toEqual({
        P: { a: "d1" },
        C: { a: "d1", b: "d2" },
      });
      expect(result.warnings).toEqual([]);
    });

    it("reports dangling parents and keeps the item's members", () => {
      const catalog = catalogOf({ C: { parent: "ghost", members: { a: "d1" } } });
      const result = reconcileCatalog(catalog, "independent");

      expect(plain(result.effective)).toEqual({ C: { a: "d1" } });
      expect(result.warnings).toEqual([
        {
          kind: "dangling-parent",
          itemName: "C",
          parentName: "ghost",
          message: "Item C is a clone of ghost, but ghost is not in the catalog",
        },
      ]);
      expect(result.summary.danglingParentCount).toBe(1);
    });

    it("returns copies, not the catalog's own maps", () => {
      const result = reconcileCatalog(PARENT_AND_CLONE, "independent");
      expect(result.effective.get("P")).not.toBe(PARENT_AND_CLONE.get("P")?.expectedMembers);
    });
  });

  describe("parent-contains-all", () => {
    it("folds the clone into its parent", () => {
      const result = reconcileCatalog(PARENT_AND_CLONE, "parent-contains-all");

      expect(plain(result.effective)).toEqual({ P: { a: "d1", b: "d2" } });
      expect(result.effective.has("C")).toBe(false);
      expect(result.warnings).toEqual([]);
    });
  });

  describe("delta-only", () => {
    it("strips members the parent supplies", () => {
      const result = reconcileCatalog(PARENT_AND_CLONE, "delta-only");

      expect(plain(result.effective)).toEqual({
        P: { a: "d1" },
        C: { b: "d2" },
      });
      expect(result.warnings).toEqual([]);
    });
  });

  describe("catalog immutability", () => {
    it.each<StorageConvention>(["independent", "parent-contains-all", "delta-only"])(
      "leaves the raw catalog untouched under %s",
      (convention) => {
        reconcileCatalog(PARENT_AND_CLONE, convention);

        expect([...PARENT_AND_CLONE.keys()]).toEqual(["P", "C"]);
        expect(Object.fromEntries(PARENT_AND_CLONE.get("P")?.expectedMembers ?? [])).toEqual({ a: "d1" });
        expect(Object.fromEntries(PARENT_AND_CLONE.get("C")?.expectedMembers ?? [])).toEqual({
          a: "d1",
          b: "d2",
        });
      },
    );

    it("produces the same effective catalog when run twice", () => {
      const reconciler = new Reconciler({ convention: "parent-contains-all" });

      const first = reconciler.reconcile(PARENT_AND_CLONE);
      const second = reconciler.reconcile(PARENT_AND_CLONE);

      expect(plain(second.effective)).toEqual(plain(first.effective));
    });
  });

  describe("warnings", () => {
    const conflicted = catalogOf({
      P: { members: { a: "d1" } },
      C: { parent: "P", members: { a: "d9" } },
      D: { parent: "missing" },
    });

    it("passes each warning to onWarning in order", () => {
      const onWarning = vi.fn<(warning: ReconciliationWarning) => void>();
      const reconciler = new Reconciler({ convention: "delta-only", onWarning });

      const result = reconciler.reconcile(conflicted);

      expect(onWarning).toHaveBeenCalledTimes(2);
      expect(onWarning.mock.calls.map(([w]) => w.kind)).toEqual([
        "digest-conflict",
        "dangling-parent",
      ]);
      expect(result.warnings.map((w) => w.kind)).toEqual([
        "digest-conflict",
        "dangling-parent",
      ]);
    });

    it("summarizes the run", () => {
      const result = reconcileCatalog(conflicted, "parent-contains-all");

      expect(result.convention).toBe("parent-contains-all");
      expect(result.summary).toEqual({
        inputItems: 3,
        effectiveItems: 2,
        danglingParentCount: 1,
        digestConflictCount: 1,
        parentCycleCount: 0,
      });
    });
  });

  describe("configuration", () => {
    it("rejects an unknown convention", () => {
      const convention: string = "merged";
      expect(
        () => new Reconciler({ convention: convention as StorageConvention }),
      ).toThrow("Unknown storage convention: merged");
    });
  });
});
