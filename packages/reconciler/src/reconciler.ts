/**
 * Reconciler — Top-level coordinator
 *
 * Applies one storage convention to a raw catalog and returns the
 * effective catalog: for every item, the members its on-disk container
 * must hold.
 *
 * The raw catalog is never modified, so the same catalog can be
 * reconciled again (under the same or another convention) with
 * identical results.
 *
 * Usage:
 *   const reconciler = new Reconciler({ convention: "parent-contains-all" });
 *   const { effective, warnings } = reconciler.reconcile(catalog);
 */

import type { Catalog, StorageConvention } from "@setcheck/types";
import { isStorageConvention } from "@setcheck/types";
import { ParentMerger } from "./parent-merger.js";
import { DeltaStripper } from "./delta-stripper.js";
import { danglingParent } from "./warnings.js";
import type {
  ReconciliationResult,
  ReconciliationSummary,
  ReconciliationWarning,
  StrategyOutcome,
} from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ReconcilerConfig {
  readonly convention: StorageConvention;
  /** Called once per warning, in the order the warnings were found. */
  readonly onWarning?: (warning: ReconciliationWarning) => void;
}

// =============================================================================
// Reconciler
// =============================================================================

export class Reconciler {
  private readonly parentMerger = new ParentMerger();
  private readonly deltaStripper = new DeltaStripper();
  private readonly convention: StorageConvention;
  private readonly onWarning: ((warning: ReconciliationWarning) => void) | undefined;

  constructor(config: ReconcilerConfig) {
    if (!isStorageConvention(config.convention)) {
      throw new Error(`Unknown storage convention: ${String(config.convention)}`);
    }
    this.convention = config.convention;
    this.onWarning = config.onWarning;
  }

  /**
   * Build the effective catalog for the configured convention.
   */
  reconcile(catalog: Catalog): ReconciliationResult {
    const outcome = this.applyConvention(catalog);

    if (this.onWarning) {
      for (const warning of outcome.warnings) {
        this.onWarning(warning);
      }
    }

    return {
      convention: this.convention,
      effective: outcome.effective,
      warnings: outcome.warnings,
      summary: this.computeSummary(catalog, outcome),
    };
  }

  private applyConvention(catalog: Catalog): StrategyOutcome {
    switch (this.convention) {
      case "independent":
        return this.copyIndependent(catalog);
      case "parent-contains-all":
        return this.parentMerger.apply(catalog);
      case "delta-only":
        return this.deltaStripper.apply(catalog);
    }
  }

  /** Fresh copies of every member map; parent references are only checked. */
  private copyIndependent(catalog: Catalog): StrategyOutcome {
    const effective = new Map<string, Map<string, string>>();
    const warnings: ReconciliationWarning[] = [];

    for (const item of catalog.values()) {
      effective.set(item.name, new Map(item.expectedMembers));
      if (item.parentName !== undefined && !catalog.has(item.parentName)) {
        warnings.push(danglingParent(item.name, item.parentName));
      }
    }

    return { effective, warnings };
  }

  private computeSummary(catalog: Catalog, outcome: StrategyOutcome): ReconciliationSummary {
    const count = (kind: ReconciliationWarning["kind"]): number =>
      outcome.warnings.filter((w) => w.kind === kind).length;

    return {
      inputItems: catalog.size,
      effectiveItems: outcome.effective.size,
      danglingParentCount: count("dangling-parent"),
      digestConflictCount: count("digest-conflict"),
      parentCycleCount: count("parent-cycle"),
    };
  }
}

/**
 * Reconcile a catalog under a convention without keeping a Reconciler.
 */
export function reconcileCatalog(
  catalog: Catalog,
  convention: StorageConvention,
): ReconciliationResult {
  return new Reconciler({ convention }).reconcile(catalog);
}
