/**
 * @setcheck/reconciler domain types.
 *
 * Reconciliation turns a raw catalog into the effective catalog for one
 * storage convention. Data problems found on the way are warnings:
 * - Dangling parent references
 * - Digest conflicts between a parent and a clone
 * - Parent chains that loop back on themselves
 */

import type { EffectiveCatalog, StorageConvention } from "@setcheck/types";

// =============================================================================
// Warnings
// =============================================================================

/** An item names a parent that is not in the catalog. */
export interface DanglingParentWarning {
  readonly kind: "dangling-parent";
  readonly itemName: string;
  readonly parentName: string;
  readonly message: string;
}

/** A clone and its parent declare the same member with different digests. */
export interface DigestConflictWarning {
  readonly kind: "digest-conflict";
  /** The clone whose member conflicted */
  readonly itemName: string;
  /** The item whose digest was kept */
  readonly parentName: string;
  readonly memberName: string;
  readonly parentDigest: string;
  readonly childDigest: string;
  readonly message: string;
}

/** Following an item's parent references leads back to an item already visited. */
export interface ParentCycleWarning {
  readonly kind: "parent-cycle";
  readonly itemName: string;
  /** Names visited, ending with the repeated one */
  readonly chain: readonly string[];
  readonly message: string;
}

export type ReconciliationWarning =
  | DanglingParentWarning
  | DigestConflictWarning
  | ParentCycleWarning;

// =============================================================================
// Result
// =============================================================================

export interface ReconciliationSummary {
  readonly inputItems: number;
  readonly effectiveItems: number;
  readonly danglingParentCount: number;
  readonly digestConflictCount: number;
  readonly parentCycleCount: number;
}

/** Output of a single convention strategy. */
export interface StrategyOutcome {
  readonly effective: EffectiveCatalog;
  readonly warnings: readonly ReconciliationWarning[];
}

export interface ReconciliationResult extends StrategyOutcome {
  readonly convention: StorageConvention;
  readonly summary: ReconciliationSummary;
}
