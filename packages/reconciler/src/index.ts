/**
 * @setcheck/reconciler — Storage-convention reconciliation engine.
 *
 * Derives, from a raw catalog, the members each on-disk container must
 * hold under one of three storage conventions:
 * - independent: every item keeps its own members
 * - parent-contains-all: clones are folded into their parent
 * - delta-only: clones lose the members their parent supplies
 *
 * Data problems (dangling parents, digest conflicts, parent cycles) are
 * returned as warnings; reconciliation itself never fails.
 */

// Reconciler (top-level coordinator)
export { Reconciler, reconcileCatalog } from "./reconciler.js";
export type { ReconcilerConfig } from "./reconciler.js";

// Convention strategies
export { ParentMerger } from "./parent-merger.js";
export { DeltaStripper } from "./delta-stripper.js";

// Types
export type {
  ReconciliationWarning,
  DanglingParentWarning,
  DigestConflictWarning,
  ParentCycleWarning,
  ReconciliationResult,
  ReconciliationSummary,
  StrategyOutcome,
} from "./types.js";
