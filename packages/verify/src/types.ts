/**
 * @setcheck/verify — Types for archive verification.
 *
 * These types define the verification protocol:
 * - ArchiveStore: where containers and their actual member digests come from
 * - DiscrepancyReport: plain, serializable outcome of a verification run
 */

import type { MemberDigests } from "@setcheck/types";

// =============================================================================
// Archive Store
// =============================================================================

/**
 * Outcome of looking up one item's container.
 *
 * `members` holds the digest of every member in the container, so each
 * container is read once per run however many members are expected.
 */
export type ContainerLookup =
  | { readonly status: "present"; readonly members: MemberDigests }
  | { readonly status: "absent" }
  | { readonly status: "unreadable"; readonly detail: string };

/**
 * Source of on-disk containers, addressed by item name.
 *
 * Digests are recomputed on every lookup; stores do not cache.
 */
export interface ArchiveStore {
  lookup(itemName: string): Promise<ContainerLookup>;
}

// =============================================================================
// Verification
// =============================================================================

export interface VerificationProgress {
  /** 1-based position of the item just verified */
  readonly index: number;
  readonly total: number;
  readonly itemName: string;
}

export interface VerifyOptions {
  /** Report on-disk members the catalog does not expect */
  readonly strict?: boolean;

  /** Called after each item has been verified, in catalog order. */
  readonly onProgress?: (progress: VerificationProgress) => void;
}

// =============================================================================
// Report
// =============================================================================

/** A member present in its container with a digest other than expected. */
export interface WrongDigestMember {
  readonly member: string;
  readonly expected: string;
  readonly actual: string;
}

/** A container that exists but could not be opened or read. */
export interface UnreadableItem {
  readonly itemName: string;
  readonly detail: string;
}

export interface ReportSummary {
  readonly totalItems: number;
  readonly absentCount: number;
  readonly incompleteCount: number;
  readonly missingMemberCount: number;
  readonly wrongDigestMemberCount: number;
  readonly unexpectedMemberCount: number;
  readonly unreadableCount: number;
  /** No absent and no incomplete items */
  readonly allVerified: boolean;
}

/**
 * Result of verifying an effective catalog against an archive store.
 *
 * Every array follows catalog order. The per-item records
 * (`missingMembers`, `wrongDigestMembers`, `unexpectedMembers`) are plain
 * objects, so integer-like item names such as `1942` enumerate first;
 * walk `incompleteItems` to visit them in catalog order. The report holds
 * no timestamps or generated identifiers: the same catalog and store
 * contents always produce the same report.
 */
export interface DiscrepancyReport {
  /** Items with no container (including unreadable ones) */
  readonly absentItems: readonly string[];

  /** Items whose container has a missing, wrong or (strict) unexpected member */
  readonly incompleteItems: readonly string[];

  readonly missingMembers: Readonly<Record<string, readonly string[]>>;

  readonly wrongDigestMembers: Readonly<Record<string, readonly WrongDigestMember[]>>;

  /** Only present in strict mode */
  readonly unexpectedMembers?: Readonly<Record<string, readonly string[]>>;

  /** Diagnostic detail for containers counted as absent because they were unreadable */
  readonly unreadableItems: readonly UnreadableItem[];

  readonly summary: ReportSummary;
}
