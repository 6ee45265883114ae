/**
 * @setcheck/verify — Archive verification for setcheck.
 *
 * Compares an effective catalog with the containers of an archive
 * store and classifies every discrepancy into a plain report.
 *
 * Core exports:
 * - verifyCatalog — verify every item, in catalog order
 * - ZipArchiveStore — containers as `<item>.zip` files in a directory
 * - MemoryArchiveStore — containers held in memory
 * - fingerprintReport — content hash of a report
 */

// Verification
export { verifyCatalog } from "./verifier.js";

// Archive stores
export { ZipArchiveStore } from "./zip-store.js";
export { MemoryArchiveStore } from "./memory-store.js";
export type { MemberContents } from "./memory-store.js";

// Digests
export { DIGEST_ALGORITHM, digestMember } from "./digest.js";
export { fingerprintReport } from "./fingerprint.js";

// Types
export type {
  ArchiveStore,
  ContainerLookup,
  VerificationProgress,
  VerifyOptions,
  WrongDigestMember,
  UnreadableItem,
  ReportSummary,
  DiscrepancyReport,
} from "./types.js";
