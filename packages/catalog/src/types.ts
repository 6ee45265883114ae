/**
 * @setcheck/catalog domain types.
 *
 * Primitive item records (what a catalog source describes) and the
 * structured error raised when a catalog cannot be loaded.
 */

import { z } from "zod";

// =============================================================================
// Records
// =============================================================================

export const MemberRecordSchema = z.object({
  name: z.string().min(1),
  /** Absent digest = member excluded from verification (e.g. a nodump rom) */
  digest: z.string().min(1).optional(),
});

export const CatalogRecordSchema = z.object({
  name: z.string().min(1),
  parentName: z.string().min(1).optional(),
  isBaseUnit: z.boolean().default(false),
  members: z.array(MemberRecordSchema).default([]),
});

/** One item as described by a catalog source, before validation. */
export type CatalogRecord = z.input<typeof CatalogRecordSchema>;

export type MemberRecord = z.input<typeof MemberRecordSchema>;

// =============================================================================
// Errors
// =============================================================================

/** Error codes for catalog loading. */
export type CatalogErrorCode =
  | "UNREADABLE"
  | "MALFORMED_XML"
  | "INVALID_RECORD"
  | "DUPLICATE_ITEM";

/**
 * Structured error from the catalog loader.
 * Always fatal: no verification is possible without a catalog.
 */
export class CatalogError extends Error {
  public readonly code: CatalogErrorCode;

  constructor(code: CatalogErrorCode, message: string) {
    super(message);
    this.name = "CatalogError";
    this.code = code;
  }
}
