import { createHash } from "node:crypto";

/** The one digest algorithm catalogs and stores agree on. */
export const DIGEST_ALGORITHM = "sha1";

/**
 * Compute the lowercase hex digest of a member's bytes.
 */
export function digestMember(data: Uint8Array | string): string {
  return createHash(DIGEST_ALGORITHM).update(data).digest("hex");
}
