/**
 * @setcheck/verify — Report fingerprint.
 *
 * SHA-256 of the RFC 8785 canonical JSON form of a report. Two runs over
 * the same catalog and containers produce the same fingerprint; any
 * change in any finding produces a different one.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { DiscrepancyReport } from "./types.js";

export function fingerprintReport(report: DiscrepancyReport): string {
  return createHash("sha256").update(canonicalize(report)).digest("hex");
}
