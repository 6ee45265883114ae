/**
 * Catalog construction from primitive item records.
 *
 * Every record is validated; the first invalid record or repeated item
 * name aborts the build. Members without a digest are left out of the
 * expected set. A repeated member name takes its last declaration.
 */

import type { Catalog, CatalogItem } from "@setcheck/types";
import { CatalogRecordSchema, CatalogError } from "./types.js";
import type { CatalogRecord } from "./types.js";

export function buildCatalog(records: readonly CatalogRecord[]): Catalog {
  const catalog = new Map<string, CatalogItem>();

  records.forEach((record, index) => {
    const parsed = CatalogRecordSchema.safeParse(record);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new CatalogError(
        "INVALID_RECORD",
        `Invalid item record #${index + 1}${where}: ${issue?.message ?? "unknown error"}`,
      );
    }

    const { name, parentName, isBaseUnit, members } = parsed.data;
    if (catalog.has(name)) {
      throw new CatalogError("DUPLICATE_ITEM", `Item "${name}" is declared more than once`);
    }

    const expectedMembers = new Map<string, string>();
    for (const member of members) {
      if (member.digest === undefined) {
        expectedMembers.delete(member.name);
      } else {
        expectedMembers.set(member.name, member.digest);
      }
    }

    catalog.set(name, {
      name,
      ...(parentName !== undefined ? { parentName } : {}),
      isBaseUnit,
      expectedMembers,
    });
  });

  return catalog;
}
