/**
 * @setcheck/catalog — Catalog loader.
 *
 * Turns a catalog source (dat XML, or primitive item records) into the
 * raw Catalog consumed by the reconciler. Load failures are fatal and
 * raised as CatalogError.
 */

export { buildCatalog } from "./build.js";
export { parseDatXml, loadCatalog } from "./dat-parser.js";
export { CatalogError, CatalogRecordSchema, MemberRecordSchema } from "./types.js";
export type { CatalogRecord, MemberRecord, CatalogErrorCode } from "./types.js";
