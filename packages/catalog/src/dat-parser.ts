/**
 * Dat file loader.
 *
 * Reads Logiqx-style dat XML (`<datafile><game>…`) and MAME `-listxml`
 * output (`<mame><machine>…`) into a Catalog:
 *
 *   <game name="pacman" cloneof="puckman" isbios="no">
 *     <rom name="pacman.6e" sha1="…"/>
 *     <rom name="82s126.1m" status="nodump"/>
 *   </game>
 *
 * `cloneof` becomes the parent reference, `isbios="yes"` marks a base
 * unit, and each rom's `sha1` is its expected digest.
 */

import { readFile } from "node:fs/promises";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import type { Catalog } from "@setcheck/types";
import { buildCatalog } from "./build.js";
import { CatalogError } from "./types.js";
import type { CatalogRecord } from "./types.js";

// =============================================================================
// XML node shapes
// =============================================================================

const ITEM_ELEMENTS = ["game", "machine"] as const;
const ARRAY_ELEMENTS = new Set<string>([...ITEM_ELEMENTS, "rom"]);

const RomNodeSchema = z.object({
  "@_name": z.string().min(1, "rom without a name"),
  "@_sha1": z.string().optional(),
});

const ItemNodeSchema = z.object({
  "@_name": z.string().min(1, "item without a name"),
  "@_cloneof": z.string().optional(),
  "@_isbios": z.string().optional(),
  rom: z.array(RomNodeSchema).default([]),
});

type ItemNode = z.infer<typeof ItemNodeSchema>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseAttributeValue: false,
  isArray: (name) => ARRAY_ELEMENTS.has(name),
});

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse dat XML text into a Catalog.
 *
 * @throws {CatalogError} MALFORMED_XML, INVALID_RECORD or DUPLICATE_ITEM
 */
export function parseDatXml(xml: string): Catalog {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new CatalogError("MALFORMED_XML", `Malformed dat XML at ${line}:${col}: ${msg}`);
  }

  const document: unknown = parser.parse(xml);
  return buildCatalog(collectItemNodes(document).map(toRecord));
}

/**
 * Read and parse a dat file.
 *
 * @throws {CatalogError} UNREADABLE when the file cannot be read, or any
 *   error of {@link parseDatXml}
 */
export async function loadCatalog(filePath: string): Promise<Catalog> {
  let xml: string;
  try {
    xml = await readFile(filePath, "utf8");
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CatalogError("UNREADABLE", `Cannot read dat file ${filePath}: ${reason}`);
  }
  return parseDatXml(xml);
}

// =============================================================================
// Helpers
// =============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Item nodes directly under the root element, in document order. */
function collectItemNodes(document: unknown): ItemNode[] {
  if (!isObject(document)) return [];

  const nodes: ItemNode[] = [];
  for (const [key, root] of Object.entries(document)) {
    if (key.startsWith("?") || !isObject(root)) continue;

    for (const element of ITEM_ELEMENTS) {
      const children = root[element];
      if (!Array.isArray(children)) continue;

      children.forEach((child: unknown, index) => {
        const parsed = ItemNodeSchema.safeParse(child);
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          throw new CatalogError(
            "INVALID_RECORD",
            `Invalid <${element}> #${index + 1}: ${issue?.message ?? "unknown error"}`,
          );
        }
        nodes.push(parsed.data);
      });
    }
  }
  return nodes;
}

function toRecord(node: ItemNode): CatalogRecord {
  const parentName = node["@_cloneof"];
  return {
    name: node["@_name"],
    ...(parentName ? { parentName } : {}),
    isBaseUnit: node["@_isbios"] === "yes",
    members: node.rom.map((rom) => ({
      name: rom["@_name"],
      ...(rom["@_sha1"] ? { digest: rom["@_sha1"] } : {}),
    })),
  };
}
