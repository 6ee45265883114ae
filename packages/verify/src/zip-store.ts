/**
 * @setcheck/verify — Zip directory archive store.
 *
 * Each item's container is `<root>/<item>.zip`. The directory is listed
 * once when the store is opened; items whose zip is not in that listing
 * are absent. A directory that does not exist holds no containers.
 *
 * A lookup reads the whole zip and digests every file entry (directory
 * entries are skipped). A zip that cannot be read or decoded, including
 * an entry failing its CRC check, makes the container unreadable.
 */

import type { Dirent } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import AdmZip from "adm-zip";
import type { ArchiveStore, ContainerLookup } from "./types.js";
import { digestMember } from "./digest.js";

const CONTAINER_EXTENSION = ".zip";

export class ZipArchiveStore implements ArchiveStore {
  private constructor(
    private readonly rootDir: string,
    private readonly containers: ReadonlySet<string>,
    /** False when `rootDir` did not exist at open time */
    readonly directoryFound: boolean,
  ) {}

  /**
   * List `rootDir` and return a store over the zip files found there.
   *
   * @throws {Error} if the directory exists but cannot be listed
   */
  static async open(rootDir: string): Promise<ZipArchiveStore> {
    let entries: Dirent[];
    try {
      entries = await readdir(rootDir, { withFileTypes: true });
    } catch (err: unknown) {
      if (isNotFound(err)) {
        return new ZipArchiveStore(rootDir, new Set(), false);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Cannot list archive directory ${rootDir}: ${reason}`);
    }

    const containers = new Set<string>();
    for (const entry of entries) {
      if (entry.isFile() && entry.name.endsWith(CONTAINER_EXTENSION)) {
        containers.add(entry.name.slice(0, -CONTAINER_EXTENSION.length));
      }
    }
    return new ZipArchiveStore(rootDir, containers, true);
  }

  /** Number of containers found when the store was opened. */
  get size(): number {
    return this.containers.size;
  }

  async lookup(itemName: string): Promise<ContainerLookup> {
    if (!this.containers.has(itemName)) {
      return { status: "absent" };
    }

    const filePath = join(this.rootDir, `${itemName}${CONTAINER_EXTENSION}`);
    try {
      const zip = new AdmZip(await readFile(filePath));
      const members = new Map<string, string>();
      for (const entry of zip.getEntries()) {
        if (entry.isDirectory) continue;
        members.set(entry.entryName, digestMember(entry.getData()));
      }
      return { status: "present", members };
    } catch (err: unknown) {
      return {
        status: "unreadable",
        detail: `${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      };
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
