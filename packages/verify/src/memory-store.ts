/**
 * @setcheck/verify — In-memory archive store.
 *
 * Holds containers as member name → bytes and digests them on every
 * lookup, like the zip store does with files. Containers can also be
 * marked unreadable to stand in for a damaged archive.
 */

import type { ArchiveStore, ContainerLookup } from "./types.js";
import { digestMember } from "./digest.js";

export type MemberContents = Readonly<Record<string, Uint8Array | string>>;

export class MemoryArchiveStore implements ArchiveStore {
  private readonly containers = new Map<string, Map<string, Uint8Array | string>>();
  private readonly unreadable = new Map<string, string>();

  constructor(containers: Readonly<Record<string, MemberContents>> = {}) {
    for (const [itemName, members] of Object.entries(containers)) {
      this.put(itemName, members);
    }
  }

  /** Add or replace a container. */
  put(itemName: string, members: MemberContents): this {
    this.containers.set(itemName, new Map(Object.entries(members)));
    this.unreadable.delete(itemName);
    return this;
  }

  /** Make lookups of `itemName` fail with `detail`. */
  markUnreadable(itemName: string, detail: string): this {
    this.unreadable.set(itemName, detail);
    return this;
  }

  async lookup(itemName: string): Promise<ContainerLookup> {
    const detail = this.unreadable.get(itemName);
    if (detail !== undefined) {
      return { status: "unreadable", detail };
    }

    const contents = this.containers.get(itemName);
    if (!contents) {
      return { status: "absent" };
    }

    const members = new Map<string, string>();
    for (const [memberName, data] of contents) {
      members.set(memberName, digestMember(data));
    }
    return { status: "present", members };
  }
}
