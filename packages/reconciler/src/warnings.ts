/**
 * Warning constructors shared by the convention strategies.
 */

import type {
  DanglingParentWarning,
  DigestConflictWarning,
  ParentCycleWarning,
} from "./types.js";

export function danglingParent(itemName: string, parentName: string): DanglingParentWarning {
  return {
    kind: "dangling-parent",
    itemName,
    parentName,
    message: `Item ${itemName} is a clone of ${parentName}, but ${parentName} is not in the catalog`,
  };
}

export function digestConflict(
  itemName: string,
  parentName: string,
  memberName: string,
  parentDigest: string,
  childDigest: string,
): DigestConflictWarning {
  return {
    kind: "digest-conflict",
    itemName,
    parentName,
    memberName,
    parentDigest,
    childDigest,
    message:
      `Digest conflict for member ${memberName}: ` +
      `${parentName}=${parentDigest} ${itemName}=${childDigest}`,
  };
}

export function parentCycle(itemName: string, chain: readonly string[]): ParentCycleWarning {
  return {
    kind: "parent-cycle",
    itemName,
    chain,
    message: `Parent chain of ${itemName} loops: ${chain.join(" -> ")}`,
  };
}
