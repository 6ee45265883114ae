/**
 * Runtime type guard tests for @setcheck/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import { isStorageConvention } from "../src/guards.js";
import { digestsEqual, normalizeDigest } from "../src/digest.js";

describe("isStorageConvention", () => {
  it("accepts every known convention", () => {
    expect(isStorageConvention("independent")).toBe(true);
    expect(isStorageConvention("parent-contains-all")).toBe(true);
    expect(isStorageConvention("delta-only")).toBe(true);
  });

  it("rejects set-type aliases and other strings", () => {
    expect(isStorageConvention("merged")).toBe(false);
    expect(isStorageConvention("")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isStorageConvention(undefined)).toBe(false);
    expect(isStorageConvention(1)).toBe(false);
  });
});

describe("digestsEqual", () => {
  it("ignores case", () => {
    expect(digestsEqual("ABCDEF01", "abcdef01")).toBe(true);
  });

  it("distinguishes different digests", () => {
    expect(digestsEqual("d1", "d2")).toBe(false);
  });

  it("normalizes to lowercase", () => {
    expect(normalizeDigest("E87E059C")).toBe("e87e059c");
  });
});
