/**
 * Digest comparison.
 *
 * Catalogs carry digests in whatever case their authors used; archive
 * stores emit lowercase hex. Equality is decided after lower-casing.
 */

export function normalizeDigest(digest: string): string {
  return digest.toLowerCase();
}

export function digestsEqual(a: string, b: string): boolean {
  return normalizeDigest(a) === normalizeDigest(b);
}
