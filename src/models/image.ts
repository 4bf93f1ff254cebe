/**
 * Image identity.
 *
 * Two images are the same image when their content digests match; the
 * display name (repository:tag) is informational only, so `app:latest` and
 * `app:1.4` built from the same content collapse into one entry.
 */

export interface Image {
  /** repository:tag as reported by the container runtime */
  readonly displayName: string;
  /** Image ID with the algorithm prefix (e.g. `sha256:`) removed */
  readonly contentDigest: string;
}

export class InvalidDigestError extends Error {
  constructor(public readonly raw: string) {
    super(`Invalid image digest: "${raw}"`);
    this.name = 'InvalidDigestError';
  }
}

/** `sha256:abc123` → `abc123`. A bare hex digest is returned unchanged. */
export function normalizeDigest(raw: string): string {
  const trimmed = raw.trim();
  const colonIdx = trimmed.indexOf(':');
  const digest = colonIdx >= 0 ? trimmed.slice(colonIdx + 1) : trimmed;
  if (!digest || digest.includes(':') || /[\s/]/.test(digest)) {
    throw new InvalidDigestError(raw);
  }
  return digest;
}

export function createImage(displayName: string, rawDigest: string): Image {
  return { displayName, contentDigest: normalizeDigest(rawDigest) };
}

export function sameImage(a: Image, b: Image): boolean {
  return a.contentDigest === b.contentDigest;
}

/**
 * Images keyed by content digest. The first display name seen for a digest
 * is the one kept; later inserts of the same digest are reported as
 * duplicates and leave the stored entry untouched.
 */
export class InventorySet implements Iterable<Image> {
  private readonly byDigest = new Map<string, Image>();

  /** Returns false when an image with the same digest is already present. */
  add(image: Image): boolean {
    if (this.byDigest.has(image.contentDigest)) return false;
    this.byDigest.set(image.contentDigest, image);
    return true;
  }

  has(contentDigest: string): boolean {
    return this.byDigest.has(contentDigest);
  }

  get(contentDigest: string): Image | undefined {
    return this.byDigest.get(contentDigest);
  }

  get size(): number {
    return this.byDigest.size;
  }

  /** Images in insertion order. */
  values(): Image[] {
    return [...this.byDigest.values()];
  }

  [Symbol.iterator](): Iterator<Image> {
    return this.byDigest.values();
  }
}
