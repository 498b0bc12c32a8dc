import type { DataBundle } from "../models/DataBundle";

const FNV_OFFSET = 2166136261;
const FNV_PRIME = 16777619;

/** Fingerprint of a bundle with no tracked data. */
export const EMPTY_FINGERPRINT = FNV_OFFSET;

/** Reserved: "no fingerprint seen yet". Never returned by `fingerprint`. */
export const UNSET_FINGERPRINT = 0;

const encoder = new TextEncoder();

function feed(hash: number, bytes: Uint8Array): number {
  let h = hash;
  for (let i = 0; i < bytes.length; i++) {
    h = Math.imul(h ^ bytes[i], FNV_PRIME);
  }
  return h;
}

function feedLength(hash: number, length: number): number {
  return feed(
    hash,
    Uint8Array.of((length >>> 24) & 0xff, (length >>> 16) & 0xff, (length >>> 8) & 0xff, length & 0xff)
  );
}

/**
 * FNV-1a over the tracked part of `bundle`.
 *
 * Types are visited in lexicographic order and types missing from the bundle
 * are skipped, so `fingerprint(b, t)` equals `fingerprint(filterBundle(b, t), [])`.
 * An empty `trackedMimeTypes` means every type in the bundle.
 */
export function fingerprint(bundle: DataBundle, trackedMimeTypes: Iterable<string>): number {
  let types = Array.from(new Set(trackedMimeTypes));
  if (types.length === 0) types = Array.from(bundle.keys());
  types.sort();

  let hash = FNV_OFFSET;
  for (const mime of types) {
    const bytes = bundle.get(mime);
    if (!bytes) continue;
    hash = feed(hash, encoder.encode(mime));
    hash = feedLength(hash, bytes.length);
    hash = feed(hash, bytes);
  }

  const result = hash >>> 0;
  return result === UNSET_FINGERPRINT ? 1 : result;
}
