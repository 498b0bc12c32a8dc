import type { DataBundle } from "../models/DataBundle";

/**
 * Copy of `bundle` restricted to `allowed` mime types, in the bundle's own
 * order. An empty allow-list keeps everything.
 */
export function filterBundle(bundle: DataBundle, allowed: Iterable<string>): DataBundle {
  const allow = new Set(allowed);
  const out: DataBundle = new Map();
  for (const [mime, bytes] of bundle) {
    if (allow.size === 0 || allow.has(mime)) {
      out.set(mime, new Uint8Array(bytes));
    }
  }
  return out;
}
