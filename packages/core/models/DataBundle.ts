/**
 * Clipboard data as the platform hands it over: mime type -> raw bytes.
 *
 * Map keeps insertion order, which filtering relies on.
 */
export type DataBundle = Map<string, Uint8Array>;

export const TEXT_MIME = "text/plain";

/** Copy with fresh byte arrays so the result shares nothing with `bundle`. */
export function cloneBundle(bundle: DataBundle): DataBundle {
  const out: DataBundle = new Map();
  for (const [mime, bytes] of bundle) {
    out.set(mime, new Uint8Array(bytes));
  }
  return out;
}

export function bundleFromText(text: string): DataBundle {
  return new Map([[TEXT_MIME, new TextEncoder().encode(text)]]);
}

export function textFromBundle(bundle: DataBundle): string | undefined {
  const bytes = bundle.get(TEXT_MIME);
  return bytes ? new TextDecoder().decode(bytes) : undefined;
}
