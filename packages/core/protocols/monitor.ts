import type { DataBundle } from "../models/DataBundle";
import type { MonitorSettings } from "../monitor/config";

/**
 * Marker type: an item carrying a non-empty entry of this type is a settings
 * push rather than clipboard data.
 */
export const SETTINGS_MIME = "application/x-clipmon-settings";

export type ItemMessage = {
  data: DataBundle;
  id?: string;
  sentAt?: number;
};

export type MonitorMessage =
  | { type: "SETTINGS"; settings: MonitorSettings }
  | { type: "DATA"; data: DataBundle };

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

function isBase64(encoded: string): boolean {
  return encoded.length % 4 === 0 && BASE64.test(encoded);
}

const BOOLEAN_KEYS = [
  "watchClipboard",
  "mirrorClipboardToSelection",
  "watchSelection",
  "mirrorSelectionToClipboard",
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(bytes: Uint8Array): unknown {
  try {
    return JSON.parse(new TextDecoder("utf-8", { fatal: true }).decode(bytes));
  } catch {
    return undefined;
  }
}

export function encodeItemMessage(data: DataBundle, meta: { id?: string; sentAt?: number } = {}): Uint8Array {
  const formats: Record<string, string> = {};
  for (const [mime, bytes] of data) {
    formats[mime] = Buffer.from(bytes).toString("base64");
  }
  return new TextEncoder().encode(JSON.stringify({ ...meta, data: formats }));
}

export function decodeItemMessage(bytes: Uint8Array): ItemMessage | null {
  const parsed = parseJson(bytes);
  if (!isRecord(parsed) || !isRecord(parsed.data)) return null;

  const data: DataBundle = new Map();
  for (const [mime, encoded] of Object.entries(parsed.data)) {
    if (!mime || typeof encoded !== "string" || !isBase64(encoded)) return null;
    data.set(mime, new Uint8Array(Buffer.from(encoded, "base64")));
  }

  const msg: ItemMessage = { data };
  if (typeof parsed.id === "string") msg.id = parsed.id;
  if (typeof parsed.sentAt === "number") msg.sentAt = parsed.sentAt;
  return msg;
}

/** Validate a raw settings object. Unknown keys are ignored; a known key with a wrong type rejects the lot. */
export function decodeSettings(raw: unknown): MonitorSettings | null {
  if (!isRecord(raw)) return null;
  const settings: MonitorSettings = {};

  const seed = raw.lastFingerprintSeed;
  if (seed !== undefined) {
    if (typeof seed !== "number" || !Number.isInteger(seed) || seed < 0 || seed > 0xffffffff) return null;
    settings.lastFingerprintSeed = seed;
  }

  const formats = raw.trackedMimeTypes;
  if (formats !== undefined) {
    if (typeof formats !== "string") return null;
    settings.trackedMimeTypes = formats;
  }

  for (const key of BOOLEAN_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "boolean") return null;
    settings[key] = value;
  }
  return settings;
}

export function decodeMonitorMessage(bytes: Uint8Array): MonitorMessage | null {
  const item = decodeItemMessage(bytes);
  if (!item) return null;

  const settingsBytes = item.data.get(SETTINGS_MIME);
  if (settingsBytes && settingsBytes.length > 0) {
    const settings = decodeSettings(parseJson(settingsBytes));
    return settings ? { type: "SETTINGS", settings } : null;
  }
  return { type: "DATA", data: item.data };
}

export function encodeSettingsMessage(settings: MonitorSettings): Uint8Array {
  const data: DataBundle = new Map([[SETTINGS_MIME, new TextEncoder().encode(JSON.stringify(settings))]]);
  return encodeItemMessage(data);
}
