import { UNSET_FINGERPRINT } from "../clipboard/fingerprint";
import type { DataBundle } from "../models/DataBundle";

export type MonitorConfig = {
  /** Mime types worth reporting; empty means all. */
  trackedMimeTypes: string[];
  watchClipboard: boolean;
  mirrorClipboardToSelection: boolean;
  watchSelection: boolean;
  mirrorSelectionToClipboard: boolean;
};

export type MonitorState = {
  lastFingerprint: number;
  pendingOutboundBundle: DataBundle | null;
};

/** Sparse settings pushed by the server. Absent keys leave the config alone. */
export type MonitorSettings = {
  lastFingerprintSeed?: number;
  trackedMimeTypes?: string;
  watchClipboard?: boolean;
  mirrorClipboardToSelection?: boolean;
  watchSelection?: boolean;
  mirrorSelectionToClipboard?: boolean;
};

const MIME_LIST_SEPARATOR = /[;,\s]+/;

export function parseMimeTypeList(list: string): string[] {
  const out: string[] = [];
  for (const token of list.split(MIME_LIST_SEPARATOR)) {
    if (token && !out.includes(token)) out.push(token);
  }
  return out;
}

export function createMonitorConfig(trackedMimeTypes: string[] = []): MonitorConfig {
  return {
    trackedMimeTypes: [...trackedMimeTypes],
    watchClipboard: false,
    mirrorClipboardToSelection: false,
    watchSelection: false,
    mirrorSelectionToClipboard: false,
  };
}

export function createMonitorState(): MonitorState {
  return { lastFingerprint: UNSET_FINGERPRINT, pendingOutboundBundle: null };
}

/**
 * Merge `settings` into `config` and `state` in place.
 * Selection keys are dropped on platforms without a selection buffer.
 */
export function applySettings(
  config: MonitorConfig,
  state: MonitorState,
  settings: MonitorSettings,
  supportsSelection: boolean
): void {
  if (state.lastFingerprint === UNSET_FINGERPRINT && settings.lastFingerprintSeed !== undefined) {
    state.lastFingerprint = settings.lastFingerprintSeed >>> 0;
  }
  if (settings.trackedMimeTypes !== undefined) {
    config.trackedMimeTypes = parseMimeTypeList(settings.trackedMimeTypes);
  }
  if (settings.watchClipboard !== undefined) {
    config.watchClipboard = settings.watchClipboard;
  }
  if (!supportsSelection) return;
  if (settings.mirrorClipboardToSelection !== undefined) {
    config.mirrorClipboardToSelection = settings.mirrorClipboardToSelection;
  }
  if (settings.mirrorSelectionToClipboard !== undefined) {
    config.mirrorSelectionToClipboard = settings.mirrorSelectionToClipboard;
  }
  if (settings.watchSelection !== undefined) {
    config.watchSelection = settings.watchSelection;
  }
}
