import { v4 as uuidv4 } from "uuid";
import { filterBundle } from "../clipboard/filter";
import { fingerprint } from "../clipboard/fingerprint";
import type { ClipboardPlatform } from "../clipboard/platform/types";
import { createSelectionGuard, type SelectionGuard } from "../clipboard/selectionGuard";
import { createSingleShotTimer } from "../clipboard/timer";
import type { IpcChannel } from "../messaging/channel";
import { cloneBundle, type DataBundle } from "../models/DataBundle";
import { ClipboardMode, otherMode } from "../models/enums";
import { decodeMonitorMessage, encodeItemMessage } from "../protocols/monitor";
import {
  applySettings,
  createMonitorConfig,
  createMonitorState,
  type MonitorConfig,
  type MonitorState,
} from "./config";
import * as log from "../logger";

/** Quiescence window between two clipboard writes requested by the server. */
export const UPDATE_DEBOUNCE_MS = 500;

export type YieldFn = (resume: () => void) => void;

export type ClipboardMonitorOptions = {
  platform: ClipboardPlatform;
  channel: IpcChannel;
  trackedMimeTypes?: string[];
  debounceMs?: number;
  selectionRetryMs?: number;
  /**
   * Lets already-queued platform events run before the selection is read,
   * so a clipboard change arriving at the same time is handled first.
   */
  yieldToEvents?: YieldFn;
  /** Called once the channel can no longer be read. */
  onFatal?: (err: Error) => void;
  now?: () => number;
  makeId?: () => string;
};

export interface ClipboardMonitor {
  start(): void;
  stop(): void;
  /** Entry point for platform change notifications. */
  onClipboardChanged(mode: ClipboardMode): void;
  checkClipboard(mode: ClipboardMode): void;
  updateClipboard(data: DataBundle, force?: boolean): void;
  handleMessage(payload: Uint8Array): void;
  getConfig(): MonitorConfig;
  getState(): MonitorState;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function createClipboardMonitor(options: ClipboardMonitorOptions): ClipboardMonitor {
  const { platform, channel } = options;
  const now = options.now ?? Date.now;
  const makeId = options.makeId ?? uuidv4;
  const yieldToEvents: YieldFn =
    options.yieldToEvents ??
    ((resume) => {
      setImmediate(resume);
    });
  const onFatal =
    options.onFatal ??
    (() => {
      channel.close();
    });

  const config = createMonitorConfig(options.trackedMimeTypes);
  const state = createMonitorState();
  // Modes written by this process whose change notification has not come back yet.
  const selfWrites = new Set<ClipboardMode>();
  const unsubscribers: Array<() => void> = [];
  let started = false;
  let stopped = false;
  let draining = false;
  let failed = false;

  const debounce = createSingleShotTimer(options.debounceMs ?? UPDATE_DEBOUNCE_MS, () => {
    const pending = state.pendingOutboundBundle;
    if (pending) updateClipboard(pending, true);
  });

  const openPointer = platform.openPointerDisplay;
  const guard: SelectionGuard | null =
    platform.supportsSelection && openPointer
      ? createSelectionGuard({
          openDisplay: () => openPointer(),
          retryMs: options.selectionRetryMs,
          onRetry: () => checkClipboard(ClipboardMode.Selection),
        })
      : null;

  function wanted(mode: ClipboardMode): boolean {
    return mode === ClipboardMode.Clipboard
      ? config.watchClipboard || config.mirrorClipboardToSelection
      : config.watchSelection || config.mirrorSelectionToClipboard;
  }

  function isSelfOriginated(mode: ClipboardMode): boolean {
    return selfWrites.has(mode) || platform.owns(mode);
  }

  function writePlatform(mode: ClipboardMode, data: DataBundle) {
    selfWrites.add(mode);
    try {
      if (!platform.write(mode, data)) selfWrites.delete(mode);
    } catch (err) {
      selfWrites.delete(mode);
      log.error("Cannot write clipboard data", { mode }, err);
    }
  }

  function sendChange(data: DataBundle) {
    try {
      channel.send(encodeItemMessage(data, { id: makeId(), sentAt: now() }));
    } catch (err) {
      log.error("Failed to send clipboard change", err);
    }
  }

  function processChange(mode: ClipboardMode) {
    if (stopped) return;

    let data: DataBundle;
    try {
      data = platform.read(mode);
    } catch (err) {
      log.error("Cannot access clipboard data", { mode }, err);
      return;
    }

    const hash = fingerprint(data, config.trackedMimeTypes);
    if (hash === state.lastFingerprint) return;

    const filtered = filterBundle(data, config.trackedMimeTypes);
    if (filtered.size === 0) return;

    state.lastFingerprint = hash;
    log.debug("Clipboard data changed", { mode, formats: Array.from(filtered.keys()) });

    const isClipboard = mode === ClipboardMode.Clipboard;
    const report = isClipboard ? config.watchClipboard : config.watchSelection;
    const mirror =
      platform.supportsSelection &&
      (isClipboard ? config.mirrorClipboardToSelection : config.mirrorSelectionToClipboard);

    if (report) sendChange(cloneBundle(filtered));
    if (mirror) writePlatform(otherMode(mode), cloneBundle(filtered));
  }

  function checkClipboard(mode: ClipboardMode) {
    if (mode === ClipboardMode.Selection && !platform.supportsSelection) return;
    if (!wanted(mode) || isSelfOriginated(mode)) return;

    if (mode === ClipboardMode.Selection) {
      if (guard && !guard.isSafe()) return;
      // clipboard has priority
      if (config.watchClipboard) {
        yieldToEvents(() => processChange(mode));
        return;
      }
    }
    processChange(mode);
  }

  function onClipboardChanged(mode: ClipboardMode) {
    if (selfWrites.delete(mode)) {
      log.debug("Ignoring self-originated change", { mode });
      return;
    }
    checkClipboard(mode);
  }

  function updateClipboard(data: DataBundle, force = false) {
    state.pendingOutboundBundle = data;
    if (!force && debounce.isActive()) return;

    state.lastFingerprint = fingerprint(data, []);
    writePlatform(ClipboardMode.Clipboard, data);
    if (platform.supportsSelection) {
      writePlatform(ClipboardMode.Selection, cloneBundle(data));
    }
    state.pendingOutboundBundle = null;
    debounce.start();
  }

  function handleMessage(payload: Uint8Array) {
    const msg = decodeMonitorMessage(payload);
    if (!msg) {
      log.warn("Dropping malformed message from server", { bytes: payload.length });
      return;
    }

    if (msg.type === "DATA") {
      updateClipboard(msg.data);
      return;
    }

    applySettings(config, state, msg.settings, platform.supportsSelection);
    log.debug("Settings applied", { keys: Object.keys(msg.settings) });
    if (platform.supportsSelection) {
      checkClipboard(ClipboardMode.Selection);
    }
    checkClipboard(ClipboardMode.Clipboard);
  }

  function fail(err: unknown) {
    if (failed) return;
    failed = true;
    const e = toError(err);
    log.error("Cannot read message from server", e.message);
    onFatal(e);
  }

  function drain() {
    if (draining || failed) return;
    draining = true;
    try {
      for (;;) {
        let payload: Uint8Array | null;
        try {
          payload = channel.read();
        } catch (err) {
          fail(err);
          return;
        }
        if (!payload) return;
        handleMessage(payload);
      }
    } finally {
      draining = false;
    }
  }

  return {
    start() {
      if (started) return;
      started = true;
      unsubscribers.push(
        platform.onChanged((mode) => onClipboardChanged(mode)),
        channel.onReadable(() => drain()),
        channel.onError((err) => fail(err))
      );
      log.info("Clipboard monitor started", { supportsSelection: platform.supportsSelection });
      drain();
    },
    stop() {
      if (stopped) return;
      stopped = true;
      for (const unsubscribe of unsubscribers.splice(0)) unsubscribe();
      debounce.stop();
      guard?.close();
      log.info("Clipboard monitor stopped");
    },
    onClipboardChanged,
    checkClipboard,
    updateClipboard,
    handleMessage,
    getConfig() {
      return { ...config, trackedMimeTypes: [...config.trackedMimeTypes] };
    },
    getState() {
      return { ...state };
    },
  };
}
