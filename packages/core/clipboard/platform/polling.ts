import clipboardy from "clipboardy";
import { bundleFromText, textFromBundle, type DataBundle } from "../../models/DataBundle";
import { ClipboardMode } from "../../models/enums";
import { EventBus } from "../../messaging/events";
import type { ChangeHandler, ClipboardPlatform } from "./types";
import * as log from "../../logger";

export type ClipboardReadFn = () => Promise<string>;
export type ClipboardWriteFn = (text: string) => Promise<void>;

export type PollingPlatformOptions = {
  pollIntervalMs?: number;
  readText?: ClipboardReadFn;
  writeText?: ClipboardWriteFn;
};

export const DEFAULT_POLL_INTERVAL_MS = 1000;

/**
 * Text-only clipboard platform for hosts without change notifications.
 *
 * Polls the system clipboard (through `clipboardy` unless overridden) and
 * keeps the last value so `read` stays synchronous. Writes announce a change
 * afterwards, as native clipboards do. There is no selection buffer.
 */
export function createPollingClipboardPlatform(options: PollingPlatformOptions = {}): ClipboardPlatform {
  const readText: ClipboardReadFn = options.readText ?? (() => clipboardy.read());
  const writeText: ClipboardWriteFn = options.writeText ?? ((text) => clipboardy.write(text));
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;

  const changed = new EventBus<ClipboardMode>();
  let timer: ReturnType<typeof setInterval> | undefined;
  let snapshot: string | null = null;
  let written: string | null = null;
  let polling = false;
  let writesInFlight = 0;
  // Bumped on every write so a poll that straddles one is discarded.
  let writeGeneration = 0;

  async function checkOnce(): Promise<void> {
    if (polling || writesInFlight > 0) return;
    polling = true;
    const generation = writeGeneration;
    try {
      const text = await readText();
      if (writesInFlight === 0 && generation === writeGeneration && text !== snapshot) {
        snapshot = text;
        // someone else owns the clipboard now
        written = null;
        log.debug("Clipboard changed");
        changed.emit(ClipboardMode.Clipboard);
      }
    } catch (err) {
      log.debug("Clipboard poll failed", err);
    } finally {
      polling = false;
    }
  }

  async function writeThrough(text: string): Promise<void> {
    writesInFlight++;
    try {
      await writeText(text);
    } catch (err) {
      log.warn("Failed to write clipboard", err);
    } finally {
      writesInFlight--;
    }
  }

  return {
    supportsSelection: false,
    start() {
      if (timer) return;
      log.info("Clipboard polling started", { pollIntervalMs });
      timer = setInterval(() => {
        void checkOnce();
      }, pollIntervalMs);
      void checkOnce();
    },
    stop() {
      if (!timer) return;
      clearInterval(timer);
      timer = undefined;
      log.info("Clipboard polling stopped");
    },
    read(mode: ClipboardMode): DataBundle {
      if (mode !== ClipboardMode.Clipboard) {
        throw new Error("selection_unsupported");
      }
      if (snapshot === null) {
        throw new Error("clipboard_unavailable");
      }
      return bundleFromText(snapshot);
    },
    write(mode: ClipboardMode, data: DataBundle): boolean {
      if (mode !== ClipboardMode.Clipboard) return false;
      const text = textFromBundle(data);
      if (text === undefined) {
        log.debug("No text/plain data to write");
        return false;
      }
      snapshot = text;
      written = text;
      writeGeneration++;
      void writeThrough(text);
      setImmediate(() => changed.emit(ClipboardMode.Clipboard));
      return true;
    },
    owns(mode: ClipboardMode): boolean {
      return mode === ClipboardMode.Clipboard && written !== null && snapshot === written;
    },
    onChanged(cb: ChangeHandler) {
      return changed.on(cb);
    },
  };
}
