import type { OpenPointerDisplayFn, PointerDisplay } from "./platform/types";
import { createSingleShotTimer } from "./timer";
import * as log from "../logger";

export const SELECTION_RETRY_MS = 100;

export interface SelectionGuard {
  /**
   * False while a selection may still be growing (primary button held with
   * Shift). A retry is then scheduled and `onRetry` runs when it expires.
   */
  isSafe(): boolean;
  close(): void;
}

export type SelectionGuardOptions = {
  openDisplay: OpenPointerDisplayFn;
  onRetry: () => void;
  retryMs?: number;
};

export function createSelectionGuard(options: SelectionGuardOptions): SelectionGuard {
  let display: PointerDisplay | null = null;
  const retry = createSingleShotTimer(options.retryMs ?? SELECTION_RETRY_MS, options.onRetry);

  function releaseDisplay() {
    const current = display;
    display = null;
    if (!current) return;
    try {
      current.close();
    } catch (err) {
      log.debug("Failed to close pointer display", err);
    }
  }

  function acquireDisplay(): PointerDisplay | null {
    if (display) return display;
    try {
      display = options.openDisplay();
    } catch (err) {
      log.warn("Cannot open pointer display", err);
      display = null;
    }
    return display;
  }

  function deferred(): boolean {
    retry.start();
    return false;
  }

  return {
    isSafe() {
      if (retry.isActive()) return false;

      const dsp = acquireDisplay();
      if (!dsp) return deferred();

      try {
        const state = dsp.queryPointer();
        if (state.primaryButton && state.shift) {
          log.debug("Selection in progress, deferring");
          return deferred();
        }
        return true;
      } catch (err) {
        log.warn("Pointer query failed", err);
        releaseDisplay();
        return deferred();
      }
    },
    close() {
      retry.stop();
      releaseDisplay();
    },
  };
}
