import type { DataBundle } from "../../models/DataBundle";
import type { ClipboardMode } from "../../models/enums";

export type ChangeHandler = (mode: ClipboardMode) => void;

/** Pointer buttons and modifiers currently held, as the display reports them. */
export type PointerState = {
  primaryButton: boolean;
  shift: boolean;
};

/**
 * Connection to the display server used to look at the pointer.
 * `queryPointer` throws when the connection is gone.
 */
export interface PointerDisplay {
  queryPointer(): PointerState;
  close(): void;
}

export type OpenPointerDisplayFn = () => PointerDisplay | null;

/**
 * Platform clipboard port. Concrete adapters live next to this file; the
 * monitor depends only on this interface.
 */
export interface ClipboardPlatform {
  /** Whether a separate selection buffer exists. Fixed for the process lifetime. */
  readonly supportsSelection: boolean;

  start(): void;
  stop(): void;

  /** Current data of a buffer. Throws when the data cannot be read. */
  read(mode: ClipboardMode): DataBundle;
  /**
   * Replace a buffer's data. Returns false when nothing was written, in which
   * case no change notification follows.
   */
  write(mode: ClipboardMode, data: DataBundle): boolean;
  /** True while the buffer holds data this process wrote. */
  owns(mode: ClipboardMode): boolean;
  onChanged(cb: ChangeHandler): () => void;

  /** Present on platforms where a selection can still be mid-drag. */
  openPointerDisplay?: OpenPointerDisplayFn;
}
