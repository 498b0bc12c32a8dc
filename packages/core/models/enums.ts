/**
 * Platform buffers the monitor can observe.
 *
 * `Selection` is the X11 primary selection; it only exists on platforms
 * that report `supportsSelection`.
 */
export enum ClipboardMode {
  Clipboard = "clipboard",
  Selection = "selection",
}

export function otherMode(mode: ClipboardMode): ClipboardMode {
  return mode === ClipboardMode.Clipboard ? ClipboardMode.Selection : ClipboardMode.Clipboard;
}
