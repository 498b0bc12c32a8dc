/**
 * In-process stand-ins for the platform clipboard, the pointer display and
 * the server channel.
 */
import type {
  ClipboardPlatform,
  OpenPointerDisplayFn,
  PointerDisplay,
  PointerState,
} from "../../packages/core/clipboard/platform/types";
import type { IpcChannel } from "../../packages/core/messaging/channel";
import { EventBus } from "../../packages/core/messaging/events";
import { cloneBundle, type DataBundle } from "../../packages/core/models/DataBundle";
import { ClipboardMode } from "../../packages/core/models/enums";
import { decodeItemMessage } from "../../packages/core/protocols/monitor";

export function bundle(entries: Record<string, string | Uint8Array>): DataBundle {
  const out: DataBundle = new Map();
  for (const [mime, value] of Object.entries(entries)) {
    out.set(mime, typeof value === "string" ? new TextEncoder().encode(value) : value);
  }
  return out;
}

export function asText(data: DataBundle): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [mime, bytes] of data) out[mime] = new TextDecoder().decode(bytes);
  return out;
}

export class FakeClipboardPlatform implements ClipboardPlatform {
  readonly writes: Array<{ mode: ClipboardMode; data: DataBundle }> = [];
  readonly owned = new Set<ClipboardMode>();
  failReads = false;
  openPointerDisplay?: OpenPointerDisplayFn;

  private readonly buffers = new Map<ClipboardMode, DataBundle>();
  private readonly changed = new EventBus<ClipboardMode>();

  constructor(readonly supportsSelection = false, openPointerDisplay?: OpenPointerDisplayFn) {
    this.openPointerDisplay = openPointerDisplay;
  }

  start(): void {}
  stop(): void {}

  read(mode: ClipboardMode): DataBundle {
    if (this.failReads) throw new Error("clipboard_unavailable");
    return cloneBundle(this.buffers.get(mode) ?? new Map());
  }

  write(mode: ClipboardMode, data: DataBundle): boolean {
    this.buffers.set(mode, data);
    this.writes.push({ mode, data });
    return true;
  }

  owns(mode: ClipboardMode): boolean {
    return this.owned.has(mode);
  }

  onChanged(cb: (mode: ClipboardMode) => void): () => void {
    return this.changed.on(cb);
  }

  /** Simulate the user putting data into a buffer, followed by the platform notification. */
  userCopy(mode: ClipboardMode, data: DataBundle, notify = true) {
    this.buffers.set(mode, data);
    if (notify) this.changed.emit(mode);
  }

  notify(mode: ClipboardMode) {
    this.changed.emit(mode);
  }

  writesTo(mode: ClipboardMode): DataBundle[] {
    return this.writes.filter((w) => w.mode === mode).map((w) => w.data);
  }
}

export class FakeChannel implements IpcChannel {
  readonly sent: Uint8Array[] = [];
  readError: Error | null = null;
  closed = false;
  reads = 0;

  private readonly inbox: Uint8Array[] = [];
  private readonly readable = new EventBus<void>();
  private readonly closedBus = new EventBus<void>();
  private readonly errors = new EventBus<Error>();

  send(payload: Uint8Array): void {
    this.sent.push(payload);
  }

  read(): Uint8Array | null {
    this.reads++;
    if (this.readError) throw this.readError;
    return this.inbox.shift() ?? null;
  }

  onReadable(cb: () => void): () => void {
    return this.readable.on(cb);
  }

  onClosed(cb: () => void): () => void {
    return this.closedBus.on(cb);
  }

  onError(cb: (err: Error) => void): () => void {
    return this.errors.on(cb);
  }

  close(): void {
    this.closed = true;
    this.closedBus.emit();
  }

  /** Queue messages without announcing them. */
  enqueue(...payloads: Uint8Array[]) {
    this.inbox.push(...payloads);
  }

  deliver(...payloads: Uint8Array[]) {
    this.enqueue(...payloads);
    this.readable.emit();
  }

  fail(err: Error) {
    this.errors.emit(err);
  }

  sentData(): Array<Record<string, string>> {
    return this.sent.map((payload) => {
      const msg = decodeItemMessage(payload);
      if (!msg) throw new Error("monitor sent an undecodable message");
      return asText(msg.data);
    });
  }
}

export class FakePointerDisplay implements PointerDisplay {
  state: PointerState = { primaryButton: false, shift: false };
  broken = false;
  closed = false;
  queries = 0;

  queryPointer(): PointerState {
    this.queries++;
    if (this.broken) throw new Error("display_gone");
    return { ...this.state };
  }

  close(): void {
    this.closed = true;
  }
}
