export const FRAME_HEADER_BYTES = 4;
export const MAX_FRAME_BYTES = 64 * 1024 * 1024;

/** Big-endian u32 length followed by the payload. */
export function encodeFrame(payload: Uint8Array): Uint8Array {
  if (payload.length > MAX_FRAME_BYTES) {
    throw new Error("frame_too_large");
  }
  const frame = new Uint8Array(FRAME_HEADER_BYTES + payload.length);
  new DataView(frame.buffer).setUint32(0, payload.length, false);
  frame.set(payload, FRAME_HEADER_BYTES);
  return frame;
}

/**
 * Accumulates stream chunks and hands out complete frames.
 */
export class FrameDecoder {
  private buffer = new Uint8Array(0);

  push(chunk: Uint8Array) {
    if (chunk.length === 0) return;
    const next = new Uint8Array(this.buffer.length + chunk.length);
    next.set(this.buffer, 0);
    next.set(chunk, this.buffer.length);
    this.buffer = next;
  }

  get bufferedBytes(): number {
    return this.buffer.length;
  }

  /** Next payload, or null if the buffer holds no complete frame yet. */
  next(): Uint8Array | null {
    if (this.buffer.length < FRAME_HEADER_BYTES) return null;
    const view = new DataView(this.buffer.buffer, this.buffer.byteOffset, this.buffer.byteLength);
    const length = view.getUint32(0, false);
    if (length > MAX_FRAME_BYTES) {
      throw new Error("frame_too_large");
    }
    const end = FRAME_HEADER_BYTES + length;
    if (this.buffer.length < end) return null;
    const payload = this.buffer.slice(FRAME_HEADER_BYTES, end);
    this.buffer = this.buffer.slice(end);
    return payload;
  }
}
