/**
 * Framed, bidirectional connection to the clipboard server.
 *
 * Implementations own the framing; users see whole message payloads only.
 */
export interface IpcChannel {
  send(payload: Uint8Array): void;

  /**
   * Next complete message, or null when no full frame is buffered.
   * Throws when the incoming byte stream cannot be framed; the channel is
   * unusable afterwards.
   */
  read(): Uint8Array | null;

  /** Fired when new bytes arrived and `read` may return a message. */
  onReadable(cb: () => void): () => void;
  onClosed(cb: () => void): () => void;
  onError(cb: (err: Error) => void): () => void;

  close(): void;
}
