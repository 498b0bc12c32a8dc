import net from "node:net";
import type { Duplex } from "node:stream";
import type { IpcChannel } from "./channel";
import { EventBus } from "./events";
import { FrameDecoder, encodeFrame } from "./framing";
import * as log from "../logger";

export const DEFAULT_CONNECT_TIMEOUT_MS = 2000;

/**
 * IpcChannel over any byte stream (local socket, named pipe, or an in-memory
 * duplex in tests).
 */
export class SocketIpcChannel implements IpcChannel {
  private readonly decoder = new FrameDecoder();
  private readonly readableBus = new EventBus<void>();
  private readonly closedBus = new EventBus<void>();
  private readonly errorBus = new EventBus<Error>();
  private failure: Error | null = null;
  private closed = false;

  constructor(private readonly stream: Duplex) {
    stream.on("data", (chunk: Buffer | string) => {
      this.decoder.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
      this.readableBus.emit();
    });
    stream.on("error", (err: Error) => {
      log.warn("IPC stream error", err.message);
      this.errorBus.emit(err);
    });
    stream.on("close", () => this.markClosed());
    stream.on("end", () => this.markClosed());
  }

  send(payload: Uint8Array): void {
    if (this.closed) {
      throw new Error("channel_closed");
    }
    this.stream.write(encodeFrame(payload));
  }

  read(): Uint8Array | null {
    if (this.failure) throw this.failure;
    try {
      return this.decoder.next();
    } catch (err) {
      this.failure = err instanceof Error ? err : new Error(String(err));
      throw this.failure;
    }
  }

  onReadable(cb: () => void): () => void {
    return this.readableBus.on(cb);
  }

  onClosed(cb: () => void): () => void {
    return this.closedBus.on(cb);
  }

  onError(cb: (err: Error) => void): () => void {
    return this.errorBus.on(cb);
  }

  close(): void {
    if (this.closed) return;
    this.stream.end();
    this.markClosed();
  }

  private markClosed() {
    if (this.closed) return;
    this.closed = true;
    log.debug("IPC channel closed");
    this.closedBus.emit();
  }
}

export type ConnectOptions = {
  timeoutMs?: number;
  /** Socket factory; defaults to `net.createConnection`. */
  createConnection?: (socketPath: string) => Duplex;
};

/**
 * Connect to the server's local endpoint (Unix socket path or Windows pipe
 * name). Rejects with `connect_timeout` when the server does not accept in
 * time.
 */
export async function connectSocketChannel(
  socketPath: string,
  options: ConnectOptions = {}
): Promise<SocketIpcChannel> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  const createConnection = options.createConnection ?? ((p: string) => net.createConnection(p));

  return await new Promise<SocketIpcChannel>((resolve, reject) => {
    const socket = createConnection(socketPath);

    const onError = (err: Error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(err);
    };
    const timer = setTimeout(() => {
      socket.off("error", onError);
      socket.destroy();
      reject(new Error("connect_timeout"));
    }, timeoutMs);

    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timer);
      socket.off("error", onError);
      log.debug("Connected to server", { socketPath });
      resolve(new SocketIpcChannel(socket));
    });
  });
}
