// Unframed byte stream over a TCP socket.
//
// Socket data is buffered as it arrives and handed out in FIFO order to
// whoever receives next. No framing happens here: CDC commands carry no
// length prefix, and the stream decoders recover records themselves.
// Reading from the socket pauses while the buffer is at its high-water mark.

import net from "node:net";
import { type ByteTransport, ConnectionError, createLogger } from "@cdc-stream/core";

const log = createLogger("cdc:tcp");

export interface TcpByteStreamOptions {
  /** Stop reading from the socket once this many bytes are buffered. Default: 1 MiB */
  highWaterMark?: number;
}

/**
 * A TCP connection exposed as a ByteTransport.
 *
 * Implements blocking receive (with optional timeout) and non-blocking poll
 * over the same buffer.
 */
export class TcpByteStream implements ByteTransport {
  private socket: net.Socket;
  private chunks: Buffer[] = [];
  private size = 0;
  private readonly highWaterMark: number;
  private paused = false;
  private waitingResolve: (() => void) | null = null;
  private closed = false;
  private error: Error | null = null;

  constructor(socket: net.Socket, options: TcpByteStreamOptions = {}) {
    this.socket = socket;
    this.highWaterMark = options.highWaterMark ?? 1024 * 1024;

    socket.on("data", (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.size += chunk.length;
      if (!this.paused && this.size >= this.highWaterMark) {
        log.debug("pausing socket", { buffered: this.size });
        this.paused = true;
        socket.pause();
      }
      this.wake();
    });

    socket.on("error", (err: Error) => {
      log.debug("socket error", { error: err.message });
      this.error = err;
      this.closed = true;
      this.wake();
    });

    socket.on("close", () => {
      log.debug("socket closed", { buffered: this.size });
      this.closed = true;
      this.wake();
    });
  }

  private wake(): void {
    if (this.waitingResolve) {
      const resolve = this.waitingResolve;
      this.waitingResolve = null;
      resolve();
    }
  }

  /** Get the underlying socket. */
  getSocket(): net.Socket {
    return this.socket;
  }

  /** Bytes received from the socket and not yet handed out. */
  get buffered(): number {
    return this.size;
  }

  /**
   * Send raw bytes over the connection.
   */
  send(bytes: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.closed || this.socket.destroyed) {
        reject(ConnectionError.closed("cannot send on a closed connection"));
        return;
      }

      this.socket.write(bytes, (err) => {
        if (err) reject(ConnectionError.io(`write failed: ${err.message}`, err));
        else resolve();
      });
    });
  }

  /**
   * Take buffered bytes without waiting.
   *
   * Returns an empty array if nothing is buffered yet, and null once the
   * connection is closed and drained. A socket error is thrown once.
   */
  tryRecv(maxBytes: number): Uint8Array | null {
    if (this.size > 0) {
      return this.take(maxBytes);
    }

    this.throwPendingError();
    if (this.closed) {
      return null;
    }
    return new Uint8Array(0);
  }

  /**
   * Receive buffered bytes, waiting for data if there is none.
   *
   * Resolves with an empty array if `timeoutMs` passes first.
   */
  async recv(maxBytes: number, timeoutMs?: number): Promise<Uint8Array | null> {
    const ready = this.tryRecv(maxBytes);
    if (ready === null || ready.length > 0) {
      return ready;
    }

    const arrived = await new Promise<boolean>((resolve) => {
      const timer =
        timeoutMs === undefined
          ? undefined
          : setTimeout(() => {
              this.waitingResolve = null;
              resolve(false);
            }, timeoutMs);

      this.waitingResolve = () => {
        clearTimeout(timer);
        resolve(true);
      };
    });

    if (!arrived) {
      return new Uint8Array(0);
    }
    return this.tryRecv(maxBytes);
  }

  /** Close the connection. */
  close(): void {
    this.socket.destroy();
  }

  private take(maxBytes: number): Uint8Array {
    const n = Math.min(maxBytes, this.size);
    const out = new Uint8Array(n);
    let filled = 0;
    while (filled < n) {
      const head = this.chunks[0];
      const count = Math.min(head.length, n - filled);
      out.set(head.subarray(0, count), filled);
      filled += count;
      if (count === head.length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = head.subarray(count);
      }
    }
    this.size -= n;

    if (this.paused && this.size < this.highWaterMark) {
      log.debug("resuming socket", { buffered: this.size });
      this.paused = false;
      this.socket.resume();
    }
    return out;
  }

  private throwPendingError(): void {
    if (this.error) {
      const err = this.error;
      this.error = null;
      throw ConnectionError.io(`socket error: ${err.message}`, err);
    }
  }
}
