// Stream decoders run after the handshake has put the session in streaming
// state. Both are single-use async iterables driven by an idle-retry policy.

import { setTimeout as delay } from "node:timers/promises";
import { ConnectionError, FramingExhaustedError, JsonFramingError } from "./errors.ts";
import { JsonScanner, isJsonWhitespace } from "./json-scan.ts";
import { createLogger } from "./logging.ts";
import { type ByteTransport } from "./transport.ts";

const log = createLogger("cdc:decoder");

/** Idle-retry configuration shared by both decoders. */
export interface IdlePolicy {
  /** Consecutive empty receives after which the stream is abandoned. Default: 5 */
  maxIdle: number;
  /** Pause between empty polls of the raw decoder, in milliseconds. Default: 1000 */
  pollDelayMs: number;
  /** How long one JSON-decoder receive waits for data, in milliseconds. Default: 1000 */
  recvTimeoutMs: number;
  /** Bytes requested per receive. Default: 1024 */
  readSize: number;
  /**
   * What to do when the buffer starts with bytes that can never become JSON.
   * "throw" fails the stream; "retry" keeps receiving as if data were missing.
   * Default: "throw"
   */
  invalidJson: "throw" | "retry";
}

export const DEFAULT_IDLE_POLICY: Readonly<IdlePolicy> = Object.freeze({
  maxIdle: 5,
  pollDelayMs: 1000,
  recvTimeoutMs: 1000,
  readSize: 1024,
  invalidJson: "throw",
});

export interface DecoderOptions extends Partial<IdlePolicy> {
  /** Sleep used between raw polls. Defaults to a real timer. */
  sleep?: (ms: number) => Promise<void>;
}

function resolvePolicy(options: DecoderOptions): IdlePolicy {
  const policy: IdlePolicy = {
    maxIdle: options.maxIdle ?? DEFAULT_IDLE_POLICY.maxIdle,
    pollDelayMs: options.pollDelayMs ?? DEFAULT_IDLE_POLICY.pollDelayMs,
    recvTimeoutMs: options.recvTimeoutMs ?? DEFAULT_IDLE_POLICY.recvTimeoutMs,
    readSize: options.readSize ?? DEFAULT_IDLE_POLICY.readSize,
    invalidJson: options.invalidJson ?? DEFAULT_IDLE_POLICY.invalidJson,
  };
  if (!Number.isInteger(policy.maxIdle) || policy.maxIdle < 1) {
    throw new RangeError(`maxIdle must be a positive integer, got ${policy.maxIdle}`);
  }
  if (!Number.isInteger(policy.readSize) || policy.readSize < 1) {
    throw new RangeError(`readSize must be a positive integer, got ${policy.readSize}`);
  }
  if (policy.pollDelayMs < 0 || policy.recvTimeoutMs < 0) {
    throw new RangeError("pollDelayMs and recvTimeoutMs must not be negative");
  }
  return policy;
}

function defaultSleep(ms: number): Promise<void> {
  return delay(ms);
}

/** Receive buffer that appends at the back and drops consumed bytes at the front. */
class ReceiveBuffer {
  private storage = new Uint8Array(0);
  private head = 0;
  private tail = 0;

  get length(): number {
    return this.tail - this.head;
  }

  /** Unconsumed bytes. Valid until the next append. */
  view(): Uint8Array {
    return this.storage.subarray(this.head, this.tail);
  }

  append(chunk: Uint8Array): void {
    const length = this.length;
    if (this.tail + chunk.length > this.storage.length) {
      if (length + chunk.length > this.storage.length / 2) {
        const grown = new Uint8Array(Math.max(this.storage.length * 2, length + chunk.length, 4096));
        grown.set(this.view());
        this.storage = grown;
      } else {
        this.storage.copyWithin(0, this.head, this.tail);
      }
      this.head = 0;
      this.tail = length;
    }
    this.storage.set(chunk, this.tail);
    this.tail += chunk.length;
  }

  consume(n: number): void {
    this.head += n;
    if (this.head === this.tail) {
      this.head = 0;
      this.tail = 0;
    }
  }
}

/**
 * Decodes a stream of concatenated JSON values.
 *
 * Each iteration scans the receive buffer for one complete value; when there
 * is none, it receives more bytes and tries again. A single receive may hold
 * several records and a record may span several receives. Consumed bytes are
 * dropped from the buffer, unconsumed bytes are always kept. The scanner
 * resumes where it stopped, so a record spanning many receives is scanned
 * once.
 */
export class JsonStreamDecoder implements AsyncIterable<unknown> {
  readonly format = "JSON";

  private readonly policy: IdlePolicy;
  private readonly buffer = new ReceiveBuffer();
  private readonly scanner = new JsonScanner();
  private started = false;
  private _idleCount = 0;
  private _consumedBytes = 0;
  private _receivedBytes = 0;

  constructor(
    private readonly io: ByteTransport,
    options: DecoderOptions = {},
  ) {
    this.policy = resolvePolicy(options);
  }

  /** Consecutive empty receives since data last arrived. */
  get idleCount(): number {
    return this._idleCount;
  }

  /** Bytes consumed by successfully decoded values, including leading whitespace. */
  get consumedBytes(): number {
    return this._consumedBytes;
  }

  /** Bytes received from the transport so far. */
  get receivedBytes(): number {
    return this._receivedBytes;
  }

  /** Received bytes not yet consumed by a decoded value. */
  pending(): Uint8Array {
    return this.buffer.view().slice();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<unknown> {
    if (this.started) {
      throw new Error("stream decoder can only be iterated once");
    }
    this.started = true;

    let ended = false;
    while (true) {
      const scan = this.scanner.scan(this.buffer.view(), ended);

      if (scan.kind === "value") {
        this.buffer.consume(scan.next);
        this._consumedBytes += scan.next;
        this._idleCount = 0;
        yield scan.value;
        continue;
      }

      if (scan.kind === "invalid" && this.policy.invalidJson === "throw") {
        throw new JsonFramingError(this._consumedBytes + scan.offset, scan.reason);
      }

      if (ended) {
        if (this.buffer.view().every(isJsonWhitespace)) {
          log.debug("stream closed by server");
          return;
        }
        throw ConnectionError.closed(
          `connection closed with ${this.buffer.length} bytes of an incomplete record buffered`,
        );
      }

      const chunk = await this.io.recv(this.policy.readSize, this.policy.recvTimeoutMs);

      if (chunk === null) {
        // One more scan, so a number or literal at the very end completes.
        ended = true;
        continue;
      }

      if (chunk.length === 0) {
        this._idleCount++;
        log.debug("empty receive", { idle: this._idleCount, maxIdle: this.policy.maxIdle });
        if (this._idleCount >= this.policy.maxIdle) {
          throw new FramingExhaustedError(this._idleCount, this.buffer.length);
        }
        continue;
      }

      this._idleCount = 0;
      this._receivedBytes += chunk.length;
      this.buffer.append(chunk);
    }
  }
}

/**
 * Passes the Avro stream through as opaque chunks.
 *
 * Polls the transport without blocking and sleeps between empty polls, so a
 * dead connection never stalls the caller for more than one poll delay.
 */
export class RawStreamDecoder implements AsyncIterable<Uint8Array> {
  readonly format = "AVRO";

  private readonly policy: IdlePolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private started = false;
  private _idleCount = 0;

  constructor(
    private readonly io: ByteTransport,
    options: DecoderOptions = {},
  ) {
    this.policy = resolvePolicy(options);
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Consecutive empty polls since data last arrived. */
  get idleCount(): number {
    return this._idleCount;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    if (this.started) {
      throw new Error("stream decoder can only be iterated once");
    }
    this.started = true;

    while (true) {
      const chunk = this.io.tryRecv(this.policy.readSize);

      if (chunk === null) {
        log.debug("stream closed by server");
        return;
      }

      if (chunk.length > 0) {
        this._idleCount = 0;
        yield chunk;
        continue;
      }

      this._idleCount++;
      log.debug("empty poll", { idle: this._idleCount, maxIdle: this.policy.maxIdle });
      if (this._idleCount >= this.policy.maxIdle) {
        throw new FramingExhaustedError(this._idleCount, 0);
      }
      await this.sleep(this.policy.pollDelayMs);
    }
  }
}

export type StreamDecoder = JsonStreamDecoder | RawStreamDecoder;
