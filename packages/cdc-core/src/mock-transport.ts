// In-memory ByteTransport driven by a script, for tests of code built on
// this package.

import { ConnectionError } from "./errors.ts";
import { type ByteTransport } from "./transport.ts";

/** One scripted receive outcome. */
export type ScriptStep = Uint8Array | string | "empty" | "closed" | Error;

/**
 * Replays a fixed sequence of receive outcomes.
 *
 * Strings are sent as UTF-8. "empty" yields one empty receive, "closed"
 * marks the end of the stream, and an Error is thrown from that receive.
 * Once the script runs out every receive is empty, as on an idle connection.
 * A data step larger than the requested size is split, and the rest is
 * delivered first on the next receive.
 */
export class MockTransport implements ByteTransport {
  readonly sent: Uint8Array[] = [];
  readonly recvCalls: Array<{ maxBytes: number; timeoutMs?: number }> = [];
  closed = false;

  private script: ScriptStep[];
  private endOfStream = false;
  private sendFailures: number[];

  constructor(script: ScriptStep[] = [], options: { failSendAt?: number[] } = {}) {
    this.script = [...script];
    this.sendFailures = options.failSendAt ?? [];
  }

  /** Everything sent so far, one string per send call. */
  sentText(): string[] {
    const decoder = new TextDecoder();
    return this.sent.map((bytes) => decoder.decode(bytes));
  }

  /** Append more steps to the script. */
  push(...steps: ScriptStep[]): void {
    this.script.push(...steps);
  }

  async send(bytes: Uint8Array): Promise<void> {
    if (this.closed) {
      throw ConnectionError.closed();
    }
    if (this.sendFailures.includes(this.sent.length)) {
      this.sent.push(new Uint8Array(0));
      throw ConnectionError.io("write failed");
    }
    this.sent.push(bytes);
  }

  async recv(maxBytes: number, timeoutMs?: number): Promise<Uint8Array | null> {
    this.recvCalls.push({ maxBytes, timeoutMs });
    return this.next(maxBytes);
  }

  tryRecv(maxBytes: number): Uint8Array | null {
    this.recvCalls.push({ maxBytes });
    return this.next(maxBytes);
  }

  close(): void {
    this.closed = true;
  }

  private next(maxBytes: number): Uint8Array | null {
    if (this.endOfStream) return null;

    const step = this.script.shift();
    if (step === undefined || step === "empty") return new Uint8Array(0);
    if (step === "closed") {
      this.endOfStream = true;
      return null;
    }
    if (step instanceof Error) throw step;

    const bytes = typeof step === "string" ? new TextEncoder().encode(step) : step;
    if (bytes.length > maxBytes) {
      this.script.unshift(bytes.subarray(maxBytes));
      return bytes.subarray(0, maxBytes);
    }
    return bytes;
  }
}
