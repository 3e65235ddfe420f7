// Tests for the handshake sequencer

import { describe, it, expect } from "vitest";
import { resolveSessionConfig } from "./config.ts";
import { encodeCredentials } from "./credentials.ts";
import { ConnectionError } from "./errors.ts";
import {
  performHandshake,
  registerCommand,
  requestDataCommand,
} from "./handshake.ts";
import { MockTransport } from "./mock-transport.ts";

const config = resolveSessionConfig({
  user: "reader",
  password: "test-secret",
  object: "shop.orders.000001",
  format: "JSON",
  clientId: "client-1",
});

describe("commands", () => {
  it("formats REGISTER", () => {
    expect(registerCommand("client-1", "AVRO")).toBe("REGISTER UUID=client-1, TYPE=AVRO");
  });

  it("formats REQUEST-DATA", () => {
    expect(requestDataCommand("shop.orders")).toBe("REQUEST-DATA shop.orders");
  });
});

describe("performHandshake", () => {
  it("sends the three commands in order", async () => {
    const io = new MockTransport(["OK", "OK"]);
    await performHandshake(io, config);

    expect(io.sentText()).toEqual([
      encodeCredentials("reader", "test-secret"),
      "REGISTER UUID=client-1, TYPE=JSON",
      "REQUEST-DATA shop.orders.000001",
    ]);
  });

  it("reads exactly one reply after each of the first two commands", async () => {
    const io = new MockTransport(["OK", "OK"]);
    await performHandshake(io, config, { replyTimeoutMs: 300, replySize: 512 });

    expect(io.recvCalls).toEqual([
      { maxBytes: 512, timeoutMs: 300 },
      { maxBytes: 512, timeoutMs: 300 },
    ]);
  });

  it("returns the replies without judging them", async () => {
    const io = new MockTransport(["ERR, code 11, msg: abcd", "ERR, code 12, msg: abcd"]);
    const replies = await performHandshake(io, config);

    expect(new TextDecoder().decode(replies.authReply)).toBe("ERR, code 11, msg: abcd");
    expect(new TextDecoder().decode(replies.registerReply)).toBe("ERR, code 12, msg: abcd");
    expect(io.sent).toHaveLength(3);
  });

  it("proceeds when a reply times out", async () => {
    const io = new MockTransport(["empty", "empty"]);
    const replies = await performHandshake(io, config);

    expect(replies.authReply).toHaveLength(0);
    expect(replies.registerReply).toHaveLength(0);
    expect(io.sent).toHaveLength(3);
  });

  it("leaves stream data unread after the request", async () => {
    const io = new MockTransport(["OK", "OK", '{"a":1}']);
    await performHandshake(io, config);

    expect(io.tryRecv(1024)).toEqual(new TextEncoder().encode('{"a":1}'));
  });

  it("aborts when the server closes during the handshake", async () => {
    const io = new MockTransport(["OK", "closed"]);

    await expect(performHandshake(io, config)).rejects.toMatchObject({
      name: "ConnectionError",
      kind: "closed",
      message: "connection closed while waiting for registration reply",
    });
    expect(io.sent).toHaveLength(2);
  });

  it("aborts on a failed write without sending anything further", async () => {
    const io = new MockTransport(["OK", "OK"], { failSendAt: [1] });

    await expect(performHandshake(io, config)).rejects.toBeInstanceOf(ConnectionError);
    expect(io.sent).toHaveLength(2);
    expect(io.recvCalls).toHaveLength(1);
  });

  it("wraps unexpected receive failures as I/O errors", async () => {
    const io = new MockTransport([new Error("EPIPE")]);

    await expect(performHandshake(io, config)).rejects.toMatchObject({
      name: "ConnectionError",
      kind: "io",
      message: "failed to receive authentication reply",
    });
  });
});
