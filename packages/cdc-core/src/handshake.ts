// Handshake sequencer: authenticate, register, request data.
//
// The exchange is strictly sequential and never branches on what the server
// says. After the first two commands the client reads one reply chunk and
// throws it away: the server answers "OK" or "ERR, code N, msg: ...", but a
// rejected client is simply disconnected, which surfaces later as a closed
// connection. Replies are returned for diagnostics only and must not be
// validated here.

import { type SessionConfig, type Format, formatObjectId } from "./config.ts";
import { encodeCredentials } from "./credentials.ts";
import { ConnectionError } from "./errors.ts";
import { createLogger } from "./logging.ts";
import { type ByteTransport } from "./transport.ts";

const log = createLogger("cdc:handshake");

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Options for the handshake exchange. */
export interface HandshakeOptions {
  /** How long to wait for each discarded reply, in milliseconds. Default: 5000 */
  replyTimeoutMs?: number;
  /** Bytes read for each discarded reply. Default: 1024 */
  replySize?: number;
}

/** Replies the server sent during the handshake, unvalidated. */
export interface HandshakeReplies {
  authReply: Uint8Array;
  registerReply: Uint8Array;
}

export function registerCommand(clientId: string, format: Format): string {
  return `REGISTER UUID=${clientId}, TYPE=${format}`;
}

export function requestDataCommand(object: string): string {
  return `REQUEST-DATA ${object}`;
}

async function sendStep(io: ByteTransport, step: string, bytes: Uint8Array): Promise<void> {
  try {
    await io.send(bytes);
  } catch (e) {
    if (e instanceof ConnectionError) throw e;
    throw ConnectionError.io(`failed to send ${step}`, e);
  }
}

/**
 * Read one reply chunk and discard it.
 *
 * A timeout counts as a reply. Only a closed connection or an I/O error
 * stops the handshake.
 */
async function discardReply(
  io: ByteTransport,
  step: string,
  options: Required<HandshakeOptions>,
): Promise<Uint8Array> {
  let reply: Uint8Array | null;
  try {
    reply = await io.recv(options.replySize, options.replyTimeoutMs);
  } catch (e) {
    if (e instanceof ConnectionError) throw e;
    throw ConnectionError.io(`failed to receive ${step} reply`, e);
  }

  if (reply === null) {
    throw ConnectionError.closed(`connection closed while waiting for ${step} reply`);
  }

  log.debug(`${step} reply discarded`, {
    bytes: reply.length,
    text: decoder.decode(reply),
  });
  return reply;
}

function resolveOptions(options: HandshakeOptions): Required<HandshakeOptions> {
  return {
    replyTimeoutMs: options.replyTimeoutMs ?? 5000,
    replySize: options.replySize ?? 1024,
  };
}

/** Step 1: send the credential token, discard the reply. */
export async function authenticate(
  io: ByteTransport,
  config: SessionConfig,
  options: HandshakeOptions = {},
): Promise<Uint8Array> {
  log.debug("authenticating", { user: config.user });
  await sendStep(io, "authentication", encoder.encode(encodeCredentials(config.user, config.password)));
  return discardReply(io, "authentication", resolveOptions(options));
}

/** Step 2: register the client for a stream format, discard the reply. */
export async function register(
  io: ByteTransport,
  config: SessionConfig,
  options: HandshakeOptions = {},
): Promise<Uint8Array> {
  const command = registerCommand(config.clientId, config.format);
  log.debug("registering", { command });
  await sendStep(io, "registration", encoder.encode(command));
  return discardReply(io, "registration", resolveOptions(options));
}

/** Step 3: request the stream. The server starts sending right away; no reply is read. */
export async function requestData(io: ByteTransport, config: SessionConfig): Promise<void> {
  const command = requestDataCommand(formatObjectId(config.object));
  log.debug("requesting data", { command });
  await sendStep(io, "data request", encoder.encode(command));
}

/**
 * Run all three steps. Any failure is fatal to the session; there is no
 * retry at this layer.
 */
export async function performHandshake(
  io: ByteTransport,
  config: SessionConfig,
  options: HandshakeOptions = {},
): Promise<HandshakeReplies> {
  const authReply = await authenticate(io, config, options);
  const registerReply = await register(io, config, options);
  await requestData(io, config);
  return { authReply, registerReply };
}
