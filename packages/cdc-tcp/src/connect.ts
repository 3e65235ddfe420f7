// TCP entry points for CDC sessions.

import net from "node:net";
import {
  CdcSession,
  ConnectionError,
  createLogger,
  resolveSessionConfig,
  type HandshakeOptions,
  type SessionConfig,
  type SessionConfigInput,
} from "@cdc-stream/core";
import { TcpByteStream, type TcpByteStreamOptions } from "./stream.ts";

const log = createLogger("cdc:tcp");

/** Options for opening a TCP connection. */
export interface ConnectOptions extends TcpByteStreamOptions {
  /** Give up connecting after this many milliseconds. Default: 10000 */
  connectTimeoutMs?: number;
}

/** Options for opening a session. */
export interface OpenSessionOptions extends ConnectOptions, HandshakeOptions {}

/**
 * Open a TCP connection.
 *
 * Rejects with a ConnectionError of kind "connect" if the peer cannot be
 * reached in time.
 */
export function connect(
  host: string,
  port: number,
  options: ConnectOptions = {},
): Promise<TcpByteStream> {
  const timeoutMs = options.connectTimeoutMs ?? 10000;

  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    socket.setNoDelay(true);

    const fail = (err: Error) => {
      clearTimeout(timer);
      socket.removeListener("error", fail);
      socket.destroy();
      reject(ConnectionError.connect(host, port, err));
    };

    const timer = setTimeout(() => {
      fail(new Error(`timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once("error", fail);

    socket.once("connect", () => {
      clearTimeout(timer);
      socket.removeListener("error", fail);
      log.debug("connected", { host, port });
      resolve(new TcpByteStream(socket, options));
    });
  });
}

/**
 * Connect and run the handshake.
 *
 * Configuration is validated before any network activity. The returned
 * session is in streaming state; the socket is closed if the handshake
 * fails.
 */
export async function openSession(
  input: SessionConfig | SessionConfigInput,
  options: OpenSessionOptions = {},
): Promise<CdcSession<TcpByteStream>> {
  const config = isResolved(input) ? input : resolveSessionConfig(input);
  const io = await connect(config.host, config.port, options);
  const session = new CdcSession(io, config, options);

  try {
    await session.handshake();
  } catch (e) {
    session.close();
    throw e;
  }
  return session;
}

function isResolved(input: SessionConfig | SessionConfigInput): input is SessionConfig {
  return typeof input.object !== "string";
}
