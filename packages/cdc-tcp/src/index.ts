// @cdc-stream/tcp - TCP transport for CDC sessions (Node.js only)
//
// Provides TCP-specific I/O: the socket byte stream and session entry points.

export { TcpByteStream } from "./stream.ts";
export { connect, openSession, type ConnectOptions, type OpenSessionOptions } from "./connect.ts";

// Re-export session types from core for convenience
export {
  CdcSession,
  SessionState,
  ConnectionError,
  ConfigurationError,
  FramingExhaustedError,
  JsonFramingError,
  JsonStreamDecoder,
  RawStreamDecoder,
  type StreamDecoder,
  type SessionConfig,
  type SessionConfigInput,
} from "@cdc-stream/core";
