// @cdc-stream/core - CDC protocol client logic
// Transport-agnostic: credentials, configuration, handshake and stream decoding.

export {
  ConnectionError,
  ConfigurationError,
  FramingExhaustedError,
  JsonFramingError,
  type ConfigField,
} from "./errors.ts";

export { encodeCredentials, credentialFileLine } from "./credentials.ts";

export {
  Format,
  DEFAULT_HOST,
  DEFAULT_PORT,
  MAX_CLIENT_ID_LENGTH,
  parseFormat,
  parseObjectId,
  formatObjectId,
  parsePort,
  validateClientId,
  resolveSessionConfig,
  type ObjectId,
  type SessionConfig,
  type SessionConfigInput,
} from "./config.ts";

export { type ByteTransport } from "./transport.ts";

export { JsonScanner, scanJsonValue, isJsonWhitespace, type JsonScan } from "./json-scan.ts";

export {
  JsonStreamDecoder,
  RawStreamDecoder,
  DEFAULT_IDLE_POLICY,
  type IdlePolicy,
  type DecoderOptions,
  type StreamDecoder,
} from "./decoder.ts";

export {
  performHandshake,
  authenticate,
  register,
  requestData,
  registerCommand,
  requestDataCommand,
  type HandshakeOptions,
  type HandshakeReplies,
} from "./handshake.ts";

export { CdcSession, SessionState } from "./session.ts";

export { Logger, createLogger, isEnabled } from "./logging.ts";

export { MockTransport, type ScriptStep } from "./mock-transport.ts";
