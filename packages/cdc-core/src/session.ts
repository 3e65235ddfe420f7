// Session state machine.
//
// connected -> authenticated -> registered -> streaming, and closed from
// anywhere. Each transition is one handshake step; steps out of order are
// rejected before anything is written to the transport.

import { type SessionConfig, Format } from "./config.ts";
import {
  JsonStreamDecoder,
  RawStreamDecoder,
  type DecoderOptions,
  type StreamDecoder,
} from "./decoder.ts";
import { ConnectionError } from "./errors.ts";
import {
  authenticate,
  register,
  requestData,
  type HandshakeOptions,
  type HandshakeReplies,
} from "./handshake.ts";
import { createLogger } from "./logging.ts";
import { type ByteTransport } from "./transport.ts";

const log = createLogger("cdc:session");

/** Session lifecycle state. */
export const SessionState = {
  Connected: "connected",
  Authenticated: "authenticated",
  Registered: "registered",
  Streaming: "streaming",
  Closed: "closed",
} as const;
export type SessionState = (typeof SessionState)[keyof typeof SessionState];

/**
 * A CDC session over one transport.
 *
 * Owns the transport exclusively: once a transport is handed to a session,
 * nothing else should read from or write to it.
 */
export class CdcSession<T extends ByteTransport = ByteTransport> {
  private _state: SessionState = SessionState.Connected;
  private _replies: Partial<HandshakeReplies> = {};
  private decoderCreated = false;

  constructor(
    private readonly io: T,
    readonly config: SessionConfig,
    private readonly handshakeOptions: HandshakeOptions = {},
  ) {}

  /** Current lifecycle state. */
  get state(): SessionState {
    return this._state;
  }

  /** Get the underlying transport. */
  getIo(): T {
    return this.io;
  }

  /** Replies discarded during the handshake so far. */
  get replies(): Partial<HandshakeReplies> {
    return this._replies;
  }

  private expect(state: SessionState, action: string): void {
    if (this._state !== state) {
      throw ConnectionError.io(`cannot ${action} in state ${this._state}, expected ${state}`);
    }
  }

  private transition(to: SessionState): void {
    log.debug("state change", { from: this._state, to });
    this._state = to;
  }

  async authenticate(): Promise<void> {
    this.expect(SessionState.Connected, "authenticate");
    this._replies.authReply = await authenticate(this.io, this.config, this.handshakeOptions);
    this.transition(SessionState.Authenticated);
  }

  async register(): Promise<void> {
    this.expect(SessionState.Authenticated, "register");
    this._replies.registerReply = await register(this.io, this.config, this.handshakeOptions);
    this.transition(SessionState.Registered);
  }

  async requestData(): Promise<void> {
    this.expect(SessionState.Registered, "request data");
    await requestData(this.io, this.config);
    this.transition(SessionState.Streaming);
  }

  /** Run the remaining handshake steps up to the streaming state. */
  async handshake(): Promise<void> {
    if (this._state === SessionState.Connected) await this.authenticate();
    if (this._state === SessionState.Authenticated) await this.register();
    if (this._state === SessionState.Registered) await this.requestData();
    this.expect(SessionState.Streaming, "complete handshake");
  }

  /**
   * Create the decoder for the configured format.
   *
   * Only one decoder may be created per session, since both consume the
   * same transport.
   */
  decoder(options: DecoderOptions = {}): StreamDecoder {
    this.expect(SessionState.Streaming, "decode");
    if (this.decoderCreated) {
      throw ConnectionError.io("a decoder was already created for this session");
    }
    this.decoderCreated = true;
    return this.config.format === Format.Json
      ? new JsonStreamDecoder(this.io, options)
      : new RawStreamDecoder(this.io, options);
  }

  /** Close the transport. Safe to call more than once. */
  close(): void {
    if (this._state === SessionState.Closed) return;
    this.transition(SessionState.Closed);
    this.io.close();
  }
}
