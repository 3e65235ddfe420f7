// Error taxonomy for CDC sessions.
//
// Everything that can end a session surfaces as one of these classes.
// Callers discriminate with instanceof, then on `kind` / `field`.

/** Error establishing or using the transport. */
export class ConnectionError extends Error {
  constructor(
    public kind: "connect" | "io" | "closed",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConnectionError";
  }

  static connect(host: string, port: number, cause?: unknown): ConnectionError {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    return new ConnectionError("connect", `failed to connect to ${host}:${port}${reason}`, {
      cause,
    });
  }

  static io(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("io", message, { cause });
  }

  static closed(context = "connection closed"): ConnectionError {
    return new ConnectionError("closed", context);
  }
}

/** Which part of the session configuration was rejected. */
export type ConfigField = "host" | "port" | "format" | "object" | "clientId";

/** Session configuration rejected before any network activity. */
export class ConfigurationError extends Error {
  constructor(
    public field: ConfigField,
    message: string,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** The server stayed silent for too many consecutive receive attempts. */
export class FramingExhaustedError extends Error {
  constructor(
    public idleCount: number,
    public pendingBytes: number,
  ) {
    super(
      `no data after ${idleCount} consecutive empty receives` +
        (pendingBytes > 0 ? ` (${pendingBytes} bytes of incomplete data buffered)` : ""),
    );
    this.name = "FramingExhaustedError";
  }
}

/** The receive buffer starts with bytes that can never become a JSON value. */
export class JsonFramingError extends Error {
  constructor(
    public offset: number,
    public reason: string,
  ) {
    super(`invalid JSON at stream offset ${offset}: ${reason}`);
    this.name = "JsonFramingError";
  }
}
