// Session configuration and validation.

import { randomUUID } from "node:crypto";
import { ConfigurationError } from "./errors.ts";

/** Stream format requested at registration. */
export const Format = {
  /** Self-delimiting JSON records. */
  Json: "JSON",
  /** Undelimited Avro binary stream. */
  Avro: "AVRO",
} as const;
export type Format = (typeof Format)[keyof typeof Format];

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 4001;

/** Longest client identifier the server keeps. */
export const MAX_CLIENT_ID_LENGTH = 32;

/** A requested table, optionally pinned to a schema version. */
export interface ObjectId {
  database: string;
  table: string;
  version?: string;
}

/** Validated, immutable session configuration. */
export interface SessionConfig {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
  readonly object: ObjectId;
  readonly format: Format;
  readonly clientId: string;
}

/** Configuration as supplied by a caller; everything but the object has a default. */
export interface SessionConfigInput {
  host?: string;
  port?: number | string;
  user?: string;
  password?: string;
  object: string;
  format?: string;
  clientId?: string;
}

export function parseFormat(value: string): Format {
  const upper = value.trim().toUpperCase();
  if (upper === Format.Json || upper === Format.Avro) {
    return upper;
  }
  throw new ConfigurationError("format", `unknown format "${value}", expected JSON or AVRO`);
}

/**
 * Parse a `DATABASE.TABLE[.VERSION]` identifier.
 */
export function parseObjectId(value: string): ObjectId {
  const parts = value.split(".");
  if (parts.length < 2 || parts.length > 3) {
    throw new ConfigurationError(
      "object",
      `invalid object "${value}", expected DATABASE.TABLE or DATABASE.TABLE.VERSION`,
    );
  }
  for (const part of parts) {
    if (part.length === 0 || /\s/.test(part)) {
      throw new ConfigurationError(
        "object",
        `invalid object "${value}", segments must be non-empty and contain no whitespace`,
      );
    }
  }
  const [database, table, version] = parts;
  return parts.length === 3 ? { database, table, version } : { database, table };
}

export function formatObjectId(id: ObjectId): string {
  return id.version === undefined
    ? `${id.database}.${id.table}`
    : `${id.database}.${id.table}.${id.version}`;
}

export function parsePort(value: number | string): number {
  const port = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError("port", `invalid port "${value}", expected an integer 1-65535`);
  }
  return port;
}

/**
 * Validate a client identifier.
 *
 * The server cuts the identifier at the first comma or space and keeps at
 * most 32 characters, so anything else would register under a different id.
 */
export function validateClientId(value: string): string {
  if (value.length === 0) {
    throw new ConfigurationError("clientId", "client identifier must not be empty");
  }
  if (value.length > MAX_CLIENT_ID_LENGTH) {
    throw new ConfigurationError(
      "clientId",
      `client identifier is ${value.length} characters, at most ${MAX_CLIENT_ID_LENGTH} allowed`,
    );
  }
  if (/[,\s]/.test(value)) {
    throw new ConfigurationError("clientId", "client identifier must not contain commas or whitespace");
  }
  return value;
}

/**
 * Apply defaults and validate. The result is frozen: configuration does not
 * change once a handshake may have started.
 */
export function resolveSessionConfig(input: SessionConfigInput): SessionConfig {
  const host = input.host ?? DEFAULT_HOST;
  if (host.trim().length === 0) {
    throw new ConfigurationError("host", "host must not be empty");
  }

  const object = Object.freeze(parseObjectId(input.object));

  return Object.freeze({
    host,
    port: parsePort(input.port ?? DEFAULT_PORT),
    user: input.user ?? "",
    password: input.password ?? "",
    object,
    format: parseFormat(input.format ?? Format.Json),
    clientId: validateClientId(input.clientId ?? randomUUID().replaceAll("-", "")),
  });
}
