// cdc-client: stream change data for one table to stdout.

import { Command, InvalidArgumentError } from "commander";
import {
  type CdcSession,
  ConfigurationError,
  ConnectionError,
  createLogger,
  DEFAULT_HOST,
  DEFAULT_IDLE_POLICY,
  DEFAULT_PORT,
  FramingExhaustedError,
  JsonFramingError,
  JsonStreamDecoder,
  resolveSessionConfig,
  type SessionConfig,
} from "@cdc-stream/core";
import { openSession, type OpenSessionOptions } from "@cdc-stream/tcp";
import { write } from "./output.ts";

const log = createLogger("cdc:cli");

const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

/** Exit codes of cdc-client. */
export const ExitCode = {
  /** The server closed the stream cleanly. */
  Ok: 0,
  /** Idle timeout, connection failure or undecodable stream. */
  Failure: 1,
  /** Invalid configuration, nothing was sent. */
  Usage: 2,
} as const;
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Parsed command line options. */
export interface ClientCliOptions {
  host: string;
  port: string;
  user: string;
  password: string;
  format: string;
  uuid?: string;
  maxIdle: number;
  pollInterval: number;
  connectTimeout: number;
}

/** Collaborators, replaceable in tests. */
export interface ClientDeps {
  openSession?: (config: SessionConfig, options: OpenSessionOptions) => Promise<CdcSession>;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  setExitCode?: (code: ExitCode) => void;
}

function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) return ExitCode.Usage;
  return ExitCode.Failure;
}

function describeError(error: unknown): string {
  if (
    error instanceof ConfigurationError ||
    error instanceof ConnectionError ||
    error instanceof FramingExhaustedError ||
    error instanceof JsonFramingError
  ) {
    return error.message;
  }
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/**
 * Connect, hand-shake and copy the decoded stream to stdout until the server
 * closes it or the idle policy gives up. Returns the process exit code.
 *
 * The session is closed on every path out of this function.
 */
export async function runClient(
  object: string,
  options: ClientCliOptions,
  deps: ClientDeps = {},
): Promise<ExitCode> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const open = deps.openSession ?? openSession;

  let session: CdcSession | undefined;
  try {
    const config = resolveSessionConfig({
      host: options.host,
      port: options.port,
      user: options.user,
      password: options.password,
      object,
      format: options.format,
      clientId: options.uuid,
    });
    log.debug("starting", {
      host: config.host,
      port: config.port,
      object,
      format: config.format,
      clientId: config.clientId,
    });

    session = await open(config, { connectTimeoutMs: options.connectTimeout });

    const decoder = session.decoder({
      maxIdle: options.maxIdle,
      pollDelayMs: options.pollInterval,
      recvTimeoutMs: options.pollInterval,
    });

    if (decoder instanceof JsonStreamDecoder) {
      for await (const record of decoder) {
        await write(stdout, `${JSON.stringify(record)}\n`);
      }
    } else {
      for await (const chunk of decoder) {
        await write(stdout, chunk);
      }
    }
    return ExitCode.Ok;
  } catch (e) {
    log.debug("failed", { error: e instanceof Error ? e.name : typeof e });
    await write(stderr, `cdc-client: ${describeError(e)}\n`);
    return exitCodeFor(e);
  } finally {
    session?.close();
  }
}

function parseInteger(name: string, min: number) {
  return (value: string): number => {
    const n = Number(value);
    if (!Number.isInteger(n) || n < min) {
      throw new InvalidArgumentError(`${name} must be an integer >= ${min}.`);
    }
    return n;
  };
}

export function createClientProgram(deps: ClientDeps = {}): Command {
  const setExitCode =
    deps.setExitCode ??
    ((code: ExitCode) => {
      process.exitCode = code;
    });

  return new Command("cdc-client")
    .description("Stream change data for one table from a CDC server")
    .argument("<FILE>", "requested object, DATABASE.TABLE[.VERSION]")
    .option("--host <host>", "server address", DEFAULT_HOST)
    .option("-P, --port <port>", "server port", String(DEFAULT_PORT))
    .option("-u, --user <user>", "username", "")
    .option("-p, --password <password>", "password", "")
    .option("-f, --format <format>", "stream format, JSON or AVRO", "JSON")
    .option("--uuid <id>", "client identifier sent at registration (default: random UUID)")
    .option(
      "--max-idle <count>",
      "consecutive empty reads before giving up",
      parseInteger("max-idle", 1),
      DEFAULT_IDLE_POLICY.maxIdle,
    )
    .option(
      "--poll-interval <ms>",
      "wait per read attempt in milliseconds",
      parseInteger("poll-interval", 0),
      DEFAULT_IDLE_POLICY.pollDelayMs,
    )
    .option(
      "--connect-timeout <ms>",
      "connection timeout in milliseconds",
      parseInteger("connect-timeout", 1),
      DEFAULT_CONNECT_TIMEOUT_MS,
    )
    .action(async (file: string, options: ClientCliOptions) => {
      setExitCode(await runClient(file, options, deps));
    });
}
