// Authentication token for the CDC protocol.

import { createHash } from "node:crypto";

/**
 * Encode a username and password into the token the server expects as the
 * very first bytes of a connection.
 *
 * The layout is the hex encoding of `"<user>:"` followed directly by the
 * lowercase hex SHA-1 of the password. The server compares against entries
 * in the same format in its cdcusers file, so this must not change.
 */
export function encodeCredentials(user: string, password: string): string {
  const prefix = Buffer.from(`${user}:`, "utf8").toString("hex");
  const digest = createHash("sha1").update(password, "utf8").digest("hex");
  return prefix + digest;
}

/** The line to append to a server's cdcusers file for this user. */
export function credentialFileLine(user: string, password: string): string {
  return encodeCredentials(user, password);
}
