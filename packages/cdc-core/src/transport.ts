/**
 * Byte transport abstraction.
 *
 * The CDC protocol runs over an undelimited byte stream: commands carry no
 * length prefix and replies arrive in whatever chunks the network delivers.
 * Transports therefore hand out raw bytes, and framing is left to the
 * stream decoders.
 *
 * Implementations:
 * - TcpByteStream (cdc-tcp) for TCP sockets
 */

/**
 * Interface for transports that carry a CDC session.
 *
 * Receive results distinguish three cases:
 * - non-empty bytes: data, in the order the peer sent it
 * - empty bytes: nothing available right now (timeout or empty poll)
 * - null: the peer closed the connection and every buffered byte was delivered
 */
export interface ByteTransport {
  /**
   * Write bytes to the peer.
   *
   * Rejects with a ConnectionError of kind "io" if the write fails.
   */
  send(bytes: Uint8Array): Promise<void>;

  /**
   * Wait for up to `maxBytes` bytes.
   *
   * Resolves as soon as any data is buffered. Without `timeoutMs` this waits
   * until data arrives or the connection closes.
   */
  recv(maxBytes: number, timeoutMs?: number): Promise<Uint8Array | null>;

  /**
   * Take up to `maxBytes` buffered bytes without waiting.
   */
  tryRecv(maxBytes: number): Uint8Array | null;

  /**
   * Close the transport.
   */
  close(): void;
}
