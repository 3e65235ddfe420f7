// Incremental JSON value scanning over raw bytes.
//
// The server sends JSON records back to back with no separator, split across
// TCP chunks at arbitrary points. The scanner finds where the first value in a
// buffer ends without parsing anything past it, so a decoder can consume
// exactly that many bytes and keep the rest for the next attempt.
//
// Scanning works on bytes rather than decoded text: every structural
// character is ASCII, and bytes of multi-byte UTF-8 sequences are all >= 0x80,
// so a chunk boundary inside a character never confuses the scanner.

/** Result of scanning for one JSON value. */
export type JsonScan =
  | { kind: "value"; value: unknown; next: number }
  | { kind: "incomplete" }
  | { kind: "invalid"; offset: number; reason: string };

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** JSON insignificant whitespace: space, tab, line feed, carriage return. */
export function isJsonWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d;
}

/** Bytes that can appear inside a bare number or literal token. */
function isTokenByte(byte: number): boolean {
  return (
    (byte >= 0x30 && byte <= 0x39) || // 0-9
    (byte >= 0x61 && byte <= 0x7a) || // a-z
    (byte >= 0x41 && byte <= 0x5a) || // A-Z
    byte === 0x2b || // +
    byte === 0x2d || // -
    byte === 0x2e // .
  );
}

/**
 * Finds the end of the first JSON value in a growing buffer.
 *
 * Scan state carries over between calls, so bytes already examined are not
 * examined again when more arrive. Between calls the caller may only append
 * to the buffer. After a value or an invalid result the scanner starts over
 * at offset 0, where the caller is expected to have dropped the bytes it
 * consumed.
 */
export class JsonScanner {
  private pos = 0;
  private start = -1;
  private token = false;
  private depth = 0;
  private inString = false;
  private escaped = false;

  /**
   * Scan `buf` for one complete value.
   *
   * With `atEnd` set no more bytes will follow, so a number or literal that
   * runs to the end of the buffer is complete.
   */
  scan(buf: Uint8Array, atEnd = false): JsonScan {
    if (this.start < 0) {
      while (this.pos < buf.length && isJsonWhitespace(buf[this.pos])) {
        this.pos++;
      }
      if (this.pos >= buf.length) {
        return { kind: "incomplete" };
      }

      const first = buf[this.pos];
      if (first === OPEN_BRACE || first === OPEN_BRACKET || first === QUOTE) {
        this.token = false;
      } else if (isTokenByte(first)) {
        this.token = true;
      } else {
        const offset = this.pos;
        this.reset();
        return {
          kind: "invalid",
          offset,
          reason: `unexpected byte 0x${first.toString(16).padStart(2, "0")}`,
        };
      }
      this.start = this.pos;
    }

    const end = this.token ? this.advanceToken(buf, atEnd) : this.advanceStructure(buf);
    if (end < 0) {
      return { kind: "incomplete" };
    }

    const start = this.start;
    this.reset();
    return decodeValue(buf, start, end);
  }

  /** Forget all scan state. */
  reset(): void {
    this.pos = 0;
    this.start = -1;
    this.token = false;
    this.depth = 0;
    this.inString = false;
    this.escaped = false;
  }

  private advanceToken(buf: Uint8Array, atEnd: boolean): number {
    while (this.pos < buf.length && isTokenByte(buf[this.pos])) {
      this.pos++;
    }
    return this.pos < buf.length || atEnd ? this.pos : -1;
  }

  // Strings and containers. A top-level string ends at its closing quote
  // with depth still 0; a container ends when depth drops back to 0.
  private advanceStructure(buf: Uint8Array): number {
    while (this.pos < buf.length) {
      const b = buf[this.pos++];
      if (this.inString) {
        if (this.escaped) {
          this.escaped = false;
        } else if (b === BACKSLASH) {
          this.escaped = true;
        } else if (b === QUOTE) {
          this.inString = false;
          if (this.depth === 0) return this.pos;
        }
      } else if (b === QUOTE) {
        this.inString = true;
      } else if (b === OPEN_BRACE || b === OPEN_BRACKET) {
        this.depth++;
      } else if (b === CLOSE_BRACE || b === CLOSE_BRACKET) {
        this.depth--;
        if (this.depth === 0) return this.pos;
      }
    }
    return -1;
  }
}

function decodeValue(buf: Uint8Array, start: number, end: number): JsonScan {
  let text: string;
  try {
    text = utf8.decode(buf.subarray(start, end));
  } catch {
    return { kind: "invalid", offset: start, reason: "malformed UTF-8" };
  }

  try {
    return { kind: "value", value: JSON.parse(text), next: end };
  } catch (e) {
    return {
      kind: "invalid",
      offset: start,
      reason: e instanceof Error ? e.message : String(e),
    };
  }
}

/**
 * Scan one JSON value starting at `offset`.
 *
 * Leading whitespace belongs to the value it precedes, so `next` always
 * points just past the value's last byte. A number or literal that runs to
 * the end of the buffer is reported as incomplete unless `atEnd` is set,
 * since the next chunk may continue it.
 */
export function scanJsonValue(buf: Uint8Array, offset = 0, atEnd = false): JsonScan {
  const scan = new JsonScanner().scan(buf.subarray(offset), atEnd);
  switch (scan.kind) {
    case "value":
      return { ...scan, next: scan.next + offset };
    case "invalid":
      return { ...scan, offset: scan.offset + offset };
    default:
      return scan;
  }
}
