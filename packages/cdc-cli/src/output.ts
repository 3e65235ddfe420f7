// Writing to output streams with back-pressure.

import { once } from "node:events";

/** Write and wait for the stream to drain if its buffer is full. */
export async function write(stream: NodeJS.WritableStream, data: string | Uint8Array): Promise<void> {
  if (!stream.write(data)) {
    await once(stream, "drain");
  }
}
