// In-process TCP server for tests.

import net from "node:net";
import { once } from "node:events";

export interface TestServer {
  port: number;
  /** Sockets accepted so far, in order. */
  sockets: net.Socket[];
  close(): Promise<void>;
}

/** Listen on an ephemeral loopback port, passing each connection to `onConnection`. */
export async function listen(onConnection: (socket: net.Socket) => void): Promise<TestServer> {
  const sockets: net.Socket[] = [];
  const server = net.createServer((socket) => {
    sockets.push(socket);
    onConnection(socket);
  });
  server.listen(0, "127.0.0.1");
  await once(server, "listening");

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("expected a TCP address");
  }

  return {
    port: address.port,
    sockets,
    close: async () => {
      for (const socket of sockets) socket.destroy();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    },
  };
}

/**
 * A CDC server stand-in: answers "OK" to authentication and registration,
 * then calls `stream` with the socket once the data request arrives.
 * Every command received is recorded in `commands`.
 */
export function cdcServer(commands: string[], stream: (socket: net.Socket) => void) {
  return (socket: net.Socket) => {
    let step = 0;
    socket.setEncoding("latin1");
    socket.on("data", (data: string) => {
      commands.push(data);
      step++;
      if (step < 3) {
        socket.write("OK");
      } else if (step === 3) {
        stream(socket);
      }
    });
  };
}
