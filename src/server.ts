import { createSocket, type RemoteInfo, type Socket } from "node:dgram";
import { describeError } from "./errors";
import { createLogger } from "./logger";
import { socketTypeFor } from "./net-utils";
import type { ListenAddress, PacketHandler } from "./types";

const logger = createLogger("server");

export type RunningServer = {
  address(): ListenAddress;
  close(): Promise<void>;
};

function bind(socket: Socket, address: ListenAddress): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.once("error", reject);
    socket.bind(address.port, address.host, () => {
      socket.off("error", reject);
      resolve();
    });
  });
}

function reply(socket: Socket, packet: Uint8Array, remote: RemoteInfo) {
  socket.send(packet, remote.port, remote.address, (error) => {
    if (error) {
      logger.error({ remote: `${remote.address}:${remote.port}` }, `Reply failed: ${error.message}`);
    }
  });
}

/**
 * Binds the UDP listener. Every datagram is handed to `handler` as its own
 * task, so a slow upstream for one query never holds up another.
 */
export async function startServer(address: ListenAddress, handler: PacketHandler): Promise<RunningServer> {
  const socket = createSocket(socketTypeFor(address.host));
  await bind(socket, address);

  socket.on("message", (data, remote) => {
    const packet = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    handler(packet)
      .then((response) => {
        if (response) reply(socket, response, remote);
      })
      .catch((error: unknown) => {
        logger.error({ remote: `${remote.address}:${remote.port}` }, `Query failed: ${describeError(error)}`);
      });
  });
  socket.on("error", (error) => {
    logger.error(`UDP socket error: ${error.message}`);
  });

  return {
    address() {
      const bound = socket.address();
      return { host: bound.address, port: bound.port };
    },
    close() {
      return new Promise((resolve) => {
        socket.close(() => resolve());
      });
    },
  };
}

/**
 * Closes the listener and ends the process without waiting for in-flight
 * upstream requests, whose replies would have nowhere to go.
 */
export async function shutdown(
  server: Pick<RunningServer, "close">,
  exit: (code: number) => void = (code) => process.exit(code),
): Promise<void> {
  let code = 0;
  try {
    await server.close();
    logger.info("Listener closed");
  } catch (error) {
    logger.error(`Failed to close listener: ${describeError(error)}`);
    code = 1;
  }
  exit(code);
}
