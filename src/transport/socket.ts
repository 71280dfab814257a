import type { Socket } from "node:net";
import type { Duplex } from "node:stream";

import type { ConnectionInfo, Transport } from "../core/types.js";
import type { FactoryProtocol, ProtocolFactory } from "../stream/factory.js";

/** The transport-facing half of a protocol such as `XmlStream`. */
export interface SocketProtocol {
  makeConnection(transport: Transport): void;
  dataReceived(data: string | Uint8Array): void;
  connectionLost(reason?: unknown): void;
}

const socketConnectionInfo = (socket: Socket): ConnectionInfo => {
  const info: ConnectionInfo = {};
  if (socket.remoteAddress !== undefined) {
    info.remoteAddress = socket.remoteAddress;
  }
  if (socket.remotePort !== undefined) {
    info.remotePort = socket.remotePort;
  }
  return info;
};

/**
 * Drives `protocol` from `socket`: socket data becomes `dataReceived`, the
 * socket closing becomes `connectionLost` (with the last socket error as the
 * reason, if any), and the protocol writes to and ends the socket through its
 * transport. An exception thrown while handling data destroys the socket with
 * that exception as the error.
 */
export const connectSocket = (protocol: SocketProtocol, socket: Duplex): Transport => {
  let lastError: Error | null = null;
  const transport: Transport = {
    write: (data) => {
      if (!socket.writableEnded && !socket.destroyed) {
        socket.write(data);
      }
    },
    loseConnection: () => {
      if (!socket.writableEnded) {
        socket.end();
      }
    },
  };

  socket.on("data", (chunk: Buffer | string) => {
    try {
      protocol.dataReceived(chunk);
    } catch (error) {
      // Surfaces through the "error" and "close" listeners below.
      socket.destroy(error instanceof Error ? error : new Error(String(error)));
    }
  });
  socket.on("error", (error: Error) => {
    lastError = error;
  });
  socket.on("close", () => {
    protocol.connectionLost(lastError);
  });

  protocol.makeConnection(transport);
  return transport;
};

/** Connection listener for `net.createServer` that builds one protocol per socket. */
export const serveFactory = <P extends FactoryProtocol & SocketProtocol, A extends unknown[]>(
  factory: ProtocolFactory<P, A>
): ((socket: Socket) => P) => {
  return (socket) => {
    const protocol = factory.buildProtocol(socketConnectionInfo(socket));
    connectSocket(protocol, socket);
    return protocol;
  };
};
