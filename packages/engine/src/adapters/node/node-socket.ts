import * as net from "node:net";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../../interfaces/socket.js";

export class NodeTcpSocket implements ITcpSocket {
  readonly remoteAddress: string | undefined;

  constructor(private readonly socket: net.Socket) {
    this.remoteAddress = socket.remoteAddress;
  }

  send(data: Uint8Array): void {
    if (this.socket.writable) {
      this.socket.write(data);
    }
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.socket.on("data", cb);
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.socket.on("close", cb);
  }

  onError(cb: (err: Error) => void): void {
    this.socket.on("error", cb);
  }

  close(): void {
    if (!this.socket.destroyed) {
      this.socket.end();
    }
  }
}

export class NodeTcpServer implements ITcpServer {
  private readonly server = net.createServer();

  listen(port: number, host: string, onListening: () => void): void {
    this.server.listen(port, host, onListening);
  }

  boundPort(): number | null {
    const addr = this.server.address();
    // A string address means a pipe, which this server never binds.
    return addr !== null && typeof addr === "object" ? addr.port : null;
  }

  onConnection(cb: (socket: ITcpSocket) => void): void {
    this.server.on("connection", (socket) => cb(new NodeTcpSocket(socket)));
  }

  onError(cb: (err: Error) => void): void {
    this.server.on("error", cb);
  }

  close(onClosed: () => void): void {
    this.server.close(() => onClosed());
  }
}

export class NodeSocketFactory implements ISocketFactory {
  createTcpServer(): ITcpServer {
    return new NodeTcpServer();
  }
}
