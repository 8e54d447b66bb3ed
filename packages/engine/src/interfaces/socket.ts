/**
 * Transport seams for the reader, writer and server. The Node adapter backs
 * them with `net`; tests back them with an in-process pair.
 */

/** An accepted connection. */
export interface ITcpSocket {
  readonly remoteAddress?: string;

  send(data: Uint8Array): void;
  onData(cb: (data: Uint8Array) => void): void;
  onClose(cb: (hadError: boolean) => void): void;
  onError(cb: (err: Error) => void): void;
  /** Ends the connection after pending writes are flushed. */
  close(): void;
}

export interface ITcpServer {
  listen(port: number, host: string, onListening: () => void): void;
  /** Port actually bound, or null before `listen` completes. */
  boundPort(): number | null;
  onConnection(cb: (socket: ITcpSocket) => void): void;
  onError(cb: (err: Error) => void): void;
  close(onClosed: () => void): void;
}

export interface ISocketFactory {
  createTcpServer(): ITcpServer;
}
