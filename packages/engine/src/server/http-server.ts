import type { ServerConfig } from "../config/server-config.js";
import { parseHttpRequest } from "../http/request-parser.js";
import {
  HttpRequestReadError,
  readRawRequest,
} from "../http/request-reader.js";
import { HttpResponse } from "../http/response-builder.js";
import { sendResponse } from "../http/response-writer.js";
import type { HttpRequest } from "../http/types.js";
import { formatMethod, STATUS_TEXT } from "../http/types.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";

export type RequestHandler = (
  request: HttpRequest,
) => HttpResponse | Promise<HttpResponse>;

export interface HttpServerOptions {
  socketFactory: ISocketFactory;
  config: ServerConfig;
  handler: RequestHandler;
  logger?: Logger;
}

export type HttpServerEvents = {
  listening: [port: number];
  request: [request: HttpRequest];
  error: [err: Error];
  close: [];
};

/**
 * Accepts connections and answers exactly one request on each: read the raw
 * request, parse it, hand it to the handler, write the response, close.
 */
export class HttpServer extends EventEmitter<HttpServerEvents> {
  private readonly socketFactory: ISocketFactory;
  private readonly config: ServerConfig;
  private readonly handler: RequestHandler;
  private readonly logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private readonly connections = new Set<ITcpSocket>();

  constructor(options: HttpServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.handler = options.handler;
    this.logger = options.logger ?? basicLogger();
  }

  /** Resolves with the bound port. */
  async start(): Promise<number> {
    if (this.tcpServer) {
      throw new Error("Server is already started");
    }

    const server = this.socketFactory.createTcpServer();
    this.tcpServer = server;
    server.onConnection((socket) => {
      this.serve(socket).catch((err: unknown) => {
        this.logger.error("Connection handling failed:", err);
      });
    });

    const port = await new Promise<number>((resolve, reject) => {
      let bound = false;
      server.onError((err) => {
        if (!bound) {
          this.tcpServer = null;
          reject(err);
          return;
        }
        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });
      server.listen(this.config.port, this.config.host, () => {
        bound = true;
        resolve(server.boundPort() ?? this.config.port);
      });
    });

    this.emit("listening", port);
    return port;
  }

  async stop(): Promise<void> {
    const server = this.tcpServer;
    this.tcpServer = null;

    for (const socket of this.connections) {
      socket.close();
    }
    this.connections.clear();

    if (server) {
      await new Promise<void>((resolve) => server.close(resolve));
    }
    this.emit("close");
  }

  private async serve(socket: ITcpSocket): Promise<void> {
    this.connections.add(socket);
    socket.onClose(() => {
      this.connections.delete(socket);
    });

    try {
      const raw = await this.readRequest(socket);
      if (raw === null) return;

      const request = parseHttpRequest(raw);
      if (!this.config.quiet) {
        this.logger.info(
          `${formatMethod(request.method)} ${request.resource.path} - ${socket.remoteAddress ?? "?"}`,
        );
      }
      this.emit("request", request);
      sendResponse(socket, await this.respond(request));
    } finally {
      socket.close();
      this.connections.delete(socket);
    }
  }

  /** Raw request text, or null once the connection has been dealt with. */
  private async readRequest(socket: ITcpSocket): Promise<string | null> {
    try {
      return await readRawRequest(socket, {
        timeoutMs: this.config.requestTimeoutMs,
        maxHeaderSize: this.config.maxHeaderSize,
        maxBodySize: this.config.maxRequestBodySize,
      });
    } catch (err) {
      const outcome = classifyReadFailure(err);
      if (outcome !== "close") {
        this.logger.debug("Rejecting unreadable request:", err);
        sendResponse(socket, errorResponse(outcome));
      }
      return null;
    }
  }

  private async respond(request: HttpRequest): Promise<HttpResponse> {
    try {
      return await this.handler(request);
    } catch (err) {
      this.logger.error("Request handler failed:", err);
      return errorResponse(500);
    }
  }
}

function errorResponse(status: 400 | 413 | 500): HttpResponse {
  return HttpResponse.withStatus(status, { body: STATUS_TEXT[status] });
}

function classifyReadFailure(err: unknown): 400 | 413 | "close" {
  // Anything other than a read error came from the socket itself.
  if (!(err instanceof HttpRequestReadError)) {
    return "close";
  }

  switch (err.code) {
    case "IDLE_TIMEOUT":
    case "CONNECTION_CLOSED":
    case "CONNECTION_CLOSED_INCOMPLETE":
      return "close";
    case "BODY_TOO_LARGE":
      return 413;
    default:
      return 400;
  }
}
