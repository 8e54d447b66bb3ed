// Node adapters
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export {
  parseHeaderLine,
  parseHttpRequest,
} from "./http/request-parser.js";
export type {
  HttpRequestReadErrorCode,
  ReadHttpRequestOptions,
} from "./http/request-reader.js";
export {
  HttpRequestReader,
  HttpRequestReadError,
  readRawRequest,
} from "./http/request-reader.js";
export type {
  HeaderInit,
  HttpResponseOptions,
  PresetOptions,
} from "./http/response-builder.js";
export { HttpResponse } from "./http/response-builder.js";
export { sendResponse } from "./http/response-writer.js";
export type {
  HttpRequest,
  KnownMethod,
  Method,
  PathResource,
  Resource,
  Version,
} from "./http/types.js";
export {
  formatMethod,
  formatVersion,
  getHeader,
  METHODS,
  parseMethod,
  parseVersion,
  pathResource,
  resourceEquals,
  STATUS_TEXT,
} from "./http/types.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  prefixedLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type {
  HttpServerEvents,
  HttpServerOptions,
  RequestHandler,
} from "./server/http-server.js";
export { HttpServer } from "./server/http-server.js";
export {
  InMemorySocketFactory,
  InMemoryTcpSocket,
} from "./testing/in-memory-socket-factory.js";
// Utils
export {
  concat,
  decodeToString,
  fromString,
  indexOfBytes,
} from "./utils/buffer.js";
export type { EventMap, Listener } from "./utils/event-emitter.js";
export { EventEmitter } from "./utils/event-emitter.js";

export const VERSION = "0.1.0";
