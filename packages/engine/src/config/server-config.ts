import type { LogLevel } from "../logging/logger.js";

export interface ServerConfig {
  /** Port to listen on. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Suppress per-request logging. Default: false */
  quiet: boolean;
  /** Max time allowed for receiving a full HTTP request. Default: 5000ms */
  requestTimeoutMs: number;
  /** Max bytes before the blank line ending the header block. Default: 8KB */
  maxHeaderSize: number;
  /** Max accepted Content-Length. Default: 10MB */
  maxRequestBodySize: number;
  /** Minimum level the CLI logger prints. Default: 'info' */
  logLevel: LogLevel;
}

export function defaultConfig(): ServerConfig {
  return {
    port: 8080,
    host: "127.0.0.1",
    quiet: false,
    requestTimeoutMs: 5000,
    maxHeaderSize: 8 * 1024,
    maxRequestBodySize: 10 * 1024 * 1024,
    logLevel: "info",
  };
}
