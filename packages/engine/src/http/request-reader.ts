import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeToString, indexOfBytes } from "../utils/buffer.js";
import { parseHttpRequest } from "./request-parser.js";
import { getHeader } from "./types.js";

const CRLF_CRLF = new Uint8Array([13, 10, 13, 10]); // \r\n\r\n
const DEFAULT_MAX_HEADER_SIZE = 8 * 1024; // 8KB
const DEFAULT_MAX_BODY_SIZE = 10 * 1024 * 1024; // 10MB
const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export interface ReadHttpRequestOptions {
  maxHeaderSize?: number;
  maxBodySize?: number;
  timeoutMs?: number;
}

export type HttpRequestReadErrorCode =
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "CONNECTION_CLOSED_INCOMPLETE"
  | "HEADERS_TOO_LARGE"
  | "INVALID_CONTENT_LENGTH"
  | "BODY_TOO_LARGE";

export class HttpRequestReadError extends Error {
  constructor(
    readonly code: HttpRequestReadErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestReadError";
  }
}

/** Offset of the blank line ending the head, or -1 while it is still missing. */
function findHeadEnd(buffer: Uint8Array, maxHeaderSize: number): number {
  const end = indexOfBytes(buffer, CRLF_CRLF);
  const headSize = end === -1 ? buffer.length : end;
  if (headSize > maxHeaderSize) {
    throw new HttpRequestReadError(
      "HEADERS_TOO_LARGE",
      "Request headers too large",
    );
  }
  return end;
}

function readContentLength(head: string): number {
  const header = getHeader(parseHttpRequest(head).headers, "content-length");
  const contentLength = header ? Number.parseInt(header, 10) : 0;
  if (Number.isNaN(contentLength) || contentLength < 0) {
    throw new HttpRequestReadError(
      "INVALID_CONTENT_LENGTH",
      "Invalid Content-Length",
    );
  }
  return contentLength;
}

interface ReadLimits {
  maxHeaderSize: number;
  maxBodySize: number;
}

/**
 * Collects the bytes of one request from a socket: everything up to the
 * blank line, then Content-Length bytes of body. The result is the raw
 * request text, ready for parseHttpRequest. One read may be pending at a
 * time; bytes past the request stay buffered for the next.
 */
export class HttpRequestReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private ended: Error | "closed" | null = null;
  private onProgress: (() => void) | null = null;

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      this.buffer = concat([this.buffer, data]);
      this.onProgress?.();
    });
    socket.onClose(() => {
      this.ended ??= "closed";
      this.onProgress?.();
    });
    socket.onError((err) => {
      this.ended = err;
      this.onProgress?.();
    });
  }

  readRaw(options: ReadHttpRequestOptions = {}): Promise<string> {
    const limits: ReadLimits = {
      maxHeaderSize: options.maxHeaderSize ?? DEFAULT_MAX_HEADER_SIZE,
      maxBodySize: options.maxBodySize ?? DEFAULT_MAX_BODY_SIZE,
    };
    const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    return new Promise((resolve, reject) => {
      const settle = (outcome: () => void) => {
        clearTimeout(timer);
        this.onProgress = null;
        outcome();
      };

      const timer = setTimeout(() => {
        settle(() => reject(this.timeoutError()));
      }, timeoutMs);

      this.onProgress = () => {
        let raw: string | null;
        try {
          raw = this.takeRequest(limits);
        } catch (err) {
          settle(() => reject(err));
          return;
        }
        if (raw !== null) {
          const complete = raw;
          settle(() => resolve(complete));
        } else if (this.ended) {
          const ended = this.ended;
          settle(() => reject(this.endedError(ended)));
        }
      };

      this.onProgress();
    });
  }

  /** Removes and returns one complete request from the buffer, if present. */
  private takeRequest(limits: ReadLimits): string | null {
    const headEnd = findHeadEnd(this.buffer, limits.maxHeaderSize);
    if (headEnd === -1) return null;

    const contentLength = readContentLength(
      decodeToString(this.buffer.subarray(0, headEnd)),
    );
    if (contentLength > limits.maxBodySize) {
      throw new HttpRequestReadError(
        "BODY_TOO_LARGE",
        "Request body too large",
      );
    }

    const total = headEnd + CRLF_CRLF.length + contentLength;
    if (this.buffer.length < total) return null;

    const raw = decodeToString(this.buffer.subarray(0, total));
    this.buffer = this.buffer.slice(total);
    return raw;
  }

  private endedError(ended: Error | "closed"): Error {
    if (ended !== "closed") return ended;
    return this.buffer.length === 0
      ? new HttpRequestReadError("CONNECTION_CLOSED", "Connection closed")
      : new HttpRequestReadError(
          "CONNECTION_CLOSED_INCOMPLETE",
          "Connection closed before request was complete",
        );
  }

  private timeoutError(): HttpRequestReadError {
    return this.buffer.length === 0
      ? new HttpRequestReadError("IDLE_TIMEOUT", "Connection idle timed out")
      : new HttpRequestReadError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
  }
}

/** Read one raw request from a socket. */
export function readRawRequest(
  socket: ITcpSocket,
  options?: ReadHttpRequestOptions,
): Promise<string> {
  return new HttpRequestReader(socket).readRaw(options);
}
