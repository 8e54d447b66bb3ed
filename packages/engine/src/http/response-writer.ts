import type { ITcpSocket } from "../interfaces/socket.js";
import { fromString } from "../utils/buffer.js";
import type { HttpResponse } from "./response-builder.js";
import { getHeader } from "./types.js";

/**
 * Send a complete HTTP response over a socket. Content-Length and
 * `Connection: close` are added when the response does not set them; the
 * caller's response is left unchanged.
 */
export function sendResponse(
  socket: ITcpSocket,
  response: HttpResponse | string,
): void {
  if (typeof response === "string") {
    socket.send(fromString(response));
    return;
  }

  const outgoing = response.clone();
  if (getHeader(outgoing.headers, "content-length") === undefined) {
    outgoing.setContentLength();
  }
  if (getHeader(outgoing.headers, "connection") === undefined) {
    outgoing.setHeader("Connection", "close");
  }
  socket.send(fromString(outgoing.build()));
}
