import { describe, expect, it } from "vitest";
import type { ITcpSocket } from "../interfaces/socket.js";
import { InMemoryTcpSocket } from "../testing/in-memory-socket-factory.js";
import { fromString } from "../utils/buffer.js";
import { HttpRequestReader, readRawRequest } from "./request-reader.js";

/** Create a socket that delivers the given chunks a few ms apart and then closes */
function chunkedMockSocket(chunks: string[], closeAfter = true): ITcpSocket {
  let dataCallback: ((data: Uint8Array) => void) | null = null;
  let closeCallback: ((hadError: boolean) => void) | null = null;

  return {
    send() {},
    onData(cb) {
      dataCallback = cb;
      let delay = 0;
      for (const chunk of chunks) {
        const c = chunk;
        setTimeout(() => dataCallback?.(fromString(c)), delay);
        delay += 5;
      }
    },
    onClose(cb) {
      closeCallback = cb;
      if (closeAfter) {
        setTimeout(() => closeCallback?.(false), chunks.length * 5 + 10);
      }
    },
    onError() {},
    close() {},
  };
}

describe("readRawRequest", () => {
  it("reads a request without a body", async () => {
    const raw = "GET /index.html HTTP/1.1\r\nHost: localhost\r\n\r\n";
    const socket = chunkedMockSocket([raw]);

    await expect(readRawRequest(socket)).resolves.toBe(raw);
  });

  it("reads Content-Length bytes of body", async () => {
    const body = '{"key":"value"}';
    const raw = `POST /submit HTTP/1.1\r\ncontent-length: ${body.length}\r\n\r\n${body}`;
    const socket = chunkedMockSocket([raw]);

    await expect(readRawRequest(socket)).resolves.toBe(raw);
  });

  it("assembles a request delivered in pieces", async () => {
    const socket = chunkedMockSocket([
      "POST /file.txt",
      " HTTP/1.1\r\nContent-Length: 5\r\n",
      "\r\nhel",
      "lo",
    ]);

    await expect(readRawRequest(socket)).resolves.toBe(
      "POST /file.txt HTTP/1.1\r\nContent-Length: 5\r\n\r\nhello",
    );
  });

  it("counts the body in bytes, not characters", async () => {
    const raw = "POST / HTTP/1.1\r\nContent-Length: 6\r\n\r\nhéllo";
    const socket = chunkedMockSocket([raw]);

    await expect(readRawRequest(socket)).resolves.toBe(raw);
  });

  it("leaves bytes past Content-Length unread", async () => {
    const socket = chunkedMockSocket([
      "POST / HTTP/1.1\r\nContent-Length: 2\r\n\r\nokEXTRA",
    ]);

    await expect(readRawRequest(socket)).resolves.toBe(
      "POST / HTTP/1.1\r\nContent-Length: 2\r\n\r\nok",
    );
  });

  it("rejects an oversized header block", async () => {
    const socket = chunkedMockSocket([`GET /${"a".repeat(64)} HTTP/1.1\r\n`]);

    await expect(
      readRawRequest(socket, { maxHeaderSize: 32 }),
    ).rejects.toMatchObject({ code: "HEADERS_TOO_LARGE" });
  });

  it("rejects a Content-Length that is not a number", async () => {
    const socket = chunkedMockSocket([
      "POST / HTTP/1.1\r\nContent-Length: lots\r\n\r\n",
    ]);

    await expect(readRawRequest(socket)).rejects.toMatchObject({
      code: "INVALID_CONTENT_LENGTH",
    });
  });

  it("rejects a body over the limit before reading it", async () => {
    const socket = chunkedMockSocket([
      "POST / HTTP/1.1\r\nContent-Length: 100\r\n\r\n",
    ]);

    await expect(
      readRawRequest(socket, { maxBodySize: 10 }),
    ).rejects.toMatchObject({ code: "BODY_TOO_LARGE" });
  });

  it("reports a close with nothing received", async () => {
    const socket = chunkedMockSocket([]);

    await expect(readRawRequest(socket)).rejects.toMatchObject({
      code: "CONNECTION_CLOSED",
    });
  });

  it("reports a close in the middle of the body", async () => {
    const socket = chunkedMockSocket([
      "POST / HTTP/1.1\r\nContent-Length: 10\r\n\r\nshort",
    ]);

    await expect(readRawRequest(socket)).rejects.toMatchObject({
      code: "CONNECTION_CLOSED_INCOMPLETE",
    });
  });

  it("times out an idle connection", async () => {
    const socket = chunkedMockSocket([], false);

    await expect(
      readRawRequest(socket, { timeoutMs: 20 }),
    ).rejects.toMatchObject({ code: "IDLE_TIMEOUT" });
  });

  it("times out a stalled request", async () => {
    const socket = chunkedMockSocket(["GET / HTTP/1.1\r\n"], false);

    await expect(
      readRawRequest(socket, { timeoutMs: 30 }),
    ).rejects.toMatchObject({ code: "REQUEST_TIMEOUT" });
  });

  it("rethrows socket errors", async () => {
    const [client, server] = InMemoryTcpSocket.createPair();
    const reader = new HttpRequestReader(server);
    const pending = reader.readRaw();

    server.fail(new Error("connection reset"));
    client.close();

    await expect(pending).rejects.toThrow("connection reset");
  });

  it("reads from an in-memory socket pair", async () => {
    const [client, server] = InMemoryTcpSocket.createPair();
    const reader = new HttpRequestReader(server);
    const pending = reader.readRaw();

    client.send(fromString("DELETE /item/7 HTTP/1.1\r\n\r\n"));

    await expect(pending).resolves.toBe("DELETE /item/7 HTTP/1.1\r\n\r\n");
  });
});
