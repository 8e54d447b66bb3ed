import {
  type HttpRequest,
  parseMethod,
  parseVersion,
  pathResource,
} from "./types.js";

const CRLF = "\r\n";

/**
 * Split a header line on its first colon. Returns null when there is no
 * colon or the key is empty after trimming.
 */
export function parseHeaderLine(line: string): [string, string] | null {
  const colonIdx = line.indexOf(":");
  if (colonIdx === -1) return null;
  const key = line.substring(0, colonIdx).trim();
  if (key === "") return null;
  const value = line.substring(colonIdx + 1).trim();
  return [key, value];
}

/**
 * Parse a complete raw HTTP/1.x request.
 *
 * Never throws. Tokens that cannot be recognized fall back to
 * "UNINITIALIZED" (method, version) or an empty string (path, body), and
 * header lines without a colon are dropped. Lines end only at CRLF; the first
 * empty line ends the header block and the remaining lines are rejoined with
 * CRLF to form the body.
 */
export function parseHttpRequest(raw: string): HttpRequest {
  const lines = raw.split(CRLF);

  const [methodToken = "", path = "", versionToken = ""] = lines[0].split(" ");

  const headers = new Map<string, string>();
  let boundary = -1;
  for (let i = 1; i < lines.length; i++) {
    if (lines[i] === "") {
      boundary = i;
      break;
    }
    const parsed = parseHeaderLine(lines[i]);
    if (!parsed) continue;
    headers.set(parsed[0], parsed[1]);
  }

  const body = boundary === -1 ? "" : lines.slice(boundary + 1).join(CRLF);

  return {
    method: parseMethod(methodToken),
    version: parseVersion(versionToken),
    resource: pathResource(path),
    headers,
    body,
  };
}
