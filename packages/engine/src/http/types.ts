export const METHODS = [
  "GET",
  "POST",
  "PUT",
  "DELETE",
  "HEAD",
  "OPTIONS",
  "CONNECT",
  "TRACE",
  "PATCH",
] as const;

export type KnownMethod = (typeof METHODS)[number];

/** Request method. Unrecognized tokens parse to "UNINITIALIZED". */
export type Method = KnownMethod | "UNINITIALIZED";

export type Version = "V1_1" | "V2_0" | "UNINITIALIZED";

export interface PathResource {
  readonly kind: "path";
  readonly path: string;
}

/** Request target. Only the path form exists. */
export type Resource = PathResource;

export interface HttpRequest {
  readonly method: Method;
  readonly version: Version;
  readonly resource: Resource;
  readonly headers: ReadonlyMap<string, string>;
  readonly body: string;
}

const VERSION_TOKENS: Record<Exclude<Version, "UNINITIALIZED">, string> = {
  V1_1: "HTTP/1.1",
  V2_0: "HTTP/2.0",
};

const METHOD_SET: ReadonlySet<string> = new Set(METHODS);

function isKnownMethod(token: string): token is KnownMethod {
  return METHOD_SET.has(token);
}

export function parseMethod(token: string): Method {
  return isKnownMethod(token) ? token : "UNINITIALIZED";
}

export function parseVersion(token: string): Version {
  switch (token) {
    case VERSION_TOKENS.V1_1:
      return "V1_1";
    case VERSION_TOKENS.V2_0:
      return "V2_0";
    default:
      return "UNINITIALIZED";
  }
}

export function formatMethod(method: Method): string {
  return method;
}

/** Wire form of a version; the fallback formats as an empty string. */
export function formatVersion(version: Version): string {
  return version === "UNINITIALIZED" ? "" : VERSION_TOKENS[version];
}

export function pathResource(path: string): Resource {
  return { kind: "path", path };
}

export function resourceEquals(a: Resource, b: Resource): boolean {
  return a.kind === b.kind && a.path === b.path;
}

/**
 * Case-insensitive header lookup. The parsed map keeps keys as sent, so
 * "host" and "Host" may both be present; the later insertion wins.
 */
export function getHeader(
  headers: ReadonlyMap<string, string>,
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  let found: string | undefined;
  for (const [key, value] of headers) {
    if (key.toLowerCase() === wanted) {
      found = value;
    }
  }
  return found;
}

export const STATUS_TEXT: Record<number, string> = {
  100: "Continue",
  101: "Switching Protocols",
  103: "Early Hints",
  200: "OK",
  201: "Created",
  202: "Accepted",
  203: "Non-Authoritative Information",
  204: "No Content",
  205: "Reset Content",
  206: "Partial Content",
  301: "Moved Permanently",
  302: "Found",
  303: "See Other",
  304: "Not Modified",
  307: "Temporary Redirect",
  308: "Permanent Redirect",
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  408: "Request Timeout",
  410: "Gone",
  413: "Content Too Large",
  418: "I'm a teapot",
  500: "Internal Server Error",
  501: "Not Implemented",
  503: "Service Unavailable",
};
