import { type HttpRequest, HttpResponse } from "@crlf/engine";

export interface RequestJson {
  method: string;
  version: string;
  resource: { kind: "path"; path: string };
  headers: Record<string, string>;
  body: string;
}

export function requestToJson(request: HttpRequest): RequestJson {
  return {
    method: request.method,
    version: request.version,
    resource: { kind: request.resource.kind, path: request.resource.path },
    headers: Object.fromEntries(request.headers),
    body: request.body,
  };
}

/** Handler for `crlf serve`: answers with the request as the server parsed it. */
export function echoHandler(request: HttpRequest): HttpResponse {
  return HttpResponse.ok({
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(requestToJson(request), null, 2),
  });
}
