import { fromString } from "../utils/buffer.js";
import { STATUS_TEXT } from "./types.js";

const CRLF = "\r\n";

export type HeaderInit = Map<string, string> | Record<string, string>;

export interface HttpResponseOptions {
  /** Status-line version token. Default: "HTTP/1.1" */
  version?: string;
  /** Default: 200 */
  status?: number;
  /** Defaults to the reason phrase for `status`, or "" if unknown. */
  statusText?: string;
  headers?: HeaderInit;
  body?: string;
}

export type PresetOptions = Omit<HttpResponseOptions, "status" | "statusText">;

function toHeaderMap(headers?: HeaderInit): Map<string, string> {
  if (!headers) return new Map();
  if (headers instanceof Map) return new Map(headers);
  return new Map(Object.entries(headers));
}

/**
 * Textual HTTP response. Mutators return `this` for chaining; `build()` reads
 * the current state without changing it.
 */
export class HttpResponse {
  private _version: string;
  private _status: number;
  private _statusText: string;
  private _headers: Map<string, string>;
  private _body: string;

  constructor(options: HttpResponseOptions = {}) {
    this._version = options.version ?? "HTTP/1.1";
    this._status = options.status ?? 200;
    this._statusText =
      options.statusText ?? STATUS_TEXT[this._status] ?? "";
    this._headers = toHeaderMap(options.headers);
    this._body = options.body ?? "";
  }

  /**
   * Response for `status` with its standard reason phrase. Without explicit
   * headers the response carries `Content-Type: text/plain`.
   */
  static withStatus(status: number, options: PresetOptions = {}): HttpResponse {
    return new HttpResponse({
      ...options,
      status,
      headers: options.headers ?? { "Content-Type": "text/plain" },
    });
  }

  static continue(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(100, options);
  }

  static switchingProtocols(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(101, options);
  }

  static earlyHints(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(103, options);
  }

  static ok(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(200, options);
  }

  static created(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(201, options);
  }

  static accepted(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(202, options);
  }

  static nonAuthoritativeInformation(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(203, options);
  }

  static noContent(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(204, options);
  }

  static resetContent(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(205, options);
  }

  static partialContent(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(206, options);
  }

  static found(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(302, options);
  }

  static seeOther(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(303, options);
  }

  static notModified(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(304, options);
  }

  static temporaryRedirect(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(307, options);
  }

  static permanentRedirect(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(308, options);
  }

  static badRequest(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(400, options);
  }

  static unauthorized(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(401, options);
  }

  static forbidden(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(403, options);
  }

  static notFound(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(404, options);
  }

  static methodNotAllowed(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(405, options);
  }

  static requestTimeout(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(408, options);
  }

  static gone(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(410, options);
  }

  static contentTooLarge(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(413, options);
  }

  static imATeapot(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(418, options);
  }

  static internalServerError(options?: PresetOptions): HttpResponse {
    return HttpResponse.withStatus(500, options);
  }

  get version(): string {
    return this._version;
  }

  get status(): number {
    return this._status;
  }

  get statusText(): string {
    return this._statusText;
  }

  get headers(): ReadonlyMap<string, string> {
    return this._headers;
  }

  get body(): string {
    return this._body;
  }

  setVersion(version: string): this {
    this._version = version;
    return this;
  }

  setStatus(status: number, statusText?: string): this {
    this._status = status;
    this._statusText = statusText ?? STATUS_TEXT[status] ?? "";
    return this;
  }

  setHeader(key: string, value: string): this {
    this._headers.set(key, value);
    return this;
  }

  setHeaders(headers: HeaderInit): this {
    for (const [key, value] of toHeaderMap(headers)) {
      this._headers.set(key, value);
    }
    return this;
  }

  removeHeader(key: string): this {
    this._headers.delete(key);
    return this;
  }

  setBody(body: string): this {
    this._body = body;
    return this;
  }

  /** Set Content-Length to the UTF-8 byte length of the current body. */
  setContentLength(): this {
    return this.setHeader("Content-Length", String(fromString(this._body).length));
  }

  clone(): HttpResponse {
    return new HttpResponse({
      version: this._version,
      status: this._status,
      statusText: this._statusText,
      headers: this._headers,
      body: this._body,
    });
  }

  build(): string {
    let out = `${this._version} ${this._status} ${this._statusText}${CRLF}`;
    for (const [key, value] of this._headers) {
      out += `${key}: ${value}${CRLF}`;
    }
    return out + CRLF + this._body;
  }
}
