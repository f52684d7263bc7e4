/**
 * Request Object
 *
 * The call record handed to the dispatcher: verb, literal path and an
 * optional raw body. Nothing here touches a socket.
 */

import type { CallRecord } from './types.ts';

/**
 * Simulated request for Trellis
 */
export class TrellisRequest {
  private _method: string;
  private _path: string;
  private _body: string | null = null;
  private _headers = new Map<string, string>();

  constructor(method: string, path: string) {
    this._method = method.toUpperCase();
    this._path = path;
  }

  /**
   * Build a request from a plain call record
   */
  static from(call: CallRecord): TrellisRequest {
    const request = new TrellisRequest(call.method, call.path);
    if (call.body !== undefined) {
      request.withBody(call.body);
    }
    for (const [name, value] of Object.entries(call.headers ?? {})) {
      request.withHeader(name, value);
    }
    return request;
  }

  /**
   * HTTP method (GET, POST, etc.)
   */
  get method(): string {
    return this._method;
  }

  /**
   * Literal request path
   */
  get path(): string {
    return this._path;
  }

  /**
   * Raw body text, or null when the call carried none
   */
  get body(): string | null {
    return this._body;
  }

  /**
   * All headers, keyed by lower-cased name
   */
  get headers(): ReadonlyMap<string, string> {
    return this._headers;
  }

  /**
   * Get a header value
   */
  header(name: string): string | null {
    return this._headers.get(name.toLowerCase()) ?? null;
  }

  /**
   * Attach a raw body
   */
  withBody(body: string): this {
    this._body = body;
    return this;
  }

  /**
   * Set a header
   */
  withHeader(name: string, value: string): this {
    this._headers.set(name.toLowerCase(), value);
    return this;
  }

  toString(): string {
    return `${this._method} ${this._path}`;
  }
}
