/**
 * Response Object
 *
 * Status plus text body, the only output of a dispatch.
 */

import { HttpStatus } from './types.ts';

export interface ResponseOptions {
  status?: number;
  headers?: Record<string, string>;
}

/**
 * Dispatch result for Trellis
 */
export class TrellisResponse {
  private _status: number = HttpStatus.OK;
  private _body: string;
  private _headers = new Map<string, string>();

  constructor(body: string, options?: ResponseOptions) {
    this._body = body;
    if (options?.status) {
      this._status = options.status;
    }
    for (const [name, value] of Object.entries(options?.headers ?? {})) {
      this._headers.set(name.toLowerCase(), value);
    }
  }

  /**
   * 200 with the given body
   */
  static ok(body: string): TrellisResponse {
    return new TrellisResponse(body);
  }

  /**
   * 404 for a call no route matched
   */
  static notFound(): TrellisResponse {
    return new TrellisResponse('404 Not Found', { status: HttpStatus.NOT_FOUND });
  }

  /**
   * 500 carrying the failure message
   */
  static serverError(message: string): TrellisResponse {
    return new TrellisResponse(`500 Internal Server Error: ${message}`, {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
    });
  }

  get status(): number {
    return this._status;
  }

  get body(): string {
    return this._body;
  }

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
   * Set a response header
   */
  setHeader(name: string, value: string): this {
    this._headers.set(name.toLowerCase(), value);
    return this;
  }

  /**
   * Whether the status is in the 2xx range
   */
  get isSuccess(): boolean {
    return this._status >= 200 && this._status < 300;
  }

  toJSON(): { status: number; body: string } {
    return { status: this._status, body: this._body };
  }
}
