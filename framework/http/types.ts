/**
 * HTTP Type Definitions
 */

/**
 * HTTP methods a route can be declared for
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Status codes the dispatcher produces
 */
export const HttpStatus = {
  OK: 200,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
} as const;

/**
 * Plain shape of a simulated call, for callers that don't build a
 * TrellisRequest themselves
 */
export interface CallRecord {
  method: string;
  path: string;
  body?: string;
  headers?: Record<string, string>;
}
