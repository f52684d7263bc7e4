/**
 * Layer 1: HTTP Layer
 *
 * Call records and dispatch results. There is no listener; requests are
 * built in process and handed to the dispatcher.
 */

export { TrellisRequest } from './request.ts';
export { TrellisResponse, type ResponseOptions } from './response.ts';
export { HttpStatus, type HttpMethod, type CallRecord } from './types.ts';
