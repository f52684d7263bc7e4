/**
 * Layer 3b: Front Controller
 *
 * Single entry point that ties route lookup and invocation together
 * and reports every outcome as a response.
 */

export { Dispatcher, toResponse, type DispatcherOptions } from './dispatcher.ts';
