/**
 * Layer 4: Controller Layer
 *
 * Route tables declared on controllers and the machinery that turns a
 * matched call into a method invocation.
 *
 * Responsibilities:
 * - Declare routes and parameter bindings per controller
 * - Convert path text to typed arguments
 * - Invoke controller methods
 */

export {
  defineController,
  pathVariable,
  requestBody,
  request,
  unbound,
  type ActionName,
  type ControllerDefinition,
  type ParameterBinding,
  type ParameterKind,
  type RouteDeclaration,
  type RoutedController,
  type RouteSpec,
} from './base.ts';
export {
  resolveArguments,
  convertValue,
  invokeRoute,
  type ResolveOptions,
  type UnboundPolicy,
} from './resolver.ts';
