/**
 * Controller Declarations
 *
 * A controller is a plain object that carries a route table. The table
 * is written once with `defineController`, which checks action names
 * against the controller's methods at compile time, and is read by the
 * router when the controller is registered.
 */

import type { HttpMethod } from '../http/types.ts';

/**
 * Kinds a path variable can be converted to. Any other label passes the
 * raw text through.
 */
export type ParameterKind = 'int' | 'long' | 'boolean' | 'string';

/**
 * How a single handler parameter is filled
 */
export type ParameterBinding =
  | { readonly source: 'path'; readonly name: string; readonly kind: ParameterKind | (string & {}) }
  | { readonly source: 'body' }
  | { readonly source: 'request' }
  | { readonly source: 'unbound'; readonly label?: string };

/**
 * Method names of T
 */
export type ActionName<T> = {
  [K in keyof T]: T[K] extends (...args: never[]) => unknown ? K : never;
}[keyof T] & string;

/**
 * One route as written in a controller's table
 */
export interface RouteDeclaration<T> {
  method: HttpMethod;
  path: string;
  action: ActionName<T>;
  params?: ParameterBinding[];
  name?: string;
}

/**
 * Route entry after declaration, with the action erased to a name
 */
export interface RouteSpec {
  readonly method: HttpMethod;
  readonly path: string;
  readonly action: string;
  readonly params: readonly ParameterBinding[];
  readonly name?: string;
}

/**
 * Route table of one controller
 */
export interface ControllerDefinition {
  readonly basePath: string;
  readonly routes: readonly RouteSpec[];
}

/**
 * Anything the router can register
 */
export interface RoutedController {
  readonly routes: ControllerDefinition;
}

/**
 * Build a controller's route table
 */
export function defineController<T>(definition: {
  basePath?: string;
  routes: RouteDeclaration<T>[];
}): ControllerDefinition {
  return Object.freeze({
    basePath: definition.basePath ?? '',
    routes: Object.freeze(
      definition.routes.map((route): RouteSpec =>
        Object.freeze({
          method: route.method,
          path: route.path,
          action: route.action,
          params: Object.freeze([...(route.params ?? [])]),
          name: route.name,
        })
      )
    ),
  });
}

/**
 * Bind a parameter to a path placeholder, converted to `kind`
 */
export function pathVariable(name: string, kind: ParameterKind | (string & {}) = 'string'): ParameterBinding {
  return { source: 'path', name, kind };
}

/**
 * Bind a parameter to the raw request body
 */
export function requestBody(): ParameterBinding {
  return { source: 'body' };
}

/**
 * Bind a parameter to the request object itself
 */
export function request(): ParameterBinding {
  return { source: 'request' };
}

/**
 * A parameter with no binding. Resolves to null unless the dispatcher
 * is configured to reject it.
 */
export function unbound(label?: string): ParameterBinding {
  return { source: 'unbound', label };
}
