/**
 * URL Router
 *
 * Ordered route registry. Routes are matched in registration order and
 * the first match wins.
 */

import type { HttpMethod } from '../http/types.ts';
import type { ParameterBinding, RoutedController } from '../controller/base.ts';
import { MappingError } from '../errors/errors.ts';
import type { Logger } from '../telemetry/logger.ts';
import { buildUrl, compilePathPattern, matchPath, type PathPattern, type PatternParams } from './patterns.ts';

/**
 * Target a route invokes: a method on its owner
 */
export interface RouteTarget {
  owner: object;
  action: string;
  params?: readonly ParameterBinding[];
}

export interface RouteDescriptor {
  readonly method: HttpMethod;
  readonly pattern: PathPattern;
  readonly owner: object;
  readonly action: string;
  readonly params: readonly ParameterBinding[];
  readonly name: string;
}

export interface RouteMatch {
  route: RouteDescriptor;
  params: PatternParams;
}

interface RouteOptions {
  name?: string;
}

/**
 * URL Router for Trellis
 */
export class Router {
  private routes: RouteDescriptor[] = [];
  private namedRoutes = new Map<string, RouteDescriptor>();
  private prefix: string;
  private logger?: Logger;

  constructor(prefix: string = '', logger?: Logger) {
    this.prefix = prefix;
    this.logger = logger?.child({ component: 'router' });
  }

  /**
   * Register every route declared by a controller
   */
  register(controller: RoutedController): this {
    const { basePath, routes } = controller.routes;

    for (const route of routes) {
      this.addRoute(
        route.method,
        basePath + route.path,
        { owner: controller, action: route.action, params: route.params },
        { name: route.name }
      );
    }

    return this;
  }

  /**
   * Add a route with explicit method
   */
  addRoute(
    method: HttpMethod,
    path: string,
    target: RouteTarget,
    options: RouteOptions = {}
  ): this {
    const member: unknown = Reflect.get(target.owner, target.action);
    if (typeof member !== 'function') {
      throw new MappingError(
        `${ownerName(target.owner)}.${target.action} is not a method`
      );
    }

    const route: RouteDescriptor = Object.freeze({
      method,
      pattern: compilePathPattern(this.prefix + path),
      owner: target.owner,
      action: target.action,
      params: Object.freeze([...(target.params ?? [])]),
      name: options.name ?? `${ownerName(target.owner)}.${target.action}`,
    });

    this.routes.push(route);
    if (!this.namedRoutes.has(route.name)) {
      this.namedRoutes.set(route.name, route);
    }

    this.logger?.debug('Mapped route', {
      method,
      path: route.pattern.template,
      target: route.name,
    });

    return this;
  }

  /**
   * Match a call to a route
   */
  match(method: string, path: string): RouteMatch | null {
    for (const route of this.routes) {
      if (route.method !== method) {
        continue;
      }

      const params = matchPath(route.pattern, path);
      if (params) {
        return { route, params };
      }
    }

    return null;
  }

  /**
   * Generate a URL for a named route
   */
  url(name: string, params: PatternParams = {}): string | null {
    const route = this.namedRoutes.get(name);
    if (!route) return null;
    return buildUrl(route.pattern.template, params);
  }

  /**
   * Get all registered routes (for debugging/admin)
   */
  getRoutes(): RouteDescriptor[] {
    return [...this.routes];
  }
}

function ownerName(owner: object): string {
  return owner.constructor.name || 'Object';
}
