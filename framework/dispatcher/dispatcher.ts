/**
 * Dispatcher
 *
 * Front controller: finds the route for a call, resolves its arguments,
 * invokes it and turns the outcome into a response. Every call ends in
 * exactly one response; nothing escapes `dispatch`.
 */

import { TrellisRequest } from '../http/request.ts';
import { TrellisResponse } from '../http/response.ts';
import { HttpStatus, type CallRecord } from '../http/types.ts';
import { Router } from '../router/router.ts';
import type { RoutedController } from '../controller/base.ts';
import { invokeRoute, resolveArguments, type UnboundPolicy } from '../controller/resolver.ts';
import { toFailure, type Failure } from '../errors/result.ts';
import type { TrellisConfig } from '../config/config.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { withSpan, SpanKind } from '../telemetry/otel.ts';

export interface DispatcherOptions {
  logger?: Logger;
  router?: Router;
  unboundParameters?: UnboundPolicy;
}

/**
 * Request dispatcher for Trellis
 */
export class Dispatcher {
  private readonly _router: Router;
  private readonly logger: Logger;
  private readonly unboundParameters: UnboundPolicy;

  constructor(options: DispatcherOptions = {}) {
    const logger = options.logger ?? getLogger();
    this.logger = logger.child({ component: 'dispatcher' });
    this._router = options.router ?? new Router('', logger);
    this.unboundParameters = options.unboundParameters ?? 'null';
  }

  /**
   * Create a dispatcher using the dispatch policy from configuration
   */
  static fromConfig(config: TrellisConfig, logger?: Logger): Dispatcher {
    return new Dispatcher({
      logger,
      unboundParameters: config.dispatcher.unboundParameters,
    });
  }

  /**
   * The route registry
   */
  get router(): Router {
    return this._router;
  }

  /**
   * Register a controller's routes
   */
  register(controller: RoutedController): this {
    this._router.register(controller);
    return this;
  }

  /**
   * Dispatch one call
   */
  async dispatch(call: TrellisRequest | CallRecord): Promise<TrellisResponse> {
    const request = call instanceof TrellisRequest ? call : TrellisRequest.from(call);

    return await withSpan(
      `dispatch ${request.method}`,
      async (span) => {
        const response = await this.handle(request, (route) => {
          span.setAttribute('http.route', route);
        });
        span.setAttribute('http.status_code', response.status);
        return response;
      },
      {
        kind: SpanKind.SERVER,
        attributes: { 'http.method': request.method, 'http.target': request.path },
      },
    );
  }

  private async handle(
    request: TrellisRequest,
    onRoute: (template: string) => void
  ): Promise<TrellisResponse> {
    try {
      this.logger.debug('Processing call', { method: request.method, path: request.path });

      const match = this._router.match(request.method, request.path);
      if (!match) {
        this.logger.debug('No handler found', { method: request.method, path: request.path });
        return TrellisResponse.notFound();
      }

      onRoute(match.route.pattern.template);
      this.logger.debug('Found handler', { target: match.route.name, params: match.params });

      const args = resolveArguments(match, request, { unboundParameters: this.unboundParameters });
      if (!args.ok) {
        return this.failed(request, args.failure);
      }

      const result = await invokeRoute(match.route, args.value);
      if (!result.ok) {
        return this.failed(request, result.failure);
      }

      const response = toResponse(result.value);
      this.logger.debug('Call completed', { target: match.route.name, status: response.status });
      return response;
    } catch (error) {
      return this.failed(request, toFailure(error, 'invocation'));
    }
  }

  private failed(request: TrellisRequest, failure: Failure): TrellisResponse {
    this.logger.error('Call failed', failure.cause, {
      method: request.method,
      path: request.path,
      kind: failure.kind,
    });
    return TrellisResponse.serverError(failure.message);
  }
}

/**
 * Convert a handler's return value to a 200 response. Absent values
 * become an empty body; plain objects and arrays are written as JSON.
 */
export function toResponse(value: unknown): TrellisResponse {
  if (value === null || value === undefined) {
    return new TrellisResponse('', { status: HttpStatus.OK });
  }
  if (isPlainData(value)) {
    return new TrellisResponse(JSON.stringify(value, bigintReplacer), {
      headers: { 'content-type': 'application/json' },
    });
  }
  return new TrellisResponse(String(value), {
    headers: { 'content-type': 'text/plain' },
  });
}

function isPlainData(value: unknown): value is object {
  if (Array.isArray(value)) return true;
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
