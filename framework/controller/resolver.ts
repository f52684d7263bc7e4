/**
 * Argument Resolution and Invocation
 *
 * Turns a matched route plus the incoming call into handler arguments,
 * then calls the handler. Both steps return results rather than throw.
 */

import type { TrellisRequest } from '../http/request.ts';
import type { RouteDescriptor, RouteMatch } from '../router/router.ts';
import { ResolutionError } from '../errors/errors.ts';
import { fail, ok, toFailure, type Result } from '../errors/result.ts';
import type { ParameterBinding } from './base.ts';

/**
 * What to do with a parameter that has no binding
 */
export type UnboundPolicy = 'null' | 'error';

export interface ResolveOptions {
  unboundParameters?: UnboundPolicy;
}

const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;
const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;
const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Resolve every parameter of the matched route, in declaration order
 */
export function resolveArguments(
  match: RouteMatch,
  request: TrellisRequest,
  options: ResolveOptions = {}
): Result<unknown[]> {
  const args: unknown[] = [];

  try {
    for (const [index, binding] of match.route.params.entries()) {
      args.push(resolveParameter(binding, index, match, request, options));
    }
  } catch (error) {
    return { ok: false, failure: toFailure(error, 'resolution') };
  }

  return ok(args);
}

function resolveParameter(
  binding: ParameterBinding,
  index: number,
  match: RouteMatch,
  request: TrellisRequest,
  options: ResolveOptions
): unknown {
  switch (binding.source) {
    case 'path': {
      if (!Object.hasOwn(match.params, binding.name)) {
        throw new ResolutionError(
          `Missing path variable '${binding.name}' for ${match.route.name}`
        );
      }
      return convertValue(match.params[binding.name], binding.kind);
    }
    case 'body':
      return request.body;
    case 'request':
      return request;
    case 'unbound':
      if (options.unboundParameters === 'error') {
        throw new ResolutionError(
          `Parameter ${index}${binding.label ? ` (${binding.label})` : ''} of ${match.route.name} has no binding`
        );
      }
      return null;
  }
}

/**
 * Convert path text to the declared kind. Unknown kinds pass the text
 * through unchanged.
 */
export function convertValue(text: string, kind: string): unknown {
  switch (kind) {
    case 'int': {
      const value = parseInteger(text);
      if (value < BigInt(INT_MIN) || value > BigInt(INT_MAX)) {
        throw numberFormatError(text);
      }
      return Number(value);
    }
    case 'long': {
      const value = parseInteger(text);
      if (value < LONG_MIN || value > LONG_MAX) {
        throw numberFormatError(text);
      }
      const asNumber = Number(value);
      return Number.isSafeInteger(asNumber) ? asNumber : value;
    }
    case 'boolean':
      return text.toLowerCase() === 'true';
    default:
      return text;
  }
}

function parseInteger(text: string): bigint {
  if (!INTEGER_TEXT.test(text)) {
    throw numberFormatError(text);
  }
  return BigInt(text.startsWith('+') ? text.slice(1) : text);
}

function numberFormatError(text: string): ResolutionError {
  return new ResolutionError(`For input string: "${text}"`);
}

/**
 * Call the route's method on its owner. A returned promise is awaited.
 */
export async function invokeRoute(route: RouteDescriptor, args: unknown[]): Promise<Result<unknown>> {
  const member: unknown = Reflect.get(route.owner, route.action);
  if (typeof member !== 'function') {
    return fail('invocation', `${route.name} is not a method`);
  }

  try {
    const value: unknown = await Reflect.apply(member, route.owner, args);
    return ok(value);
  } catch (error) {
    return { ok: false, failure: toFailure(error, 'invocation') };
  }
}
