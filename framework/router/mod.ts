/**
 * Layer 3: Routing Layer
 *
 * Maps incoming call paths to controller methods.
 *
 * Responsibilities:
 * - Compile path templates into anchored patterns
 * - Match calls in registration order
 * - Extract placeholder values from paths
 * - Support URL generation/reversing
 */

export { Router, type RouteDescriptor, type RouteMatch, type RouteTarget } from './router.ts';
export {
  compilePathPattern,
  matchPath,
  buildUrl,
  parsePathParams,
  type PathPattern,
  type PatternParams,
} from './patterns.ts';
