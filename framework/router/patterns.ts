/**
 * Path Pattern Utilities
 *
 * Compiles `/users/{id}` style templates into anchored regular
 * expressions and extracts placeholder values from literal paths.
 */

export type PatternParams = Record<string, string>;

/**
 * Compiled form of a path template
 */
export interface PathPattern {
  readonly template: string;
  readonly regex: RegExp;
  readonly names: readonly string[];
}

const PLACEHOLDER = /\{([^/}]+)\}/g;
const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

/**
 * Compile a template into an anchored pattern. Each `{name}` segment
 * matches one or more characters other than `/`.
 */
export function compilePathPattern(template: string): PathPattern {
  const names: string[] = [];
  let source = '';
  let last = 0;

  for (const match of template.matchAll(PLACEHOLDER)) {
    const index = match.index ?? 0;
    source += escapeLiteral(template.slice(last, index)) + '([^/]+)';
    names.push(match[1]);
    last = index + match[0].length;
  }
  source += escapeLiteral(template.slice(last));

  return {
    template,
    regex: new RegExp(`^${source}$`),
    names,
  };
}

/**
 * Match a literal path against a compiled pattern
 */
export function matchPath(pattern: PathPattern, path: string): PatternParams | null {
  const result = pattern.regex.exec(path);
  if (!result) return null;

  const params: PatternParams = {};
  pattern.names.forEach((name, i) => {
    params[name] = result[i + 1];
  });
  return params;
}

/**
 * Build a URL from a template and parameters
 */
export function buildUrl(
  template: string,
  params: PatternParams,
  query?: Record<string, string | string[]>
): string {
  let url = template.replace(PLACEHOLDER, (placeholder: string, name: string) =>
    Object.hasOwn(params, name) ? encodeURIComponent(params[name]) : placeholder
  );

  if (query && Object.keys(query).length > 0) {
    const searchParams = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (Array.isArray(value)) {
        for (const v of value) {
          searchParams.append(key, v);
        }
      } else {
        searchParams.append(key, value);
      }
    }
    url += '?' + searchParams.toString();
  }

  return url;
}

/**
 * Parse placeholder names from a template, in order
 */
export function parsePathParams(template: string): string[] {
  return compilePathPattern(template).names.slice();
}

function escapeLiteral(text: string): string {
  return text.replace(REGEX_SPECIALS, '\\$&');
}
