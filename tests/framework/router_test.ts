/**
 * Router Tests
 */

import { expect, test } from 'vitest';
import { Router } from '../../framework/router/router.ts';
import {
  buildUrl,
  compilePathPattern,
  matchPath,
  parsePathParams,
} from '../../framework/router/patterns.ts';
import { defineController, pathVariable, type ControllerDefinition } from '../../framework/controller/base.ts';
import { MappingError } from '../../framework/errors/errors.ts';
import { memoryLogger } from '../test_utils.ts';

class ItemController {
  readonly routes: ControllerDefinition = defineController<ItemController>({
    basePath: '/api',
    routes: [
      { method: 'GET', path: '/items/{id}', action: 'show', params: [pathVariable('id', 'int')] },
      { method: 'GET', path: '/items/latest', action: 'latest' },
      { method: 'POST', path: '/items', action: 'create', name: 'items.create' },
    ],
  });

  show(id: number): string {
    return `item ${id}`;
  }

  latest(): string {
    return 'latest';
  }

  create(): string {
    return 'created';
  }
}

// Patterns

test('Pattern - compiles placeholders in order', () => {
  const pattern = compilePathPattern('/users/{id}/posts/{postId}');

  expect(pattern.names).toEqual(['id', 'postId']);
  expect(pattern.regex.test('/users/1/posts/2')).toBe(true);
  expect(pattern.regex.test('/users/1/posts')).toBe(false);
});

test('Pattern - matches whole path only', () => {
  const pattern = compilePathPattern('/users/{id}');

  expect(matchPath(pattern, '/users/123')).toEqual({ id: '123' });
  expect(matchPath(pattern, '/users/123/extra')).toBeNull();
  expect(matchPath(pattern, '/prefix/users/123')).toBeNull();
  expect(matchPath(pattern, '/users/')).toBeNull();
});

test('Pattern - literal segments are not regex syntax', () => {
  const pattern = compilePathPattern('/files/{name}.txt');

  expect(matchPath(pattern, '/files/report.txt')).toEqual({ name: 'report' });
  expect(matchPath(pattern, '/files/reportXtxt')).toBeNull();
});

test('Pattern - placeholder names need not be identifiers', () => {
  const pattern = compilePathPattern('/orders/{order-id}');

  expect(matchPath(pattern, '/orders/A7')).toEqual({ 'order-id': 'A7' });
});

test('Pattern - colons are literal text', () => {
  const pattern = compilePathPattern('/time/12:30');

  expect(pattern.template).toBe('/time/12:30');
  expect(pattern.names).toEqual([]);
  expect(matchPath(pattern, '/time/12:30')).toEqual({});
  expect(matchPath(pattern, '/time/12XYZ')).toBeNull();
});

test('Pattern - parse placeholder names', () => {
  expect(parsePathParams('/a/{x}/b/{y}')).toEqual(['x', 'y']);
  expect(parsePathParams('/health')).toEqual([]);
});

test('Pattern - build url', () => {
  expect(buildUrl('/users/{id}', { id: '42' })).toBe('/users/42');
  expect(buildUrl('/search/{term}', { term: 'a b' }, { page: '2' })).toBe('/search/a%20b?page=2');
  expect(buildUrl('/users/{id}', {})).toBe('/users/{id}');
  expect(buildUrl('/users/:id', { id: '42' })).toBe('/users/:id');
  expect(buildUrl('/objects/{constructor}', {})).toBe('/objects/{constructor}');
});

// Router

test('Router - register controller with base path', () => {
  const router = new Router().register(new ItemController());

  const match = router.match('GET', '/api/items/7');
  expect(match?.route.action).toBe('show');
  expect(match?.params).toEqual({ id: '7' });
  expect(match?.route.pattern.template).toBe('/api/items/{id}');
});

test('Router - default route name', () => {
  const router = new Router().register(new ItemController());

  expect(router.getRoutes().map((route) => route.name)).toEqual([
    'ItemController.show',
    'ItemController.latest',
    'items.create',
  ]);
});

test('Router - first registered route wins', () => {
  const router = new Router().register(new ItemController());

  // '/items/{id}' is registered before '/items/latest'
  const match = router.match('GET', '/api/items/latest');
  expect(match?.route.action).toBe('show');
  expect(match?.params).toEqual({ id: 'latest' });
});

test('Router - method must match', () => {
  const router = new Router().register(new ItemController());

  expect(router.match('POST', '/api/items/7')).toBeNull();
  expect(router.match('GET', '/api/items')).toBeNull();
  expect(router.match('POST', '/api/items')?.route.action).toBe('create');
});

test('Router - no match returns null', () => {
  const router = new Router().register(new ItemController());

  expect(router.match('GET', '/health')).toBeNull();
});

test('Router - prefix applies to every route', () => {
  const router = new Router('/v1').register(new ItemController());

  expect(router.match('GET', '/v1/api/items/3')?.params).toEqual({ id: '3' });
  expect(router.match('GET', '/api/items/3')).toBeNull();
});

test('Router - descriptors are immutable', () => {
  const router = new Router().register(new ItemController());
  const [route] = router.getRoutes();

  expect(Object.isFrozen(route)).toBe(true);
  expect(Object.isFrozen(route.params)).toBe(true);
  expect(route.params).toEqual([{ source: 'path', name: 'id', kind: 'int' }]);
});

test('Router - getRoutes returns a copy', () => {
  const router = new Router().register(new ItemController());

  router.getRoutes().length = 0;
  expect(router.getRoutes()).toHaveLength(3);
});

test('Router - add route directly', () => {
  const owner = { ping: () => 'pong' };
  const router = new Router().addRoute('GET', '/ping', { owner, action: 'ping' });

  const match = router.match('GET', '/ping');
  expect(match?.route.owner).toBe(owner);
  expect(match?.route.name).toBe('Object.ping');
});

test('Router - literal colon route matches only itself', () => {
  const owner = { at: () => 'half past' };
  const router = new Router().addRoute('GET', '/time/12:30', { owner, action: 'at' });

  expect(router.match('GET', '/time/12:30')?.params).toEqual({});
  expect(router.match('GET', '/time/12XYZ')).toBeNull();
});

test('Router - rejects a target that is not a method', () => {
  const router = new Router();

  expect(() => router.addRoute('GET', '/x', { owner: { value: 1 }, action: 'value' })).toThrow(MappingError);
});

test('Router - url for named route', () => {
  const router = new Router().register(new ItemController());

  expect(router.url('ItemController.show', { id: '12' })).toBe('/api/items/12');
  expect(router.url('missing')).toBeNull();
});

test('Router - logs each mapped route', () => {
  const { logger, entries } = memoryLogger();
  new Router('', logger).register(new ItemController());

  const mapped = entries.filter((entry) => entry.message === 'Mapped route');
  expect(mapped).toHaveLength(3);
  expect(mapped[0].context).toEqual({
    component: 'router',
    method: 'GET',
    path: '/api/items/{id}',
    target: 'ItemController.show',
  });
});
