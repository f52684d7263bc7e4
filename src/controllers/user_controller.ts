/**
 * User Controller
 *
 * Sample controller mounted under /api.
 */

import { defineController, pathVariable, requestBody, type ControllerDefinition } from '../../framework/mod.ts';

export class UserController {
  readonly routes: ControllerDefinition = defineController<UserController>({
    basePath: '/api',
    routes: [
      { method: 'GET', path: '/users/{id}', action: 'getUser', params: [pathVariable('id', 'long')] },
      {
        method: 'GET',
        path: '/users/{id}/posts/{postId}',
        action: 'getUserPost',
        params: [pathVariable('id', 'long'), pathVariable('postId', 'long')],
      },
      { method: 'POST', path: '/users', action: 'createUser', params: [requestBody()] },
    ],
  });

  getUser(id: number | bigint): { id: number | bigint; name: string } {
    return { id, name: `User ${id}` };
  }

  getUserPost(userId: number | bigint, postId: number | bigint): Record<string, unknown> {
    return { userId, postId, title: `Post ${postId}` };
  }

  /**
   * Echo the submitted user back. A body that is not JSON fails the call.
   */
  createUser(body: string | null): { created: boolean; data: unknown } {
    const data: unknown = body === null ? null : JSON.parse(body);
    return { created: true, data };
  }
}
