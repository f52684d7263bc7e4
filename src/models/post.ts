/**
 * Post Model
 *
 * Sample entity whose author is loaded on first use.
 */

import { defineEntity, manyToOne, type EntityDefinition } from '../../framework/mod.ts';
import { User } from './user.ts';

export class Post {
  static readonly entity: EntityDefinition = defineEntity<Post>({
    table: 'posts',
    id: { field: 'id', generated: true },
    columns: {
      title: {},
      content: {},
    },
    relations: {
      author: manyToOne(() => User, { fetch: 'lazy' }),
    },
  });

  id: number | null = null;
  title = '';
  content = '';
  author: User | null = null;

  static create(title: string, content: string, author: User | null = null): Post {
    const post = new Post();
    post.title = title;
    post.content = content;
    post.author = author;
    return post;
  }

  toString(): string {
    return `Post{id=${this.id}, title='${this.title}'}`;
  }
}
