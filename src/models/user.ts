/**
 * User Model
 *
 * Sample entity stored in the `users` table.
 */

import { defineEntity, type EntityDefinition } from '../../framework/mod.ts';

export class User {
  static readonly entity: EntityDefinition = defineEntity<User>({
    table: 'users',
    id: { field: 'id', generated: true },
    columns: {
      username: { column: 'username' },
      email: { column: 'email' },
      tempData: { transient: true },
    },
  });

  id: number | null = null;
  username = '';
  email = '';
  /** Never stored */
  tempData: string | null = null;

  static create(username: string, email: string): User {
    const user = new User();
    user.username = username;
    user.email = email;
    return user;
  }

  toString(): string {
    return `User{id=${this.id}, username='${this.username}', email='${this.email}'}`;
  }
}
