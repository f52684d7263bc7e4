/**
 * Lazy Loading Tests
 */

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { EntityManager } from '../../framework/orm/session.ts';
import type { SqliteDriver } from '../../framework/orm/sqlite.ts';
import { isLazyReference, isResolved, referenceId } from '../../framework/orm/lazy.ts';
import { defineEntity, manyToOne, type EntityDefinition } from '../../framework/orm/metadata.ts';
import { EntityNotFoundError, LazyInitializationError } from '../../framework/errors/errors.ts';
import { Post, User } from '../../src/mod.ts';
import { memoryLogger, sampleDriver } from '../test_utils.ts';

class Employee {
  static readonly entity: EntityDefinition = defineEntity<Employee>({
    table: 'employees',
    id: { field: 'id' },
    columns: { name: {} },
    relations: { manager: manyToOne(() => Employee) },
  });

  id = 0;
  name = '';
  manager: Employee | null = null;
}

describe('Lazy references', () => {
  let driver: SqliteDriver;
  let em: EntityManager;

  beforeEach(() => {
    driver = sampleDriver();
    em = new EntityManager({ driver, logger: memoryLogger().logger });

    em.begin();
    const author = User.create('jane_doe', 'jane@example.test');
    em.persist(author);
    em.flush();
    em.persist(Post.create('My First Post', 'Hello World!', author));
    em.commit();
  });

  afterEach(() => {
    driver.close();
  });

  function loadPost(): Post {
    const post = em.find(Post, 1);
    if (!post) throw new Error('missing post');
    return post;
  }

  function authorOf(post: Post): User {
    if (!post.author) throw new Error('missing author');
    return post.author;
  }

  test('Lazy - reference created without a fetch', () => {
    em.begin();
    const select = vi.spyOn(driver, 'selectById');
    const author = authorOf(loadPost());

    expect(select).toHaveBeenCalledTimes(1);
    expect(isLazyReference(author)).toBe(true);
    expect(isResolved(author)).toBe(false);
    em.commit();
  });

  test('Lazy - first access loads once, later accesses do not', () => {
    em.begin();
    const select = vi.spyOn(driver, 'selectById');
    const author = authorOf(loadPost());

    expect(author.username).toBe('jane_doe');
    expect(select).toHaveBeenCalledTimes(2);
    expect(isResolved(author)).toBe(true);

    expect(author.email).toBe('jane@example.test');
    expect(author.toString()).toBe("User{id=1, username='jane_doe', email='jane@example.test'}");
    expect(select).toHaveBeenCalledTimes(2);
    em.commit();
  });

  test('Lazy - id and type checks do not load', () => {
    em.begin();
    const author = authorOf(loadPost());

    expect(author.id).toBe(1);
    expect(referenceId(author, 'id')).toBe(1);
    expect(author instanceof User).toBe(true);
    expect(isResolved(author)).toBe(false);
    em.commit();
  });

  test('Lazy - resolves to the record already in the identity map', () => {
    em.begin();
    const user = em.find(User, 1);
    const select = vi.spyOn(driver, 'selectById');
    const author = authorOf(loadPost());

    expect(author.username).toBe('jane_doe');
    expect(select).toHaveBeenCalledTimes(1);

    author.username = 'renamed';
    expect(user?.username).toBe('renamed');
    em.commit();
  });

  test('Lazy - key enumeration and membership load the record', () => {
    em.begin();
    const author = authorOf(loadPost());

    expect('username' in author).toBe(true);
    expect(isResolved(author)).toBe(true);
    expect(Object.keys(author)).toEqual(['id', 'username', 'email', 'tempData']);
    em.commit();
  });

  test('Lazy - access after the unit of work ended fails', () => {
    em.begin();
    const author = authorOf(loadPost());
    em.commit();

    expect(() => author.username).toThrow(LazyInitializationError);
    expect(() => author.username).toThrow('Could not initialize User#1: the unit of work has ended');
    expect(author.id).toBe(1);
  });

  test('Lazy - reference from an earlier unit of work fails in a later one', () => {
    em.begin();
    const author = authorOf(loadPost());
    em.rollback();

    em.begin();
    expect(() => author.email).toThrow(LazyInitializationError);
    em.commit();
  });

  test('Lazy - resolved reference keeps working after commit', () => {
    em.begin();
    const author = authorOf(loadPost());
    expect(author.username).toBe('jane_doe');
    em.commit();

    expect(author.email).toBe('jane@example.test');
  });

  test('Lazy - loaded reference is managed like the record it stands for', () => {
    em.begin();
    const author = authorOf(loadPost());
    author.email = 'jane@new.example.test';

    expect(isResolved(author)).toBe(true);
    expect(em.contains(author)).toBe(true);

    em.markDirty(author);
    em.commit();

    expect(driver.selectById('users', 'id', 1)).toMatchObject({ email: 'jane@new.example.test' });
  });

  test('Lazy - markDirty loads an unresolved reference', () => {
    em.begin();
    const select = vi.spyOn(driver, 'selectById');
    const author = authorOf(loadPost());

    expect(em.contains(author)).toBe(false);
    expect(select).toHaveBeenCalledTimes(1);

    em.markDirty(author);
    expect(select).toHaveBeenCalledTimes(2);
    expect(isResolved(author)).toBe(true);
    expect(em.contains(author)).toBe(true);
    em.commit();
  });

  test('Lazy - persisting a loaded reference does not insert again', () => {
    em.begin();
    const author = authorOf(loadPost());
    expect(author.username).toBe('jane_doe');

    const insert = vi.spyOn(driver, 'insert');
    em.persist(author);
    em.flush();

    expect(insert).not.toHaveBeenCalled();
    em.commit();
  });

  test('Lazy - awaiting a reference does not load it', async () => {
    em.begin();
    const author = authorOf(loadPost());
    em.commit();

    const awaited = await Promise.resolve(author);
    expect(awaited === author).toBe(true);
    expect(isResolved(author)).toBe(false);
  });

  test('Lazy - missing target row', () => {
    driver.insert('posts', { title: 'Stray', content: '', author_id: 99 }, 'id');
    em.begin();
    const stray = em.find(Post, 2);
    if (!stray) throw new Error('missing post');
    const author = authorOf(stray);

    expect(() => author.username).toThrow(EntityNotFoundError);
    expect(() => author.username).toThrow('No User with id 99');
    em.commit();
  });

  test('Lazy - re-saving a post keeps the join column without loading', () => {
    em.begin();
    const post = loadPost();
    post.title = 'Edited';
    em.markDirty(post);
    em.commit();

    expect(driver.selectById('posts', 'id', 1)).toMatchObject({ title: 'Edited', author_id: 1 });
    expect(isResolved(authorOf(post))).toBe(false);
  });

  test('Lazy - null join column leaves the relation empty', () => {
    driver.insert('posts', { title: 'Orphan', content: '', author_id: null }, 'id');
    em.begin();
    expect(em.find(Post, 2)?.author).toBeNull();
    em.commit();
  });
});

describe('Eager relations', () => {
  let driver: SqliteDriver;
  let em: EntityManager;

  beforeEach(() => {
    driver = sampleDriver();
    driver.exec('CREATE TABLE employees (id INTEGER PRIMARY KEY, name TEXT, manager_id INTEGER)');
    driver.insert('employees', { id: 1, name: 'Ada', manager_id: 1 });
    driver.insert('employees', { id: 2, name: 'Ben', manager_id: 1 });
    em = new EntityManager({ driver, logger: memoryLogger().logger });
  });

  afterEach(() => {
    driver.close();
  });

  test('Eager - related record loaded with its owner', () => {
    em.begin();
    const select = vi.spyOn(driver, 'selectById');
    const ben = em.find(Employee, 2);

    expect(select).toHaveBeenCalledTimes(2);
    expect(ben?.manager?.name).toBe('Ada');
    expect(isLazyReference(ben?.manager)).toBe(false);
    em.commit();
  });

  test('Eager - self reference ends at the identity map', () => {
    em.begin();
    const ada = em.find(Employee, 1);

    expect(ada?.manager).toBe(ada);
    em.commit();
  });

  test('Eager - shared target is one instance', () => {
    em.begin();
    const ben = em.find(Employee, 2);
    const ada = em.find(Employee, 1);

    expect(ben?.manager).toBe(ada);
    em.commit();
  });
});
