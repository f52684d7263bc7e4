/**
 * Lazy References
 *
 * A lazy reference stands in for a related record that has not been
 * fetched. Reading its id or `then` never loads. The first other access
 * loads the record through its owning entity manager, once, and every
 * access from then on goes to the loaded record.
 */

import { EntityNotFoundError, LazyInitializationError } from '../errors/errors.ts';
import type { EntityId, EntityType } from './metadata.ts';

/**
 * What a lazy reference needs from the entity manager that created it
 */
export interface LazyOwner {
  /** Whether the given unit of work is still the open one */
  isCurrent(unitOfWork: number): boolean;
  find<T extends object>(type: EntityType<T>, id: EntityId): T | null;
}

interface LazyState {
  readonly type: EntityType;
  readonly id: EntityId;
  readonly idField: string;
  readonly owner: LazyOwner;
  readonly unitOfWork: number;
  resolved: object | null;
}

const references = new WeakMap<object, LazyState>();

/**
 * Create a lazy reference to (type, id), bound to the owner's current
 * unit of work
 */
export function createLazyReference<T extends object>(
  type: EntityType<T>,
  idField: string,
  id: EntityId,
  owner: LazyOwner,
  unitOfWork: number
): T {
  const state: LazyState = { type, id, idField, owner, unitOfWork, resolved: null };
  const shell = new type();

  const proxy = new Proxy(shell, {
    get(_target, property) {
      if (property === idField && !state.resolved) {
        return id;
      }
      // Not a thenable; awaiting a reference must not load it
      if (property === 'then' && !state.resolved) {
        return undefined;
      }
      const record = resolve(state);
      return Reflect.get(record, property, record);
    },
    set(_target, property, value) {
      return Reflect.set(resolve(state), property, value);
    },
    has(_target, property) {
      return Reflect.has(resolve(state), property);
    },
    ownKeys() {
      return Reflect.ownKeys(resolve(state));
    },
    getOwnPropertyDescriptor(_target, property) {
      const descriptor = Reflect.getOwnPropertyDescriptor(resolve(state), property);
      return descriptor ? { ...descriptor, configurable: true } : undefined;
    },
    defineProperty(_target, property, descriptor) {
      return Reflect.defineProperty(resolve(state), property, descriptor);
    },
    deleteProperty(_target, property) {
      return Reflect.deleteProperty(resolve(state), property);
    },
    getPrototypeOf(target) {
      return Reflect.getPrototypeOf(target);
    },
  });

  references.set(proxy, state);
  return proxy;
}

/**
 * Whether a value is a lazy reference (resolved or not)
 */
export function isLazyReference(value: unknown): boolean {
  return typeof value === 'object' && value !== null && references.has(value);
}

/**
 * Whether a lazy reference has loaded its record. Plain records count
 * as resolved.
 */
export function isResolved(value: object): boolean {
  const state = references.get(value);
  return state ? state.resolved !== null : true;
}

/**
 * The loaded record behind a resolved lazy reference. Anything else,
 * including an unresolved reference, is returned as given.
 */
export function resolvedTarget(value: object): object {
  return references.get(value)?.resolved ?? value;
}

/**
 * The record behind a lazy reference, loading it when needed. Plain
 * records are returned as given.
 */
export function loadReference(value: object): object {
  const state = references.get(value);
  return state ? resolve(state) : value;
}

/**
 * Read a record's id without resolving a lazy reference
 */
export function referenceId(value: object, idField: string): unknown {
  const state = references.get(value);
  if (state && !state.resolved) {
    return state.id;
  }
  return Reflect.get(value, idField);
}

function resolve(state: LazyState): object {
  if (state.resolved) {
    return state.resolved;
  }

  if (!state.owner.isCurrent(state.unitOfWork)) {
    throw new LazyInitializationError(
      `Could not initialize ${state.type.name}#${String(state.id)}: the unit of work has ended`
    );
  }

  const record = state.owner.find(state.type, state.id);
  if (!record) {
    throw new EntityNotFoundError(`No ${state.type.name} with id ${String(state.id)}`);
  }

  state.resolved = record;
  return record;
}
