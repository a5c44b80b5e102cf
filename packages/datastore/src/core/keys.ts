/**
 * Entity key utilities
 */

import type { EntityKey } from "./types.js";

/**
 * Check whether a key carries an id or a name
 */
export function isCompleteKey(key: EntityKey): boolean {
  return key.id !== undefined || key.name !== undefined;
}

/**
 * The id or name of a key, whichever is set (name first)
 *
 * @example
 * idOrName({ kind: 'User', id: '42' })      // => '42'
 * idOrName({ kind: 'User', name: 'alice' }) // => 'alice'
 * idOrName({ kind: 'User' })                // => undefined
 */
export function idOrName(key: EntityKey): string | undefined {
  return key.name ?? key.id;
}

/**
 * Apply a namespace to a key (and its ancestors) that carries none
 */
export function withNamespace(
  key: EntityKey,
  namespace: string | undefined,
): EntityKey {
  const resolved = key.namespace ?? namespace;
  return {
    ...key,
    namespace: resolved,
    parent: key.parent ? withNamespace(key.parent, resolved) : undefined,
  };
}

/**
 * Ancestor path of a key, outermost first
 */
export function keyPath(key: EntityKey): EntityKey[] {
  const path: EntityKey[] = [];
  for (let current: EntityKey | undefined = key; current; current = current.parent) {
    path.unshift(current);
  }
  return path;
}

/**
 * Stable string form of a key, usable as a map key and in log lines
 *
 * @example
 * keyToString({ kind: 'User', id: '42', namespace: 'prod' })
 * // => 'prod:User(42)'
 *
 * keyToString({ kind: 'Post', name: 'hello', parent: { kind: 'User', id: '42' } })
 * // => 'User(42)/Post("hello")'
 */
export function keyToString(key: EntityKey): string {
  const segments = keyPath(key).map((element) => {
    if (element.name !== undefined) {
      return `${element.kind}(${JSON.stringify(element.name)})`;
    }
    return `${element.kind}(${element.id ?? "?"})`;
  });
  const path = segments.join("/");
  return key.namespace ? `${key.namespace}:${path}` : path;
}

/**
 * Copy a key, ancestors included
 */
export function cloneKey(key: EntityKey): EntityKey {
  return {
    ...key,
    parent: key.parent ? cloneKey(key.parent) : undefined,
  };
}
