/**
 * Request-scoped memoization of reference lookups.
 *
 * One RequestReferenceCache lives for exactly one rendering request and is
 * thrown away afterwards. Code running outside a request gets the
 * NullReferenceCache, which forwards every call to the loader.
 */

import { Project, ReferableObject } from './types.js';

export interface ReferenceCache {
  /** Project for a foreign-project token */
  projectFor(token: string, load: () => Project | undefined): Project | undefined;

  /** Object of the given type with the given id inside a project */
  objectFor(
    typeName: string,
    projectId: number,
    id: number,
    load: () => ReferableObject | undefined
  ): ReferableObject | undefined;

  /** URL of an object as seen from a contextual project */
  urlFor(typeName: string, projectId: number, objectId: number, load: () => string): string;
}

/** Boxed so that a remembered miss (undefined) is still a hit */
interface Entry<V> {
  value: V;
}

/** type name -> project id -> key -> entry */
type ScopedTables<V> = Map<string, Map<number, Map<number, Entry<V>>>>;

function getOrSet<K, V>(cache: Map<K, Entry<V>>, key: K, load: () => V): V {
  const hit = cache.get(key);
  if (hit) {
    return hit.value;
  }
  const value = load();
  cache.set(key, { value });
  return value;
}

function tableFor<V>(tables: ScopedTables<V>, typeName: string, projectId: number): Map<number, Entry<V>> {
  let byProject = tables.get(typeName);
  if (!byProject) {
    byProject = new Map();
    tables.set(typeName, byProject);
  }
  let table = byProject.get(projectId);
  if (!table) {
    table = new Map();
    byProject.set(projectId, table);
  }
  return table;
}

export class RequestReferenceCache implements ReferenceCache {
  private projectRefs = new Map<string, Entry<Project | undefined>>();
  private objects: ScopedTables<ReferableObject | undefined> = new Map();
  private urls: ScopedTables<string> = new Map();

  projectFor(token: string, load: () => Project | undefined): Project | undefined {
    return getOrSet(this.projectRefs, token, load);
  }

  objectFor(
    typeName: string,
    projectId: number,
    id: number,
    load: () => ReferableObject | undefined
  ): ReferableObject | undefined {
    return getOrSet(tableFor(this.objects, typeName, projectId), id, load);
  }

  urlFor(typeName: string, projectId: number, objectId: number, load: () => string): string {
    return getOrSet(tableFor(this.urls, typeName, projectId), objectId, load);
  }
}

export class NullReferenceCache implements ReferenceCache {
  projectFor(_token: string, load: () => Project | undefined): Project | undefined {
    return load();
  }

  objectFor(
    _typeName: string,
    _projectId: number,
    _id: number,
    load: () => ReferableObject | undefined
  ): ReferableObject | undefined {
    return load();
  }

  urlFor(_typeName: string, _projectId: number, _objectId: number, load: () => string): string {
    return load();
  }
}
