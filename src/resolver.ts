import { ReferenceCache } from './cache.js';
import { Project, ReferableObject, ReferenceMatch, ReferenceType } from './types.js';

/**
 * A match resolved to the object it points at
 */
export interface ResolvedReference {
  project: Project;
  object: ReferableObject;
}

/**
 * Resolve the project a match points into. A match without a project token
 * refers to the ambient project and never reaches the store.
 */
export function resolveProject(
  match: ReferenceMatch,
  type: ReferenceType,
  ambientProject: Project,
  cache: ReferenceCache
): Project | undefined {
  const token = match.projectToken;
  if (token === undefined) {
    return ambientProject;
  }
  return cache.projectFor(token, () => type.lookupProjectByToken(token));
}

/**
 * Resolve a match to a concrete object.
 *
 * Returns null when either the project or the object cannot be found; the
 * caller leaves the matched text as it was. Store errors are not caught here.
 */
export function resolveReference(
  match: ReferenceMatch,
  type: ReferenceType,
  ambientProject: Project,
  cache: ReferenceCache
): ResolvedReference | null {
  const project = resolveProject(match, type, ambientProject, cache);
  if (!project) return null;

  const object = cache.objectFor(type.name, project.id, match.id, () => type.lookupObject(project, match.id));
  if (!object) return null;

  return { project, object };
}
