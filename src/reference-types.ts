import { escapeRegex } from './patterns.js';
import { ObjectKind, ReferenceStore } from './store.js';
import { Project, ReferableObject, ReferenceType } from './types.js';

/**
 * Options for building the built-in reference types
 */
export interface ReferenceTypeOptions {
  /** Base URL that link-form references start with, e.g. "https://git.example.com" */
  host: string;
}

interface TypeDefinition {
  name: string;
  title: string;
  dataAttribute: string;
  /** Character that introduces a short reference */
  symbol: string;
  /** URL path segment in front of the number */
  segment: string;
  kind: ObjectKind;
}

const DEFINITIONS: TypeDefinition[] = [
  { name: 'issue', title: 'Issue', dataAttribute: 'issue', symbol: '#', segment: 'issues', kind: 'issues' },
  {
    name: 'merge_request',
    title: 'Merge Request',
    dataAttribute: 'merge-request',
    symbol: '!',
    segment: 'merge_requests',
    kind: 'mergeRequests'
  },
  { name: 'snippet', title: 'Snippet', dataAttribute: 'snippet', symbol: '$', segment: 'snippets', kind: 'snippets' }
];

// namespace/project, with optional nested groups
const PROJECT_PATH = '[a-zA-Z0-9_.-]+(?:\\/[a-zA-Z0-9_.-]+)+';
const NOTE_ANCHOR = '(?<anchor>#note_\\d+)?';

/**
 * Short form: [group/project]<symbol><number>[#note_<n>], not glued to a preceding word
 */
export function shortReferencePattern(symbol: string, idGroup: string): RegExp {
  return new RegExp(
    `(?<![\\w/.-])(?:(?<project>${PROJECT_PATH}))?${escapeRegex(symbol)}(?<${idGroup}>\\d+)${NOTE_ANCHOR}(?!\\w)`
  );
}

/**
 * Link form: <host>/<group/project>/<segment>/<number>[#note_<n>], captured whole as `url`
 */
export function linkReferencePattern(host: string, segment: string, idGroup: string): RegExp {
  return new RegExp(
    `(?<url>${escapeRegex(host)}\\/(?<project>${PROJECT_PATH})\\/${escapeRegex(segment)}\\/(?<${idGroup}>\\d+)${NOTE_ANCHOR})`
  );
}

function normalizeHost(host: string): string {
  return host.replace(/\/+$/, '');
}

function createReferenceType(definition: TypeDefinition, store: ReferenceStore, host: string): ReferenceType {
  const { name, title, dataAttribute, symbol, segment, kind } = definition;

  const projectPathOf = (object: ReferableObject, fallback: Project): string =>
    store.projectById(object.projectId)?.path ?? fallback.path;

  return {
    name,
    title,
    idGroup: name,
    dataAttribute,
    shortPattern: shortReferencePattern(symbol, name),
    linkPattern: linkReferencePattern(host, segment, name),

    lookupObject: (project, id) => store.findObject(kind, project.id, id),

    lookupProjectByToken: token => store.projectByPath(token),

    urlFor: (object, project) => `${host}/${projectPathOf(object, project)}/${segment}/${object.iid}`,

    displayText: (object, ambientProject) => {
      if (object.projectId === ambientProject.id) {
        return `${symbol}${object.iid}`;
      }
      return `${projectPathOf(object, ambientProject)}${symbol}${object.iid}`;
    }
  };
}

/**
 * Issue, merge request and snippet reference types backed by `store`
 */
export function createReferenceTypes(store: ReferenceStore, options: ReferenceTypeOptions): ReferenceType[] {
  const host = normalizeHost(options.host);
  return DEFINITIONS.map(definition => createReferenceType(definition, store, host));
}
