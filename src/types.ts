/**
 * A project that references can point into.
 * Owned by the store; the rewriter only ever looks projects up.
 */
export interface Project {
  /** Unique project id */
  id: number;

  /** Full path, e.g. "acme/app". Doubles as the foreign-project token. */
  path: string;

  /** Human-friendly name */
  name: string;
}

/**
 * A referable domain object (issue, merge request, snippet).
 */
export interface ReferableObject {
  /** Globally unique id, written to the rendered link's data attribute */
  id: number;

  /** Project-scoped number used in references such as #5 or !5 */
  iid: number;

  /** Owning project id */
  projectId: number;

  title: string;
}

/**
 * One occurrence of a reference pattern inside a string.
 */
export interface ReferenceMatch {
  /** Full matched text */
  text: string;

  /** Offset of the match in the scanned string */
  index: number;

  /** Offset just past the match */
  end: number;

  /** Numeric object id taken from the type's id group */
  id: number;

  /** Foreign-project token; absent means the ambient project */
  projectToken?: string;

  /** Anchor fragment such as "#note_7" */
  anchor?: string;

  /** Explicit URL captured by a link-form pattern */
  url?: string;

  /** Every named group the pattern defines that participated in the match */
  groups: Record<string, string>;
}

/**
 * Static description of one kind of referable object, together with the
 * lookups the rewriter needs to resolve and link it.
 */
export interface ReferenceType {
  /** Snake-case name, used for the CSS marker class (gfm-merge_request) */
  name: string;

  /** Display name used in link titles ("Merge Request") */
  title: string;

  /** Named capture group holding the numeric id */
  idGroup: string;

  /** Suffix of the data attribute holding the object id (data-merge-request) */
  dataAttribute: string;

  /** Short form such as !123, matched in text and link text */
  shortPattern?: RegExp;

  /** Fully-qualified URL form */
  linkPattern?: RegExp;

  lookupObject(project: Project, id: number): ReferableObject | undefined;

  /** Never called for an absent token; that case is the ambient project */
  lookupProjectByToken(token: string): Project | undefined;

  urlFor(object: ReferableObject, project: Project): string;

  displayText(object: ReferableObject, ambientProject: Project): string;
}

/**
 * Attributes of a rendered reference link, before it is turned into markup.
 */
export interface RenderedLink {
  href: string;
  text: string;
  title: string;
  classes: string[];

  /** data-* attributes without the "data-" prefix, in insertion order */
  data: Array<[string, string]>;
}

/**
 * A reference recovered from already-rendered markup.
 */
export interface RenderedReference {
  /** Reference type name, e.g. "issue" */
  type: string;
  projectId: number;
  objectId: number;
  original: string;
}
