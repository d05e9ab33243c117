import { ReferenceCache } from './cache.js';
import { ResolvedReference } from './resolver.js';
import { Project, ReferableObject, ReferenceMatch, ReferenceType, RenderedLink } from './types.js';

/** Generic marker class carried by every rendered reference */
export const REFERENCE_CLASS = 'gfm';

const NOTE_ANCHOR_PATTERN = /^#note_(\d+)$/;

export interface LinkContext {
  /** Project of the document being rendered */
  ambientProject: Project;
  cache: ReferenceCache;
}

/**
 * Extra qualifiers appended to the link text, e.g. "comment 7" for a
 * reference to a note on the object.
 */
function linkTextExtras(match: ReferenceMatch): string[] {
  const extras: string[] = [];
  const note = match.anchor?.match(NOTE_ANCHOR_PATTERN);
  if (note) {
    extras.push(`comment ${note[1]}`);
  }
  return extras;
}

function linkText(
  object: ReferableObject,
  match: ReferenceMatch,
  type: ReferenceType,
  ambientProject: Project
): string {
  const text = type.displayText(object, ambientProject);
  const extras = linkTextExtras(match);
  return extras.length > 0 ? `${text} (${extras.join(', ')})` : text;
}

export function referenceClasses(type: ReferenceType): string[] {
  return [REFERENCE_CLASS, `${REFERENCE_CLASS}-${type.name}`];
}

/**
 * Build the link for a resolved reference.
 *
 * `overrideText` is the existing text of a link element being rewritten; it
 * replaces the generated link text and is recorded as the original.
 */
export function renderLink(
  resolved: ResolvedReference,
  match: ReferenceMatch,
  type: ReferenceType,
  context: LinkContext,
  overrideText?: string
): RenderedLink {
  const { project, object } = resolved;

  const href = match.url ?? context.cache.urlFor(
    type.name,
    project.id,
    object.id,
    () => type.urlFor(object, project)
  );

  return {
    href,
    text: overrideText ?? linkText(object, match, type, context.ambientProject),
    title: `${type.title}: ${object.title}`,
    classes: referenceClasses(type),
    data: [
      ['original', overrideText ?? match.text],
      ['project', String(project.id)],
      [type.dataAttribute, String(object.id)],
      ['reference-type', type.name]
    ]
  };
}

/**
 * Turn a rendered link into an anchor element owned by `document`.
 * Values go through the DOM, so serializing the element escapes them.
 * Text is left out when `withText` is false so the caller can supply children.
 */
export function createLinkElement(document: Document, link: RenderedLink, withText = true): HTMLAnchorElement {
  const anchor = document.createElement('a');
  anchor.setAttribute('href', link.href);
  for (const [name, value] of link.data) {
    anchor.setAttribute(`data-${name}`, value);
  }
  anchor.setAttribute('title', link.title);
  anchor.setAttribute('class', link.classes.join(' '));
  if (withText) {
    anchor.textContent = link.text;
  }
  return anchor;
}
