import { NullReferenceCache, ReferenceCache } from './cache.js';
import { createLinkElement, LinkContext, REFERENCE_CLASS, renderLink } from './link-renderer.js';
import { findMatches, matchesPrefix, matchesWhole } from './patterns.js';
import { resolveReference } from './resolver.js';
import { Project, ReferenceType } from './types.js';

/**
 * Options for rewriting references in a document
 */
export interface RewriteOptions {
  /** Project of the document; without one nothing is rewritten */
  project?: Project;
  /** Request-scoped cache; lookups are not memoized when omitted */
  cache?: ReferenceCache;
}

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

/** Content under these is never turned into references, links included */
const IGNORED_PARENTS = 'a, code, pre, style, script, textarea, noscript, template, title, .no-references';

interface RewriteContext extends LinkContext {
  document: Document;
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE;
}

function isIgnored(node: Node): boolean {
  return node.parentElement?.closest(IGNORED_PARENTS) != null;
}

/**
 * Text nodes and anchors under `root`, in document order
 */
function collectNodes(root: Node, into: Array<Text | Element> = []): Array<Text | Element> {
  for (const child of Array.from(root.childNodes)) {
    if (isText(child)) {
      into.push(child);
    } else if (isElement(child)) {
      if (child.localName === 'a') {
        into.push(child);
      }
      collectNodes(child, into);
    }
  }
  return into;
}

function isEligibleLink(element: Element): boolean {
  return element.localName === 'a'
    && (element.getAttribute('href') ?? '') !== ''
    && !element.classList.contains(REFERENCE_CLASS)
    && element.querySelector('img') === null
    && !isIgnored(element);
}

function decodeHref(href: string): string {
  try {
    return decodeURIComponent(href);
  } catch {
    // Malformed escapes are matched as written
    return href;
  }
}

/**
 * Replace every resolvable match of `pattern` in `text` with a rendered link.
 * Returns the replacement nodes, or null when nothing resolved.
 */
function substitute(
  text: string,
  pattern: RegExp,
  type: ReferenceType,
  context: RewriteContext
): Node[] | null {
  const { document } = context;
  const nodes: Node[] = [];
  let cursor = 0;

  for (const match of findMatches(text, pattern, type.idGroup)) {
    const resolved = resolveReference(match, type, context.ambientProject, context.cache);
    if (!resolved) continue;

    if (match.index > cursor) {
      nodes.push(document.createTextNode(text.slice(cursor, match.index)));
    }
    nodes.push(createLinkElement(document, renderLink(resolved, match, type, context)));
    cursor = match.end;
  }

  if (nodes.length === 0) return null;

  if (cursor < text.length) {
    nodes.push(document.createTextNode(text.slice(cursor)));
  }
  return nodes;
}

/**
 * Point a link element at the referenced object, keeping what it displays.
 */
function replaceHref(
  element: Element,
  href: string,
  pattern: RegExp,
  type: ReferenceType,
  context: RewriteContext
): void {
  const [match] = findMatches(href, pattern, type.idGroup);
  if (!match) return;

  const resolved = resolveReference(match, type, context.ambientProject, context.cache);
  if (!resolved) return;

  const text = element.textContent ?? '';
  const anchor = createLinkElement(context.document, renderLink(resolved, match, type, context, text), false);
  anchor.append(...Array.from(element.childNodes));
  element.replaceWith(anchor);
}

function rewriteText(node: Text, type: ReferenceType, context: RewriteContext): void {
  if (!type.shortPattern || isIgnored(node)) return;

  const nodes = substitute(node.data, type.shortPattern, type, context);
  if (nodes) {
    node.replaceWith(...nodes);
  }
}

function rewriteLink(element: Element, type: ReferenceType, context: RewriteContext): void {
  if (!isEligibleLink(element)) return;

  const href = decodeHref(element.getAttribute('href') ?? '');
  const text = element.textContent ?? '';
  const { shortPattern, linkPattern } = type;

  if (shortPattern && matchesWhole(href, shortPattern)) {
    replaceHref(element, href, shortPattern, type, context);
    return;
  }

  if (!linkPattern) return;

  // A pasted URL shown as itself gets the friendlier reference text
  if (href === text && matchesPrefix(text, linkPattern)) {
    const nodes = substitute(text, linkPattern, type, context);
    if (nodes) {
      element.replaceWith(...nodes);
    }
    return;
  }

  if (matchesWhole(href, linkPattern)) {
    replaceHref(element, href, linkPattern, type, context);
  }
}

/**
 * Rewrite references of one type under `root`, in place.
 *
 * Nodes are collected before anything is replaced, so markup produced by
 * this pass is never scanned again.
 */
export function rewriteDocument(root: Element, type: ReferenceType, options: RewriteOptions = {}): Element {
  if (!options.project) {
    return root;
  }

  const context: RewriteContext = {
    document: root.ownerDocument,
    ambientProject: options.project,
    cache: options.cache ?? new NullReferenceCache()
  };

  for (const node of collectNodes(root)) {
    if (isText(node)) {
      rewriteText(node, type, context);
    } else {
      rewriteLink(node, type, context);
    }
  }

  return root;
}

/**
 * Rewrite references of every given type, one pass per type, in order.
 * All passes share the same cache.
 */
export function rewriteReferences(root: Element, types: ReferenceType[], options: RewriteOptions = {}): Element {
  if (!options.project) {
    return root;
  }

  const cache = options.cache ?? new NullReferenceCache();
  for (const type of types) {
    rewriteDocument(root, type, { project: options.project, cache });
  }
  return root;
}
