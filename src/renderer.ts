import { Marked } from 'marked';
import { JSDOM } from 'jsdom';
import { ReferenceCache } from './cache.js';
import { extractReferences } from './references.js';
import { rewriteReferences } from './rewriter.js';
import { Project, ReferenceType, RenderedReference } from './types.js';

/**
 * Options for rendering markdown
 */
export interface RenderOptions {
  /** Reference types to link, applied in order */
  types: ReferenceType[];
  /** Project the document belongs to; references stay plain text without it */
  project?: Project;
  /** Request-scoped cache shared by every document rendered in one request */
  cache?: ReferenceCache;
  /** Disable reference linking (for testing or performance) */
  disableReferences?: boolean;
}

/**
 * Result of rendering markdown
 */
export interface RenderResult {
  /** The rendered HTML */
  html: string;
  /** References linked in the HTML, in document order */
  references: RenderedReference[];
}

/**
 * Create a configured marked instance
 */
function createMarkedInstance(): Marked {
  return new Marked({
    gfm: true,        // GitHub Flavored Markdown
    breaks: true,     // Convert \n to <br>
  });
}

const markedInstance = createMarkedInstance();

/**
 * Link references in an HTML fragment
 */
export function linkHtml(html: string, options: RenderOptions): RenderResult {
  if (!options.project || options.disableReferences) {
    return { html, references: [] };
  }

  const { document } = new JSDOM('<!DOCTYPE html><body></body>').window;
  const body = document.body;
  body.innerHTML = html;

  rewriteReferences(body, options.types, { project: options.project, cache: options.cache });

  return {
    html: body.innerHTML,
    references: extractReferences(body, options.types)
  };
}

/**
 * Render markdown to HTML with references linked
 */
export function renderMarkdown(markdown: string, options: RenderOptions): RenderResult {
  const html = markedInstance.parse(markdown) as string;
  return linkHtml(html, options);
}

/**
 * Render a single document by ID
 */
export function renderDocument(
  documentId: string,
  corpus: Map<string, string>,
  options: RenderOptions
): RenderResult | null {
  const content = corpus.get(documentId);

  if (content === undefined) {
    return null;
  }

  return renderMarkdown(content, options);
}
