import { REFERENCE_CLASS } from './link-renderer.js';
import { ReferenceType, RenderedReference } from './types.js';

function readId(element: Element, attribute: string): number | null {
  const raw = element.getAttribute(`data-${attribute}`);
  if (raw === null || !/^\d+$/.test(raw)) return null;
  return parseInt(raw, 10);
}

/**
 * Recover the reference a rendered link stands for, if it is one of `types`
 */
export function referencedBy(element: Element, types: ReferenceType[]): RenderedReference | null {
  if (!element.classList.contains(REFERENCE_CLASS)) return null;

  const projectId = readId(element, 'project');
  if (projectId === null) return null;

  for (const type of types) {
    const objectId = readId(element, type.dataAttribute);
    if (objectId !== null) {
      return {
        type: type.name,
        projectId,
        objectId,
        original: element.getAttribute('data-original') ?? ''
      };
    }
  }
  return null;
}

/**
 * All rendered references under `root`, in document order
 */
export function extractReferences(root: Element, types: ReferenceType[]): RenderedReference[] {
  const references: RenderedReference[] = [];
  for (const element of Array.from(root.querySelectorAll(`a.${REFERENCE_CLASS}`))) {
    const reference = referencedBy(element, types);
    if (reference) {
      references.push(reference);
    }
  }
  return references;
}
