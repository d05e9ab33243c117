import { ReferenceMatch } from './types.js';

/**
 * Escape special regex characters in a string
 */
export function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Derived patterns are compiled once per source pattern
const globalPatterns = new WeakMap<RegExp, RegExp>();
const wholePatterns = new WeakMap<RegExp, RegExp>();
const prefixPatterns = new WeakMap<RegExp, RegExp>();

function withoutStickyFlags(pattern: RegExp): string {
  return pattern.flags.replace(/[gy]/g, '');
}

function derive(
  cache: WeakMap<RegExp, RegExp>,
  pattern: RegExp,
  build: (pattern: RegExp) => RegExp
): RegExp {
  let derived = cache.get(pattern);
  if (!derived) {
    derived = build(pattern);
    cache.set(pattern, derived);
  }
  return derived;
}

function globalPattern(pattern: RegExp): RegExp {
  return derive(globalPatterns, pattern, p => new RegExp(p.source, withoutStickyFlags(p) + 'g'));
}

function toMatch(match: RegExpMatchArray, idGroup: string): ReferenceMatch | null {
  const groups: Record<string, string> = {};
  for (const [name, value] of Object.entries(match.groups ?? {})) {
    // Groups that did not participate come back undefined
    if (typeof value === 'string') {
      groups[name] = value;
    }
  }

  const rawId = groups[idGroup];
  if (rawId === undefined) return null;
  const id = parseInt(rawId, 10);
  // Ids past 2^53 would round to a different object
  if (!Number.isSafeInteger(id)) return null;

  const index = match.index ?? 0;
  return {
    text: match[0],
    index,
    end: index + match[0].length,
    id,
    projectToken: groups['project'],
    anchor: groups['anchor'],
    url: groups['url'],
    groups
  };
}

function* scan(text: string, pattern: RegExp, idGroup: string): Generator<ReferenceMatch> {
  for (const match of text.matchAll(globalPattern(pattern))) {
    const result = toMatch(match, idGroup);
    if (result) {
      yield result;
    }
  }
}

/**
 * Find every non-overlapping occurrence of `pattern` in `text`, left to right.
 *
 * The returned sequence is lazy and can be iterated more than once; each
 * iteration rescans `text` from the start.
 */
export function findMatches(text: string, pattern: RegExp, idGroup: string): Iterable<ReferenceMatch> {
  return {
    [Symbol.iterator]: () => scan(text, pattern, idGroup)
  };
}

/**
 * True when `pattern` matches the whole of `text`, end to end
 */
export function matchesWhole(text: string, pattern: RegExp): boolean {
  const whole = derive(wholePatterns, pattern, p => new RegExp(`^(?:${p.source})$`, withoutStickyFlags(p)));
  return whole.test(text);
}

/**
 * True when `pattern` matches at the very start of `text`
 */
export function matchesPrefix(text: string, pattern: RegExp): boolean {
  const prefix = derive(prefixPatterns, pattern, p => new RegExp(`^(?:${p.source})`, withoutStickyFlags(p)));
  return prefix.test(text);
}
