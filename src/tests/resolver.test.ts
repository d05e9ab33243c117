import * as test from 'node:test';
import * as assert from 'node:assert';
import { RequestReferenceCache, NullReferenceCache } from '../cache.js';
import { findMatches } from '../patterns.js';
import { resolveReference } from '../resolver.js';
import { ReferenceMatch, ReferenceType } from '../types.js';
import { createStore, createTypes, project, typeNamed } from './fixtures.js';

const { describe, it, mock } = test;

function firstMatch(text: string, type: ReferenceType): ReferenceMatch {
  if (!type.shortPattern) {
    throw new Error(`${type.name} has no short pattern`);
  }
  const [match] = findMatches(text, type.shortPattern, type.idGroup);
  if (!match) {
    throw new Error(`No match in ${text}`);
  }
  return match;
}

describe('resolveReference', () => {
  const store = createStore();
  const app = project(store, 'acme/app');
  const issueType = typeNamed(createTypes(store), 'issue');

  it('should resolve a reference in the ambient project without a project lookup', () => {
    const lookupProjectByToken = mock.fn(issueType.lookupProjectByToken);
    const type = { ...issueType, lookupProjectByToken };

    const resolved = resolveReference(firstMatch('#10', type), type, app, new NullReferenceCache());

    assert.strictEqual(resolved?.project.id, 1);
    assert.strictEqual(resolved?.object.id, 110);
    assert.strictEqual(lookupProjectByToken.mock.callCount(), 0);
  });

  it('should resolve a reference into a foreign project', () => {
    const resolved = resolveReference(firstMatch('acme/docs#5', issueType), issueType, app, new NullReferenceCache());

    assert.strictEqual(resolved?.project.path, 'acme/docs');
    assert.strictEqual(resolved?.object.title, 'Docs typo');
  });

  it('should return null for an unknown project without looking up the object', () => {
    const lookupObject = mock.fn(issueType.lookupObject);
    const type = { ...issueType, lookupObject };

    const resolved = resolveReference(firstMatch('acme/nope#5', type), type, app, new NullReferenceCache());

    assert.strictEqual(resolved, null);
    assert.strictEqual(lookupObject.mock.callCount(), 0);
  });

  it('should return null for an unknown object', () => {
    assert.strictEqual(resolveReference(firstMatch('#99', issueType), issueType, app, new NullReferenceCache()), null);
  });

  it('should go through the cache for projects and objects', () => {
    const lookupProjectByToken = mock.fn(issueType.lookupProjectByToken);
    const lookupObject = mock.fn(issueType.lookupObject);
    const type = { ...issueType, lookupProjectByToken, lookupObject };
    const cache = new RequestReferenceCache();

    for (let i = 0; i < 3; i++) {
      resolveReference(firstMatch('acme/docs#5', type), type, app, cache);
    }

    assert.strictEqual(lookupProjectByToken.mock.callCount(), 1);
    assert.strictEqual(lookupObject.mock.callCount(), 1);
  });

  it('should let store errors propagate', () => {
    const type = {
      ...issueType,
      lookupObject: () => {
        throw new Error('store unavailable');
      }
    };

    assert.throws(
      () => resolveReference(firstMatch('#10', type), type, app, new NullReferenceCache()),
      /store unavailable/
    );
  });
});
