import * as test from 'node:test';
import * as assert from 'node:assert';
import request from 'supertest';
import { createApp } from '../app.js';
import { LoadResult } from '../loader.js';
import { ReferenceType } from '../types.js';
import { createStore, createTypes, typeNamed } from './fixtures.js';

const { describe, it, mock } = test;

function createTestData(): LoadResult {
  return {
    corpus: new Map([
      ['notes.md', '<!-- project: acme/app -->\nsee !42 and !42'],
      ['plain.md', 'also !42']
    ]),
    documentProjects: new Map([['notes.md', 'acme/app']]),
    store: createStore(),
    errors: []
  };
}

function createTestApp(types?: ReferenceType[], requestCache?: boolean) {
  const data = createTestData();
  return createApp(data, { types: types ?? createTypes(data.store), requestCache, logRequests: false });
}

describe('GET /health', () => {

  it('reports loaded content', async () => {
    const res = await request(createTestApp()).get('/health');

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, { status: 'ok', documents: 2, projects: 2 });
  });
});

describe('/api', () => {

  it('lists projects and documents', async () => {
    const app = createTestApp();

    const projects = await request(app).get('/api/projects');
    assert.deepStrictEqual(projects.body.map((p: { path: string }) => p.path), ['acme/app', 'acme/docs']);

    const documents = await request(app).get('/api/documents');
    assert.deepStrictEqual(documents.body, ['notes.md', 'plain.md']);
  });

  it('returns raw markdown', async () => {
    const res = await request(createTestApp()).get('/api/document/plain.md');

    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.text, 'also !42');
  });

  it('returns 404 for unknown documents', async () => {
    const res = await request(createTestApp()).get('/api/document/missing.md');

    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(res.body, { error: 'Document not found: missing.md' });
  });

  it('renders a document in its declared project', async () => {
    const res = await request(createTestApp()).get('/api/render/notes.md');

    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.body.references.length, 2);
    assert.strictEqual(res.body.references[0].objectId, 420);
  });

  it('leaves references plain in documents without a project', async () => {
    const res = await request(createTestApp()).get('/api/render/plain.md');

    assert.strictEqual(res.body.html, '<p>also !42</p>\n');
    assert.deepStrictEqual(res.body.references, []);
  });

  it('renders with a project override', async () => {
    const res = await request(createTestApp()).get('/api/render/plain.md?project=acme/app');

    assert.strictEqual(res.body.references.length, 1);
  });

  it('returns 404 for an unknown override project', async () => {
    const res = await request(createTestApp()).get('/api/render/plain.md?project=acme/nope');

    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(res.body, { error: 'Project not found: acme/nope' });
  });

  it('renders posted markdown', async () => {
    const res = await request(createTestApp())
      .post('/api/render')
      .send({ markdown: 'see acme/docs#5', project: 'acme/app' });

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body.references, [
      { type: 'issue', projectId: 2, objectId: 105, original: 'acme/docs#5' }
    ]);
  });

  it('rejects invalid render requests', async () => {
    const res = await request(createTestApp()).post('/api/render').send({ text: 'see !42' });

    assert.strictEqual(res.status, 400);
  });

  it('shares one cache across documents rendered in a request', async () => {
    const types = createTypes();
    const mergeRequestType = typeNamed(types, 'merge_request');
    const lookupObject = mock.fn(mergeRequestType.lookupObject);

    const res = await request(createTestApp([{ ...mergeRequestType, lookupObject }]))
      .get('/api/render-all?project=acme/app');

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body.map((d: { documentId: string }) => d.documentId), ['notes.md', 'plain.md']);
    assert.strictEqual(lookupObject.mock.callCount(), 1);
  });

  it('does not share the cache between requests', async () => {
    const types = createTypes();
    const mergeRequestType = typeNamed(types, 'merge_request');
    const lookupObject = mock.fn(mergeRequestType.lookupObject);
    const app = createTestApp([{ ...mergeRequestType, lookupObject }]);

    await request(app).get('/api/render/notes.md');
    await request(app).get('/api/render/notes.md');

    assert.strictEqual(lookupObject.mock.callCount(), 2);
  });

  it('looks up every occurrence when request caching is off', async () => {
    const types = createTypes();
    const mergeRequestType = typeNamed(types, 'merge_request');
    const lookupObject = mock.fn(mergeRequestType.lookupObject);

    await request(createTestApp([{ ...mergeRequestType, lookupObject }], false)).get('/api/render/notes.md');

    assert.strictEqual(lookupObject.mock.callCount(), 2);
  });

  it('returns 500 when the store fails', async () => {
    const types = createTypes();
    const failing = {
      ...typeNamed(types, 'merge_request'),
      lookupObject: () => {
        throw new Error('store unavailable');
      }
    };
    // Keep the expected error out of the test output
    const consoleError = mock.method(console, 'error', () => undefined);

    const res = await request(createTestApp([failing])).get('/api/render/notes.md');

    consoleError.mock.restore();
    assert.strictEqual(res.status, 500);
    assert.deepStrictEqual(res.body, { error: 'Internal server error' });
    assert.strictEqual(consoleError.mock.callCount(), 1);
  });

  it('returns 404 for unknown routes', async () => {
    const res = await request(createTestApp()).get('/api/nothing');

    assert.strictEqual(res.status, 404);
  });
});
