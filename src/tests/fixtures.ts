import { JSDOM } from 'jsdom';
import { createReferenceTypes } from '../reference-types.js';
import { ReferenceStore, StoreData } from '../store.js';
import { Project, ReferenceType } from '../types.js';

export const HOST = 'https://git.test';

export const storeData: StoreData = {
  projects: [
    { id: 1, path: 'acme/app', name: 'App' },
    { id: 2, path: 'acme/docs', name: 'Docs' }
  ],
  issues: [
    { id: 110, iid: 10, projectId: 1, title: 'Crash on save' },
    { id: 105, iid: 5, projectId: 2, title: 'Docs typo' }
  ],
  mergeRequests: [
    { id: 420, iid: 42, projectId: 1, title: 'Fix login' },
    { id: 430, iid: 43, projectId: 1, title: 'Fix "quoted" & more' }
  ],
  snippets: [
    { id: 7, iid: 7, projectId: 1, title: 'Setup script' }
  ]
};

export function createStore(): ReferenceStore {
  return new ReferenceStore(storeData);
}

export function createTypes(store: ReferenceStore = createStore()): ReferenceType[] {
  return createReferenceTypes(store, { host: HOST });
}

export function typeNamed(types: ReferenceType[], name: string): ReferenceType {
  const type = types.find(t => t.name === name);
  if (!type) {
    throw new Error(`No reference type ${name}`);
  }
  return type;
}

export function project(store: ReferenceStore, path: string): Project {
  const found = store.projectByPath(path);
  if (!found) {
    throw new Error(`No project ${path}`);
  }
  return found;
}

/**
 * A fresh <body> holding `html`
 */
export function createBody(html: string): HTMLElement {
  const { document } = new JSDOM('<!DOCTYPE html><body></body>').window;
  document.body.innerHTML = html;
  return document.body;
}
