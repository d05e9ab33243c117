import * as fs from 'node:fs';
import * as path from 'node:path';
import { StoreLoadError } from './errors.js';
import { ReferenceStore } from './store.js';

/**
 * Options for loading content files
 */
export interface LoadOptions {
  /** Directory to scan for .md files */
  contentDir: string;
  /** JSON file holding projects and referable objects */
  dataFile: string;
  /** Whether to include _*.md metadata files (default: false) */
  includeMetadata?: boolean;
}

/**
 * Result of loading all content files
 */
export interface LoadResult {
  /** Raw content of all documents, keyed by file name */
  corpus: Map<string, string>;
  /** Project path each document declares, keyed by file name */
  documentProjects: Map<string, string>;
  /** Projects and objects references resolve against */
  store: ReferenceStore;
  /** Any errors encountered during loading */
  errors: string[];
}

// First line of a document may name its project: <!-- project: acme/app -->
const PROJECT_HEADER_PATTERN = /^<!--\s*project:\s*(\S+)\s*-->/;

/**
 * Check if a filename is a metadata file (starts with _)
 */
function isMetadataFile(filename: string): boolean {
  return path.basename(filename).startsWith('_');
}

/**
 * Find all markdown files in a directory (non-recursive)
 */
function findMarkdownFiles(dir: string, includeMetadata: boolean, errors: string[]): string[] {
  const files: string[] = [];

  try {
    const entries = fs.readdirSync(dir, { withFileTypes: true });

    for (const entry of entries) {
      if (entry.isFile() && entry.name.endsWith('.md')) {
        if (includeMetadata || !isMetadataFile(entry.name)) {
          files.push(path.join(dir, entry.name));
        }
      }
    }
  } catch (err) {
    errors.push(`Cannot read content directory ${dir}: ${err}`);
  }

  return files.sort();
}

/**
 * Project path declared on the first line of a document, if any
 */
export function declaredProject(content: string): string | undefined {
  const firstLine = content.split(/\r?\n/, 1)[0] ?? '';
  return firstLine.match(PROJECT_HEADER_PATTERN)?.[1];
}

/**
 * Read and validate the store data file
 */
export function loadStore(dataFile: string): ReferenceStore {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(dataFile, 'utf-8'));
  } catch (err) {
    throw new StoreLoadError(`Failed to read ${dataFile}: ${err}`);
  }
  return ReferenceStore.fromJson(raw);
}

/**
 * Load the store and every markdown document in a directory
 */
export function loadContent(options: LoadOptions): LoadResult {
  const { contentDir, dataFile, includeMetadata = false } = options;

  const corpus = new Map<string, string>();
  const documentProjects = new Map<string, string>();
  const errors: string[] = [];

  const store = loadStore(dataFile);

  for (const filePath of findMarkdownFiles(contentDir, includeMetadata, errors)) {
    const documentId = path.basename(filePath);

    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      corpus.set(documentId, content);

      const projectPath = declaredProject(content);
      if (projectPath) {
        documentProjects.set(documentId, projectPath);
        if (!store.projectByPath(projectPath)) {
          errors.push(`${documentId}: unknown project ${projectPath}`);
        }
      }
    } catch (err) {
      errors.push(`Failed to read ${documentId}: ${err}`);
    }
  }

  return {
    corpus,
    documentProjects,
    store,
    errors
  };
}
