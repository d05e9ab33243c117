import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { NullReferenceCache, ReferenceCache, RequestReferenceCache } from '../cache.js';
import { BadRequestError, NotFoundError } from '../errors.js';
import { LoadResult } from '../loader.js';
import { renderDocument, renderMarkdown } from '../renderer.js';
import { Project, ReferenceType } from '../types.js';

/**
 * Everything the API routes render against
 */
export interface ApiContext {
  data: LoadResult;
  types: ReferenceType[];
  /** Memoize lookups within each request (default: true) */
  requestCache?: boolean;
}

const renderBodySchema = z.object({
  markdown: z.string(),
  project: z.string().min(1).optional()
});

/**
 * Create API routes for rendering documents
 */
export function createApiRoutes(context: ApiContext): Router {
  const router = Router();
  const { data, types } = context;

  // One cache per request; never shared between requests
  const createCache = (): ReferenceCache =>
    context.requestCache === false ? new NullReferenceCache() : new RequestReferenceCache();

  const projectByPath = (projectPath: string): Project => {
    const project = data.store.projectByPath(projectPath);
    if (!project) {
      throw new NotFoundError(`Project not found: ${projectPath}`);
    }
    return project;
  };

  /**
   * Project override from ?project=, or the project the document declares
   */
  const ambientProject = (req: Request, documentId?: string): Project | undefined => {
    const { project } = req.query;
    if (typeof project === 'string' && project) {
      return projectByPath(project);
    }
    const declared = documentId ? data.documentProjects.get(documentId) : undefined;
    return declared ? data.store.projectByPath(declared) : undefined;
  };

  /**
   * GET /api/projects
   * List all projects
   */
  router.get('/projects', (_req: Request, res: Response) => {
    res.json(data.store.listProjects());
  });

  /**
   * GET /api/documents
   * List all loaded documents
   */
  router.get('/documents', (_req: Request, res: Response) => {
    res.json(Array.from(data.corpus.keys()));
  });

  /**
   * GET /api/document/:id
   * Get raw markdown content of a document
   */
  router.get('/document/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const content = data.corpus.get(id);

    if (content === undefined) {
      throw new NotFoundError(`Document not found: ${id}`);
    }

    res.type('text/markdown').send(content);
  });

  /**
   * GET /api/render/:id
   * Render a document as HTML
   * Query params: ?project=acme/app
   */
  router.get('/render/:id', (req: Request, res: Response) => {
    const { id } = req.params;

    const result = renderDocument(id, data.corpus, {
      types,
      project: ambientProject(req, id),
      cache: createCache()
    });

    if (!result) {
      throw new NotFoundError(`Document not found: ${id}`);
    }

    res.json(result);
  });

  /**
   * POST /api/render
   * Render markdown from the request body
   * Body: { "markdown": "see !42", "project": "acme/app" }
   */
  router.post('/render', (req: Request, res: Response) => {
    const body = renderBodySchema.safeParse(req.body);
    if (!body.success) {
      throw new BadRequestError('Body must be { markdown: string, project?: string }');
    }

    const { markdown, project } = body.data;
    const result = renderMarkdown(markdown, {
      types,
      project: project ? projectByPath(project) : undefined,
      cache: createCache()
    });

    res.json(result);
  });

  /**
   * GET /api/render-all
   * Render every document in one request, sharing one cache
   * Query params: ?project=acme/app
   */
  router.get('/render-all', (req: Request, res: Response) => {
    const cache = createCache();
    const documents = Array.from(data.corpus.entries()).map(([documentId, content]) => ({
      documentId,
      ...renderMarkdown(content, {
        types,
        project: ambientProject(req, documentId),
        cache
      })
    }));

    res.json(documents);
  });

  return router;
}
