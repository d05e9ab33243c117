import express, { Application, ErrorRequestHandler } from 'express';
import morgan from 'morgan';
import { HttpError } from './errors.js';
import { LoadResult } from './loader.js';
import { createApiRoutes } from './routes/api.js';
import { ReferenceType } from './types.js';

/**
 * Options for the Express application
 */
export interface AppOptions {
  /** Reference types to link, applied in order */
  types: ReferenceType[];
  /** Memoize lookups within each request (default: true) */
  requestCache?: boolean;
  /** Log requests with morgan (default: true) */
  logRequests?: boolean;
}

const handleErrors: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof HttpError) {
    res.status(err.statusCode).json({ error: err.message });
    return;
  }
  // Store failures propagate out of the rewriter and end up here
  console.error('Unhandled error:', err);
  res.status(500).json({ error: 'Internal server error' });
};

/**
 * Create and configure the Express application
 */
export function createApp(data: LoadResult, options: AppOptions): Application {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '1mb' }));
  if (options.logRequests !== false) {
    app.use(morgan('dev'));
  }

  // API routes
  app.use('/api', createApiRoutes({
    data,
    types: options.types,
    requestCache: options.requestCache
  }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      documents: data.corpus.size,
      projects: data.store.projectCount
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(handleErrors);

  return app;
}
