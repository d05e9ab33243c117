import { createApp } from './app.js';
import {
  getContentDir,
  getDataFile,
  getHost,
  getServerPort,
  isRequestCacheEnabled,
  loadConfig
} from './config.js';
import { loadContent } from './loader.js';
import { createReferenceTypes } from './reference-types.js';

/**
 * Start the server
 */
async function bootstrap() {
  await loadConfig();

  const contentDir = getContentDir();
  console.log(`Loading content from: ${contentDir}`);
  const data = loadContent({ contentDir, dataFile: getDataFile() });

  console.log(`Loaded ${data.corpus.size} documents, ${data.store.projectCount} projects`);

  if (data.errors.length > 0) {
    console.warn('Warnings:', data.errors);
  }

  const types = createReferenceTypes(data.store, { host: getHost() });
  const app = createApp(data, { types, requestCache: isRequestCacheEnabled() });

  const port = getServerPort();
  const server = app.listen(port, () => {
    console.log(`Reflinkr API listening on http://localhost:${port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000);
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch(err => {
  console.error('Failed to start:', err);
  process.exit(1);
});
