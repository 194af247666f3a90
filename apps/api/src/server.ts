import { serve } from '@hono/node-server';
import { createApp } from './index';
import { loadConfig } from './services/config';
import { createLogger } from './services/logger';
import { createDefaultPipeline } from './services/research-query';

const config = loadConfig();
const log = createLogger('Server', config.logging.level);
const pipeline = createDefaultPipeline(config, log);
const app = createApp({ runQuery: pipeline.run, logger: log });

const port = Number(process.env.PORT) || 4000;

log.info(`Starting server on port ${port}...`);

const server = serve({ fetch: app.fetch, port }, (info) => {
  log.info(`Server running at http://localhost:${info.port}`);
});

function shutdown(signal: string) {
  log.info(`${signal} received, shutting down`);
  server.close(() => {
    pipeline
      .close()
      .catch((error: unknown) => {
        log.error(`Failed to close database pool: ${error instanceof Error ? error.message : String(error)}`);
      })
      .finally(() => process.exit(0));
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
