import './env_bootstrap.js';
import express from 'express';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { ConfigError } from './engine/errors.js';
import { logger } from './logger.js';
import { createWebhookRouter } from './webhook.js';

function buildServer(app: Awaited<ReturnType<typeof createApp>>) {
  const server = express();
  server.use(express.json());

  server.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });
  server.use(createWebhookRouter(app.router, app.config.verifyToken));
  return server;
}

async function main() {
  const config = loadConfig();
  const app = await createApp(config);
  if (!config.verifyToken) logger.warn('[env] WHATSAPP_VERIFY_TOKEN not set – webhook verification will be rejected.');

  const listener = buildServer(app).listen(config.port, () => {
    logger.info(`[server] listening on :${config.port} (engine: ${app.engine.name})`);
  });

  const shutdown = () => {
    logger.info('[server] shutting down');
    listener.close(() => app.close());
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(err => {
  if (err instanceof ConfigError) logger.error(err.message);
  else logger.error('[server] failed to start', err);
  process.exit(1);
});
