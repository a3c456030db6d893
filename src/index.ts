import { createServer } from 'http';

import express from 'express';
import cors from 'cors';

import { config } from './config/index.js';
import { authenticate } from './middleware/auth.js';
import { rateLimiter } from './middleware/rateLimit.js';
import buildRoutes from './api/routes.js';
import { registry } from './metrics/index.js';
import { loadEngineConfig } from './bootstrap/engineConfig.js';
import { buildEngine } from './bootstrap/buildEngine.js';
import { EngineLogger } from './services/EngineLogger.js';
import { FeedRefresher } from './services/FeedRefresher.js';
import { createAppLogger } from './utils/logger.js';

const logger = createAppLogger();

const engineFile = loadEngineConfig(config.engineConfigPath);
const service = buildEngine(engineFile, { logger: new EngineLogger(logger) });
const { engine } = service;

const feedRefresher = new FeedRefresher({
  feeds: service.aggregatorFeeds,
  intervalMs: config.feedRefreshIntervalMs,
  logger
});

const app = express();
app.use(cors());
app.use(express.json());
app.use(rateLimiter);

// Metrics endpoint (no auth required for Prometheus scraping)
app.get('/metrics', async (_req, res) => {
  try {
    res.set('Content-Type', registry.contentType);
    res.end(await registry.metrics());
  } catch (err) {
    res.status(500).end(err instanceof Error ? err.message : String(err));
  }
});

// Unauthenticated liveness probe
app.get('/health', (_req, res) => {
  res.json({
    status: 'ok',
    collateral: engine.collateralTokens().length,
    aggregatorFeeds: service.aggregatorFeeds.length,
    feedRefresher: feedRefresher.running ? 'running' : 'idle'
  });
});

app.use('/api/v1', authenticate, buildRoutes(service));

const httpServer = createServer(app);

// Graceful shutdown handling
const shutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down...`);
  feedRefresher.stop();
  httpServer.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });
};
['SIGINT', 'SIGTERM'].forEach((sig) => process.on(sig, () => shutdown(sig)));

const start = async () => {
  if (service.aggregatorFeeds.length > 0) {
    const summary = await feedRefresher.refreshAll();
    logger.info(`[feed] initial refresh: ${summary.refreshed} ok, ${summary.failed} failed`);
    feedRefresher.start();
  }

  httpServer.listen(config.port, () => {
    logger.info(`Synthetic USD engine listening on port ${config.port}`);
    logger.info(
      `[engine] synthetic=${engine.syntheticToken().id} collateral=[${engine.collateralTokens().join(',')}] ` +
      `account=${engine.engineAccount} staleTimeoutSec=${engine.staleTimeoutSec}`
    );
  });
};

start().catch((err) => {
  logger.error('Failed to start', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
