import { createServer } from 'http';

import { bootstrap } from './bootstrap.js';
import { config } from './config/index.js';
import { createAppLogger, retentionSpec } from './logging/logger.js';

const logger = createAppLogger({
  level: config.logLevel,
  fileEnabled: config.logFileEnabled,
  retentionHours: config.logFileRetentionHours
});

if (config.logFileEnabled) {
  logger.info(`[logger] File logging enabled: logs/platform-metrics-*.log (retention: ${retentionSpec(config.logFileRetentionHours)})`);
}

const { app } = bootstrap(config, logger);
const server = createServer(app);

server.listen(config.port, () => {
  logger.info(`Metrics server listening on port ${config.port}`, {
    commit: process.env.GIT_COMMIT_SHA || 'unknown',
    node: process.version
  });
});

function shutdown(signal: string): void {
  logger.info(`[shutdown] ${signal} received, closing metrics server`);
  server.close(err => {
    if (err) {
      logger.error('[shutdown] failed to close server', { error: err.message });
      process.exitCode = 1;
    }
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
