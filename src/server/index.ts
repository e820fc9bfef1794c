// =============================================================================
// Server Entry — load config, build the context, listen
// =============================================================================
import { loadConfig, missingExchangeSettings } from './config';
import { createApp } from './app';
import { createContext } from './context';
import logger from './utils/logger';

const config = loadConfig();

const missing = missingExchangeSettings(config);
if (missing.length) {
  logger.warn('Atlassian OAuth is not fully configured; login will fail until these are set', {
    missing,
  });
}

const app = createApp(createContext(config));

const server = app.listen(config.port, () => {
  logger.info(`${config.appName} listening on port ${config.port} [${config.appEnv}]`);
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info(`${signal} received, closing server`);
  server.close((err) => {
    if (err) {
      logger.error('Error while closing server', { error: err.message });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
