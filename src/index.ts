import { createApp } from './app';
import { loadConfig } from './config';
import { createOrchestrator } from './services/ConversionOrchestrator';
import { createLogger } from './utils/logger';

const logger = createLogger('SERVER');

const config = loadConfig();
const orchestrator = createOrchestrator(config);
const app = createApp({ config, orchestrator });

// Start server
const server = app.listen(config.port, () => {
  logger.info(`Document conversion service listening on port ${config.port}`);
  logger.info(`Environment: ${process.env.NODE_ENV || 'production'}`);
  logger.info(`Temp directory: ${config.tmpDir}`);
  logger.info('Available endpoints: /health, /html-to-pdf, /docling/url-to-markdown, /convert');
});

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('SIGTERM received, shutting down gracefully');
  server.close(() => process.exit(0));
});
