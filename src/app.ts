import express, { Express } from 'express';
import cors from 'cors';
import { ServiceConfig } from './config';
import { errorHandler } from './middleware/errorHandler';
import { createConvertRouter } from './routes/convert';
import { createHealthRouter } from './routes/health';
import { createUrlToMarkdownRouter } from './routes/urlToMarkdown';
import { ConversionOrchestrator } from './services/ConversionOrchestrator';

export interface AppDeps {
  config: Readonly<ServiceConfig>;
  orchestrator: ConversionOrchestrator;
}

export function createApp({ config, orchestrator }: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: config.jsonBodyLimit })); // Allow large HTML payloads

  // Routes
  app.use('/', createHealthRouter(config.serviceName));
  app.use('/', createConvertRouter(orchestrator, config));
  app.use('/', createUrlToMarkdownRouter(orchestrator));

  app.use(errorHandler);

  return app;
}
