import { Router, Request, Response } from 'express';
import { sendError } from '../middleware/errorHandler';
import { ConversionOrchestrator } from '../services/ConversionOrchestrator';
import { UrlToMarkdownResponse } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('URL2MD');

/**
 * Numbers may arrive as JSON numbers or numeric strings; anything else is
 * passed on as NaN so validation rejects it.
 */
function optionalInt(value: unknown): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value.trim());
  return NaN;
}

export function createUrlToMarkdownRouter(orchestrator: ConversionOrchestrator): Router {
  const router = Router();

  /**
   * POST /docling/url-to-markdown
   * Download a remote PDF or HTML document and convert it to Markdown
   */
  router.post('/docling/url-to-markdown', async (req: Request, res: Response) => {
    const startTime = Date.now();

    try {
      const body: Record<string, unknown> = typeof req.body === 'object' && req.body !== null ? req.body : {};
      const url = typeof body.url === 'string' ? body.url : '';

      logger.info('Starting URL conversion', { url });

      const result = await orchestrator.urlToMarkdown({
        url,
        maxMb: optionalInt(body.maxMb ?? body.max_mb),
        timeoutSeconds: optionalInt(body.timeoutSeconds ?? body.timeout_s)
      });

      logger.info('URL conversion successful', {
        markdownSize: `${(Buffer.byteLength(result.content, 'utf8') / 1024).toFixed(2)}KB`,
        processingTime: `${Date.now() - startTime}ms`
      });

      const response: UrlToMarkdownResponse = { url, markdown: result.content };
      res.json(response);
    } catch (error) {
      sendError(res, error, { conversionStatus: 500 });
    }
  });

  return router;
}
