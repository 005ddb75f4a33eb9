import { Router, Request, Response } from 'express';
import multer from 'multer';
import { ServiceConfig } from '../config';
import { ValidationError } from '../errors';
import { sendError } from '../middleware/errorHandler';
import { ConversionOrchestrator } from '../services/ConversionOrchestrator';
import { OutputFormat } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('CONVERT');

const CONTENT_TYPES: Record<OutputFormat, string> = {
  markdown: 'text/plain; charset=utf-8',
  text: 'text/plain; charset=utf-8',
  html: 'text/html; charset=utf-8',
  json: 'application/json; charset=utf-8'
};

function formatKb(bytes: number): string {
  return `${(bytes / 1024).toFixed(2)}KB`;
}

export function createConvertRouter(
  orchestrator: ConversionOrchestrator,
  config: Pick<ServiceConfig, 'maxUploadBytes'>
): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxUploadBytes, files: 1 }
  });

  /**
   * POST /html-to-pdf
   * Render an HTML document to PDF
   */
  router.post('/html-to-pdf', async (req: Request, res: Response) => {
    const startTime = Date.now();

    try {
      const html: unknown = req.body?.html;
      if (typeof html !== 'string') {
        throw new ValidationError('Missing or invalid HTML content');
      }

      logger.info('Starting PDF conversion', { htmlSize: formatKb(Buffer.byteLength(html, 'utf8')) });

      const result = await orchestrator.htmlToPdf({ html });

      logger.info('PDF conversion successful', {
        fileSize: formatKb(result.fileSize),
        processingTime: `${Date.now() - startTime}ms`
      });

      res
        .status(200)
        .set({
          'Content-Type': 'application/pdf',
          'Content-Disposition': 'attachment; filename="document.pdf"',
          'Content-Length': String(result.fileSize)
        })
        .end(result.pdf);
    } catch (error) {
      sendError(res, error, { conversionStatus: 500 });
    }
  });

  /**
   * POST /convert
   * Convert an uploaded document (multipart field "file") to markdown, text, html or json
   */
  router.post('/convert', upload.single('file'), async (req: Request, res: Response) => {
    const startTime = Date.now();

    try {
      if (!req.file) {
        throw new ValidationError('No file uploaded (expected multipart field "file")');
      }

      const rawFormat: unknown =
        typeof req.query.outputFormat === 'string' ? req.query.outputFormat : req.body?.outputFormat;
      const outputFormat = rawFormat === undefined || rawFormat === '' ? 'markdown' : String(rawFormat);

      logger.info('Starting document conversion', {
        filename: req.file.originalname,
        fileSize: formatKb(req.file.size),
        outputFormat
      });

      const result = await orchestrator.convertUpload({
        bytes: req.file.buffer,
        filename: req.file.originalname,
        outputFormat
      });

      logger.info('Document conversion successful', {
        outputSize: formatKb(Buffer.byteLength(result.content, 'utf8')),
        processingTime: `${Date.now() - startTime}ms`
      });

      res.status(200).type(CONTENT_TYPES[result.format]).send(result.content);
    } catch (error) {
      sendError(res, error, { conversionStatus: 400 });
    }
  });

  return router;
}
