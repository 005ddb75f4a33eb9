/**
 * Conversion orchestrator
 *
 * One request runs received → validated → resource-acquired → converted →
 * post-processed → succeeded, or drops to failed from any stage. Temp files
 * live in a TempScope that is closed after the last stage whatever happened.
 */
import {
  ConversionError,
  ConversionStage,
  ErrorCode,
  ExternalToolError,
  FetchError,
  OversizeError,
  ValidationError,
  errorMessage
} from '../errors';
import {
  ConversionRequest,
  ConversionResult,
  HtmlConversionRequest,
  OUTPUT_FORMATS,
  OutputFormat,
  PdfResult,
  UploadConversionRequest,
  UrlConversionRequest,
  isOutputFormat
} from '../types';
import { ServiceConfig } from '../config';
import { createLogger } from '../utils/logger';
import { normalizeMarkdown } from '../utils/markdown';
import { BoundedFetcher } from './BoundedFetcher';
import { DocumentService, StructuredDocumentConverter } from './DocumentService';
import { HtmlRenderer, PdfRenderer } from './PdfRenderer';
import { TempFileStore } from './TempFileStore';

const logger = createLogger('ORCHESTRATOR');

const MIB = 1024 * 1024;

export type OrchestratorLimits = Pick<
  ServiceConfig,
  'maxHtmlBytes' | 'maxUploadBytes' | 'defaultUrlMaxMb' | 'defaultUrlTimeoutSeconds'
>;

export interface OrchestratorDeps {
  renderer: HtmlRenderer;
  documents: Pick<DocumentService, 'convertFile'>;
  fetcher: Pick<BoundedFetcher, 'fetch' | 'saveUpload'>;
  store: TempFileStore;
  limits: OrchestratorLimits;
}

/**
 * Stage tracker for a single request
 */
class ConversionRun {
  private current: ConversionStage = 'received';
  private readonly startTime = Date.now();

  constructor(readonly kind: ConversionRequest['kind']) {
    logger.debug(`${kind}: received`);
  }

  advance(stage: ConversionStage): void {
    this.current = stage;
    logger.debug(`${this.kind}: ${stage}`, { elapsedMs: Date.now() - this.startTime });
  }

  /**
   * Validation errors pass through untouched; everything else becomes a
   * ConversionError tagged with the stage that failed.
   */
  fail(error: unknown): Error {
    const failedAt = this.current;
    this.current = 'failed';
    logger.warn(`${this.kind}: failed during ${failedAt}`, { error: errorMessage(error) });

    if (error instanceof ValidationError || error instanceof ConversionError) return error;
    return new ConversionError(errorMessage(error), failedAt, error, codeFor(error));
  }
}

function codeFor(error: unknown): ErrorCode {
  if (error instanceof FetchError) return 'FETCH_FAILED';
  if (error instanceof OversizeError) return 'PAYLOAD_TOO_LARGE';
  if (error instanceof ExternalToolError && error.tool === 'wkhtmltopdf') return 'RENDERING_FAILED';
  return 'CONVERSION_FAILED';
}

export class ConversionOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  /**
   * Dispatch a request by its source kind
   */
  async execute(request: ConversionRequest): Promise<ConversionResult | PdfResult> {
    switch (request.kind) {
      case 'html':
        return this.htmlToPdf(request);
      case 'url':
        return this.urlToMarkdown(request);
      case 'upload':
        return this.convertUpload(request);
    }
  }

  async htmlToPdf(request: HtmlConversionRequest): Promise<PdfResult> {
    const run = new ConversionRun('html');
    try {
      this.validateHtml(request.html);
      run.advance('validated');

      // Markup is piped to the renderer, no temp file involved
      run.advance('resource-acquired');
      const pdf = await this.deps.renderer.render(request.html);
      run.advance('converted');

      run.advance('post-processed');
      run.advance('succeeded');
      return { pdf, fileSize: pdf.length };
    } catch (error) {
      throw run.fail(error);
    }
  }

  async urlToMarkdown(request: UrlConversionRequest): Promise<ConversionResult> {
    const run = new ConversionRun('url');
    try {
      const { url, maxBytes, timeoutSeconds } = this.validateUrlRequest(request);
      run.advance('validated');

      return await this.deps.store.withScope(async scope => {
        const fetched = await this.deps.fetcher.fetch(url, scope, { maxBytes, timeoutSeconds });
        run.advance('resource-acquired');

        const markdown = await this.deps.documents.convertFile(fetched.resource.path, 'markdown');
        run.advance('converted');

        const content = normalizeMarkdown(markdown);
        run.advance('post-processed');

        run.advance('succeeded');
        return { format: 'markdown' as const, content };
      });
    } catch (error) {
      throw run.fail(error);
    }
  }

  async convertUpload(request: UploadConversionRequest): Promise<ConversionResult> {
    const run = new ConversionRun('upload');
    try {
      const format = this.validateUpload(request);
      run.advance('validated');

      return await this.deps.store.withScope(async scope => {
        const resource = await this.deps.fetcher.saveUpload(request.bytes, request.filename, scope);
        run.advance('resource-acquired');

        const content = await this.deps.documents.convertFile(resource.path, format);
        run.advance('converted');

        run.advance('post-processed');
        run.advance('succeeded');
        return { format, content };
      });
    } catch (error) {
      throw run.fail(error);
    }
  }

  private validateHtml(html: unknown): void {
    if (typeof html !== 'string' || html.trim().length === 0) {
      throw new ValidationError('Missing or invalid HTML content');
    }
    const size = Buffer.byteLength(html, 'utf8');
    if (size > this.deps.limits.maxHtmlBytes) {
      throw new ValidationError(
        `HTML content too large: ${(size / MIB).toFixed(2)}MB (max ${(this.deps.limits.maxHtmlBytes / MIB).toFixed(0)}MB)`,
        'PAYLOAD_TOO_LARGE',
        413
      );
    }
  }

  private validateUrlRequest(request: UrlConversionRequest): { url: string; maxBytes: number; timeoutSeconds: number } {
    if (typeof request.url !== 'string' || request.url.trim().length === 0) {
      throw new ValidationError('Missing url');
    }
    const url = request.url.trim();
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new ValidationError(`Invalid URL: ${url}`);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ValidationError(`Only http and https URLs are supported: ${url}`);
    }

    const maxMb = request.maxMb ?? this.deps.limits.defaultUrlMaxMb;
    if (!Number.isInteger(maxMb) || maxMb <= 0) {
      throw new ValidationError('maxMb must be a positive integer');
    }
    const timeoutSeconds = request.timeoutSeconds ?? this.deps.limits.defaultUrlTimeoutSeconds;
    if (!Number.isInteger(timeoutSeconds) || timeoutSeconds <= 0) {
      throw new ValidationError('timeoutSeconds must be a positive integer');
    }

    return { url, maxBytes: maxMb * MIB, timeoutSeconds };
  }

  private validateUpload(request: UploadConversionRequest): OutputFormat {
    if (!request.filename || !request.filename.trim()) {
      throw new ValidationError('Missing filename');
    }
    if (request.bytes.length > this.deps.limits.maxUploadBytes) {
      throw new ValidationError(
        `File too large: ${request.bytes.length} bytes (max ${this.deps.limits.maxUploadBytes})`,
        'PAYLOAD_TOO_LARGE',
        413
      );
    }
    if (!isOutputFormat(request.outputFormat)) {
      throw new ValidationError(
        `Unsupported output format: ${request.outputFormat} (expected one of ${OUTPUT_FORMATS.join(', ')})`,
        'UNSUPPORTED_FORMAT'
      );
    }
    return request.outputFormat;
  }
}

/**
 * Wire the orchestrator with the real external tools, letting callers swap any of them
 */
export function createOrchestrator(
  config: ServiceConfig,
  overrides: Partial<OrchestratorDeps> = {}
): ConversionOrchestrator {
  return new ConversionOrchestrator({
    renderer:
      overrides.renderer ||
      new PdfRenderer({ binaryPath: config.wkhtmltopdfPath, timeoutMs: config.renderTimeoutMs }),
    documents:
      overrides.documents ||
      new DocumentService(
        new StructuredDocumentConverter({ maxFileSizeBytes: config.maxDocumentBytes, maxPages: config.maxPages })
      ),
    fetcher: overrides.fetcher || new BoundedFetcher({ connectTimeoutSeconds: config.connectTimeoutSeconds }),
    store: overrides.store || new TempFileStore({ baseDir: config.tmpDir, prefix: config.tmpPrefix }),
    limits: overrides.limits || config
  });
}
