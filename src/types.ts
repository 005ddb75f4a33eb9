export const OUTPUT_FORMATS = ['markdown', 'text', 'html', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some(format => format === value);
}

export interface HtmlConversionRequest {
  html: string;
}

export interface UrlConversionRequest {
  url: string;
  /** Download cap in MiB; the service default applies when absent */
  maxMb?: number;
  timeoutSeconds?: number;
}

export interface UploadConversionRequest {
  bytes: Buffer;
  filename: string;
  /** Checked against OUTPUT_FORMATS before any conversion work */
  outputFormat: string;
}

/**
 * Exactly one source kind per request
 */
export type ConversionRequest =
  | ({ kind: 'html' } & HtmlConversionRequest)
  | ({ kind: 'url' } & UrlConversionRequest)
  | ({ kind: 'upload' } & UploadConversionRequest);

export interface ConversionResult {
  format: OutputFormat;
  content: string;
}

export interface PdfResult {
  pdf: Buffer;
  fileSize: number;
}

export interface UrlToMarkdownResponse {
  url: string;
  markdown: string;
}

export interface HealthResponse {
  status: 'ok';
  service: string;
  timestamp: string;
}

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
  };
}
