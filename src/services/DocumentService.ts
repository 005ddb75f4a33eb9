/**
 * Document conversion service
 *
 * Turns a file on disk into a StructuredDocument and exports it as Markdown,
 * plain text, HTML or JSON. The structure step sits behind DocumentConverter so
 * tests (and alternative engines) can stand in for the default one.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import mammoth from 'mammoth';
import { ExternalToolError, ValidationError, errorMessage } from '../errors';
import { OUTPUT_FORMATS, isOutputFormat } from '../types';
import { createLogger } from '../utils/logger';
import { SOURCE_MIMETYPES, SourceKind, StructuredDocument, paragraphsFromText } from './document/DocumentModel';
import { EXPORTERS } from './document/exporters';
import { parseHtml } from './document/htmlParser';
import { parsePdf } from './document/pdfParser';

const logger = createLogger('DOCUMENTS');

const TOOL_NAME = 'document-converter';

export interface DocumentConverter {
  convert(filePath: string): Promise<StructuredDocument>;
}

export interface ConversionLimits {
  maxFileSizeBytes: number;
  maxPages: number;
}

export const DEFAULT_LIMITS: ConversionLimits = {
  maxFileSizeBytes: 50 * 1024 * 1024,
  maxPages: 10000
};

const PDF_MAGIC = Buffer.from('%PDF-');
const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

/** Bytes inspected for markup; pages often open with a long head */
const HTML_SAMPLE_BYTES = 64 * 1024;

const LEADING_TAG = /^<(?:[a-z][a-z0-9-]*[\s/>]|!doctype|!--|\?xml)/;
const BLOCK_TAG = /<(?:p|div|h[1-6]|table|ul|ol|span|a|body|head|meta|title)[\s/>]/;

/**
 * Decide the parser from the bytes themselves; file names and suffixes are not trusted
 */
export function detectSourceKind(data: Buffer): SourceKind {
  if (data.subarray(0, 1024).indexOf(PDF_MAGIC) !== -1) return 'pdf';
  if (data.subarray(0, ZIP_MAGIC.length).equals(ZIP_MAGIC)) return 'docx';

  const text = data
    .subarray(0, HTML_SAMPLE_BYTES)
    .toString('utf8')
    .replace(/^\uFEFF/, '')
    .trimStart()
    .toLowerCase();
  if (LEADING_TAG.test(text) || BLOCK_TAG.test(text)) {
    return 'html';
  }
  return 'text';
}

export class StructuredDocumentConverter implements DocumentConverter {
  constructor(private readonly limits: ConversionLimits = DEFAULT_LIMITS) {}

  async convert(filePath: string): Promise<StructuredDocument> {
    const stats = await fs.stat(filePath);
    if (stats.size > this.limits.maxFileSizeBytes) {
      throw new ExternalToolError(
        TOOL_NAME,
        `file is ${stats.size} bytes, limit is ${this.limits.maxFileSizeBytes}`
      );
    }

    const data = await fs.readFile(filePath);
    const source = detectSourceKind(data);
    const filename = path.basename(filePath);
    const base = {
      name: path.parse(filename).name,
      source,
      origin: { filename, mimetype: SOURCE_MIMETYPES[source], sizeBytes: stats.size }
    };

    logger.debug('Parsing document', { filename, source, bytes: stats.size });

    switch (source) {
      case 'pdf': {
        const parsed = await parsePdf(data, this.limits.maxPages);
        return { ...base, pageCount: parsed.pageCount, nodes: parsed.nodes };
      }
      case 'docx': {
        const result = await mammoth.convertToHtml({ buffer: data });
        return { ...base, nodes: parseHtml(result.value).nodes };
      }
      case 'html':
        return { ...base, nodes: parseHtml(data.toString('utf8')).nodes };
      case 'text':
        return { ...base, nodes: paragraphsFromText(data.toString('utf8')) };
    }
  }
}

export class DocumentService {
  constructor(private readonly converter: DocumentConverter = new StructuredDocumentConverter()) {}

  /**
   * Convert a file to the requested output format.
   * An unknown format is rejected before the converter runs.
   */
  async convertFile(filePath: string, outputFormat: string): Promise<string> {
    if (!isOutputFormat(outputFormat)) {
      throw new ValidationError(
        `Unsupported output format: ${outputFormat} (expected one of ${OUTPUT_FORMATS.join(', ')})`,
        'UNSUPPORTED_FORMAT'
      );
    }

    let doc: StructuredDocument;
    try {
      doc = await this.converter.convert(filePath);
    } catch (error) {
      if (error instanceof ExternalToolError) throw error;
      throw new ExternalToolError(TOOL_NAME, errorMessage(error));
    }

    return EXPORTERS[outputFormat](doc);
  }
}
