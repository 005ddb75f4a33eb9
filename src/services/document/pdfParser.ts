import pdfParse from 'pdf-parse';
import { ExternalToolError } from '../../errors';
import { DocumentNode, normalizeWhitespace, paragraphsFromText } from './DocumentModel';

export interface ParsedPdf {
  title?: string;
  pageCount: number;
  nodes: DocumentNode[];
}

export async function parsePdf(data: Buffer, maxPages: number): Promise<ParsedPdf> {
  // Text is only extracted for the first maxPages pages; numpages is the full count
  const result = await pdfParse(data, { max: maxPages });

  if (result.numpages > maxPages) {
    throw new ExternalToolError(
      'document-converter',
      `document has ${result.numpages} pages, limit is ${maxPages}`
    );
  }

  const rawTitle: unknown = result.info?.Title;
  const title = typeof rawTitle === 'string' ? normalizeWhitespace(rawTitle) || undefined : undefined;

  const nodes: DocumentNode[] = [];
  if (title) {
    nodes.push({ kind: 'title', text: title });
  }
  nodes.push(...paragraphsFromText(result.text || ''));

  return { title, pageCount: result.numpages, nodes };
}
