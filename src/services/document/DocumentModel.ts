/**
 * In-memory structured document produced by the converter and consumed by the
 * exporters. Lives only for the duration of one request.
 */

/**
 * Inline formatting inside a block. Blocks without any formatting carry no runs.
 */
export type InlineRun =
  | { kind: 'text'; text: string }
  | { kind: 'strong'; text: string }
  | { kind: 'emphasis'; text: string }
  | { kind: 'code'; text: string }
  | { kind: 'link'; text: string; href: string };

export interface TextBlock {
  /** Plain text with whitespace collapsed */
  text: string;
  runs?: InlineRun[];
}

export type DocumentNode =
  | { kind: 'title'; text: string }
  | ({ kind: 'heading'; level: number } & TextBlock)
  | ({ kind: 'paragraph' } & TextBlock)
  | { kind: 'list'; ordered: boolean; items: TextBlock[] }
  | { kind: 'table'; rows: string[][] }
  | { kind: 'code'; text: string };

export type SourceKind = 'pdf' | 'html' | 'docx' | 'text';

export interface DocumentOrigin {
  filename: string;
  mimetype: string;
  sizeBytes: number;
}

export interface StructuredDocument {
  name: string;
  source: SourceKind;
  origin: DocumentOrigin;
  pageCount?: number;
  nodes: DocumentNode[];
}

export const SOURCE_MIMETYPES: Record<SourceKind, string> = {
  pdf: 'application/pdf',
  html: 'text/html',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  text: 'text/plain'
};

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Split plain text into paragraphs on blank lines, joining wrapped lines
 */
export function paragraphsFromText(text: string): DocumentNode[] {
  return text
    .replace(/\r\n?/g, '\n')
    .split(/\n[ \t]*\n/)
    .map(block => normalizeWhitespace(block))
    .filter(block => block.length > 0)
    .map(block => ({ kind: 'paragraph' as const, text: block }));
}

/**
 * Collapse whitespace across run boundaries and build a TextBlock.
 * Formatted runs never start or end with a space; the space moves into the
 * neighbouring text run. Returns null when nothing visible is left.
 */
export function textBlockFromRuns(raw: InlineRun[]): TextBlock | null {
  const runs: InlineRun[] = [];
  let pendingSpace = false;

  const appendText = (text: string): void => {
    const last = runs[runs.length - 1];
    if (last && last.kind === 'text') last.text += text;
    else runs.push({ kind: 'text', text });
  };

  for (const run of raw) {
    const collapsed = run.text.replace(/\s+/g, ' ');
    const core = collapsed.trim();
    if (collapsed.startsWith(' ')) pendingSpace = true;
    if (!core) continue;

    if (pendingSpace && runs.length > 0) appendText(' ');
    if (run.kind === 'text') appendText(core);
    else runs.push({ ...run, text: core });
    pendingSpace = collapsed.endsWith(' ');
  }

  if (runs.length === 0) return null;

  const text = runs.map(run => run.text).join('');
  return runs.some(run => run.kind !== 'text') ? { text, runs } : { text };
}
