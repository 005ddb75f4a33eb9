import { OutputFormat } from '../../types';
import { DocumentNode, InlineRun, StructuredDocument, TextBlock } from './DocumentModel';

export function exportToMarkdown(doc: StructuredDocument): string {
  return doc.nodes.map(nodeToMarkdown).join('\n\n');
}

function nodeToMarkdown(node: DocumentNode): string {
  switch (node.kind) {
    case 'title':
      return `# ${node.text}`;
    case 'heading':
      return `${'#'.repeat(Math.min(Math.max(node.level, 1), 6))} ${blockToMarkdown(node)}`;
    case 'paragraph':
      return blockToMarkdown(node);
    case 'list':
      return node.items
        .map((item, index) => `${node.ordered ? `${index + 1}.` : '-'} ${blockToMarkdown(item)}`)
        .join('\n');
    case 'table':
      return tableToMarkdown(node.rows);
    case 'code':
      return '```\n' + node.text + '\n```';
  }
}

function blockToMarkdown(block: TextBlock): string {
  return block.runs ? block.runs.map(runToMarkdown).join('') : block.text;
}

function runToMarkdown(run: InlineRun): string {
  switch (run.kind) {
    case 'text':
      return run.text;
    case 'strong':
      return `**${run.text}**`;
    case 'emphasis':
      return `*${run.text}*`;
    case 'code': {
      const fence = run.text.includes('`') ? '``' : '`';
      return `${fence}${run.text}${fence}`;
    }
    case 'link':
      return `[${run.text.replace(/([[\]])/g, '\\$1')}](${markdownHref(run.href)})`;
  }
}

function markdownHref(href: string): string {
  return href.replace(/\s/g, '%20').replace(/\(/g, '%28').replace(/\)/g, '%29');
}

function tableToMarkdown(rows: string[][]): string {
  const width = Math.max(...rows.map(row => row.length));
  const pad = (row: string[]): string[] => Array.from({ length: width }, (_, i) => escapePipes(row[i] ?? ''));
  const [header, ...body] = rows.map(pad);
  const lines = [
    `| ${header.join(' | ')} |`,
    `| ${header.map(() => '---').join(' | ')} |`,
    ...body.map(row => `| ${row.join(' | ')} |`)
  ];
  return lines.join('\n');
}

function escapePipes(cell: string): string {
  return cell.replace(/\|/g, '\\|');
}

export function exportToText(doc: StructuredDocument): string {
  return doc.nodes
    .map(node => {
      switch (node.kind) {
        case 'list':
          return node.items.map(item => item.text).join('\n');
        case 'table':
          return node.rows.map(row => row.join('\t')).join('\n');
        default:
          return node.text;
      }
    })
    .join('\n\n');
}

export function exportToHtml(doc: StructuredDocument): string {
  const title = doc.nodes.find(node => node.kind === 'title');
  const head = `<head>\n<meta charset="UTF-8">\n<title>${escapeHtml(title ? title.text : doc.name)}</title>\n</head>`;
  const body = doc.nodes.map(nodeToHtml).join('\n');
  return `<!DOCTYPE html>\n<html>\n${head}\n<body>\n${body}\n</body>\n</html>`;
}

function nodeToHtml(node: DocumentNode): string {
  switch (node.kind) {
    case 'title':
      return `<h1>${escapeHtml(node.text)}</h1>`;
    case 'heading': {
      const level = Math.min(Math.max(node.level, 1), 6);
      return `<h${level}>${blockToHtml(node)}</h${level}>`;
    }
    case 'paragraph':
      return `<p>${blockToHtml(node)}</p>`;
    case 'list': {
      const tag = node.ordered ? 'ol' : 'ul';
      const items = node.items.map(item => `<li>${blockToHtml(item)}</li>`).join('');
      return `<${tag}>${items}</${tag}>`;
    }
    case 'table': {
      const [header, ...body] = node.rows;
      const headerRow = `<tr>${header.map(cell => `<th>${escapeHtml(cell)}</th>`).join('')}</tr>`;
      const bodyRows = body.map(row => `<tr>${row.map(cell => `<td>${escapeHtml(cell)}</td>`).join('')}</tr>`);
      return `<table>${[headerRow, ...bodyRows].join('')}</table>`;
    }
    case 'code':
      return `<pre><code>${escapeHtml(node.text)}</code></pre>`;
  }
}

function blockToHtml(block: TextBlock): string {
  return block.runs ? block.runs.map(runToHtml).join('') : escapeHtml(block.text);
}

function runToHtml(run: InlineRun): string {
  switch (run.kind) {
    case 'text':
      return escapeHtml(run.text);
    case 'strong':
      return `<strong>${escapeHtml(run.text)}</strong>`;
    case 'emphasis':
      return `<em>${escapeHtml(run.text)}</em>`;
    case 'code':
      return `<code>${escapeHtml(run.text)}</code>`;
    case 'link':
      return `<a href="${escapeHtml(run.href)}">${escapeHtml(run.text)}</a>`;
  }
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export interface DocumentDict {
  schema_name: 'StructuredDocument';
  version: string;
  name: string;
  source: StructuredDocument['source'];
  origin: StructuredDocument['origin'];
  page_count: number | null;
  nodes: DocumentNode[];
}

export function exportToDict(doc: StructuredDocument): DocumentDict {
  return {
    schema_name: 'StructuredDocument',
    version: '1.0.0',
    name: doc.name,
    source: doc.source,
    origin: { ...doc.origin },
    page_count: doc.pageCount ?? null,
    nodes: doc.nodes
  };
}

/**
 * JSON keeps non-ASCII characters as-is; JSON.stringify only escapes what JSON requires
 */
export function exportToJson(doc: StructuredDocument): string {
  return JSON.stringify(exportToDict(doc));
}

export const EXPORTERS: Record<OutputFormat, (doc: StructuredDocument) => string> = {
  markdown: exportToMarkdown,
  text: exportToText,
  html: exportToHtml,
  json: exportToJson
};
