import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { isTag, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import { DocumentNode, InlineRun, TextBlock, normalizeWhitespace, textBlockFromRuns } from './DocumentModel';

const DROPPED_TAGS = 'head, script, style, noscript, template, svg, iframe';

const BLOCK_TAGS = new Set([
  'address', 'article', 'aside', 'blockquote', 'details', 'dialog', 'div', 'dl', 'fieldset',
  'figcaption', 'figure', 'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header',
  'hr', 'li', 'main', 'nav', 'ol', 'p', 'pre', 'section', 'summary', 'table', 'ul'
]);

export interface ParsedHtml {
  title?: string;
  nodes: DocumentNode[];
}

export function parseHtml(html: string): ParsedHtml {
  const $ = cheerio.load(html);
  const title = normalizeWhitespace($('title').first().text()) || undefined;

  $(DROPPED_TAGS).remove();

  const nodes: DocumentNode[] = [];
  if (title) {
    nodes.push({ kind: 'title', text: title });
  }

  const body = $('body').get(0);
  if (body) {
    walkContainer($, body, nodes);
  }

  return { title, nodes };
}

function walkContainer($: CheerioAPI, container: Element, nodes: DocumentNode[]): void {
  let inline: AnyNode[] = [];

  const flush = (): void => {
    const block = inlineBlock($, inline);
    if (block) nodes.push({ kind: 'paragraph', ...block });
    inline = [];
  };

  for (const child of $(container).contents().toArray()) {
    if (isTag(child) && BLOCK_TAGS.has(child.tagName.toLowerCase())) {
      flush();
      walkBlock($, child, child.tagName.toLowerCase(), nodes);
    } else {
      inline.push(child);
    }
  }

  flush();
}

function inlineBlock($: CheerioAPI, content: AnyNode[]): TextBlock | null {
  const runs: InlineRun[] = [];
  collectInline($, content, runs);
  return textBlockFromRuns(runs);
}

/**
 * Flatten inline markup into runs. Formatting that wraps a link is dropped so
 * the link survives.
 */
function collectInline($: CheerioAPI, content: AnyNode[], runs: InlineRun[]): void {
  for (const node of content) {
    if (isText(node)) {
      runs.push({ kind: 'text', text: node.data });
      continue;
    }
    if (!isTag(node)) continue;

    const tag = node.tagName.toLowerCase();
    if (tag === 'br') {
      runs.push({ kind: 'text', text: ' ' });
      continue;
    }

    const text = $(node).text();
    switch (tag) {
      case 'a': {
        const href = (node.attribs.href || '').trim();
        if (href && !/^javascript:/i.test(href)) {
          runs.push({ kind: 'link', text, href });
          continue;
        }
        break;
      }
      case 'strong':
      case 'b':
      case 'em':
      case 'i': {
        if ($(node).find('a[href]').length === 0) {
          const kind: 'strong' | 'emphasis' = tag === 'strong' || tag === 'b' ? 'strong' : 'emphasis';
          runs.push({ kind, text });
          continue;
        }
        break;
      }
      case 'code':
      case 'kbd':
      case 'samp':
        runs.push({ kind: 'code', text });
        continue;
    }

    collectInline($, node.children, runs);
  }
}

function walkBlock($: CheerioAPI, element: Element, tag: string, nodes: DocumentNode[]): void {
  const heading = /^h([1-6])$/.exec(tag);
  if (heading) {
    const block = inlineBlock($, element.children);
    if (block) nodes.push({ kind: 'heading', level: Number(heading[1]), ...block });
    return;
  }

  switch (tag) {
    case 'p':
    case 'li':
    case 'summary':
    case 'figcaption': {
      const block = inlineBlock($, element.children);
      if (block) nodes.push({ kind: 'paragraph', ...block });
      return;
    }
    case 'ul':
    case 'ol': {
      const items = $(element)
        .children('li')
        .toArray()
        .map(item => inlineBlock($, item.children))
        .filter((item): item is TextBlock => item !== null);
      if (items.length > 0) nodes.push({ kind: 'list', ordered: tag === 'ol', items });
      return;
    }
    case 'table': {
      const rows = $(element)
        .find('tr')
        .toArray()
        .map(row =>
          $(row)
            .children('th, td')
            .toArray()
            .map(cell => normalizeWhitespace($(cell).text()))
        )
        .filter(row => row.length > 0);
      if (rows.length > 0) nodes.push({ kind: 'table', rows });
      return;
    }
    case 'pre': {
      const text = $(element).text().replace(/^\n+|\s+$/g, '');
      if (text) nodes.push({ kind: 'code', text });
      return;
    }
    case 'hr':
      return;
    default:
      walkContainer($, element, nodes);
  }
}
