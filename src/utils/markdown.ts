/**
 * Markdown presentation helpers
 */

const EXCESS_BLANK_LINES = /\n[ \t]*\n(?:[ \t]*\n)+/g;

/**
 * Collapse runs of three or more consecutive newlines (blank lines may carry
 * stray spaces or tabs) down to exactly one empty line.
 */
export function collapseBlankLines(markdown: string): string {
  return markdown.replace(/\r\n?/g, '\n').replace(EXCESS_BLANK_LINES, '\n\n');
}

export function normalizeMarkdown(markdown: string): string {
  return collapseBlankLines(markdown).trim();
}
