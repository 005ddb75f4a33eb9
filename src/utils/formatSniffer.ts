/**
 * Best-guess file suffix from a declared content-type and/or URL path.
 * Only used to name temp files; conversion never branches on it.
 */

export type SniffedSuffix = '.pdf' | '.html' | '';

export interface SniffInput {
  url?: string;
  contentType?: string | null;
}

const CONTENT_TYPE_SUFFIXES = new Map<string, SniffedSuffix>([
  ['application/pdf', '.pdf'],
  ['text/html', '.html']
]);

const PATH_SUFFIXES: Array<[string, SniffedSuffix]> = [
  ['.pdf', '.pdf'],
  ['.html', '.html'],
  ['.htm', '.html']
];

function suffixFromContentType(contentType: string): SniffedSuffix {
  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  return CONTENT_TYPE_SUFFIXES.get(mediaType) ?? '';
}

function urlPath(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    // Not an absolute URL; drop query and fragment by hand
    return url.split(/[?#]/)[0];
  }
}

function suffixFromUrl(url: string): SniffedSuffix {
  const path = urlPath(url).toLowerCase();
  const match = PATH_SUFFIXES.find(([ending]) => path.endsWith(ending));
  return match ? match[1] : '';
}

export function guessSuffix({ url, contentType }: SniffInput): SniffedSuffix {
  if (contentType) {
    const fromType = suffixFromContentType(contentType);
    if (fromType) return fromType;
  }
  return url ? suffixFromUrl(url) : '';
}
