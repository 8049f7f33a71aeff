/**
 * News module helpers
 */

import { ALL_CATEGORIES, type NewsCategory } from './types';

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/**
 * Decode the common character entities in a single pass, so "&amp;lt;"
 * becomes "&lt;" and not "<".
 */
export function decodeHtmlEntities(s: string): string {
  return s.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body[0] === '#') {
      const code = body[1] === 'x' || body[1] === 'X'
        ? parseInt(body.slice(2), 16)
        : parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

/**
 * Entities decoded, whitespace collapsed and trimmed. Markup is left alone,
 * so "<" and ">" in a headline survive.
 */
export function cleanText(text: string): string {
  return decodeHtmlEntities(text).replace(/\s+/g, ' ').trim();
}

/**
 * Plain text from an HTML fragment: script/style blocks dropped, tags
 * stripped, entities decoded, whitespace collapsed and trimmed. Only
 * "<" followed by a letter (or "/" and a letter) starts a tag.
 */
export function sanitizeHtml(html: string): string {
  const withoutTags = html
    .replace(/<script\b[^>]*>[\s\S]*?<\/script\s*>/gi, ' ')
    .replace(/<style\b[^>]*>[\s\S]*?<\/style\s*>/gi, ' ')
    .replace(/<\/?[a-z][^<>]*>/gi, ' ');

  return cleanText(withoutTags);
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Resolve a category name case-insensitively. An unknown value is a caller
 * bug, so it throws.
 */
export function parseCategory(value: string): NewsCategory {
  const needle = value.trim().toLowerCase();
  const match = ALL_CATEGORIES.find((c) => c.toLowerCase() === needle);
  if (!match) {
    throw new Error(`Unknown news category: "${value}"`);
  }
  return match;
}

/**
 * GET with a deadline. The signal stays armed while the caller reads the
 * body, so a stalled body read is cut off too.
 */
export function fetchWithTimeout(
  url: string,
  opts?: {
    timeoutMs?: number;
    headers?: Record<string, string>;
  }
): Promise<Response> {
  return fetch(url, {
    method: 'GET',
    headers: {
      Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
      ...opts?.headers,
    },
    signal: AbortSignal.timeout(opts?.timeoutMs ?? 15000),
  });
}
