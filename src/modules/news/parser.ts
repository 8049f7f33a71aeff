/**
 * Feed Parser - RSS 2.0 / Atom to canonical Articles
 *
 * Flow: validate -> SAX events -> item state machine -> Article
 *
 * The document is checked for well-formedness up front, then streamed through
 * a SAX parser. Each call owns its own state, so concurrent fetches never
 * share a parser.
 */

import { randomUUID } from 'node:crypto';
import { XMLValidator } from 'fast-xml-parser';
import { Parser } from 'htmlparser2';
import type { Article, NewsSource } from './types';
import { parsePublishedDate } from './dates';
import { cleanText, isHttpUrl, sanitizeHtml } from './utils';

// ============================================================================
// Parser State
// ============================================================================

type ItemField = 'title' | 'link' | 'guid' | 'description' | 'content' | 'published' | 'updated';

type ItemAccumulator = Record<ItemField, string> & {
  imageUrl?: string;
};

type ActiveField = {
  field: ItemField;
  /** element that opened the field; nested markup keeps appending to it */
  element: string;
  depth: number;
};

type ParserState =
  | { kind: 'idle' }
  | { kind: 'in_item'; item: ItemAccumulator; active: ActiveField | null; depth: number };

const ITEM_ELEMENTS = new Set(['item', 'entry']);

const FIELD_BY_ELEMENT: Record<string, ItemField> = {
  'title': 'title',
  'link': 'link',
  'guid': 'guid',
  'id': 'guid',
  'description': 'description',
  'summary': 'description',
  'content:encoded': 'content',
  'content': 'content',
  'pubDate': 'published',
  'published': 'published',
  'dc:date': 'published',
  'updated': 'updated',
};

const IMAGE_ELEMENTS = new Set(['enclosure', 'media:content', 'media:thumbnail']);

function emptyItem(): ItemAccumulator {
  return {
    title: '',
    link: '',
    guid: '',
    description: '',
    content: '',
    published: '',
    updated: '',
  };
}

// ============================================================================
// Item -> Article
// ============================================================================

/**
 * Build an Article from one accumulated item, or null when the item lacks a
 * title or a usable link.
 */
function itemToArticle(item: ItemAccumulator, source: NewsSource, ingestedAt: Date): Article | null {
  const title = cleanText(item.title);
  const link = item.link.trim();
  const guid = item.guid.trim();

  const url = isHttpUrl(link) ? link : isHttpUrl(guid) ? guid : null;
  if (!title || !url) return null;

  const description = sanitizeHtml(item.description) || sanitizeHtml(item.content);
  const publishedAt =
    parsePublishedDate(item.published, ingestedAt) ??
    parsePublishedDate(item.updated, ingestedAt) ??
    ingestedAt;

  return {
    id: randomUUID(),
    title,
    source,
    url,
    publishedAt,
    category: source.category,
    description: description || undefined,
    imageUrl: item.imageUrl,
    isRead: false,
    isFavorite: false,
    isBreakingNews: false,
    importance: 5,
  };
}

// ============================================================================
// Parse
// ============================================================================

export type FeedParseResult =
  | { ok: true; articles: Article[]; skipped: number }
  | { ok: false; error: string };

const FEED_ROOTS = new Set(['rss', 'feed', 'rdf:RDF']);

/**
 * Parse one feed document. A document that is not well-formed, or whose root
 * is not rss/feed/rdf:RDF, fails as a whole; a malformed item is skipped
 * without affecting its siblings. Articles are in document order.
 */
export function parseFeed(xml: string, source: NewsSource, ingestedAt: Date = new Date()): FeedParseResult {
  const doc = xml.replace(/^\uFEFF/, '').trimStart();
  const validation = XMLValidator.validate(doc);
  if (validation !== true) {
    return { ok: false, error: `XML error at line ${validation.err.line}: ${validation.err.msg}` };
  }

  const articles: Article[] = [];
  let skipped = 0;
  const documentInfo: { root: string | null } = { root: null };
  let state: ParserState = { kind: 'idle' };

  const parser = new Parser(
    {
      onopentag(name, attribs) {
        documentInfo.root ??= name;

        if (ITEM_ELEMENTS.has(name)) {
          state = { kind: 'in_item', item: emptyItem(), active: null, depth: 0 };
          return;
        }
        if (state.kind !== 'in_item') return;

        state.depth++;
        const { item } = state;

        if (state.active) {
          if (name === state.active.element) state.active.depth++;
          // keep words in sibling blocks apart; whitespace is collapsed later
          item[state.active.field] += ' ';
          return;
        }

        if (IMAGE_ELEMENTS.has(name)) {
          // enclosures also carry audio/video
          if (attribs.type && !attribs.type.startsWith('image/')) return;
          const url = attribs.url?.trim();
          if (!item.imageUrl && url && isHttpUrl(url)) item.imageUrl = url;
          return;
        }

        // Atom: <link href="..." rel="alternate"/>
        if (name === 'link' && attribs.href) {
          const rel = attribs.rel ?? 'alternate';
          if (rel === 'alternate' && !item.link) item.link = attribs.href;
          return;
        }

        const field = FIELD_BY_ELEMENT[name];
        // Only direct children of the item carry its fields
        if (field && state.depth === 1) {
          state.active = { field, element: name, depth: 1 };
        }
      },

      ontext(text) {
        if (state.kind !== 'in_item' || !state.active) return;
        state.item[state.active.field] += text;
      },

      onclosetag(name) {
        if (state.kind !== 'in_item') return;

        if (ITEM_ELEMENTS.has(name) && state.depth === 0) {
          const article = itemToArticle(state.item, source, ingestedAt);
          if (article) articles.push(article);
          else skipped++;
          state = { kind: 'idle' };
          return;
        }

        state.depth--;
        if (!state.active) return;
        if (name === state.active.element) {
          state.active.depth--;
          if (state.active.depth === 0) {
            state.active = null;
            return;
          }
        }
        state.item[state.active.field] += ' ';
      },
    },
    { xmlMode: true }
  );

  parser.write(doc);
  parser.end();

  const { root } = documentInfo;
  if (root === null || !FEED_ROOTS.has(root)) {
    return { ok: false, error: `Not an RSS/Atom feed (root <${root ?? 'none'}>)` };
  }

  return { ok: true, articles, skipped };
}

/**
 * parseFeed() reduced to its articles; a failed document yields [].
 */
export function parseFeedXml(xml: string, source: NewsSource, ingestedAt: Date = new Date()): Article[] {
  const result = parseFeed(xml, source, ingestedAt);
  if (!result.ok) {
    console.warn(`[news/parser] ${source.name}: ${result.error}`);
    return [];
  }
  if (result.skipped > 0) {
    console.log(`[news/parser] ${source.name}: skipped ${result.skipped} item(s) without title or link`);
  }
  return result.articles;
}
