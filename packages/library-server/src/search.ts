import type { BookRecord, MatchType, MetadataSearchResult, TopicSearchHit, TopicSearchResult } from '@libris/shared';
import { InputError } from './errors';
import { createMatcher, exactMatch, type Matcher } from './matching';
import { ensureIndex, FTS_TABLE, openIndex } from './search_index';
import type { TextProvider } from './text_cache';

export const MATCH_TYPES: readonly MatchType[] = ['exact', 'fuzzy'];

export function isMatchType(value: unknown): value is MatchType {
  return value === 'exact' || value === 'fuzzy';
}

const defaultMatcher = createMatcher({ fuzzy: true });

/**
 * Matches the query against title and author with `matcher` (fuzzy unless
 * one is given); the published date is always compared as an exact substring.
 */
export function searchMetadata(
  query: string,
  books: ReadonlyMap<string, BookRecord>,
  matcher: Matcher = defaultMatcher,
): MetadataSearchResult[] {
  const results: MetadataSearchResult[] = [];
  for (const [title, book] of books) {
    const titleMatch = matcher(query, title);
    const authorMatch = !!book.author && matcher(query, book.author);
    const yearMatch = !!book.published && exactMatch(query, book.published);
    if (titleMatch || authorMatch || yearMatch) {
      results.push({
        title: book.title,
        author: book.author || 'Unknown',
        published: book.published || 'Unknown',
        chapters: book.toc.slice(0, 5).map(t => t.label),
      });
    }
  }
  return results;
}

export interface TopicSearchRequest {
  topic?: string | null;
  topics?: string[] | null;
  limit?: number;
  offset?: number;
  bookFilter?: string | null;
  authorFilter?: string | null;
  matchType?: string;
}

export interface TopicSearchOptions {
  indexPath: string;
  textProvider?: TextProvider;
  forceRebuild?: boolean;
  /** Replaces the default `ensureIndex` call, e.g. to share one build between concurrent queries. */
  prepareIndex?: () => Promise<unknown>;
}

/** `topics` wins over `topic`; order-preserving de-duplication, blanks dropped. */
export function normalizeTopics(topic?: string | null, topics?: string[] | null): string[] {
  const raw = topics && topics.length ? topics : topic != null ? [topic] : [];
  const seen = new Set<string>();
  const out: string[] = [];
  for (const t of raw) {
    if (typeof t !== 'string' || !t.trim() || seen.has(t)) continue;
    seen.add(t);
    out.push(t);
  }
  return out;
}

/** Each topic becomes a quoted FTS5 phrase; any phrase may match. */
export function buildFtsQuery(topics: string[]): string {
  return topics.map(t => `"${t.replace(/"/g, '""')}"`).join(' OR ');
}

export function relevanceScore(raw: number | null | undefined): number {
  if (raw === null || raw === undefined || Number.isNaN(raw)) return 0;
  const bounded = Math.min(1, Math.max(0, 1 / (1 + Math.abs(raw))));
  return Math.round(bounded * 1000) / 1000;
}

interface HitRow {
  text: string;
  book_title: string;
  author: string;
  location: string;
  context_before: string;
  context_after: string;
  score: number | null;
}

interface CountRow {
  total: number;
}

function isCountRow(row: unknown): row is CountRow {
  return !!row && typeof row === 'object' && 'total' in row && typeof row.total === 'number';
}

function isHitRow(row: unknown): row is HitRow {
  return !!row && typeof row === 'object' && 'text' in row && 'book_title' in row && 'score' in row;
}

function filterClause(column: string, matchType: MatchType): string {
  return matchType === 'exact' ? `${column} = ? COLLATE NOCASE` : `instr(lower(${column}), lower(?)) > 0`;
}

/**
 * Full-text search for any of the topics, filtered and paginated. The index
 * is brought up to date with `books` first. `limit` 0 returns every match
 * from `offset` on.
 */
export async function searchTopic(
  request: TopicSearchRequest,
  books: ReadonlyMap<string, BookRecord>,
  options: TopicSearchOptions,
): Promise<TopicSearchResult> {
  const limit = request.limit ?? 10;
  const offset = request.offset ?? 0;
  const matchType = request.matchType ?? 'fuzzy';
  const topics = normalizeTopics(request.topic, request.topics);
  if (!topics.length) {
    return { total_results: 0, offset, limit, results: [] };
  }
  if (!isMatchType(matchType)) {
    throw new InputError("match_type must be 'exact' or 'fuzzy'", { matchType });
  }

  if (options.prepareIndex) {
    await options.prepareIndex();
  } else {
    await ensureIndex(books.values(), options.textProvider, options.indexPath, { forceRebuild: options.forceRebuild });
  }

  const where = [`${FTS_TABLE} MATCH ?`];
  const params: Array<string | number> = [buildFtsQuery(topics)];
  if (request.bookFilter) {
    where.push(filterClause('book_title', matchType));
    params.push(request.bookFilter);
  }
  if (request.authorFilter) {
    where.push(filterClause('author', matchType));
    params.push(request.authorFilter);
  }
  const whereSql = where.join(' AND ');

  const db = openIndex(options.indexPath);
  try {
    const countRow: unknown = db.prepare(`SELECT COUNT(*) AS total FROM ${FTS_TABLE} WHERE ${whereSql}`).get(...params);
    const total = isCountRow(countRow) ? countRow.total : 0;

    const pageSql = limit > 0 ? ' LIMIT ? OFFSET ?' : ' LIMIT -1 OFFSET ?';
    const pageParams = limit > 0 ? [...params, limit, offset] : [...params, offset];
    const rows: unknown[] = db
      .prepare(
        'SELECT text, book_title, author, location, context_before, context_after, '
          + `bm25(${FTS_TABLE}) AS score FROM ${FTS_TABLE} WHERE ${whereSql} `
          + 'ORDER BY score ASC, rowid ASC' + pageSql,
      )
      .all(...pageParams);

    const results: TopicSearchHit[] = rows.filter(isHitRow).map(row => ({
      text: row.text,
      book_title: row.book_title,
      author: row.author,
      location: row.location,
      context_before: row.context_before,
      context_after: row.context_after,
      relevance_score: relevanceScore(row.score),
    }));
    return { total_results: total, offset, limit, results };
  } finally {
    db.close();
  }
}
