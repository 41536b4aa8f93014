import type { MetadataSearchResult, TopicSearchResult } from '@libris/shared';
import { errorMessage, InputError, isInputError } from './errors';
import { isRecord, isStringArray } from './guards';
import type { LibraryOrchestrator } from './orchestrator';
import { isMatchType } from './search';
import { startTimer } from './telemetry';

export const MAX_LIMIT = 500;
export const BOOK_FIELDS = ['author', 'published', 'path'] as const;

export type BookField = (typeof BOOK_FIELDS)[number];

export interface ToolError {
  error: string;
}

export interface BookListing {
  title: string;
  author?: string;
  published?: string;
  path?: string;
}

export interface ListBooksResult {
  total: number;
  offset: number;
  limit: number;
  books: BookListing[];
}

export type ToolPayload = ListBooksResult | MetadataSearchResult[] | TopicSearchResult | ToolError;

export const TOOL_NAMES = ['list_books', 'search_books', 'find_topic'] as const;
export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some(t => t === name);
}

function isBookField(value: string): value is BookField {
  return BOOK_FIELDS.some(f => f === value);
}

function readCount(args: Record<string, unknown>, key: 'limit' | 'offset', fallback: number): number {
  const value = args[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new InputError(`${key} must be a non-negative integer`, { [key]: value });
  }
  if (key === 'limit' && value > MAX_LIMIT) {
    throw new InputError(`limit must be <= ${MAX_LIMIT}`, { limit: value });
  }
  return value;
}

function readOptionalString(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' && value ? value : undefined;
}

function ensureLoaded(orchestrator: LibraryOrchestrator): ToolError | undefined {
  return orchestrator.current.books.size ? undefined : { error: 'Books not loaded yet' };
}

export function list_books(orchestrator: LibraryOrchestrator, args: Record<string, unknown> = {}): ListBooksResult | ToolError {
  const limit = readCount(args, 'limit', 50);
  const offset = readCount(args, 'offset', 0);
  const include = new Set(isStringArray(args.include_fields) ? args.include_fields.filter(isBookField) : []);
  const notLoaded = ensureLoaded(orchestrator);
  if (notLoaded) return notLoaded;

  const sorted = orchestrator
    .listBooks()
    .map(book => ({ book, key: book.title.toLowerCase() }))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .map(entry => entry.book);
  const page = limit ? sorted.slice(offset, offset + limit) : sorted.slice(offset);
  const books = page.map(book => {
    const item: BookListing = { title: book.title };
    if (include.has('author')) item.author = book.author || 'Unknown';
    if (include.has('published')) item.published = book.published || 'Unknown';
    if (include.has('path')) item.path = book.path;
    return item;
  });
  return { total: sorted.length, offset, limit, books };
}

export function search_books(orchestrator: LibraryOrchestrator, args: Record<string, unknown> = {}): MetadataSearchResult[] | ToolError {
  const query = typeof args.query === 'string' ? args.query : '';
  const notLoaded = ensureLoaded(orchestrator);
  if (notLoaded) return notLoaded;
  return orchestrator.searchBooks(query);
}

export async function find_topic(orchestrator: LibraryOrchestrator, args: Record<string, unknown> = {}): Promise<TopicSearchResult | ToolError> {
  const topic = readOptionalString(args, 'topic');
  const topics = isStringArray(args.topics) ? args.topics : undefined;
  if (!topic && !topics?.length) {
    throw new InputError('topic or topics is required');
  }
  const limit = readCount(args, 'limit', 10);
  const offset = readCount(args, 'offset', 0);
  const matchType = args.match_type ?? 'fuzzy';
  if (!isMatchType(matchType)) {
    throw new InputError("match_type must be 'exact' or 'fuzzy'", { matchType });
  }
  const notLoaded = ensureLoaded(orchestrator);
  if (notLoaded) return notLoaded;

  return orchestrator.findTopic({
    topic,
    topics,
    limit,
    offset,
    bookFilter: readOptionalString(args, 'book_filter'),
    authorFilter: readOptionalString(args, 'author_filter'),
    matchType,
  });
}

/**
 * Dispatches a tool call. Invalid input and failures come back as
 * `{ error }` payloads rather than exceptions.
 */
export async function call_tool(orchestrator: LibraryOrchestrator, name: string, rawArgs: unknown): Promise<ToolPayload> {
  if (!isToolName(name)) return { error: `Unknown tool: ${name}` };
  const args = isRecord(rawArgs) ? rawArgs : {};
  const stop = startTimer('tool_call', { source: 'tools', tool: name });
  try {
    switch (name) {
      case 'list_books':
        return list_books(orchestrator, args);
      case 'search_books':
        return search_books(orchestrator, args);
      case 'find_topic':
        return await find_topic(orchestrator, args);
    }
  } catch (err) {
    if (!isInputError(err)) console.error(`[tools] error handling tool ${name}:`, err);
    return { error: errorMessage(err) };
  } finally {
    stop();
  }
}
